import type { LineStyle, Scene } from '../../../src/timeline/types';

export interface PlotPadding {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface ProjectionBox {
  width: number;
  height: number;
  padding: PlotPadding;
}

export interface SceneProjection {
  plot: { left: number; top: number; width: number; height: number };
  x: (value: number) => number;
  y: (value: number) => number;
  dx: (span: number) => number;
  dy: (span: number) => number;
  rectTop: (y: number, height: number) => number;
  fontPx: (points: number) => number;
}

export const DEFAULT_PROJECTION_BOX: ProjectionBox = {
  width: 980,
  height: 720,
  padding: { top: 48, right: 16, bottom: 48, left: 56 },
};

const POINTS_TO_PX = 4 / 3;

/**
 * Переводит координаты сцены (дни x часы) в пиксели SVG
 */
export const createSceneProjection = (scene: Scene, box: ProjectionBox = DEFAULT_PROJECTION_BOX): SceneProjection => {
  const { padding } = box;
  const plot = {
    left: padding.left,
    top: padding.top,
    width: Math.max(0, box.width - padding.left - padding.right),
    height: Math.max(0, box.height - padding.top - padding.bottom),
  };

  const [minX, maxX] = scene.range.x;
  const [minY, maxY] = scene.range.y;
  const spanX = maxX - minX || 1;
  const spanY = maxY - minY || 1;

  const dx = (span: number) => (span / spanX) * plot.width;
  const dy = (span: number) => (span / spanY) * plot.height;
  const x = (value: number) => plot.left + dx(value - minX);
  // При yInverted меньшие часы сверху
  const y = (value: number) => plot.top + (scene.range.yInverted ? dy(value - minY) : dy(maxY - value));

  return {
    plot,
    x,
    y,
    dx,
    dy,
    rectTop: (top, height) => (scene.range.yInverted ? y(top) : y(top + height)),
    fontPx: (points) => points * POINTS_TO_PX,
  };
};

export const dashArrayFor = (style: LineStyle): string | undefined => {
  switch (style) {
    case 'dashed':
      return '6 4';
    case 'dotted':
      return '1 3';
    default:
      return undefined;
  }
};
