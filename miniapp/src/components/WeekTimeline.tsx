import React from 'react';
import type { Scene, ScenePrimitive } from '../../../src/timeline/types';
import {
  createSceneProjection,
  dashArrayFor,
  DEFAULT_PROJECTION_BOX,
  type ProjectionBox,
  type SceneProjection,
} from '../utils/sceneProjection';
import './WeekTimeline.css';

interface WeekTimelineProps {
  scene: Scene;
  box?: ProjectionBox;
}

const TICK_FONT_PX = 12;

const renderPrimitive = (primitive: ScenePrimitive, projection: SceneProjection, key: string) => {
  const { x, y, dx, dy, rectTop, fontPx } = projection;

  switch (primitive.kind) {
    case 'rect':
      return (
        <rect
          key={key}
          className={`timeline-${primitive.role}`}
          x={x(primitive.x)}
          y={rectTop(primitive.y, primitive.height)}
          width={dx(primitive.width)}
          height={dy(primitive.height)}
          fill={primitive.fill}
          stroke={primitive.stroke}
          fillOpacity={primitive.opacity}
        />
      );
    case 'line':
      return (
        <line
          key={key}
          className={`timeline-${primitive.role}`}
          x1={x(primitive.x1)}
          y1={y(primitive.y1)}
          x2={x(primitive.x2)}
          y2={y(primitive.y2)}
          stroke={primitive.color}
          strokeWidth={primitive.width}
          strokeDasharray={dashArrayFor(primitive.style)}
          strokeOpacity={primitive.opacity}
        />
      );
    case 'tag': {
      const height = dy(primitive.height);
      return (
        <g key={key} className={`timeline-${primitive.role}`}>
          <rect x={x(primitive.x)} y={y(primitive.y) - height / 2} width={dx(primitive.width)} height={height} fill={primitive.fill} />
          <text
            x={x(primitive.x + primitive.width / 2)}
            y={y(primitive.y)}
            fill={primitive.textColor}
            fontSize={fontPx(primitive.fontSize)}
            textAnchor="middle"
            dominantBaseline="central"
          >
            {primitive.text}
          </text>
        </g>
      );
    }
    case 'text': {
      const { frame } = primitive;
      return (
        <g key={key} className={`timeline-${primitive.role}`}>
          {frame && (
            <rect
              x={x(frame.x)}
              y={rectTop(frame.y, frame.height)}
              width={dx(frame.width)}
              height={dy(frame.height)}
              rx={4}
              fill={frame.fill}
              stroke={frame.stroke}
              strokeWidth={frame.strokeWidth}
              opacity={frame.opacity}
            />
          )}
          <text
            x={x(primitive.x)}
            y={y(primitive.y)}
            fill={primitive.color}
            fontSize={fontPx(primitive.fontSize)}
            textAnchor={primitive.anchor}
            dominantBaseline={primitive.baseline === 'middle' ? 'central' : 'text-after-edge'}
          >
            {primitive.text}
          </text>
        </g>
      );
    }
    default:
      return null;
  }
};

const WeekTimeline: React.FC<WeekTimelineProps> = ({ scene, box = DEFAULT_PROJECTION_BOX }) => {
  const projection = createSceneProjection(scene, box);
  const { plot, x, y } = projection;

  return (
    <svg
      className="week-timeline"
      viewBox={`0 0 ${box.width} ${box.height}`}
      role="img"
      aria-label={scene.title}
    >
      <text className="week-timeline__title" x={box.width / 2} y={box.padding.top / 2} textAnchor="middle">
        {scene.title}
      </text>

      {scene.xTicks.map((tick) => (
        <text
          key={`x-${tick.position}`}
          className="week-timeline__tick"
          x={x(tick.position)}
          y={plot.top - 6}
          fontSize={TICK_FONT_PX}
          textAnchor="middle"
        >
          {tick.label}
        </text>
      ))}

      {scene.yTicks.map((tick) => (
        <text
          key={`y-${tick.position}`}
          className="week-timeline__tick"
          x={plot.left - 6}
          y={y(tick.position)}
          fontSize={TICK_FONT_PX}
          textAnchor="end"
          dominantBaseline="central"
        >
          {tick.label}
        </text>
      ))}

      <text
        className="week-timeline__axis-label"
        x={plot.left + plot.width / 2}
        y={box.height - 12}
        fontSize={TICK_FONT_PX}
        textAnchor="middle"
      >
        {scene.axisLabels.x}
      </text>
      <text
        className="week-timeline__axis-label"
        transform={`translate(14 ${plot.top + plot.height / 2}) rotate(-90)`}
        fontSize={TICK_FONT_PX}
        textAnchor="middle"
      >
        {scene.axisLabels.y}
      </text>

      {scene.primitives.map((primitive, index) => renderPrimitive(primitive, projection, `p-${index}`))}
    </svg>
  );
};

export default WeekTimeline;
