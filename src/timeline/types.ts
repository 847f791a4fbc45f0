export type IntervalCategory = 'work' | 'exercise';

/**
 * Интервал на сетке недели, живёт только в рамках одного рендера
 */
export interface Interval {
  dayIndex: number; // 0 = понедельник
  startHour: number;
  endHour: number;
  category: IntervalCategory;
  label: string;
  colorKey: IntervalCategory;
}

export interface DayIntervals {
  intervals: Interval[];
  lastWorkEnd: number | null;
}

export type PrimitiveRole = 'grid' | 'work' | 'exercise' | 'dose' | 'patients' | 'note' | 'summary';

export type LineStyle = 'solid' | 'dashed' | 'dotted';

export type TextAnchor = 'start' | 'middle';

export type TextBaseline = 'middle' | 'bottom';

interface PrimitiveBase {
  role: PrimitiveRole;
  dayIndex: number | null; // null для линий сетки
}

export interface FilledRect extends PrimitiveBase {
  kind: 'rect';
  x: number;
  y: number;
  width: number;
  height: number;
  fill: string;
  stroke: string;
  opacity: number;
}

export interface Line extends PrimitiveBase {
  kind: 'line';
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  color: string;
  width: number;
  style: LineStyle;
  opacity: number;
}

/**
 * Непрозрачная плашка с подписью (метка дозы)
 */
export interface PointTag extends PrimitiveBase {
  kind: 'tag';
  x: number;
  y: number; // центр по вертикали
  width: number;
  height: number;
  fill: string;
  text: string;
  textColor: string;
  fontSize: number;
}

export interface TextFrame {
  x: number;
  y: number;
  width: number;
  height: number;
  fill: string;
  stroke: string;
  strokeWidth: number;
  opacity: number;
}

export interface TextBox extends PrimitiveBase {
  kind: 'text';
  x: number;
  y: number;
  text: string;
  color: string;
  fontSize: number;
  anchor: TextAnchor;
  baseline: TextBaseline;
  frame: TextFrame | null;
}

export type ScenePrimitive = FilledRect | Line | PointTag | TextBox;

export interface AxisTick {
  position: number;
  label: string;
}

export interface SceneColumn {
  dayIndex: number;
  date: string; // YYYY-MM-DD
  label: string;
  hasRecord: boolean;
}

export interface Scene {
  title: string;
  range: {
    x: [number, number];
    y: [number, number];
    yInverted: boolean;
  };
  xTicks: AxisTick[];
  yTicks: AxisTick[];
  axisLabels: { x: string; y: string };
  columns: SceneColumn[];
  primitives: ScenePrimitive[];
}

export interface ColumnMargins {
  block: number;
  dose: number;
  cartouche: number;
  text: number;
}

export interface TimelinePalette {
  work: string;
  exercise: string;
  dose: string;
  doseText: string;
  text: string;
  grid: string;
  noteFill: string;
  noteStroke: string;
}

export interface TimelineConfig {
  readonly visibleHourRange: readonly [number, number];
  readonly margins: Readonly<ColumnMargins>;
  readonly palette: Readonly<TimelinePalette>;
}

export interface TimelineConfigInput {
  visibleHourRange?: readonly [number, number];
  margins?: Partial<ColumnMargins>;
  palette?: Partial<TimelinePalette>;
}
