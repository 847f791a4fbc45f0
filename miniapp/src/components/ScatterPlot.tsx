import React from 'react';
import type { CorrelationResult } from '../../../src/stats/correlation';

interface ScatterPlotProps {
  result: CorrelationResult;
  xLabel: string;
  yLabel: string;
  width?: number;
  height?: number;
}

const PADDING = 40;

const extent = (values: number[]): [number, number] => {
  if (values.length === 0) {
    return [0, 1];
  }
  const min = Math.min(...values);
  const max = Math.max(...values);
  // Одна точка или одинаковые значения: расширяем диапазон
  return min === max ? [min - 1, max + 1] : [min, max];
};

const ScatterPlot: React.FC<ScatterPlotProps> = ({ result, xLabel, yLabel, width = 480, height = 320 }) => {
  const [minX, maxX] = extent(result.points.map((point) => point.x));
  const [minY, maxY] = extent(result.points.map((point) => point.y));

  const toX = (value: number) => PADDING + ((value - minX) / (maxX - minX)) * (width - 2 * PADDING);
  const toY = (value: number) => height - PADDING - ((value - minY) / (maxY - minY)) * (height - 2 * PADDING);

  const { fit } = result;

  return (
    <svg className="scatter-plot" viewBox={`0 0 ${width} ${height}`} role="img" aria-label={`${yLabel} vs ${xLabel}`}>
      <line x1={PADDING} y1={height - PADDING} x2={width - PADDING} y2={height - PADDING} stroke="#999" />
      <line x1={PADDING} y1={PADDING} x2={PADDING} y2={height - PADDING} stroke="#999" />

      {result.points.map((point) => (
        <circle key={point.date} cx={toX(point.x)} cy={toY(point.y)} r={5} fill="#1f77b4" fillOpacity={0.8}>
          <title>{`${point.date}: ${point.x}, ${point.y}`}</title>
        </circle>
      ))}

      {fit && (
        <line
          className="scatter-plot__fit"
          x1={toX(minX)}
          y1={toY(fit.slope * minX + fit.intercept)}
          x2={toX(maxX)}
          y2={toY(fit.slope * maxX + fit.intercept)}
          stroke="red"
          strokeWidth={2}
        />
      )}

      <text x={width / 2} y={height - 8} textAnchor="middle" fontSize={12}>
        {xLabel}
      </text>
      <text transform={`translate(12 ${height / 2}) rotate(-90)`} textAnchor="middle" fontSize={12}>
        {yLabel}
      </text>
    </svg>
  );
};

export default ScatterPlot;
