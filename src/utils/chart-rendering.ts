/**
 * Pressure Chart Rendering
 *
 * Renders a snapshot history as a self-contained SVG polyline with a dashed
 * zero line. Pressure 0 sits on the vertical centre; +100 and -100 touch the
 * padded top and bottom edges.
 */

import { Snapshot } from '../models/snapshot';

export interface ChartOptions {
  width: number;
  height: number;
  padding: number;
  color: string;
}

export interface ChartPoint {
  x: number;
  y: number;
}

export const FULL_CHART: ChartOptions = {
  width: 600,
  height: 200,
  padding: 20,
  color: '#a855f7',
};

export const SPARKLINE_CHART: ChartOptions = {
  width: 120,
  height: 40,
  padding: 5,
  color: '#22c55e',
};

/**
 * Map snapshots onto drawing coordinates.
 * A single snapshot lands on the left padding edge.
 */
export function computeChartPoints(
  snapshots: Pick<Snapshot, 'pressure_index'>[],
  options: Pick<ChartOptions, 'width' | 'height' | 'padding'>
): ChartPoint[] {
  const { width, height, padding } = options;
  const step = (width - 2 * padding) / Math.max(snapshots.length - 1, 1);
  const centre = height / 2;
  const amplitude = height / 2 - padding;

  return snapshots.map((snapshot, index) => ({
    x: padding + index * step,
    y: centre - (snapshot.pressure_index * amplitude) / 100,
  }));
}

/**
 * Render the pressure chart
 *
 * @returns SVG markup, or an empty string when there is nothing to draw
 */
export function renderPressureChart(
  snapshots: Pick<Snapshot, 'pressure_index'>[],
  options: ChartOptions = FULL_CHART
): string {
  if (snapshots.length === 0) {
    return '';
  }

  const { width, height, padding, color } = options;
  const gradientId = `grad-${color.replace(/#/g, '')}`;
  const points = computeChartPoints(snapshots, options)
    .map((point) => `${point.x},${point.y}`)
    .join(' ');

  return [
    `<svg width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" xmlns="http://www.w3.org/2000/svg">`,
    '<defs>',
    `<linearGradient id="${gradientId}" x1="0%" y1="0%" x2="100%" y2="0%">`,
    `<stop offset="0%" style="stop-color:${color};stop-opacity:0.2" />`,
    `<stop offset="100%" style="stop-color:${color};stop-opacity:1" />`,
    '</linearGradient>',
    '</defs>',
    `<line x1="${padding}" y1="${height / 2}" x2="${width - padding}" y2="${height / 2}" stroke="rgba(255,255,255,0.1)" stroke-dasharray="4"/>`,
    `<polyline points="${points}" fill="none" stroke="url(#${gradientId})" stroke-width="3" stroke-linejoin="round" />`,
    '</svg>',
  ].join('');
}

/**
 * Compact chart for match cards
 */
export function renderSparkline(snapshots: Pick<Snapshot, 'pressure_index'>[]): string {
  return renderPressureChart(snapshots, SPARKLINE_CHART);
}
