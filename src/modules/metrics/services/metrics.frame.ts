/**
 * METRIC FRAME
 *
 * Aligns raw series onto one date index.
 */

import { dailyRange } from '../../../common/dates.js';
import type { SeriesPoint } from '../../series/contracts/series.contracts.js';
import type { Column, MetricFrame } from '../contracts/metrics.contracts.js';

export function emptyFrame(): MetricFrame {
  return { dates: [], columns: new Map() };
}

/**
 * Builds a frame from per-key observations (each sorted ascending).
 *
 * With `forwardFill` the index is every calendar day between the earliest and
 * latest observation and each column repeats its last known value; days
 * before a series' first observation stay null. Without it the index is the
 * sorted union of observation dates.
 */
export function alignSeries(series: ReadonlyMap<string, SeriesPoint[]>, forwardFill: boolean): MetricFrame {
  const allDates = new Set<string>();
  for (const points of series.values()) {
    for (const p of points) allDates.add(p.date);
  }
  if (allDates.size === 0) return emptyFrame();

  const sorted = [...allDates].sort();
  const dates = forwardFill ? dailyRange(sorted[0], sorted[sorted.length - 1]) : sorted;

  const columns = new Map<string, Column>();
  for (const [key, points] of series) {
    if (points.length === 0) continue;

    const byDate = new Map(points.map(p => [p.date, p.value]));
    const column: Column = [];
    let carried: number | null = null;

    for (const date of dates) {
      const value = byDate.get(date);
      if (value !== undefined) {
        carried = value;
        column.push(value);
      } else {
        column.push(forwardFill ? carried : null);
      }
    }
    columns.set(key, column);
  }

  return { dates, columns };
}

/**
 * Index of the last non-null entry, or -1.
 */
export function lastValidIndex(column: Column): number {
  for (let i = column.length - 1; i >= 0; i--) {
    if (column[i] !== null) return i;
  }
  return -1;
}

/**
 * Present (date, value) pairs of a column.
 */
export function columnPoints(frame: MetricFrame, key: string): SeriesPoint[] {
  const column = frame.columns.get(key);
  if (!column) return [];

  const points: SeriesPoint[] = [];
  column.forEach((value, i) => {
    if (value !== null) points.push({ date: frame.dates[i], value });
  });
  return points;
}
