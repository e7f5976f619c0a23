/**
 * DASHBOARD — Types
 *
 * JSON shape consumed by the static dashboard page.
 */

import type { BreachSummary } from '../../alerts/contracts/alert.types.js';
import type { DerivedFailure } from '../../metrics/contracts/metrics.contracts.js';

export interface KeyMetricView {
  key: string;
  label: string;
  unit: string;
  category: string;
  value: number;
  d1: number | null;
  date: string;
}

export interface ChartSeriesView {
  key: string;
  label: string;
  dates: string[];
  values: number[];
}

export interface ChartView {
  title: string;
  type: 'line' | 'bar' | 'area';
  yLabel: string;
  height: number;
  referenceLine: number | null;
  series: ChartSeriesView[];
}

export interface TableRowView {
  key: string;
  label: string;
  unit: string;
  date: string;
  /** Requested columns present on `date` ("value" or a statistic name). */
  values: Record<string, number>;
}

export interface TableView {
  title: string;
  columns: string[];
  rows: TableRowView[];
}

export interface DashboardData {
  generatedAt: string;
  dateRange: { start: string; end: string };
  configVersion: string;
  keyMetrics: KeyMetricView[];
  charts: ChartView[];
  tables: TableView[];
  alerts: BreachSummary;
  failures: DerivedFailure[];
}
