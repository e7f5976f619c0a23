/**
 * METRICS CONTRACTS
 */

import type { ExpressionErrorKind } from '../../expression/index.js';

export type Column = Array<number | null>;

/**
 * Date-indexed table of metric columns. Every column has `dates.length`
 * entries; `null` marks an absent value.
 */
export interface MetricFrame {
  dates: string[];
  columns: Map<string, Column>;
}

export interface DerivedFailure {
  key: string;
  kind: ExpressionErrorKind;
  message: string;
}

export interface MetricsResult {
  frame: MetricFrame;
  failures: DerivedFailure[];
}

export interface CalculateOptions {
  start?: string;
  end?: string;
  /** Daily calendar index with carried-forward values (default true). */
  forwardFill?: boolean;
}

export interface LatestMetric {
  key: string;
  label: string;
  unit: string;
  date: string;
  value: number;
  /** Change and rolling statistics present on `date`, by configured name. */
  stats: Record<string, number>;
}

export type LatestValues = Record<string, LatestMetric>;
