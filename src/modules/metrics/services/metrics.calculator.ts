/**
 * METRICS CALCULATOR
 *
 * Pure column math over a MetricFrame: derived expressions, period changes
 * and rolling statistics. Absent inputs always produce absent outputs.
 */

import {
  ExpressionError,
  compileExpression,
  evaluate,
  type CompiledExpression,
} from '../../expression/index.js';
import { errorMessage } from '../../../common/errors.js';
import type {
  ChangeDefinition,
  DerivedDefinition,
  RollingDefinition,
} from '../../../config/monitor.config.js';
import type { Column, DerivedFailure, MetricFrame, MetricsResult } from '../contracts/metrics.contracts.js';

// ═══════════════════════════════════════════════════════════════
// CHANGES
// ═══════════════════════════════════════════════════════════════

export function diff(column: Column, periods: number): Column {
  return column.map((value, i) => {
    const prev = i >= periods ? column[i - periods] : null;
    return value === null || prev === null ? null : value - prev;
  });
}

/**
 * Percent change over `periods` rows, absent when the earlier value is 0.
 */
export function pctChange(column: Column, periods: number): Column {
  return column.map((value, i) => {
    const prev = i >= periods ? column[i - periods] : null;
    if (value === null || prev === null || prev === 0) return null;
    return ((value - prev) / prev) * 100;
  });
}

// ═══════════════════════════════════════════════════════════════
// ROLLING
// ═══════════════════════════════════════════════════════════════

interface WindowStats {
  mean: number;
  std: number | null;
}

/**
 * Mean and sample standard deviation of the `window` values ending at `end`.
 * Null unless every value in the window is present.
 */
function windowStats(column: Column, end: number, window: number): WindowStats | null {
  if (end + 1 < window) return null;

  const values: number[] = [];
  for (let i = end - window + 1; i <= end; i++) {
    const v = column[i];
    if (v === null) return null;
    values.push(v);
  }

  const mean = values.reduce((sum, v) => sum + v, 0) / window;
  if (window < 2) return { mean, std: null };

  const min = Math.min(...values);
  const max = Math.max(...values);
  if (min === max) return { mean: min, std: 0 };

  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (window - 1);
  return { mean, std: Math.sqrt(variance) };
}

export function rollingMean(column: Column, window: number): Column {
  return column.map((_, i) => windowStats(column, i, window)?.mean ?? null);
}

export function rollingStd(column: Column, window: number): Column {
  return column.map((_, i) => windowStats(column, i, window)?.std ?? null);
}

/**
 * (value - rolling mean) / rolling std; absent when std is 0.
 */
export function zscore(column: Column, window: number): Column {
  return column.map((value, i) => {
    const stats = windowStats(column, i, window);
    if (value === null || !stats || stats.std === null || stats.std === 0) return null;
    return (value - stats.mean) / stats.std;
  });
}

export function applyChange(column: Column, def: ChangeDefinition): Column {
  return def.type === 'diff' ? diff(column, def.periods) : pctChange(column, def.periods);
}

export function applyRolling(column: Column, def: RollingDefinition): Column {
  switch (def.type) {
    case 'rolling_mean':
      return rollingMean(column, def.window);
    case 'rolling_std':
      return rollingStd(column, def.window);
    case 'zscore':
      return zscore(column, def.window);
  }
}

// ═══════════════════════════════════════════════════════════════
// DERIVED
// ═══════════════════════════════════════════════════════════════

function evaluateColumn(frame: MetricFrame, compiled: CompiledExpression): Column {
  const inputs = compiled.variables.map(name => ({ name, column: frame.columns.get(name) ?? [] }));

  return frame.dates.map((_, i) => {
    const scope: Record<string, number> = {};
    for (const { name, column } of inputs) {
      const v = column[i];
      if (v === null || v === undefined) return null;
      scope[name] = v;
    }

    const result = evaluate(compiled, scope);
    const numeric = typeof result === 'boolean' ? Number(result) : result;
    return Number.isFinite(numeric) ? numeric : null;
  });
}

/**
 * Adds one column per derived definition, in order. Each expression sees
 * the columns already in the frame (raw series and earlier derived metrics).
 * A definition that fails to compile is reported and skipped.
 */
export function calculateDerived(frame: MetricFrame, definitions: readonly DerivedDefinition[]): DerivedFailure[] {
  const failures: DerivedFailure[] = [];

  for (const def of definitions) {
    try {
      const compiled = compileExpression(def.expr, frame.columns.keys());
      frame.columns.set(def.key, evaluateColumn(frame, compiled));
    } catch (err) {
      failures.push({
        key: def.key,
        kind: err instanceof ExpressionError ? err.kind : 'SYNTAX',
        message: errorMessage(err),
      });
    }
  }

  return failures;
}

// ═══════════════════════════════════════════════════════════════
// ALL METRICS
// ═══════════════════════════════════════════════════════════════

export interface MetricDefinitions {
  derived: readonly DerivedDefinition[];
  changes: readonly ChangeDefinition[];
  rolling: readonly RollingDefinition[];
}

/**
 * Derived columns first, then `<key>_<name>` change and rolling columns
 * for every raw and derived column. Mutates and returns `frame`.
 */
export function calculateAllMetrics(frame: MetricFrame, defs: MetricDefinitions): MetricsResult {
  if (frame.dates.length === 0) return { frame, failures: [] };

  const failures = calculateDerived(frame, defs.derived);
  const baseKeys = [...frame.columns.keys()];

  for (const key of baseKeys) {
    const column = frame.columns.get(key) ?? [];
    for (const def of defs.changes) {
      frame.columns.set(`${key}_${def.name}`, applyChange(column, def));
    }
    for (const def of defs.rolling) {
      frame.columns.set(`${key}_${def.name}`, applyRolling(column, def));
    }
  }

  return { frame, failures };
}
