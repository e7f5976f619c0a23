/**
 * METRICS SERVICE
 *
 * Loads raw observations from the series store and runs the calculator.
 */

import { errorMessage } from '../../../common/errors.js';
import { noopLogger, type Logger } from '../../../common/logger.js';
import type { MonitorConfig } from '../../../config/monitor.config.js';
import type { DateRange, SeriesPoint, SeriesStore } from '../../series/contracts/series.contracts.js';
import type { DerivedMetricsWriter } from '../../series/ingest/ingest.service.js';
import { alignSeries, columnPoints, lastValidIndex } from './metrics.frame.js';
import { calculateAllMetrics, calculateDerived } from './metrics.calculator.js';
import type {
  CalculateOptions,
  LatestMetric,
  LatestValues,
  MetricFrame,
  MetricsResult,
} from '../contracts/metrics.contracts.js';

export interface MetricsServiceDeps {
  config: MonitorConfig;
  store: SeriesStore;
  logger?: Logger;
}

export class MetricsService implements DerivedMetricsWriter {
  private readonly logger: Logger;

  constructor(private readonly deps: MetricsServiceDeps) {
    this.logger = deps.logger ?? noopLogger;
  }

  /**
   * Observations of every configured series that has any, keyed by series key.
   */
  async loadObservations(range?: DateRange): Promise<Map<string, SeriesPoint[]>> {
    const series = new Map<string, SeriesPoint[]>();
    for (const key of this.deps.config.seriesKeys) {
      const points = await this.deps.store.getObservations(key, range);
      if (points.length) series.set(key, points);
    }
    return series;
  }

  async loadBaseData(options: CalculateOptions = {}): Promise<MetricFrame> {
    const series = await this.loadObservations({ start: options.start, end: options.end });
    return alignSeries(series, options.forwardFill ?? true);
  }

  async calculateAll(options: CalculateOptions = {}): Promise<MetricsResult> {
    const frame = await this.loadBaseData(options);
    const { config } = this.deps;

    const result = calculateAllMetrics(frame, {
      derived: config.derived,
      changes: config.metricChanges,
      rolling: config.metricRolling,
    });

    for (const failure of result.failures) {
      this.logger.warn(
        { key: failure.key, kind: failure.kind, error: failure.message },
        '[Metrics] Derived metric skipped'
      );
    }

    return result;
  }

  // ═══════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════

  /**
   * Latest present value of every raw and derived key, with the change and
   * rolling statistics present on that same date.
   */
  async getLatestValues(result?: MetricsResult): Promise<LatestValues> {
    const { frame } = result ?? (await this.calculateAll());
    return latestValuesFromFrame(frame, this.deps.config);
  }

  /**
   * One metric value. `type` is "value" or a configured statistic name;
   * without `date` the latest present value is returned.
   */
  async getMetricValue(key: string, type = 'value', date?: string): Promise<number | null> {
    const { frame } = await this.calculateAll();
    const column = frame.columns.get(type === 'value' ? key : `${key}_${type}`);
    if (!column) return null;

    if (date) {
      const index = frame.dates.indexOf(date);
      return index >= 0 ? column[index] : null;
    }

    const index = lastValidIndex(column);
    return index >= 0 ? column[index] : null;
  }

  /**
   * Stored points of one key: observations for a raw series, the derived
   * cache for a derived metric. Unknown keys have no history.
   */
  async getHistory(key: string, range?: DateRange): Promise<SeriesPoint[]> {
    const { config, store } = this.deps;
    if (config.getDerived(key)) return store.getDerivedValues(key, range);
    if (config.getSeries(key)) return store.getObservations(key, range);
    return [];
  }

  // ═══════════════════════════════════════════════════════════════
  // DERIVED CACHE
  // ═══════════════════════════════════════════════════════════════

  /**
   * Recomputes derived series on the forward-filled frame and upserts every
   * present value. Returns rows written.
   */
  async storeDerivedMetrics(): Promise<number> {
    const frame = await this.loadBaseData();
    if (frame.dates.length === 0) return 0;

    const failures = calculateDerived(frame, this.deps.config.derived);
    const failed = new Set(failures.map(f => f.key));

    let total = 0;
    for (const key of this.deps.config.derivedKeys) {
      if (failed.has(key)) continue;
      try {
        const rows = await this.deps.store.upsertDerivedValues(key, columnPoints(frame, key));
        total += rows;
        this.logger.debug({ key, rows }, '[Metrics] Derived values stored');
      } catch (err) {
        this.logger.error({ key, error: errorMessage(err) }, '[Metrics] Could not store derived values');
      }
    }
    return total;
  }
}

export function latestValuesFromFrame(frame: MetricFrame, config: MonitorConfig): LatestValues {
  const latest: LatestValues = {};

  for (const key of [...config.seriesKeys, ...config.derivedKeys]) {
    const column = frame.columns.get(key);
    if (!column) continue;

    const index = lastValidIndex(column);
    if (index < 0) continue;
    const value = column[index];
    if (value === null) continue;

    const stats: Record<string, number> = {};
    for (const name of config.metricSuffixes) {
      const stat = frame.columns.get(`${key}_${name}`)?.[index];
      if (stat !== null && stat !== undefined) stats[name] = stat;
    }

    const { label, unit } = config.describe(key);
    const metric: LatestMetric = { key, label, unit, date: frame.dates[index], value, stats };
    latest[key] = metric;
  }

  return latest;
}
