/**
 * DASHBOARD SERVICE
 *
 * Assembles the dashboard export: key metrics, chart series (not
 * forward-filled), latest-value tables and current breaches.
 */

import fs from 'fs';
import path from 'path';
import { addDays, todayIso, systemClock, type Clock } from '../../../common/dates.js';
import { NotFoundError, errorMessage } from '../../../common/errors.js';
import { noopLogger, type Logger } from '../../../common/logger.js';
import type { MonitorConfig } from '../../../config/monitor.config.js';
import type { BreachSummary } from '../../alerts/contracts/alert.types.js';
import type { LatestValues, MetricFrame, MetricsResult, CalculateOptions } from '../../metrics/contracts/metrics.contracts.js';
import { columnPoints } from '../../metrics/services/metrics.frame.js';
import type {
  ChartView,
  DashboardData,
  KeyMetricView,
  TableView,
} from '../contracts/dashboard.types.js';

export interface DashboardMetricsSource {
  calculateAll(options?: CalculateOptions): Promise<MetricsResult>;
  getLatestValues(result?: MetricsResult): Promise<LatestValues>;
}

export interface DashboardAlertsSource {
  getBreachSummary(): Promise<BreachSummary>;
}

export interface DashboardServiceDeps {
  config: MonitorConfig;
  metrics: DashboardMetricsSource;
  alerts: DashboardAlertsSource;
  logger?: Logger;
  clock?: Clock;
}

const round4 = (value: number) => Math.round(value * 10_000) / 10_000;

export class DashboardService {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly deps: DashboardServiceDeps) {
    this.logger = deps.logger ?? noopLogger;
    this.clock = deps.clock ?? systemClock;
  }

  async buildDashboardData(options: { days?: number } = {}): Promise<DashboardData> {
    const days = options.days ?? 365;
    const end = todayIso(this.clock);
    const start = addDays(end, -days);

    const chartResult = await this.deps.metrics.calculateAll({ start, end, forwardFill: false });
    if (chartResult.frame.dates.length === 0) {
      throw new NotFoundError(`No data available between ${start} and ${end}`);
    }

    const latest = await this.deps.metrics.getLatestValues();
    const alerts = await this.loadAlerts();

    return {
      generatedAt: this.clock.now().toISOString(),
      dateRange: { start, end },
      configVersion: this.deps.config.version,
      keyMetrics: this.buildKeyMetrics(latest),
      charts: this.buildCharts(chartResult.frame),
      tables: this.buildTables(latest),
      alerts,
      failures: chartResult.failures,
    };
  }

  /**
   * Writes the export as pretty JSON and returns the absolute path.
   */
  async exportToFile(outFile: string, options: { days?: number } = {}): Promise<string> {
    const data = await this.buildDashboardData(options);
    const resolved = path.resolve(outFile);

    await fs.promises.mkdir(path.dirname(resolved), { recursive: true });
    await fs.promises.writeFile(resolved, JSON.stringify(data, null, 2), 'utf-8');

    this.logger.info(
      {
        file: resolved,
        charts: data.charts.length,
        tables: data.tables.length,
        critical: data.alerts.critical.length,
        warning: data.alerts.warning.length,
      },
      '[Dashboard] Export written'
    );
    return resolved;
  }

  // ═══════════════════════════════════════════════════════════════
  // SECTIONS
  // ═══════════════════════════════════════════════════════════════

  private async loadAlerts(): Promise<BreachSummary> {
    try {
      return await this.deps.alerts.getBreachSummary();
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, '[Dashboard] Could not evaluate alerts');
      return { critical: [], warning: [], info: [] };
    }
  }

  private buildKeyMetrics(latest: LatestValues): KeyMetricView[] {
    const views: KeyMetricView[] = [];
    for (const def of this.deps.config.panel.keyMetrics) {
      const metric = latest[def.key];
      if (!metric) continue;
      views.push({
        key: def.key,
        label: def.label ?? metric.label,
        unit: metric.unit,
        category: def.category,
        value: metric.value,
        d1: metric.stats.d1 ?? null,
        date: metric.date,
      });
    }
    return views;
  }

  private buildCharts(frame: MetricFrame): ChartView[] {
    const charts: ChartView[] = [];

    for (const def of this.deps.config.panel.charts) {
      const available = def.series.filter(key => frame.columns.has(key));
      if (available.length === 0) continue;

      charts.push({
        title: def.title,
        type: def.chartType,
        yLabel: def.yAxisLabel,
        height: def.height,
        referenceLine: def.referenceLine ?? null,
        series: available.map(key => {
          const points = columnPoints(frame, key);
          return {
            key,
            label: this.deps.config.describe(key).label,
            dates: points.map(p => p.date),
            values: points.map(p => round4(p.value)),
          };
        }),
      });
    }

    return charts;
  }

  private buildTables(latest: LatestValues): TableView[] {
    return this.deps.config.panel.tables.map(def => ({
      title: def.title,
      columns: def.showColumns,
      rows: def.series.flatMap(key => {
        const metric = latest[key];
        if (!metric) return [];

        const values: Record<string, number> = {};
        for (const column of def.showColumns) {
          if (column === 'value') values.value = metric.value;
          else if (Object.hasOwn(metric.stats, column)) values[column] = metric.stats[column];
        }
        return [{ key, label: metric.label, unit: metric.unit, date: metric.date, values }];
      }),
    }));
  }
}
