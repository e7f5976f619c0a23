/**
 * Dashboard Service Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NotFoundError } from '../../../common/errors.js';
import { parseMonitorConfig } from '../../../config/monitor.config.js';
import { AlertMonitor } from '../../alerts/services/alert.monitor.js';
import { MemoryAlertStore } from '../../alerts/storage/memory.alert.store.js';
import { MetricsService } from '../../metrics/services/metrics.service.js';
import { MemorySeriesStore } from '../../series/storage/memory.series.store.js';
import { DashboardService } from '../services/dashboard.service.js';
import type { DashboardData } from '../contracts/dashboard.types.js';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const clock = { now: () => new Date('2024-01-05T12:00:00Z') };

const config = parseMonitorConfig({
  version: 'test',
  series: [
    { key: 'effr', seriesId: 'EFFR', label: 'EFFR', unit: 'percent' },
    { key: 'walcl', seriesId: 'WALCL', label: 'Fed Assets', unit: 'usd_millions', frequency: 'weekly' },
  ],
  derived: [{ key: 'effr_bps', expr: 'effr * 100', label: 'EFFR bps', unit: 'bps' }],
  metrics: {
    changes: [{ name: 'd1', type: 'diff', periods: 1 }],
  },
  alerts: [{ key: 'effr', rule: 'value > 5', severity: 'critical', note: 'Above 5%' }],
  panel: {
    keyMetrics: [
      { key: 'effr_bps', label: 'EFFR (bps)', category: 'rates' },
      { key: 'not_loaded' },
    ],
    charts: [
      { title: 'Rates', series: ['effr', 'not_loaded'], yAxisLabel: '%' },
      { title: 'Empty', series: ['not_loaded'] },
    ],
    tables: [{ title: 'Latest', series: ['effr', 'walcl', 'not_loaded'], showColumns: ['value', 'd1', 'ma5'] }],
  },
});

describe('DashboardService', () => {
  let store: MemorySeriesStore;
  let metrics: MetricsService;
  let service: DashboardService;

  beforeEach(async () => {
    vi.clearAllMocks();
    store = new MemorySeriesStore();
    await store.upsertObservations('effr', [
      { date: '2024-01-02', value: 5.33 },
      { date: '2024-01-03', value: 5.33333 },
      { date: '2024-01-04', value: 5.35 },
    ]);
    await store.upsertObservations('walcl', [{ date: '2024-01-01', value: 7_700_000 }]);

    metrics = new MetricsService({ config, store, logger: mockLogger });
    const alerts = new AlertMonitor({ config, metrics, store: new MemoryAlertStore(), logger: mockLogger, clock });
    service = new DashboardService({ config, metrics, alerts, logger: mockLogger, clock });
  });

  describe('buildDashboardData', () => {
    it('should stamp the generation time and date range', async () => {
      const data = await service.buildDashboardData();

      expect(data.generatedAt).toBe('2024-01-05T12:00:00.000Z');
      expect(data.dateRange).toEqual({ start: '2023-01-05', end: '2024-01-05' });
      expect(data.configVersion).toBe('test');
      expect(data.failures).toEqual([]);
    });

    it('should build key metrics from latest values and skip missing keys', async () => {
      const data = await service.buildDashboardData();

      expect(data.keyMetrics).toHaveLength(1);
      const [metric] = data.keyMetrics;
      expect(metric).toMatchObject({
        key: 'effr_bps',
        label: 'EFFR (bps)',
        unit: 'bps',
        category: 'rates',
        date: '2024-01-04',
      });
      expect(metric.value).toBeCloseTo(535, 10);
      expect(metric.d1).toBeCloseTo(1.667, 10);
    });

    it('should chart observed points only, rounded to 4 decimals', async () => {
      const data = await service.buildDashboardData();

      expect(data.charts).toEqual([
        {
          title: 'Rates',
          type: 'line',
          yLabel: '%',
          height: 400,
          referenceLine: null,
          series: [
            {
              key: 'effr',
              label: 'EFFR',
              dates: ['2024-01-02', '2024-01-03', '2024-01-04'],
              values: [5.33, 5.3333, 5.35],
            },
          ],
        },
      ]);
    });

    it('should fill table rows with the requested columns that exist', async () => {
      const data = await service.buildDashboardData();

      expect(data.tables).toHaveLength(1);
      const [table] = data.tables;
      expect(table.title).toBe('Latest');
      expect(table.columns).toEqual(['value', 'd1', 'ma5']);
      expect(table.rows.map(r => r.key)).toEqual(['effr', 'walcl']);

      const [effr, walcl] = table.rows;
      expect(effr.date).toBe('2024-01-04');
      expect(Object.keys(effr.values)).toEqual(['value', 'd1']);
      expect(effr.values.value).toBe(5.35);
      expect(effr.values.d1).toBeCloseTo(0.01667, 10);
      expect(walcl).toEqual({
        key: 'walcl',
        label: 'Fed Assets',
        unit: 'usd_millions',
        date: '2024-01-04',
        values: { value: 7_700_000, d1: 0 },
      });
    });

    it('should include current breaches grouped by severity', async () => {
      const data = await service.buildDashboardData();

      expect(data.alerts.critical.map(a => a.key)).toEqual(['effr']);
      expect(data.alerts.critical[0].value).toBe(5.35);
      expect(data.alerts.warning).toEqual([]);
      expect(data.alerts.info).toEqual([]);
    });

    it('should fall back to empty alert groups when alerts cannot be evaluated', async () => {
      const failing = new DashboardService({
        config,
        metrics,
        alerts: { getBreachSummary: () => Promise.reject(new Error('state unavailable')) },
        logger: mockLogger,
        clock,
      });

      const data = await failing.buildDashboardData();

      expect(data.alerts).toEqual({ critical: [], warning: [], info: [] });
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { error: 'state unavailable' },
        '[Dashboard] Could not evaluate alerts'
      );
    });

    it('should throw NotFoundError when the window has no data', async () => {
      await expect(service.buildDashboardData({ days: 2 })).resolves.toBeDefined();

      const empty = new MetricsService({ config, store: new MemorySeriesStore(), logger: mockLogger });
      const noData = new DashboardService({
        config,
        metrics: empty,
        alerts: { getBreachSummary: async () => ({ critical: [], warning: [], info: [] }) },
        clock,
      });

      await expect(noData.buildDashboardData()).rejects.toThrow(NotFoundError);
      await expect(noData.buildDashboardData()).rejects.toThrow(
        'No data available between 2023-01-05 and 2024-01-05'
      );
    });

    it('should limit charts to the requested window', async () => {
      const data = await service.buildDashboardData({ days: 2 });

      expect(data.dateRange).toEqual({ start: '2024-01-03', end: '2024-01-05' });
      expect(data.charts[0].series[0].dates).toEqual(['2024-01-03', '2024-01-04']);
    });
  });

  describe('exportToFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'fed-monitor-'));
    });

    afterEach(async () => {
      await fs.promises.rm(dir, { recursive: true, force: true });
    });

    it('should write pretty JSON into a created directory and return the absolute path', async () => {
      const target = path.join(dir, 'nested', 'data.json');

      const written = await service.exportToFile(target, { days: 30 });

      expect(written).toBe(path.resolve(target));
      const text = await fs.promises.readFile(written, 'utf-8');
      expect(text.startsWith('{\n  "generatedAt": "2024-01-05T12:00:00.000Z"')).toBe(true);

      const data: DashboardData = JSON.parse(text);
      expect(data.dateRange).toEqual({ start: '2023-12-06', end: '2024-01-05' });
      expect(data.charts.map(c => c.title)).toEqual(['Rates']);
      expect(mockLogger.info).toHaveBeenCalledWith(
        { file: written, charts: 1, tables: 1, critical: 1, warning: 0 },
        '[Dashboard] Export written'
      );
    });
  });
});
