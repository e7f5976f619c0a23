/**
 * Metrics Calculator Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { parseMonitorConfig } from '../../../config/monitor.config.js';
import { MemorySeriesStore } from '../../series/storage/memory.series.store.js';
import { alignSeries, columnPoints, lastValidIndex } from '../services/metrics.frame.js';
import {
  calculateAllMetrics,
  calculateDerived,
  diff,
  pctChange,
  rollingMean,
  rollingStd,
  zscore,
} from '../services/metrics.calculator.js';
import { MetricsService } from '../services/metrics.service.js';
import type { SeriesPoint } from '../../series/contracts/series.contracts.js';

function frameOf(series: Record<string, SeriesPoint[]>, forwardFill = true) {
  return alignSeries(new Map(Object.entries(series)), forwardFill);
}

describe('Metrics Calculator', () => {
  describe('changes', () => {
    it('should diff over a period and keep gaps absent', () => {
      expect(diff([1, null, 4, 6], 1)).toEqual([null, null, null, 2]);
      expect(diff([1, 2, 4, 7], 2)).toEqual([null, null, 3, 5]);
    });

    it('should leave percent change absent when the earlier value is 0', () => {
      expect(pctChange([0, 5, 10], 1)).toEqual([null, null, 100]);
    });
  });

  describe('rolling', () => {
    it('should compute the mean over a full window only', () => {
      expect(rollingMean([1, 2, 3, 4], 2)).toEqual([null, 1.5, 2.5, 3.5]);
      expect(rollingMean([1, null, 3, 4], 2)).toEqual([null, null, null, 3.5]);
    });

    it('should compute the sample standard deviation', () => {
      const std = rollingStd([2, 4, 4, 4, 5, 5, 7, 9], 8);
      expect(std.slice(0, 7)).toEqual([null, null, null, null, null, null, null]);
      expect(std[7]).toBeCloseTo(Math.sqrt(32 / 7), 10);
    });

    it('should return exactly 0 for a constant window and nothing for window 1', () => {
      expect(rollingStd([5.33, 5.33, 5.33], 3)).toEqual([null, null, 0]);
      expect(rollingStd([1, 2, 3], 1)).toEqual([null, null, null]);
    });

    it('should leave the z-score absent before the window fills', () => {
      expect(zscore([1, 2, 3, 4, 5], 3)).toEqual([null, null, 1, 1, 1]);
    });

    it('should leave the z-score absent when the window is flat', () => {
      expect(zscore([2, 2, 2], 3)).toEqual([null, null, null]);
    });
  });

  describe('alignSeries', () => {
    const series = {
      effr: [
        { date: '2024-01-01', value: 5.33 },
        { date: '2024-01-02', value: 5.33 },
        { date: '2024-01-03', value: 5.35 },
      ],
      walcl: [{ date: '2024-01-01', value: 7_700_000 }],
    };

    it('should forward-fill a weekly series onto the daily index', () => {
      const frame = frameOf(series);
      expect(frame.dates).toEqual(['2024-01-01', '2024-01-02', '2024-01-03']);
      expect(frame.columns.get('walcl')).toEqual([7_700_000, 7_700_000, 7_700_000]);
    });

    it('should keep gaps without forward fill', () => {
      const frame = frameOf(series, false);
      expect(frame.columns.get('walcl')).toEqual([7_700_000, null, null]);
    });

    it('should not fill days before the first observation', () => {
      const frame = frameOf({
        a: [{ date: '2024-01-02', value: 1 }],
        b: [{ date: '2024-01-01', value: 2 }],
      });
      expect(frame.columns.get('a')).toEqual([null, 1]);
    });

    it('should give a Tuesday 1-day change of 0 for a Monday weekly value', () => {
      const frame = frameOf(series);
      calculateAllMetrics(frame, {
        derived: [],
        changes: [{ name: 'd1', type: 'diff', periods: 1 }],
        rolling: [],
      });
      const d1 = frame.columns.get('walcl_d1');
      expect(d1?.[1]).toBe(0);
    });

    it('should find the last present value', () => {
      expect(lastValidIndex([1, 2, null])).toBe(1);
      expect(lastValidIndex([null, null])).toBe(-1);
    });
  });

  describe('calculateDerived', () => {
    const derived = (key: string, expr: string) => ({ key, expr, label: key, unit: '' });

    it('should compute a spread in basis points', () => {
      const frame = frameOf({
        effr: [{ date: '2024-01-02', value: 5.33 }],
        iorb: [{ date: '2024-01-02', value: 5.4 }],
      });
      const failures = calculateDerived(frame, [derived('spread', '(effr - iorb) * 100')]);

      expect(failures).toEqual([]);
      expect(frame.columns.get('spread')?.[0]).toBeCloseTo(-7.0, 10);
    });

    it('should fail only the metric that references an unknown key', () => {
      const frame = frameOf({ effr: [{ date: '2024-01-02', value: 5.33 }] });
      const failures = calculateDerived(frame, [
        derived('broken', 'effr + nope'),
        derived('bps', 'effr * 100'),
        derived('bps_half', 'bps / 2'),
      ]);

      expect(failures.map(f => [f.key, f.kind])).toEqual([['broken', 'UNKNOWN_SYMBOL']]);
      expect(frame.columns.has('broken')).toBe(false);
      expect(frame.columns.get('bps')?.[0]).toBeCloseTo(533, 10);
      expect(frame.columns.get('bps_half')?.[0]).toBeCloseTo(266.5, 10);
    });

    it('should leave a value absent when an input is missing or the result is not finite', () => {
      const frame = frameOf(
        {
          a: [
            { date: '2024-01-01', value: 1 },
            { date: '2024-01-02', value: 2 },
          ],
          b: [
            { date: '2024-01-01', value: 0 },
            { date: '2024-01-03', value: 4 },
          ],
        },
        false
      );
      calculateDerived(frame, [derived('ratio', 'a / b')]);
      expect(frame.columns.get('ratio')).toEqual([null, null, null]);
    });

    it('should turn a comparison into 0 or 1', () => {
      const frame = frameOf({ a: [{ date: '2024-01-01', value: 3 }] });
      calculateDerived(frame, [derived('above', 'a > 2')]);
      expect(frame.columns.get('above')).toEqual([1]);
    });
  });

  describe('calculateAllMetrics', () => {
    it('should add change and rolling columns for raw and derived keys', () => {
      const frame = frameOf({
        a: [
          { date: '2024-01-01', value: 1 },
          { date: '2024-01-02', value: 2 },
          { date: '2024-01-03', value: 4 },
        ],
      });
      const { failures } = calculateAllMetrics(frame, {
        derived: [{ key: 'twice', expr: 'a * 2', label: 'Twice', unit: '' }],
        changes: [{ name: 'd1', type: 'diff', periods: 1 }],
        rolling: [{ name: 'ma2', type: 'rolling_mean', window: 2 }],
      });

      expect(failures).toEqual([]);
      expect(frame.columns.get('a_d1')).toEqual([null, 1, 2]);
      expect(frame.columns.get('twice_d1')).toEqual([null, 2, 4]);
      expect(frame.columns.get('twice_ma2')).toEqual([null, 3, 6]);
      expect(columnPoints(frame, 'a_d1')).toEqual([
        { date: '2024-01-02', value: 1 },
        { date: '2024-01-03', value: 2 },
      ]);
    });
  });
});

describe('MetricsService', () => {
  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };

  const config = parseMonitorConfig({
    series: [
      { key: 'effr', seriesId: 'EFFR', label: 'EFFR', unit: 'percent' },
      { key: 'iorb', seriesId: 'IORB', label: 'IORB', unit: 'percent' },
      { key: 'walcl', seriesId: 'WALCL', label: 'Fed Assets', unit: 'usd_millions', frequency: 'weekly' },
    ],
    derived: [
      { key: 'spread', expr: '(effr - iorb) * 100', label: 'EFFR-IORB', unit: 'bps' },
      { key: 'broken', expr: 'effr + missing_key', label: 'Broken' },
    ],
    metrics: {
      changes: [{ name: 'd1', type: 'diff', periods: 1 }],
      rolling: [{ name: 'ma2', type: 'rolling_mean', window: 2 }],
    },
  });

  let store: MemorySeriesStore;
  let service: MetricsService;

  beforeEach(async () => {
    vi.clearAllMocks();
    store = new MemorySeriesStore();
    await store.upsertObservations('effr', [
      { date: '2024-01-01', value: 5.33 },
      { date: '2024-01-02', value: 5.33 },
      { date: '2024-01-03', value: 5.35 },
    ]);
    await store.upsertObservations('iorb', [
      { date: '2024-01-01', value: 5.4 },
      { date: '2024-01-02', value: 5.4 },
      { date: '2024-01-03', value: 5.4 },
    ]);
    await store.upsertObservations('walcl', [{ date: '2024-01-01', value: 7_700_000 }]);
    service = new MetricsService({ config, store, logger: mockLogger });
  });

  it('should report a failing derived metric and compute the rest', async () => {
    const result = await service.calculateAll();

    expect(result.failures.map(f => f.key)).toEqual(['broken']);
    expect(result.frame.columns.get('spread')?.[2]).toBeCloseTo(-5.0, 10);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ key: 'broken', kind: 'UNKNOWN_SYMBOL' }),
      '[Metrics] Derived metric skipped'
    );
  });

  it('should return latest values with statistics from the same date', async () => {
    const latest = await service.getLatestValues();

    expect(Object.keys(latest)).toEqual(['effr', 'iorb', 'walcl', 'spread']);
    expect(latest.effr.date).toBe('2024-01-03');
    expect(latest.effr.value).toBe(5.35);
    expect(latest.effr.stats.d1).toBeCloseTo(0.02, 10);
    expect(latest.effr.stats.ma2).toBeCloseTo(5.34, 10);
    expect(latest.walcl).toMatchObject({ label: 'Fed Assets', unit: 'usd_millions', value: 7_700_000 });
    expect(latest.walcl.stats.d1).toBe(0);
  });

  it('should look up a single value by statistic and date', async () => {
    expect(await service.getMetricValue('spread', 'value', '2024-01-02')).toBeCloseTo(-7.0, 10);
    expect(await service.getMetricValue('effr', 'd1', '2024-01-01')).toBeNull();
    expect(await service.getMetricValue('effr', 'ma2')).toBeCloseTo(5.34, 10);
    expect(await service.getMetricValue('unknown')).toBeNull();
  });

  it('should store derived values and skip failed metrics', async () => {
    const rows = await service.storeDerivedMetrics();

    expect(rows).toBe(3);
    expect((await store.getDerivedValues('spread')).map(p => p.date)).toEqual([
      '2024-01-01',
      '2024-01-02',
      '2024-01-03',
    ]);
    expect(await store.getDerivedValues('broken')).toEqual([]);
  });

  it('should read history from the derived cache or the observations', async () => {
    await service.storeDerivedMetrics();

    const spread = await service.getHistory('spread', { start: '2024-01-03' });
    expect(spread.map(p => p.date)).toEqual(['2024-01-03']);
    expect(spread[0].value).toBeCloseTo(-5.0, 10);

    expect(await service.getHistory('effr', { end: '2024-01-02' })).toEqual([
      { date: '2024-01-01', value: 5.33 },
      { date: '2024-01-02', value: 5.33 },
    ]);
    expect(await service.getHistory('unknown')).toEqual([]);
  });

  it('should store nothing without observations', async () => {
    const empty = new MetricsService({ config, store: new MemorySeriesStore(), logger: mockLogger });
    expect(await empty.storeDerivedMetrics()).toBe(0);
  });
});
