/**
 * Ingest Service Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { FredFetchError } from '../../../common/errors.js';
import { parseMonitorConfig } from '../../../config/monitor.config.js';
import { IngestService, type SeriesFetcher } from '../ingest/ingest.service.js';
import { MemorySeriesStore } from '../storage/memory.series.store.js';

describe('IngestService', () => {
  const config = parseMonitorConfig({
    series: [
      { key: 'effr', seriesId: 'EFFR', label: 'EFFR', unit: 'percent' },
      { key: 'iorb', seriesId: 'IORB', label: 'IORB', unit: 'percent' },
    ],
  });

  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
  const now = new Date('2024-01-05T12:00:00Z');
  const fetchSeries = vi.fn<SeriesFetcher['fetchSeries']>();
  const checkHealth = vi.fn<SeriesFetcher['checkHealth']>();
  const storeDerivedMetrics = vi.fn(async () => 4);

  let store: MemorySeriesStore;
  let ingest: IngestService;

  beforeEach(() => {
    vi.clearAllMocks();
    fetchSeries.mockImplementation(async seriesId => [
      { date: '2024-01-04', value: seriesId === 'EFFR' ? 5.33 : 5.4 },
    ]);
    store = new MemorySeriesStore();
    ingest = new IngestService({
      config,
      store,
      fetcher: { fetchSeries, checkHealth },
      derived: { storeDerivedMetrics },
      logger: mockLogger,
      clock: { now: () => now },
    });
  });

  it('should continue from the day after the latest stored observation', async () => {
    await store.upsertObservations('effr', [{ date: '2024-01-02', value: 5.33 }]);

    const result = await ingest.fetchAllSeries();

    expect(fetchSeries).toHaveBeenCalledWith('EFFR', '2024-01-03', '2024-01-05');
    expect(fetchSeries).toHaveBeenCalledWith('IORB', undefined, '2024-01-05');
    expect(result).toMatchObject({ ok: true, totalSeries: 2, successCount: 2, failCount: 0, derivedStored: 4 });
    expect(await store.getObservations('iorb')).toEqual([{ date: '2024-01-04', value: 5.4 }]);
  });

  it('should prefer an explicit start date, then a backfill window', async () => {
    await ingest.fetchAllSeries({ startDate: '2023-06-01', backfillDays: 14 });
    expect(fetchSeries).toHaveBeenLastCalledWith('IORB', '2023-06-01', '2024-01-05');

    await ingest.fetchAllSeries({ backfillDays: 14 });
    expect(fetchSeries).toHaveBeenLastCalledWith('IORB', '2023-12-22', '2024-01-05');
  });

  it('should backfill whole years of history', async () => {
    await ingest.backfillAll(2);
    expect(fetchSeries).toHaveBeenCalledWith('EFFR', '2022-01-05', '2024-01-05');
  });

  it('should isolate a failing series and log it', async () => {
    fetchSeries.mockImplementation(async seriesId => {
      if (seriesId === 'IORB') throw new FredFetchError('IORB', 'Request failed with status code 500', 500);
      return [{ date: '2024-01-04', value: 5.33 }];
    });

    const result = await ingest.fetchAllSeries();

    expect(result).toMatchObject({ ok: false, successCount: 1, failCount: 1 });
    expect(result.results[1]).toMatchObject({
      seriesKey: 'iorb',
      ok: false,
      rowsFetched: 0,
      error: 'FRED fetch failed for IORB: Request failed with status code 500',
    });
    expect(await store.getObservations('effr')).toHaveLength(1);
    expect(storeDerivedMetrics).toHaveBeenCalledTimes(1);

    const log = await store.getRecentFetchLog(10);
    expect(log.map(e => [e.seriesKey, e.status, e.rowsFetched])).toEqual([
      ['iorb', 'error', 0],
      ['effr', 'success', 1],
    ]);
    expect(log[0].errorMessage).toBe('FRED fetch failed for IORB: Request failed with status code 500');
    expect(log[0].fetchedAt).toEqual(now);
  });

  it('should isolate a series whose stored-date lookup fails', async () => {
    class LookupFailingStore extends MemorySeriesStore {
      async getLatestObservationDate(seriesKey: string): Promise<string | null> {
        if (seriesKey === 'effr') throw new Error('lookup failed');
        return super.getLatestObservationDate(seriesKey);
      }
    }
    const failingStore = new LookupFailingStore();
    const isolated = new IngestService({
      config,
      store: failingStore,
      fetcher: { fetchSeries, checkHealth },
      logger: mockLogger,
      clock: { now: () => now },
    });

    const result = await isolated.fetchAllSeries();

    expect(result).toMatchObject({ ok: false, successCount: 1, failCount: 1 });
    expect(result.results[0]).toMatchObject({ seriesKey: 'effr', ok: false, error: 'lookup failed' });
    expect(result.results[1]).toMatchObject({ seriesKey: 'iorb', ok: true, rowsFetched: 1 });
    expect(fetchSeries).toHaveBeenCalledTimes(1);
    expect(fetchSeries).toHaveBeenCalledWith('IORB', undefined, '2024-01-05');
    expect(await failingStore.getObservations('iorb')).toEqual([{ date: '2024-01-04', value: 5.4 }]);

    const log = await failingStore.getRecentFetchLog(10);
    expect(log.map(e => [e.seriesKey, e.status, e.errorMessage])).toEqual([
      ['iorb', 'success', undefined],
      ['effr', 'error', 'lookup failed'],
    ]);
  });

  it('should keep a stored series successful when its fetch-log write fails', async () => {
    class LogFailingStore extends MemorySeriesStore {
      async appendFetchLog(): Promise<void> {
        throw new Error('log unavailable');
      }
    }
    const logFailingStore = new LogFailingStore();
    const tolerant = new IngestService({
      config,
      store: logFailingStore,
      fetcher: { fetchSeries, checkHealth },
      logger: mockLogger,
      clock: { now: () => now },
    });

    const result = await tolerant.fetchAllSeries();

    expect(result).toMatchObject({ ok: true, successCount: 2, failCount: 0 });
    expect(result.results[0]).toMatchObject({ seriesKey: 'effr', ok: true, rowsFetched: 1, rowsWritten: 1 });
    expect(await logFailingStore.getObservations('effr')).toEqual([{ date: '2024-01-04', value: 5.33 }]);
    expect(mockLogger.error).toHaveBeenCalledWith(
      { seriesKey: 'effr', error: 'log unavailable' },
      '[Ingest] Could not write fetch log'
    );
  });

  it('should skip the derived refresh when every series failed', async () => {
    fetchSeries.mockRejectedValue(new Error('network down'));

    const result = await ingest.fetchAllSeries();

    expect(result).toMatchObject({ ok: false, successCount: 0, failCount: 2, derivedStored: 0 });
    expect(storeDerivedMetrics).not.toHaveBeenCalled();
  });

  it('should not fail the run when the derived refresh throws', async () => {
    storeDerivedMetrics.mockRejectedValueOnce(new Error('write conflict'));

    const result = await ingest.fetchAllSeries();

    expect(result).toMatchObject({ ok: true, derivedStored: 0 });
    expect(mockLogger.error).toHaveBeenCalledWith(
      { error: 'write conflict' },
      '[Ingest] Derived metric refresh failed'
    );
  });

  it('should pass through the FRED health check', async () => {
    checkHealth.mockResolvedValueOnce({ ok: true, message: 'FRED API accessible, got 21 points' });
    expect(await ingest.checkFredHealth()).toEqual({ ok: true, message: 'FRED API accessible, got 21 points' });
  });
});
