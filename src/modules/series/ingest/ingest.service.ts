/**
 * INGEST SERVICE
 *
 * Pulls every configured series from FRED into the series store.
 * Idempotent: re-fetching a window overwrites the same rows.
 * A failing series is logged to the fetch log and does not stop the others.
 */

import { addDays, todayIso, systemClock, type Clock } from '../../../common/dates.js';
import { errorMessage } from '../../../common/errors.js';
import { noopLogger, type Logger } from '../../../common/logger.js';
import type { MonitorConfig, SeriesDefinition } from '../../../config/monitor.config.js';
import type { FredClient } from './fred.client.js';
import type {
  FetchLogEntry,
  FetchRunResult,
  SeriesFetchResult,
  SeriesStore,
} from '../contracts/series.contracts.js';

export type SeriesFetcher = Pick<FredClient, 'fetchSeries' | 'checkHealth'>;

/**
 * Anything that can rebuild the derived-metric cache after new observations land.
 */
export interface DerivedMetricsWriter {
  storeDerivedMetrics(): Promise<number>;
}

export interface FetchOptions {
  startDate?: string;
  endDate?: string;
  backfillDays?: number;
}

export interface IngestServiceDeps {
  config: MonitorConfig;
  store: SeriesStore;
  fetcher: SeriesFetcher;
  derived?: DerivedMetricsWriter;
  logger?: Logger;
  clock?: Clock;
}

export class IngestService {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly deps: IngestServiceDeps) {
    this.logger = deps.logger ?? noopLogger;
    this.clock = deps.clock ?? systemClock;
  }

  // ═══════════════════════════════════════════════════════════════
  // FETCH ALL
  // ═══════════════════════════════════════════════════════════════

  /**
   * Start date per series: explicit `startDate`, else `today - backfillDays`,
   * else the day after the latest stored observation (full history when none).
   */
  async fetchAllSeries(options: FetchOptions = {}): Promise<FetchRunResult> {
    const started = Date.now();
    const today = todayIso(this.clock);
    const endDate = options.endDate ?? today;
    const series = this.deps.config.series;

    this.logger.info({ series: series.length, endDate }, '[Ingest] Fetching series from FRED');

    const results: SeriesFetchResult[] = [];
    for (const def of series) {
      results.push(await this.fetchOne(def, options, today, endDate));
    }

    const successCount = results.filter(r => r.ok).length;
    const failCount = results.length - successCount;

    let derivedStored = 0;
    if (successCount > 0 && this.deps.derived) {
      try {
        derivedStored = await this.deps.derived.storeDerivedMetrics();
      } catch (err) {
        this.logger.error({ error: errorMessage(err) }, '[Ingest] Derived metric refresh failed');
      }
    }

    const totalRows = results.reduce((sum, r) => sum + r.rowsFetched, 0);
    this.logger.info(
      { successCount, failCount, totalRows, derivedStored },
      `[Ingest] Done: ${totalRows} observations across ${results.length} series`
    );

    return {
      ok: failCount === 0,
      totalSeries: results.length,
      successCount,
      failCount,
      results,
      derivedStored,
      processingTimeMs: Date.now() - started,
    };
  }

  /**
   * Re-fetches `years` of history (365 days per year) for every series.
   */
  async backfillAll(years = 2): Promise<FetchRunResult> {
    const endDate = todayIso(this.clock);
    const startDate = addDays(endDate, -years * 365);
    this.logger.info({ years, startDate, endDate }, '[Ingest] Backfilling history');
    return this.fetchAllSeries({ startDate, endDate });
  }

  async checkFredHealth(): Promise<{ ok: boolean; message: string }> {
    return this.deps.fetcher.checkHealth();
  }

  // ═══════════════════════════════════════════════════════════════
  // SINGLE SERIES
  // ═══════════════════════════════════════════════════════════════

  private async resolveStartDate(
    def: SeriesDefinition,
    options: FetchOptions,
    today: string
  ): Promise<string | undefined> {
    if (options.startDate) return options.startDate;
    if (options.backfillDays) return addDays(today, -options.backfillDays);

    const latest = await this.deps.store.getLatestObservationDate(def.key);
    return latest ? addDays(latest, 1) : undefined;
  }

  private async fetchOne(
    def: SeriesDefinition,
    options: FetchOptions,
    today: string,
    endDate: string
  ): Promise<SeriesFetchResult> {
    let startDate: string | undefined;

    try {
      startDate = await this.resolveStartDate(def, options, today);
      const points = await this.deps.fetcher.fetchSeries(def.seriesId, startDate, endDate);
      const rowsWritten = await this.deps.store.upsertObservations(def.key, points);

      await this.writeFetchLog({ seriesKey: def.key, status: 'success', rowsFetched: points.length });

      this.logger.info({ seriesKey: def.key, rowsFetched: points.length, rowsWritten }, '[Ingest] Series stored');
      return { seriesKey: def.key, seriesId: def.seriesId, startDate, ok: true, rowsFetched: points.length, rowsWritten };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error({ seriesKey: def.key, seriesId: def.seriesId, error: message }, '[Ingest] Series failed');
      await this.writeFetchLog({ seriesKey: def.key, status: 'error', rowsFetched: 0, errorMessage: message });
      return {
        seriesKey: def.key,
        seriesId: def.seriesId,
        startDate,
        ok: false,
        rowsFetched: 0,
        rowsWritten: 0,
        error: message,
      };
    }
  }

  /**
   * Fetch-log writes never fail the series they describe.
   */
  private async writeFetchLog(entry: Omit<FetchLogEntry, 'fetchedAt'>): Promise<void> {
    try {
      await this.deps.store.appendFetchLog({ ...entry, fetchedAt: this.clock.now() });
    } catch (err) {
      this.logger.error(
        { seriesKey: entry.seriesKey, error: errorMessage(err) },
        '[Ingest] Could not write fetch log'
      );
    }
  }
}
