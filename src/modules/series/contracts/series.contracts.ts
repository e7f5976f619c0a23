/**
 * SERIES CONTRACTS
 *
 * Observations, derived-metric cache rows and the fetch log, plus the store
 * interface every other module reads and writes through.
 */

// ═══════════════════════════════════════════════════════════════
// DATA
// ═══════════════════════════════════════════════════════════════

export interface SeriesPoint {
  date: string;         // ISO date (YYYY-MM-DD)
  value: number;
}

export interface DateRange {
  start?: string;
  end?: string;
}

export type FetchStatus = 'success' | 'error';

export interface FetchLogEntry {
  seriesKey: string;
  status: FetchStatus;
  rowsFetched: number;
  errorMessage?: string;
  fetchedAt: Date;
}

export interface SeriesCoverage {
  seriesKey: string;
  count: number;
  firstDate: string;
  lastDate: string;
}

// ═══════════════════════════════════════════════════════════════
// STORE
// ═══════════════════════════════════════════════════════════════

export interface SeriesStore {
  /** Insert or overwrite observations; returns rows inserted or changed. */
  upsertObservations(seriesKey: string, points: SeriesPoint[]): Promise<number>;
  /** Observations sorted by date ascending, optionally within [start, end]. */
  getObservations(seriesKey: string, range?: DateRange): Promise<SeriesPoint[]>;
  getLatestObservationDate(seriesKey: string): Promise<string | null>;
  getCoverage(): Promise<SeriesCoverage[]>;

  upsertDerivedValues(metricKey: string, points: SeriesPoint[]): Promise<number>;
  getDerivedValues(metricKey: string, range?: DateRange): Promise<SeriesPoint[]>;

  appendFetchLog(entry: FetchLogEntry): Promise<void>;
  getRecentFetchLog(limit: number): Promise<FetchLogEntry[]>;
}

// ═══════════════════════════════════════════════════════════════
// INGEST RESULTS
// ═══════════════════════════════════════════════════════════════

export interface SeriesFetchResult {
  seriesKey: string;
  seriesId: string;
  ok: boolean;
  rowsFetched: number;
  rowsWritten: number;
  startDate?: string;
  error?: string;
}

export interface FetchRunResult {
  ok: boolean;
  totalSeries: number;
  successCount: number;
  failCount: number;
  results: SeriesFetchResult[];
  derivedStored: number;
  processingTimeMs: number;
}
