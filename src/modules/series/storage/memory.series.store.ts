/**
 * MEMORY SERIES STORE
 *
 * In-process SeriesStore. Backs tests and dry runs without MongoDB.
 */

import type {
  DateRange,
  FetchLogEntry,
  SeriesCoverage,
  SeriesPoint,
  SeriesStore,
} from '../contracts/series.contracts.js';

type Table = Map<string, Map<string, number>>;

function upsert(table: Table, key: string, points: SeriesPoint[]): number {
  let rows = table.get(key);
  if (!rows) {
    rows = new Map();
    table.set(key, rows);
  }

  let written = 0;
  for (const p of points) {
    if (rows.get(p.date) !== p.value) written++;
    rows.set(p.date, p.value);
  }
  return written;
}

function select(table: Table, key: string, range?: DateRange): SeriesPoint[] {
  const rows = table.get(key);
  if (!rows) return [];

  return [...rows.entries()]
    .filter(([date]) => (!range?.start || date >= range.start) && (!range?.end || date <= range.end))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, value]) => ({ date, value }));
}

export class MemorySeriesStore implements SeriesStore {
  private readonly observations: Table = new Map();
  private readonly derived: Table = new Map();
  private readonly fetchLog: FetchLogEntry[] = [];

  async upsertObservations(seriesKey: string, points: SeriesPoint[]): Promise<number> {
    return upsert(this.observations, seriesKey, points);
  }

  async getObservations(seriesKey: string, range?: DateRange): Promise<SeriesPoint[]> {
    return select(this.observations, seriesKey, range);
  }

  async getLatestObservationDate(seriesKey: string): Promise<string | null> {
    const points = select(this.observations, seriesKey);
    return points.length ? points[points.length - 1].date : null;
  }

  async getCoverage(): Promise<SeriesCoverage[]> {
    return [...this.observations.keys()]
      .sort()
      .map(seriesKey => {
        const points = select(this.observations, seriesKey);
        return {
          seriesKey,
          count: points.length,
          firstDate: points[0]?.date ?? '',
          lastDate: points[points.length - 1]?.date ?? '',
        };
      })
      .filter(c => c.count > 0);
  }

  async upsertDerivedValues(metricKey: string, points: SeriesPoint[]): Promise<number> {
    return upsert(this.derived, metricKey, points);
  }

  async getDerivedValues(metricKey: string, range?: DateRange): Promise<SeriesPoint[]> {
    return select(this.derived, metricKey, range);
  }

  async appendFetchLog(entry: FetchLogEntry): Promise<void> {
    this.fetchLog.push({ ...entry });
  }

  async getRecentFetchLog(limit: number): Promise<FetchLogEntry[]> {
    return this.fetchLog.slice(-limit).reverse();
  }
}
