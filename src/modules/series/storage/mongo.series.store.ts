/**
 * MONGO SERIES STORE
 *
 * SeriesStore over the observation, derived-metric and fetch-log models.
 * Upserts are bulk and idempotent.
 */

import { ObservationModel } from './observation.model.js';
import { DerivedMetricModel } from './derived_metric.model.js';
import { FetchLogModel } from './fetch_log.model.js';
import type {
  DateRange,
  FetchLogEntry,
  SeriesCoverage,
  SeriesPoint,
  SeriesStore,
} from '../contracts/series.contracts.js';

interface DateCondition {
  $gte?: string;
  $lte?: string;
}

function dateCondition(range?: DateRange): { date?: DateCondition } {
  if (!range?.start && !range?.end) return {};
  const date: DateCondition = {};
  if (range.start) date.$gte = range.start;
  if (range.end) date.$lte = range.end;
  return { date };
}

export class MongoSeriesStore implements SeriesStore {
  // ═══════════════════════════════════════════════════════════════
  // OBSERVATIONS
  // ═══════════════════════════════════════════════════════════════

  async upsertObservations(seriesKey: string, points: SeriesPoint[]): Promise<number> {
    if (points.length === 0) return 0;

    const bulkOps = points.map(p => ({
      updateOne: {
        filter: { seriesKey, date: p.date },
        update: { $set: { seriesKey, date: p.date, value: p.value, source: 'FRED' } },
        upsert: true,
      },
    }));

    const result = await ObservationModel.bulkWrite(bulkOps, { ordered: false });
    return result.upsertedCount + result.modifiedCount;
  }

  async getObservations(seriesKey: string, range?: DateRange): Promise<SeriesPoint[]> {
    return ObservationModel.find({ seriesKey, ...dateCondition(range) })
      .sort({ date: 1 })
      .select({ date: 1, value: 1, _id: 0 })
      .lean<SeriesPoint[]>()
      .exec();
  }

  async getLatestObservationDate(seriesKey: string): Promise<string | null> {
    const latest = await ObservationModel.findOne({ seriesKey })
      .sort({ date: -1 })
      .select({ date: 1, _id: 0 })
      .lean<{ date: string } | null>();
    return latest?.date ?? null;
  }

  async getCoverage(): Promise<SeriesCoverage[]> {
    const rows = await ObservationModel.aggregate<{
      _id: string;
      count: number;
      firstDate: string;
      lastDate: string;
    }>([
      {
        $group: {
          _id: '$seriesKey',
          count: { $sum: 1 },
          firstDate: { $min: '$date' },
          lastDate: { $max: '$date' },
        },
      },
      { $sort: { _id: 1 } },
    ]);

    return rows.map(r => ({ seriesKey: r._id, count: r.count, firstDate: r.firstDate, lastDate: r.lastDate }));
  }

  // ═══════════════════════════════════════════════════════════════
  // DERIVED METRICS
  // ═══════════════════════════════════════════════════════════════

  async upsertDerivedValues(metricKey: string, points: SeriesPoint[]): Promise<number> {
    if (points.length === 0) return 0;

    const computedAt = new Date();
    const bulkOps = points.map(p => ({
      updateOne: {
        filter: { metricKey, date: p.date },
        update: { $set: { metricKey, date: p.date, value: p.value, computedAt } },
        upsert: true,
      },
    }));

    const result = await DerivedMetricModel.bulkWrite(bulkOps, { ordered: false });
    return result.upsertedCount + result.modifiedCount;
  }

  async getDerivedValues(metricKey: string, range?: DateRange): Promise<SeriesPoint[]> {
    return DerivedMetricModel.find({ metricKey, ...dateCondition(range) })
      .sort({ date: 1 })
      .select({ date: 1, value: 1, _id: 0 })
      .lean<SeriesPoint[]>()
      .exec();
  }

  // ═══════════════════════════════════════════════════════════════
  // FETCH LOG
  // ═══════════════════════════════════════════════════════════════

  async appendFetchLog(entry: FetchLogEntry): Promise<void> {
    await FetchLogModel.create(entry);
  }

  async getRecentFetchLog(limit: number): Promise<FetchLogEntry[]> {
    return FetchLogModel.find()
      .sort({ fetchedAt: -1 })
      .limit(limit)
      .select({ _id: 0, __v: 0 })
      .lean<FetchLogEntry[]>()
      .exec();
  }
}
