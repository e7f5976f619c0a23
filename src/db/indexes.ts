/**
 * Database Indexes
 * Run on startup; mongoose builds each model's schema indexes.
 */

import { errorMessage } from '../common/errors.js';
import type { Logger } from '../common/logger.js';
import { AlertLogModel } from '../modules/alerts/storage/alert_log.model.js';
import { AlertStateModel } from '../modules/alerts/storage/alert_state.model.js';
import { DerivedMetricModel } from '../modules/series/storage/derived_metric.model.js';
import { FetchLogModel } from '../modules/series/storage/fetch_log.model.js';
import { ObservationModel } from '../modules/series/storage/observation.model.js';
import { mongoose } from './mongoose.js';

interface IndexedModel {
  createIndexes(): Promise<unknown>;
  collection: { name: string };
}

const MODELS: IndexedModel[] = [ObservationModel, DerivedMetricModel, FetchLogModel, AlertStateModel, AlertLogModel];

export async function ensureIndexes(logger: Logger): Promise<void> {
  if (!mongoose.connection.db) {
    logger.warn({}, '[DB] No database connection, skipping indexes');
    return;
  }

  for (const model of MODELS) {
    try {
      await model.createIndexes();
    } catch (err) {
      logger.warn({ collection: model.collection.name, error: errorMessage(err) }, '[DB] Index creation failed');
    }
  }

  logger.info({ collections: MODELS.length }, '[DB] Indexes ensured');
}
