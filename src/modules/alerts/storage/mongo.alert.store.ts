/**
 * MONGO ALERT STORE
 */

import { AlertStateModel } from './alert_state.model.js';
import { AlertLogModel } from './alert_log.model.js';
import type {
  AlertStateRecord,
  AlertStore,
  AlertTransitionLogEntry,
} from '../contracts/alert.types.js';

const HIDDEN = { _id: 0, __v: 0 };

export class MongoAlertStore implements AlertStore {
  async getState(alertId: string): Promise<AlertStateRecord | null> {
    return AlertStateModel.findOne({ alertId }).select(HIDDEN).lean<AlertStateRecord | null>().exec();
  }

  async saveState(record: AlertStateRecord): Promise<void> {
    await AlertStateModel.updateOne({ alertId: record.alertId }, { $set: record }, { upsert: true });
  }

  async listStates(): Promise<AlertStateRecord[]> {
    return AlertStateModel.find().sort({ alertId: 1 }).select(HIDDEN).lean<AlertStateRecord[]>().exec();
  }

  async appendLog(entry: AlertTransitionLogEntry): Promise<void> {
    await AlertLogModel.create(entry);
  }

  async getHistory(limit: number): Promise<AlertTransitionLogEntry[]> {
    return AlertLogModel.find()
      .sort({ triggeredAt: -1 })
      .limit(limit)
      .select(HIDDEN)
      .lean<AlertTransitionLogEntry[]>()
      .exec();
  }
}
