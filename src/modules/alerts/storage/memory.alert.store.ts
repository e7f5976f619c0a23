/**
 * MEMORY ALERT STORE
 *
 * In-process AlertStore for tests and dry runs.
 */

import type {
  AlertStateRecord,
  AlertStore,
  AlertTransitionLogEntry,
} from '../contracts/alert.types.js';

export class MemoryAlertStore implements AlertStore {
  private readonly states = new Map<string, AlertStateRecord>();
  private readonly log: AlertTransitionLogEntry[] = [];

  async getState(alertId: string): Promise<AlertStateRecord | null> {
    const state = this.states.get(alertId);
    return state ? { ...state } : null;
  }

  async saveState(record: AlertStateRecord): Promise<void> {
    this.states.set(record.alertId, { ...record });
  }

  async listStates(): Promise<AlertStateRecord[]> {
    return [...this.states.values()]
      .map(s => ({ ...s }))
      .sort((a, b) => (a.alertId < b.alertId ? -1 : a.alertId > b.alertId ? 1 : 0));
  }

  async appendLog(entry: AlertTransitionLogEntry): Promise<void> {
    this.log.push({ ...entry });
  }

  async getHistory(limit: number): Promise<AlertTransitionLogEntry[]> {
    return this.log.slice(-limit).reverse();
  }
}
