/**
 * ALERT API ROUTES
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseInput } from '../../../common/validation.js';
import type { AlertMonitor } from '../services/alert.monitor.js';
import type { AlertStore } from '../contracts/alert.types.js';

export interface AlertRoutesDeps {
  monitor: Pick<AlertMonitor, 'evaluateAll' | 'getBreachSummary'>;
  store: AlertStore;
}

const HistoryQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export async function registerAlertRoutes(fastify: FastifyInstance, deps: AlertRoutesDeps): Promise<void> {
  const { monitor, store } = deps;

  // Stateless evaluation of every rule
  fastify.get('/api/alerts', async () => {
    const alerts = await monitor.evaluateAll();
    return {
      ok: true,
      count: alerts.length,
      breached: alerts.filter(a => a.classification === 'BREACH').length,
      unknown: alerts.filter(a => a.classification === 'UNKNOWN').length,
      alerts,
    };
  });

  fastify.get('/api/alerts/summary', async () => {
    const summary = await monitor.getBreachSummary();
    return {
      ok: true,
      counts: {
        critical: summary.critical.length,
        warning: summary.warning.length,
        info: summary.info.length,
      },
      summary,
    };
  });

  fastify.get('/api/alerts/history', async req => {
    const { limit } = parseInput(HistoryQuery, req.query);
    return { ok: true, history: await store.getHistory(limit) };
  });

  fastify.get('/api/alerts/state', async () => {
    return { ok: true, states: await store.listStates() };
  });
}
