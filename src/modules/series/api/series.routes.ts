/**
 * SERIES API ROUTES
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseInput } from '../../../common/validation.js';
import type { MonitorConfig } from '../../../config/monitor.config.js';
import type { SeriesStore } from '../contracts/series.contracts.js';

export interface SeriesRoutesDeps {
  config: MonitorConfig;
  store: SeriesStore;
}

const FetchLogQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export async function registerSeriesRoutes(fastify: FastifyInstance, deps: SeriesRoutesDeps): Promise<void> {
  const { config, store } = deps;

  // ─────────────────────────────────────────────────────────────
  // GET /api/series — configured series with stored coverage
  // ─────────────────────────────────────────────────────────────

  fastify.get('/api/series', async () => {
    const coverage = new Map((await store.getCoverage()).map(c => [c.seriesKey, c]));

    return {
      ok: true,
      series: config.series.map(def => {
        const cov = coverage.get(def.key);
        return {
          key: def.key,
          seriesId: def.seriesId,
          label: def.label,
          unit: def.unit,
          frequency: def.frequency,
          category: def.category ?? null,
          loaded: !!cov,
          pointCount: cov?.count ?? 0,
          firstDate: cov?.firstDate ?? null,
          lastDate: cov?.lastDate ?? null,
        };
      }),
      derived: config.derived.map(def => ({
        key: def.key,
        label: def.label,
        unit: def.unit,
        expr: def.expr,
        category: def.category ?? null,
      })),
    };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /api/series/fetch-log — most recent fetch attempts
  // ─────────────────────────────────────────────────────────────

  fastify.get('/api/series/fetch-log', async req => {
    const { limit } = parseInput(FetchLogQuery, req.query);
    return { ok: true, entries: await store.getRecentFetchLog(limit) };
  });
}
