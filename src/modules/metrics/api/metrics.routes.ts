/**
 * METRICS API ROUTES
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../../../common/errors.js';
import { IsoDateSchema, parseInput } from '../../../common/validation.js';
import type { MonitorConfig } from '../../../config/monitor.config.js';
import type { MetricsService } from '../services/metrics.service.js';

export interface MetricsRoutesDeps {
  config: MonitorConfig;
  metrics: Pick<MetricsService, 'calculateAll' | 'getLatestValues' | 'getMetricValue' | 'getHistory'>;
}

const MetricParams = z.object({ key: z.string().min(1) });
const MetricQuery = z.object({
  type: z.string().default('value'),
  date: IsoDateSchema.optional(),
});
const HistoryQuery = z.object({
  start: IsoDateSchema.optional(),
  end: IsoDateSchema.optional(),
});

export async function registerMetricsRoutes(fastify: FastifyInstance, deps: MetricsRoutesDeps): Promise<void> {
  const { config, metrics } = deps;

  // ─────────────────────────────────────────────────────────────
  // GET /api/metrics/latest — latest value and statistics per key
  // ─────────────────────────────────────────────────────────────

  fastify.get('/api/metrics/latest', async () => {
    const result = await metrics.calculateAll();
    const latest = await metrics.getLatestValues(result);
    return { ok: true, metrics: latest, failures: result.failures };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /api/metrics/:key?type=&date= — one metric value
  // ─────────────────────────────────────────────────────────────

  fastify.get('/api/metrics/:key', async req => {
    const { key } = parseInput(MetricParams, req.params);
    const { type, date } = parseInput(MetricQuery, req.query);

    if (!config.getSeries(key) && !config.getDerived(key)) {
      throw new NotFoundError(`Unknown metric "${key}"`);
    }
    if (type !== 'value' && !config.metricSuffixes.includes(type)) {
      throw new ValidationError(`Unknown metric type "${type}" (expected value, ${config.metricSuffixes.join(', ')})`);
    }

    const value = await metrics.getMetricValue(key, type, date);
    return { ok: true, key, type, date: date ?? null, value };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /api/metrics/:key/history?start=&end= — stored points
  // ─────────────────────────────────────────────────────────────

  fastify.get('/api/metrics/:key/history', async req => {
    const { key } = parseInput(MetricParams, req.params);
    const { start, end } = parseInput(HistoryQuery, req.query);

    const derived = config.getDerived(key);
    if (!derived && !config.getSeries(key)) {
      throw new NotFoundError(`Unknown metric "${key}"`);
    }

    const points = await metrics.getHistory(key, { start, end });
    return {
      ok: true,
      key,
      source: derived ? 'derived' : 'observations',
      count: points.length,
      points,
    };
  });
}
