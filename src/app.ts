import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { AppError } from './common/errors.js';
import type { MonitorConfig } from './config/monitor.config.js';
import { registerAlertRoutes, type AlertRoutesDeps } from './modules/alerts/api/alert.routes.js';
import { registerDashboardRoutes } from './modules/dashboard/api/dashboard.routes.js';
import type { DashboardService } from './modules/dashboard/services/dashboard.service.js';
import { registerMetricsRoutes, type MetricsRoutesDeps } from './modules/metrics/api/metrics.routes.js';
import { registerSeriesRoutes } from './modules/series/api/series.routes.js';
import type { SeriesStore } from './modules/series/contracts/series.contracts.js';

export interface AppOptions {
  config: MonitorConfig;
  seriesStore: SeriesStore;
  alertStore: AlertRoutesDeps['store'];
  metrics: MetricsRoutesDeps['metrics'];
  monitor: AlertRoutesDeps['monitor'];
  dashboard: Pick<DashboardService, 'buildDashboardData'>;
  /** pino level for Fastify's request log, or false to silence it */
  logLevel: string | false;
  corsOrigins: string;
  /** Include unexpected error messages in 500 responses */
  exposeErrors: boolean;
  /** Extra readiness checks reported by /api/health */
  healthChecks?: () => Record<string, string>;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: AppOptions): FastifyInstance {
  const app = Fastify({
    logger: options.logLevel === false ? false : { level: options.logLevel },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: options.corsOrigins === '*' ? true : options.corsOrigins.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    app.log.error(err);

    if (err instanceof AppError) {
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    return reply.status(err.statusCode ?? 500).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: options.exposeErrors ? err.message : 'Internal server error',
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    service: 'fed-monitor',
    configVersion: options.config.version,
    timestamp: new Date().toISOString(),
    checks: options.healthChecks?.() ?? {},
  }));

  app.register(async fastify => {
    await registerSeriesRoutes(fastify, { config: options.config, store: options.seriesStore });
    await registerMetricsRoutes(fastify, { config: options.config, metrics: options.metrics });
    await registerAlertRoutes(fastify, { monitor: options.monitor, store: options.alertStore });
    await registerDashboardRoutes(fastify, { dashboard: options.dashboard });
  });

  return app;
}
