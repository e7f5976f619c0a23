/**
 * DASHBOARD API ROUTES
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseInput } from '../../../common/validation.js';
import type { DashboardService } from '../services/dashboard.service.js';

const DashboardQuery = z.object({
  days: z.coerce.number().int().min(1).max(3650).default(365),
});

export async function registerDashboardRoutes(
  fastify: FastifyInstance,
  deps: { dashboard: Pick<DashboardService, 'buildDashboardData'> }
): Promise<void> {
  fastify.get('/api/dashboard', async req => {
    const { days } = parseInput(DashboardQuery, req.query);
    const data = await deps.dashboard.buildDashboardData({ days });
    return { ok: true, ...data };
  });
}
