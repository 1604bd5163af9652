/**
 * Root route registration: health, cache control and every module.
 */

import type { FastifyInstance } from 'fastify';
import { registerDashboardModule } from '../modules/dashboard/index.js';
import { registerSelectionModule } from '../modules/selection/index.js';
import type { ApiContext } from './context.js';

export async function registerRoutes(fastify: FastifyInstance, ctx: ApiContext): Promise<void> {
  fastify.get('/api/health', async () => ({
    ok: true,
    ts: new Date().toISOString(),
    fred: { configured: ctx.macro.isConfigured() },
    sessions: ctx.sessions.size(),
  }));

  // "Refresh all data": drop every cached quote, name and FRED series
  fastify.post('/api/cache/clear', async () => {
    ctx.quotes.clearCaches();
    ctx.macro.clearCaches();
    fastify.log.info('Caches cleared');
    return { ok: true, cleared: true };
  });

  await registerDashboardModule(fastify, ctx);
  await registerSelectionModule(fastify, ctx);
}
