/**
 * DASHBOARD MODULE
 *
 * Market overview, FX, rates, commodities and central-bank tables built
 * on the market-data fetchers.
 */

import type { FastifyInstance } from 'fastify';
import type { ApiContext } from '../../api/context.js';
import { registerCatalogRoutes } from './api/catalog.routes.js';
import { registerFxRoutes } from './api/fx.routes.js';
import { registerMacroRoutes } from './api/macro.routes.js';
import { registerMarketRoutes } from './api/market.routes.js';

export async function registerDashboardModule(fastify: FastifyInstance, ctx: ApiContext): Promise<void> {
  console.log('[Dashboard] Registering routes');

  await registerCatalogRoutes(fastify, ctx);
  await registerMarketRoutes(fastify, ctx);
  await registerFxRoutes(fastify, ctx);
  await registerMacroRoutes(fastify, ctx);

  console.log('[Dashboard] ✅ Registered at /api/market, /api/fx, /api/rates, /api/commodities, /api/macro');
}

export * from './contracts/cells.js';
export * from './contracts/dashboard.contracts.js';
