import type { FastifyInstance } from 'fastify';
import type { ApiContext } from '../../../api/context.js';

export async function registerCatalogRoutes(fastify: FastifyInstance, ctx: ApiContext): Promise<void> {
  fastify.get('/api/catalog', async () => ({ ok: true, catalog: ctx.catalog }));

  fastify.get('/api/catalog/indices', async () => ({
    ok: true,
    regions: Object.entries(ctx.catalog.equityIndices).map(([region, indices]) => ({
      region,
      indices: Object.entries(indices).map(([name, ticker]) => ({
        name,
        ticker,
        hasConstituents: name in ctx.catalog.equityConstituents,
      })),
    })),
  }));
}
