/**
 * FX ROUTES
 *
 * Rates table, pair view, correlation matrix and rolling correlation.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ApiContext } from '../../../api/context.js';
import { sendCsv } from '../../../api/csv-reply.js';
import { NotFoundError, ValidationError } from '../../../common/errors.js';
import { Currency, CurrencyList, Decimals, IsoDate, OutputFormat, RangeQuery, resolveRange } from '../../../common/schemas.js';
import { listCurrencies } from '../../catalog/catalog.registry.js';
import { today } from '../../market-data/utils/dates.js';
import { fxRowsCsv, correlationMatrixCsv, returnsCsv } from '../services/csv.export.js';
import {
  annotateCorrelation,
  buildFxPairView,
  buildFxTable,
  runFxCorrelation,
  runRollingFxCorrelation,
} from '../services/fx.service.js';
import { present, presentFxRows } from '../services/presenter.js';

const FxTableQuery = z.object({
  base: Currency.default('USD'),
  date: IsoDate.optional(),
  decimals: Decimals.default(4),
  format: OutputFormat,
});

const PairQuery = RangeQuery.extend({
  base: Currency,
  unit: Currency,
  decimals: Decimals.default(4),
});

const CorrelationQuery = RangeQuery.extend({
  base: Currency.default('USD'),
  assets: CurrencyList.optional(),
  format: OutputFormat,
  export: z.enum(['matrix', 'returns']).default('matrix'),
});

const RollingQuery = RangeQuery.extend({
  base: Currency.default('USD'),
  a: Currency,
  b: Currency,
  window: z.coerce.number().int().min(2).max(250).default(30),
});

export async function registerFxRoutes(fastify: FastifyInstance, ctx: ApiContext): Promise<void> {
  const { quotes, catalog } = ctx;

  fastify.get('/api/fx/currencies', async () => ({
    ok: true,
    currencies: listCurrencies(catalog),
    g10: catalog.fx.g10,
    emerging: catalog.fx.emerging,
    crosses: catalog.fx.crosses,
    correlationDefaults: catalog.fx.correlationDefaults,
  }));

  // ─────────────────────────────────────────────────────────────
  // GET /api/fx/rates: G10 and emerging rows at a quote date
  // ─────────────────────────────────────────────────────────────

  fastify.get<{ Querystring: z.infer<typeof FxTableQuery> }>(
    '/api/fx/rates',
    { schema: { querystring: FxTableQuery } },
    async (req, reply) => {
      const { base, decimals, format } = req.query;
      const quoteDate = req.query.date ?? today();
      const table = await buildFxTable(quotes, catalog, base, quoteDate);

      if (format === 'csv') {
        return sendCsv(reply, `fx_rates_${base}_${quoteDate}.csv`, fxRowsCsv([...table.g10, ...table.emerging]));
      }
      return {
        ok: true,
        base,
        quoteDate,
        g10: presentFxRows(table.g10, decimals),
        emerging: presentFxRows(table.emerging, decimals),
      };
    }
  );

  // ─────────────────────────────────────────────────────────────
  // GET /api/fx/pair
  // ─────────────────────────────────────────────────────────────

  fastify.get<{ Querystring: z.infer<typeof PairQuery> }>(
    '/api/fx/pair',
    { schema: { querystring: PairQuery } },
    async (req) => {
      const { base, unit, decimals } = req.query;
      if (base === unit) {
        throw new ValidationError('base and unit must differ');
      }
      const range = resolveRange(req.query);
      const view = await buildFxPairView(quotes, base, unit, range);
      if (!view) {
        throw new NotFoundError(`No data for ${base}/${unit} between ${range.start} and ${range.end}`);
      }
      return {
        ok: true,
        range,
        pair: present(
          view,
          [['current', 'rate'], ['dailyPct', 'signed_percent'], ['ytdPct', 'signed_percent']],
          decimals
        ),
      };
    }
  );

  // ─────────────────────────────────────────────────────────────
  // GET /api/fx/correlation
  //
  // `assets` lists the currencies in display order; listing the base
  // itself adds its basket column.
  // ─────────────────────────────────────────────────────────────

  fastify.get<{ Querystring: z.infer<typeof CorrelationQuery> }>(
    '/api/fx/correlation',
    { schema: { querystring: CorrelationQuery } },
    async (req, reply) => {
      const { base, format } = req.query;
      const assets = req.query.assets ?? catalog.fx.correlationDefaults;
      const range = resolveRange(req.query);

      const outcome = await runFxCorrelation(quotes, base, assets, range);
      if (outcome.status === 'INSUFFICIENT_DATA') {
        return reply.code(422).send({
          ok: false,
          error: 'INSUFFICIENT_DATA',
          message: outcome.reason,
          included: outcome.included,
          excluded: outcome.excluded,
        });
      }

      if (format === 'csv') {
        return req.query.export === 'returns'
          ? sendCsv(reply, `fx_returns_${base}_${range.start}_${range.end}.csv`, returnsCsv(outcome.returns))
          : sendCsv(reply, `fx_correlation_${base}_${range.start}_${range.end}.csv`, correlationMatrixCsv(outcome.matrix));
      }
      return { ok: true, range, correlation: annotateCorrelation(outcome) };
    }
  );

  fastify.get<{ Querystring: z.infer<typeof RollingQuery> }>(
    '/api/fx/correlation/rolling',
    { schema: { querystring: RollingQuery } },
    async (req) => {
      const { base, a, b, window } = req.query;
      const range = resolveRange(req.query);
      const points = await runRollingFxCorrelation(quotes, base, a, b, range, window);
      if (!points) {
        throw new NotFoundError(`No data for ${base}/${a} or ${base}/${b}`);
      }
      return { ok: true, base, a, b, window, range, points };
    }
  );
}
