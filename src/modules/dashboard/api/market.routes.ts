/**
 * MARKET ROUTES
 *
 * Overview, commodities and rates tables. Every table endpoint takes
 * `start`, `end`, `decimals` and `format=json|csv`.
 */

import type { FastifyInstance } from 'fastify';
import type { ApiContext } from '../../../api/context.js';
import { sendCsv } from '../../../api/csv-reply.js';
import { resolveRange, TableQuery, type TableQueryInput } from '../../../common/schemas.js';
import { formatCell } from '../contracts/cells.js';
import type { QuoteTable } from '../contracts/dashboard.contracts.js';
import { buildCommodityTables } from '../services/commodities.service.js';
import { quoteTablesCsv, yieldMatrixCsv } from '../services/csv.export.js';
import { buildMarketOverview } from '../services/overview.service.js';
import { NOMINAL_QUOTE_FIELDS, presentQuoteRows, QUOTE_FIELDS } from '../services/presenter.js';
import { buildShortTermRates, buildYieldMatrix } from '../services/rates.service.js';

function presentTables(tables: QuoteTable[], decimals: number, fields = QUOTE_FIELDS) {
  return tables.map((t) => ({ title: t.title, rows: presentQuoteRows(t.rows, decimals, fields) }));
}

export async function registerMarketRoutes(fastify: FastifyInstance, ctx: ApiContext): Promise<void> {
  const { quotes, catalog } = ctx;

  // ─────────────────────────────────────────────────────────────
  // GET /api/market/overview
  // ─────────────────────────────────────────────────────────────

  fastify.get<{ Querystring: TableQueryInput }>(
    '/api/market/overview',
    { schema: { querystring: TableQuery } },
    async (req, reply) => {
      const range = resolveRange(req.query);
      const tables = await buildMarketOverview(quotes, catalog, range);

      if (req.query.format === 'csv') {
        return sendCsv(reply, `market_overview_${range.end}.csv`, quoteTablesCsv(tables));
      }
      return { ok: true, range, tables: presentTables(tables, req.query.decimals) };
    }
  );

  // ─────────────────────────────────────────────────────────────
  // GET /api/commodities
  // ─────────────────────────────────────────────────────────────

  fastify.get<{ Querystring: TableQueryInput }>(
    '/api/commodities',
    { schema: { querystring: TableQuery } },
    async (req, reply) => {
      const range = resolveRange(req.query);
      const tables = await buildCommodityTables(quotes, catalog, range);

      if (req.query.format === 'csv') {
        return sendCsv(reply, `commodities_${range.start}_${range.end}.csv`, quoteTablesCsv(tables));
      }
      return { ok: true, range, tables: presentTables(tables, req.query.decimals, NOMINAL_QUOTE_FIELDS) };
    }
  );

  // ─────────────────────────────────────────────────────────────
  // GET /api/rates/short-term
  // ─────────────────────────────────────────────────────────────

  fastify.get<{ Querystring: TableQueryInput }>(
    '/api/rates/short-term',
    { schema: { querystring: TableQuery } },
    async (req, reply) => {
      const range = resolveRange(req.query);
      const tables = await buildShortTermRates(quotes, catalog, range);

      if (req.query.format === 'csv') {
        return sendCsv(reply, `short_term_rates_${range.end}.csv`, quoteTablesCsv(tables));
      }
      return { ok: true, range, tables: presentTables(tables, req.query.decimals, NOMINAL_QUOTE_FIELDS) };
    }
  );

  // ─────────────────────────────────────────────────────────────
  // GET /api/rates/yields: tenor × country
  // ─────────────────────────────────────────────────────────────

  fastify.get<{ Querystring: TableQueryInput }>(
    '/api/rates/yields',
    { schema: { querystring: TableQuery } },
    async (req, reply) => {
      const range = resolveRange(req.query);
      const matrix = await buildYieldMatrix(quotes, catalog, range);

      if (req.query.format === 'csv') {
        return sendCsv(reply, `sovereign_yields_${range.end}.csv`, yieldMatrixCsv(matrix));
      }
      const display = matrix.values.map((row) =>
        row.map((cell) => formatCell(cell, 'nominal', req.query.decimals))
      );
      return { ok: true, range, matrix, display };
    }
  );
}
