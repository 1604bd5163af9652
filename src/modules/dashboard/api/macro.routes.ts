/**
 * MACRO ROUTES
 *
 * Central-bank policy rates from FRED. Without FRED_API_KEY these answer
 * 503 CONFIGURATION_MISSING; nothing else in the API is affected.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ApiContext } from '../../../api/context.js';
import { sendCsv } from '../../../api/csv-reply.js';
import { NotFoundError } from '../../../common/errors.js';
import { describeIssue } from '../../../common/result.js';
import { Decimals, OutputFormat, RangeQuery } from '../../../common/schemas.js';
import { today } from '../../market-data/utils/dates.js';
import {
  assertMacroConfigured,
  buildCentralBankTable,
  describeRateChange,
  POLICY_HISTORY_START,
} from '../services/central-banks.service.js';
import { centralBanksCsv } from '../services/csv.export.js';
import { present } from '../services/presenter.js';

const CentralBankQuery = z.object({
  decimals: Decimals.default(2),
  format: OutputFormat,
});

const SeriesParams = z.object({
  seriesId: z.string().regex(/^[A-Za-z0-9_]+$/, 'Invalid FRED series id'),
});

export async function registerMacroRoutes(fastify: FastifyInstance, ctx: ApiContext): Promise<void> {
  const { macro, catalog } = ctx;

  fastify.get<{ Querystring: z.infer<typeof CentralBankQuery> }>(
    '/api/macro/central-banks',
    { schema: { querystring: CentralBankQuery } },
    async (req, reply) => {
      const rows = await buildCentralBankTable(macro, catalog);

      if (req.query.format === 'csv') {
        return sendCsv(reply, `central_bank_rates_${today()}.csv`, centralBanksCsv(rows));
      }
      return {
        ok: true,
        banks: rows.map((row) => {
          const shown = present(row, [['currentRate', 'percent']], req.query.decimals);
          return { ...shown, display: { ...shown.display, lastChangePct: describeRateChange(row) } };
        }),
      };
    }
  );

  // ─────────────────────────────────────────────────────────────
  // GET /api/macro/series/:seriesId: history for charting
  // ─────────────────────────────────────────────────────────────

  fastify.get<{ Params: z.infer<typeof SeriesParams>; Querystring: z.infer<typeof RangeQuery> }>(
    '/api/macro/series/:seriesId',
    { schema: { params: SeriesParams, querystring: RangeQuery } },
    async (req) => {
      assertMacroConfigured(macro);
      const { seriesId } = req.params;
      const start = req.query.start ?? POLICY_HISTORY_START;
      const result = await macro.fetchSeries(seriesId, { start, end: req.query.end });

      if (!result.ok) {
        throw new NotFoundError(`${seriesId}: ${describeIssue(result.issue)}`);
      }
      return { ok: true, seriesId, points: result.value };
    }
  );
}
