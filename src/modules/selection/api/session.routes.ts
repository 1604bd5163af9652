/**
 * SESSION ROUTES
 *
 * Per-session dashboard state: index and equity watchlists, chart
 * overlays, date ranges and display settings, plus the tables and chart
 * data they drive.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ApiContext } from '../../../api/context.js';
import { sendCsv } from '../../../api/csv-reply.js';
import { ValidationError } from '../../../common/errors.js';
import { BooleanFlag, Currency, Decimals, IsoDate, OutputFormat } from '../../../common/schemas.js';
import { chartDataCsv, quoteRowsCsv } from '../../dashboard/services/csv.export.js';
import { buildComparisonChart, buildFxComparisonChart } from '../../dashboard/services/chart.service.js';
import { presentQuoteRows } from '../../dashboard/services/presenter.js';
import { buildSelectionTable, flattenTableRows } from '../../dashboard/services/quote-table.service.js';
import {
  addUnique,
  chartItemKey,
  fxChartItem,
  fxChartItemKey,
  removeByKey,
  type ChartItem,
} from '../chart-items.store.js';
import {
  addIndices,
  allEquitiesSelection,
  allIndicesSelection,
  displayNameLabels,
  indexRefsOf,
} from '../selection.presets.js';
import { addToSelection, clearSelection, removeFromSelection, selectionSize } from '../selection.store.js';
import type { SelectionTree } from '../selection.types.js';
import type { SessionState } from '../session.store.js';

// ═══════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════

const SessionParams = z.object({ id: z.string().uuid() });
const KindParams = SessionParams.extend({ kind: z.enum(['indices', 'equities']) });

const Range = z
  .object({ start: IsoDate, end: IsoDate })
  .refine((r) => r.start < r.end, 'start must be before end');

const SettingsBody = z.object({
  decimals: Decimals.optional(),
  normalize: z.boolean().optional(),
  logScale: z.boolean().optional(),
  range: Range.optional(),
  chartRange: Range.optional(),
});

const IndexRefs = z.object({ region: z.string().min(1), index: z.string().min(1) });

const AddIndicesBody = z.object({ refs: z.array(IndexRefs).min(1) });

const AddEquitiesBody = z.object({
  region: z.string().min(1),
  index: z.string().min(1),
  symbols: z.array(z.string().min(1)).min(1),
  label: z.enum(['name', 'symbol']).default('name'),
});

const SelectAllEquitiesBody = z.object({ refs: z.array(IndexRefs).optional() }).default({});

const RemoveBody = z.object({
  region: z.string().min(1),
  category: z.string().min(1),
  symbols: z.array(z.string().min(1)).min(1),
});

const TableQuery = z.object({
  decimals: Decimals.optional(),
  format: OutputFormat,
  skeleton: BooleanFlag.default('false'),
});

const ChartItemSchema = z.object({
  type: z.enum(['Index', 'Equity', 'FX', 'Indicator', 'Commodity', 'Rate']),
  region: z.string().default(''),
  name: z.string().min(1),
  symbol: z.string().min(1),
});

const AddChartItemsBody = z.object({ items: z.array(ChartItemSchema).min(1) });
const RemoveChartItemsBody = z.object({ symbols: z.array(z.string().min(1)).min(1) });

const AddFxChartsBody = z.object({
  pairs: z.array(z.object({ base: Currency, unit: Currency })).min(1),
});
const RemoveFxChartsBody = z.object({ pairs: z.array(z.string().min(1)).min(1) });

const ChartQuery = z.object({ format: OutputFormat });

type Params = z.infer<typeof SessionParams>;
type KindParamsT = z.infer<typeof KindParams>;

// ═══════════════════════════════════════════════════════════════
// VIEW
// ═══════════════════════════════════════════════════════════════

function sessionView(state: SessionState) {
  return {
    ...state,
    counts: {
      indices: selectionSize(state.indices),
      equities: selectionSize(state.equities),
      chartItems: state.chartItems.length,
      fxChartItems: state.fxChartItems.length,
    },
  };
}

function withTree(state: SessionState, kind: KindParamsT['kind'], tree: SelectionTree): SessionState {
  return kind === 'indices' ? { ...state, indices: tree } : { ...state, equities: tree };
}

// ═══════════════════════════════════════════════════════════════
// ROUTES
// ═══════════════════════════════════════════════════════════════

export async function registerSessionRoutes(fastify: FastifyInstance, ctx: ApiContext): Promise<void> {
  const { sessions, quotes, catalog } = ctx;
  const prefix = '/api/sessions';

  // ─────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────

  fastify.post(prefix, async (_req, reply) => {
    const state = sessions.create();
    return reply.code(201).send({ ok: true, session: sessionView(state) });
  });

  fastify.get<{ Params: Params }>(
    `${prefix}/:id`,
    { schema: { params: SessionParams } },
    async (req) => ({ ok: true, session: sessionView(sessions.get(req.params.id)) })
  );

  fastify.delete<{ Params: Params }>(
    `${prefix}/:id`,
    { schema: { params: SessionParams } },
    async (req) => ({ ok: true, deleted: sessions.delete(req.params.id) })
  );

  fastify.patch<{ Params: Params; Body: z.infer<typeof SettingsBody> }>(
    `${prefix}/:id/settings`,
    { schema: { params: SessionParams, body: SettingsBody } },
    async (req) => {
      const { decimals, normalize, logScale, range, chartRange } = req.body;
      const state = sessions.update(req.params.id, (s) => ({
        ...s,
        range: range ?? s.range,
        chartRange: chartRange ?? s.chartRange,
        settings: {
          decimals: decimals ?? s.settings.decimals,
          normalize: normalize ?? s.settings.normalize,
          logScale: logScale ?? s.settings.logScale,
        },
      }));
      return { ok: true, session: sessionView(state) };
    }
  );

  // ─────────────────────────────────────────────────────────────
  // Watchlists
  // ─────────────────────────────────────────────────────────────

  fastify.post<{ Params: Params; Body: z.infer<typeof AddIndicesBody> }>(
    `${prefix}/:id/indices`,
    { schema: { params: SessionParams, body: AddIndicesBody } },
    async (req) => {
      const state = sessions.update(req.params.id, (s) => ({
        ...s,
        indices: addIndices(s.indices, catalog, req.body.refs),
      }));
      return { ok: true, indices: state.indices };
    }
  );

  fastify.post<{ Params: Params }>(
    `${prefix}/:id/indices/select-all`,
    { schema: { params: SessionParams } },
    async (req) => {
      const state = sessions.update(req.params.id, (s) => ({
        ...s,
        indices: allIndicesSelection(catalog),
      }));
      return { ok: true, indices: state.indices };
    }
  );

  fastify.post<{ Params: Params; Body: z.infer<typeof AddEquitiesBody> }>(
    `${prefix}/:id/equities`,
    { schema: { params: SessionParams, body: AddEquitiesBody } },
    async (req) => {
      const { region, index, symbols, label } = req.body;
      sessions.get(req.params.id); // 404 before any name lookup
      const labels = label === 'name' ? await displayNameLabels(quotes, symbols) : undefined;

      // applied to the state current after the name lookups, not before
      const state = sessions.update(req.params.id, (s) => ({
        ...s,
        equities: addToSelection(s.equities, region, index, symbols, labels),
      }));
      return { ok: true, equities: state.equities };
    }
  );

  // Replaces the equity watchlist with every constituent of the given
  // indices, or of the indices currently in the index watchlist.
  fastify.post<{ Params: Params; Body: z.infer<typeof SelectAllEquitiesBody> }>(
    `${prefix}/:id/equities/select-all`,
    { schema: { params: SessionParams, body: SelectAllEquitiesBody } },
    async (req) => {
      const current = sessions.get(req.params.id);
      const refs = req.body.refs ?? indexRefsOf(current.indices);
      const equities = await allEquitiesSelection(quotes, catalog, refs);

      const state = sessions.update(req.params.id, (s) => ({ ...s, equities }));
      return { ok: true, equities: state.equities };
    }
  );

  fastify.post<{ Params: KindParamsT; Body: z.infer<typeof RemoveBody> }>(
    `${prefix}/:id/:kind/remove`,
    { schema: { params: KindParams, body: RemoveBody } },
    async (req) => {
      const { kind } = req.params;
      const { region, category, symbols } = req.body;
      const state = sessions.update(req.params.id, (s) =>
        withTree(s, kind, removeFromSelection(s[kind], region, category, symbols))
      );
      return { ok: true, [kind]: state[kind] };
    }
  );

  fastify.delete<{ Params: KindParamsT }>(
    `${prefix}/:id/:kind`,
    { schema: { params: KindParams } },
    async (req) => {
      const { kind } = req.params;
      const state = sessions.update(req.params.id, (s) => withTree(s, kind, clearSelection()));
      return { ok: true, [kind]: state[kind] };
    }
  );

  // ─────────────────────────────────────────────────────────────
  // GET /:id/tables/:kind: grouped snapshot table of a watchlist
  // ─────────────────────────────────────────────────────────────

  fastify.get<{ Params: KindParamsT; Querystring: z.infer<typeof TableQuery> }>(
    `${prefix}/:id/tables/:kind`,
    { schema: { params: KindParams, querystring: TableQuery } },
    async (req, reply) => {
      const { kind } = req.params;
      const { format, skeleton } = req.query;
      const state = sessions.get(req.params.id);
      const decimals = req.query.decimals ?? state.settings.decimals;

      const table = await buildSelectionTable(quotes, state[kind], state.range, { skeleton });

      if (format === 'csv') {
        if (skeleton) {
          throw new ValidationError('A skeleton table cannot be exported');
        }
        const nameColumn = kind === 'indices' ? 'Index' : 'Company';
        return sendCsv(
          reply,
          `${kind}_data_${state.range.start}_${state.range.end}.csv`,
          quoteRowsCsv(flattenTableRows(table), nameColumn)
        );
      }

      return {
        ok: true,
        range: state.range,
        groups: table.groups.map((group) => ({
          region: group.region,
          categories: group.categories.map((bucket) => ({
            category: bucket.category,
            rows: presentQuoteRows(bucket.rows, decimals),
          })),
        })),
      };
    }
  );

  // ─────────────────────────────────────────────────────────────
  // Chart overlays
  // ─────────────────────────────────────────────────────────────

  fastify.post<{ Params: Params; Body: z.infer<typeof AddChartItemsBody> }>(
    `${prefix}/:id/charts`,
    { schema: { params: SessionParams, body: AddChartItemsBody } },
    async (req) => {
      const items: ChartItem[] = req.body.items;
      const state = sessions.update(req.params.id, (s) => ({
        ...s,
        chartItems: addUnique(s.chartItems, items, chartItemKey),
      }));
      return { ok: true, chartItems: state.chartItems };
    }
  );

  fastify.post<{ Params: Params; Body: z.infer<typeof RemoveChartItemsBody> }>(
    `${prefix}/:id/charts/remove`,
    { schema: { params: SessionParams, body: RemoveChartItemsBody } },
    async (req) => {
      const state = sessions.update(req.params.id, (s) => ({
        ...s,
        chartItems: removeByKey(s.chartItems, req.body.symbols, chartItemKey),
      }));
      return { ok: true, chartItems: state.chartItems };
    }
  );

  fastify.delete<{ Params: Params }>(
    `${prefix}/:id/charts`,
    { schema: { params: SessionParams } },
    async (req) => {
      const state = sessions.update(req.params.id, (s) => ({ ...s, chartItems: [] }));
      return { ok: true, chartItems: state.chartItems };
    }
  );

  fastify.get<{ Params: Params; Querystring: z.infer<typeof ChartQuery> }>(
    `${prefix}/:id/charts/data`,
    { schema: { params: SessionParams, querystring: ChartQuery } },
    async (req, reply) => {
      const state = sessions.get(req.params.id);
      const chart = await buildComparisonChart(quotes, state.chartItems, state.chartRange, state.settings);

      if (req.query.format === 'csv') {
        return sendCsv(
          reply,
          `chart_data_${state.chartRange.start}_${state.chartRange.end}.csv`,
          chartDataCsv(chart)
        );
      }
      return { ok: true, chart };
    }
  );

  fastify.post<{ Params: Params; Body: z.infer<typeof AddFxChartsBody> }>(
    `${prefix}/:id/fx-charts`,
    { schema: { params: SessionParams, body: AddFxChartsBody } },
    async (req) => {
      const additions = req.body.pairs
        .filter((p) => p.base !== p.unit)
        .map((p) => fxChartItem(p.base, p.unit));
      const state = sessions.update(req.params.id, (s) => ({
        ...s,
        fxChartItems: addUnique(s.fxChartItems, additions, fxChartItemKey),
      }));
      return { ok: true, fxChartItems: state.fxChartItems };
    }
  );

  fastify.post<{ Params: Params; Body: z.infer<typeof RemoveFxChartsBody> }>(
    `${prefix}/:id/fx-charts/remove`,
    { schema: { params: SessionParams, body: RemoveFxChartsBody } },
    async (req) => {
      const state = sessions.update(req.params.id, (s) => ({
        ...s,
        fxChartItems: removeByKey(s.fxChartItems, req.body.pairs, fxChartItemKey),
      }));
      return { ok: true, fxChartItems: state.fxChartItems };
    }
  );

  fastify.delete<{ Params: Params }>(
    `${prefix}/:id/fx-charts`,
    { schema: { params: SessionParams } },
    async (req) => {
      const state = sessions.update(req.params.id, (s) => ({ ...s, fxChartItems: [] }));
      return { ok: true, fxChartItems: state.fxChartItems };
    }
  );

  fastify.get<{ Params: Params; Querystring: z.infer<typeof ChartQuery> }>(
    `${prefix}/:id/fx-charts/data`,
    { schema: { params: SessionParams, querystring: ChartQuery } },
    async (req, reply) => {
      const state = sessions.get(req.params.id);
      const chart = await buildFxComparisonChart(
        quotes,
        state.fxChartItems,
        state.range,
        state.settings.logScale
      );

      if (req.query.format === 'csv') {
        return sendCsv(reply, `fx_chart_data_${state.range.start}_${state.range.end}.csv`, chartDataCsv(chart));
      }
      return { ok: true, chart };
    }
  );
}
