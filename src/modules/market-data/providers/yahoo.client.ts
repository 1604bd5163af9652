/**
 * YAHOO FINANCE CLIENT
 *
 * Daily closes from the unofficial chart API (no key required).
 * Quotes, FX pairs (`EURUSD=X`), futures (`GC=F`) and indices (`^GSPC`)
 * all go through the same endpoint.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { toEpochSeconds, isoDate } from '../utils/dates.js';
import type { DateRange, PricePoint } from '../contracts/market-data.contracts.js';

// ═══════════════════════════════════════════════════════════════
// RESPONSE SCHEMA
// ═══════════════════════════════════════════════════════════════

const NullableNumbers = z.array(z.number().nullable());

const ChartResultSchema = z.object({
  meta: z.object({
    symbol: z.string(),
    currency: z.string().nullish(),
    longName: z.string().nullish(),
    shortName: z.string().nullish(),
    gmtoffset: z.number().nullish(),
  }),
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z.array(z.object({ close: NullableNumbers.optional() })),
    adjclose: z.array(z.object({ adjclose: NullableNumbers })).optional(),
  }),
});

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(ChartResultSchema).nullable(),
    error: z
      .object({ code: z.string(), description: z.string() })
      .nullable()
      .optional(),
  }),
});

export interface YahooChart {
  symbol: string;
  currency: string | null;
  name: string | null;
  points: PricePoint[];
}

export interface YahooClientOptions {
  baseUrl: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

// ═══════════════════════════════════════════════════════════════
// FETCH
// ═══════════════════════════════════════════════════════════════

/**
 * Fetch daily closes for `symbol` over [start, end)
 */
export async function fetchYahooChart(
  symbol: string,
  range: DateRange,
  options: YahooClientOptions
): Promise<YahooChart> {
  const http = options.http ?? axios;
  const url = `${options.baseUrl}/${encodeURIComponent(symbol)}`;

  const response = await http.get<unknown>(url, {
    params: {
      period1: toEpochSeconds(range.start),
      period2: toEpochSeconds(range.end),
      interval: '1d',
      events: 'history',
      includeAdjustedClose: true,
    },
    headers: {
      'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
      Accept: 'application/json',
    },
    timeout: options.timeoutMs,
  });

  return parseYahooChart(response.data);
}

// ═══════════════════════════════════════════════════════════════
// PARSE
// ═══════════════════════════════════════════════════════════════

/**
 * Turn a chart payload into a clean series: adjusted closes when present,
 * null closes dropped, one point per exchange-local day (last wins),
 * ascending by date.
 */
export function parseYahooChart(payload: unknown): YahooChart {
  const parsed = ChartResponseSchema.parse(payload);

  if (parsed.chart.error) {
    throw new Error(`YAHOO_CHART_ERROR: ${parsed.chart.error.code} ${parsed.chart.error.description}`);
  }

  const result = parsed.chart.result?.[0];
  if (!result) {
    throw new Error('YAHOO_CHART_EMPTY');
  }

  const timestamps = result.timestamp ?? [];
  const closes = result.indicators.quote[0]?.close ?? [];
  const adjusted = result.indicators.adjclose?.[0]?.adjclose;
  const prices = adjusted && adjusted.length === timestamps.length ? adjusted : closes;
  const offset = result.meta.gmtoffset ?? 0;

  const byDate = new Map<string, number>();
  for (let i = 0; i < timestamps.length; i++) {
    const price = prices[i];
    if (price === null || price === undefined || !Number.isFinite(price)) continue;
    const date = isoDate(new Date((timestamps[i] + offset) * 1000));
    byDate.set(date, price);
  }

  const points = [...byDate.entries()]
    .map(([date, price]) => ({ date, price }))
    .sort((a, b) => a.date.localeCompare(b.date));

  return {
    symbol: result.meta.symbol,
    currency: result.meta.currency ?? null,
    name: result.meta.longName ?? result.meta.shortName ?? null,
    points,
  };
}
