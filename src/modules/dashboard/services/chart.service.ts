/**
 * CHART SERVICE
 *
 * Comparison chart data for the session's chart overlays: one trace per
 * item over the chart range, optionally rebased to 100, plus per-trace
 * performance stats. Items with no data are listed in `missing`.
 */

import { normalizeTo100, performanceStats } from '../../analytics/performance.metrics.js';
import type { DateRange, QuoteFetcher } from '../../market-data/contracts/market-data.contracts.js';
import { fetchFxSeries } from '../../market-data/services/fx.quotes.js';
import type { ChartItem, FxChartItem } from '../../selection/chart-items.store.js';
import type { ChartTrace, ComparisonChart } from '../contracts/dashboard.contracts.js';

export interface ChartOptions {
  normalize: boolean;
  logScale: boolean;
}

export function yAxisTitle(options: ChartOptions): string {
  const title = options.normalize ? 'Normalized Price (Base=100)' : 'Price';
  return options.logScale ? `${title} (Log Scale)` : title;
}

function assemble(
  range: DateRange,
  options: ChartOptions,
  traces: ChartTrace[],
  missing: string[]
): ComparisonChart {
  const stats: ComparisonChart['stats'] = [];
  for (const trace of traces) {
    const s = performanceStats(trace.prices);
    if (s) stats.push({ symbol: trace.symbol, name: trace.name, ...s });
  }

  return {
    range: { start: range.start, end: range.end },
    normalized: options.normalize,
    yAxis: { title: yAxisTitle(options), type: options.logScale ? 'log' : 'linear' },
    traces,
    missing,
    stats,
  };
}

export async function buildComparisonChart(
  quotes: QuoteFetcher,
  items: readonly ChartItem[],
  range: DateRange,
  options: ChartOptions
): Promise<ComparisonChart> {
  const fetched = await Promise.all(
    items.map(async (item) => ({ item, result: await quotes.fetchSeries(item.symbol, range) }))
  );

  const traces: ChartTrace[] = [];
  const missing: string[] = [];
  for (const { item, result } of fetched) {
    if (!result.ok) {
      missing.push(item.name);
      continue;
    }
    const prices = [...result.value];
    traces.push({
      symbol: item.symbol,
      name: item.name,
      type: item.type,
      points: options.normalize ? normalizeTo100(prices) : prices,
      prices,
    });
  }

  return assemble(range, options, traces, missing);
}

/**
 * FX pairs are always rebased to 100 so that pairs quoted on very
 * different scales share an axis.
 */
export async function buildFxComparisonChart(
  quotes: QuoteFetcher,
  items: readonly FxChartItem[],
  range: DateRange,
  logScale: boolean
): Promise<ComparisonChart> {
  const fetched = await Promise.all(
    items.map(async (item) => ({
      item,
      result: await fetchFxSeries(quotes, item.base, item.unit, range),
    }))
  );

  const traces: ChartTrace[] = [];
  const missing: string[] = [];
  for (const { item, result } of fetched) {
    if (!result.ok) {
      missing.push(item.pair);
      continue;
    }
    const prices = [...result.value];
    traces.push({
      symbol: item.pair,
      name: item.pair,
      type: 'FX',
      points: normalizeTo100(prices),
      prices,
    });
  }

  return assemble(range, { normalize: true, logScale }, traces, missing);
}
