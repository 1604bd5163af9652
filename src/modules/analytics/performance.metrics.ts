/**
 * PERFORMANCE METRICS
 *
 * Chart-side statistics: rebasing to 100, total return, annualized
 * volatility and price range.
 */

import type { PricePoint, PriceSeries } from '../market-data/contracts/market-data.contracts.js';
import { toReturnSeries } from './returns.utils.js';
import { pctChange } from './snapshot.metrics.js';
import { sampleStd } from './utils/stats.js';

export const TRADING_DAYS_PER_YEAR = 252;

export interface PerformanceStats {
  startDate: string;
  endDate: string;
  startPrice: number;
  endPrice: number;
  totalReturnPct: number | null;
  volatilityPct: number | null;
  observations: number;
}

/**
 * Rebase so the first observation is 100. A non-positive first value
 * leaves the series as it is.
 */
export function normalizeTo100(series: PriceSeries): PricePoint[] {
  if (series.length === 0) return [];
  const base = series[0].price;
  if (!(base > 0)) return series.map((p) => ({ ...p }));
  return series.map((p) => ({ date: p.date, price: (p.price / base) * 100 }));
}

/**
 * Sample std of daily returns × √252, in percent. Needs two returns.
 */
export function annualizedVolatilityPct(series: PriceSeries): number | null {
  const returns = toReturnSeries(series)
    .map((r) => r.value)
    .filter((v) => Number.isFinite(v));
  if (returns.length < 2) return null;
  return sampleStd(returns) * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100;
}

export function performanceStats(series: PriceSeries): PerformanceStats | null {
  if (series.length === 0) return null;
  const first = series[0];
  const last = series[series.length - 1];

  return {
    startDate: first.date,
    endDate: last.date,
    startPrice: first.price,
    endPrice: last.price,
    totalReturnPct: pctChange(first.price, last.price),
    volatilityPct: annualizedVolatilityPct(series),
    observations: series.length,
  };
}

export function priceRange(series: PriceSeries): { low: number; high: number } | null {
  if (series.length === 0) return null;
  let low = Infinity;
  let high = -Infinity;
  for (const p of series) {
    if (p.price < low) low = p.price;
    if (p.price > high) high = p.price;
  }
  return { low, high };
}
