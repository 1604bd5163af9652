/**
 * FX quotes on top of a QuoteFetcher.
 *
 * Yahoo quotes USD-based pairs as `{CCY}=X` (JPY=X is USD/JPY) and every
 * other pair as `{BASE}{UNIT}=X`.
 */

import type { Result } from '../../../common/result.js';
import { addDays } from '../utils/dates.js';
import type { DateRange, PriceSeries, QuoteFetcher } from '../contracts/market-data.contracts.js';

export const RATE_LOOKBACK_DAYS = 7;

export function fxTicker(base: string, unit: string): string {
  if (base === 'USD') {
    return `${unit}=X`;
  }
  return `${base}${unit}=X`;
}

export function fetchFxSeries(
  quotes: QuoteFetcher,
  base: string,
  unit: string,
  range: DateRange
): Promise<Result<PriceSeries>> {
  return quotes.fetchSeries(fxTicker(base, unit), range);
}

/**
 * Close on `date`, or the last close in the week before it.
 */
export async function fetchFxRateOn(
  quotes: QuoteFetcher,
  base: string,
  unit: string,
  date: string
): Promise<number | null> {
  const result = await fetchFxSeries(quotes, base, unit, {
    start: addDays(date, -RATE_LOOKBACK_DAYS),
    end: addDays(date, 1),
  });
  if (!result.ok) return null;
  return lastOnOrBefore(result.value, date);
}

export function lastOnOrBefore(series: PriceSeries, date: string): number | null {
  for (let i = series.length - 1; i >= 0; i--) {
    if (series[i].date <= date) return series[i].price;
  }
  return null;
}
