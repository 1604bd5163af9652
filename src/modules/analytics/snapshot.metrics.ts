/**
 * SNAPSHOT METRICS
 *
 * Headline changes shown in every quote table: 1D, 1W (6 observations
 * back) and YTD. A metric without enough history is null; it never takes
 * the rest of the snapshot down with it.
 */

import { insufficientHistory, ok, type Result } from '../../common/result.js';
import type { PriceSeries, Snapshot } from '../market-data/contracts/market-data.contracts.js';

export const WEEK_LOOKBACK_OBS = 6;

/**
 * Percent change from `from` to `to`; null when `from` is not positive.
 */
export function pctChange(from: number, to: number): number | null {
  if (!Number.isFinite(from) || !Number.isFinite(to) || from <= 0) return null;
  return ((to - from) / from) * 100;
}

/**
 * Last vs previous observation. A non-positive previous value reports 0.
 */
export function dailyChangePct(prices: readonly number[]): number | null {
  if (prices.length < 2) return null;
  const last = prices[prices.length - 1];
  const prev = prices[prices.length - 2];
  return pctChange(prev, last) ?? 0;
}

/**
 * Last vs the value 6 observations back (the last one included).
 */
export function weekChangePct(prices: readonly number[]): number | null {
  if (prices.length < WEEK_LOOKBACK_OBS) return null;
  const last = prices[prices.length - 1];
  const weekAgo = prices[prices.length - WEEK_LOOKBACK_OBS];
  return pctChange(weekAgo, last);
}

/**
 * `current` vs the first observation of a series starting January 1st.
 */
export function ytdChangePct(current: number, ytdPrices: readonly number[] | null): number | null {
  if (!ytdPrices || ytdPrices.length < 2) return null;
  return pctChange(ytdPrices[0], current);
}

export function computeSnapshot(series: PriceSeries, ytdSeries: PriceSeries | null): Result<Snapshot> {
  if (series.length < 2) {
    return insufficientHistory(2, series.length);
  }

  const prices = series.map((p) => p.price);
  const last = series[series.length - 1];

  return ok({
    value: last.price,
    previous: prices[prices.length - 2],
    dailyPct: dailyChangePct(prices) ?? 0,
    weekPct: weekChangePct(prices),
    ytdPct: ytdChangePct(last.price, ytdSeries ? ytdSeries.map((p) => p.price) : null),
    asOf: last.date,
  });
}
