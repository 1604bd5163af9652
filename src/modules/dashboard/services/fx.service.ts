/**
 * FX SERVICE
 *
 * Rates table at a quote date, single-pair view, and the correlation
 * matrix of currencies against a base.
 */

import {
  computeCorrelation,
  rollingCorrelation,
  summarizeCorrelation,
  type CorrelationOutcome,
  type RollingPoint,
} from '../../analytics/correlation.engine.js';
import { priceRange } from '../../analytics/performance.metrics.js';
import { toReturnSeries } from '../../analytics/returns.utils.js';
import { pctChange } from '../../analytics/snapshot.metrics.js';
import type { Catalog } from '../../catalog/catalog.registry.js';
import type { DateRange, QuoteFetcher } from '../../market-data/contracts/market-data.contracts.js';
import { fetchFxRateOn, fetchFxSeries, fxTicker } from '../../market-data/services/fx.quotes.js';
import { addDays, yearStart } from '../../market-data/utils/dates.js';
import { cellOf, NOT_AVAILABLE } from '../contracts/cells.js';
import type { CorrelationView, FxPairView, FxRow, FxTable } from '../contracts/dashboard.contracts.js';

// Closes looked at for the 1D change up to the quote date
const DAILY_WINDOW_DAYS = 10;

// ═══════════════════════════════════════════════════════════════
// RATES TABLE
// ═══════════════════════════════════════════════════════════════

/**
 * `base/ccy` rate on the quote date, 1D change from the last two closes up
 * to that date, YTD change against the rate on January 1st of its year.
 */
export async function buildFxRow(
  quotes: QuoteFetcher,
  base: string,
  currency: string,
  quoteDate: string
): Promise<FxRow> {
  const [rate, ytdRate, recent] = await Promise.all([
    fetchFxRateOn(quotes, base, currency, quoteDate),
    fetchFxRateOn(quotes, base, currency, yearStart(quoteDate)),
    fetchFxSeries(quotes, base, currency, {
      start: addDays(quoteDate, -DAILY_WINDOW_DAYS),
      end: addDays(quoteDate, 1),
    }),
  ]);

  let dailyPct: number | null = null;
  if (recent.ok) {
    const upTo = recent.value.filter((p) => p.date <= quoteDate);
    if (upTo.length >= 2) {
      const last = upTo[upTo.length - 1].price;
      const prev = upTo[upTo.length - 2].price;
      dailyPct = prev !== 0 ? ((last - prev) / prev) * 100 : null;
    }
  }

  const ytdPct = rate !== null && ytdRate !== null && ytdRate !== 0
    ? ((rate - ytdRate) / ytdRate) * 100
    : null;

  return {
    pair: `${base}/${currency}`,
    currency,
    rate: cellOf(rate),
    dailyPct: cellOf(dailyPct),
    ytdPct: cellOf(ytdPct),
  };
}

export async function buildFxTable(
  quotes: QuoteFetcher,
  catalog: Catalog,
  base: string,
  quoteDate: string
): Promise<FxTable> {
  const rowsFor = (currencies: string[]) =>
    Promise.all(
      currencies
        .filter((ccy) => ccy !== base)
        .map((ccy) => buildFxRow(quotes, base, ccy, quoteDate))
    );

  const [g10, emerging] = await Promise.all([
    rowsFor(catalog.fx.g10),
    rowsFor(catalog.fx.emerging),
  ]);

  return { base, quoteDate, g10, emerging };
}

// ═══════════════════════════════════════════════════════════════
// PAIR VIEW
// ═══════════════════════════════════════════════════════════════

/**
 * null when the pair has no data in the range
 */
export async function buildFxPairView(
  quotes: QuoteFetcher,
  base: string,
  unit: string,
  range: DateRange
): Promise<FxPairView | null> {
  const result = await fetchFxSeries(quotes, base, unit, range);
  if (!result.ok) return null;

  const series = result.value;
  const current = series[series.length - 1].price;
  const dailyPct = series.length > 1
    ? pctChange(series[series.length - 2].price, current) ?? 0
    : 0;

  let ytdPct: number | null = null;
  const ytdStart = yearStart(range.end);
  if (ytdStart < range.end) {
    const ytd = await fetchFxSeries(quotes, base, unit, { start: ytdStart, end: range.end });
    if (ytd.ok && ytd.value.length > 1) {
      ytdPct = pctChange(ytd.value[0].price, current);
    }
  }

  return {
    pair: `${base}/${unit}`,
    ticker: fxTicker(base, unit),
    current: cellOf(current),
    dailyPct: cellOf(dailyPct),
    ytdPct: ytdPct === null ? NOT_AVAILABLE : cellOf(ytdPct),
    range: priceRange(series),
    series: [...series],
  };
}

// ═══════════════════════════════════════════════════════════════
// CORRELATION
// ═══════════════════════════════════════════════════════════════

export function runFxCorrelation(
  quotes: QuoteFetcher,
  base: string,
  assets: readonly string[],
  range: DateRange
): Promise<CorrelationOutcome> {
  return computeCorrelation({
    base,
    assets,
    range,
    fetch: (b, counter, r) => fetchFxSeries(quotes, b, counter, r),
  });
}

export function annotateCorrelation(outcome: Extract<CorrelationOutcome, { status: 'OK' }>): CorrelationView {
  const { matrix, meanReturnsPct } = outcome;

  const annotated = matrix.values.map((row) =>
    row.map((value, j) => {
      if (value === null) return '';
      const mu = meanReturnsPct[matrix.assets[j]];
      return `${value.toFixed(2)}\n(${mu.toFixed(2)}%)`;
    })
  );

  return { ...outcome, summary: summarizeCorrelation(matrix), annotated };
}

/**
 * Rolling correlation of `base/a` against `base/b` daily returns
 */
export async function runRollingFxCorrelation(
  quotes: QuoteFetcher,
  base: string,
  a: string,
  b: string,
  range: DateRange,
  window: number
): Promise<RollingPoint[] | null> {
  const [sa, sb] = await Promise.all([
    fetchFxSeries(quotes, base, a, range),
    fetchFxSeries(quotes, base, b, range),
  ]);
  if (!sa.ok || !sb.ok) return null;
  return rollingCorrelation(toReturnSeries(sa.value), toReturnSeries(sb.value), window);
}
