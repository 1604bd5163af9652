/**
 * RETURNS
 *
 * Price series → period-over-period fractional returns, and inner-join
 * alignment of several return series on their dates.
 */

import type { PriceSeries } from '../market-data/contracts/market-data.contracts.js';

export interface ReturnPoint {
  date: string;
  value: number;
}

/**
 * One point per price after the first: len(returns) = len(prices) - 1
 */
export type ReturnSeries = readonly ReturnPoint[];

export interface AlignedReturns {
  dates: string[];
  columns: Map<string, number[]>;
}

export function toReturnSeries(series: PriceSeries): ReturnPoint[] {
  const out: ReturnPoint[] = [];
  for (let i = 1; i < series.length; i++) {
    const prev = series[i - 1].price;
    out.push({
      date: series[i].date,
      value: (series[i].price - prev) / prev,
    });
  }
  return out;
}

/**
 * Inner join: keep only dates present in every series. A non-finite value
 * (return off a zero price) removes its date just like a missing one.
 * Dates come out ascending; columns keep the map's insertion order.
 */
export function alignOnCommonDates(series: ReadonlyMap<string, ReturnSeries>): AlignedReturns {
  const lookups = new Map<string, Map<string, number>>();
  for (const [id, points] of series) {
    const byDate = new Map<string, number>();
    for (const p of points) {
      if (Number.isFinite(p.value)) byDate.set(p.date, p.value);
    }
    lookups.set(id, byDate);
  }

  const [first] = lookups.values();
  if (!first) {
    return { dates: [], columns: new Map() };
  }

  const all = [...lookups.values()];
  const dates = [...first.keys()]
    .filter((date) => all.every((byDate) => byDate.has(date)))
    .sort();

  const columns = new Map<string, number[]>();
  for (const [id, byDate] of lookups) {
    columns.set(id, dates.map((date) => byDate.get(date) ?? NaN));
  }

  return { dates, columns };
}
