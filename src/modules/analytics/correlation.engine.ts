/**
 * CORRELATION ENGINE
 *
 * Base asset + counter assets → correlation matrix of daily returns with
 * mean-return annotations.
 *
 * Pipeline:
 *   fetch base/counter series → returns → inner join on dates
 *   → optional base-as-basket column → pairwise Pearson → mean returns
 *
 * Counters with no data or a single observation are dropped silently.
 * Output is a pure function of the fetched series.
 */

import type { Result } from '../../common/result.js';
import type { DateRange, PriceSeries } from '../market-data/contracts/market-data.contracts.js';
import { alignOnCommonDates, toReturnSeries, type ReturnSeries } from './returns.utils.js';
import { mean, pearson } from './utils/stats.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type PairFetcher = (
  base: string,
  counter: string,
  range: DateRange
) => Promise<Result<PriceSeries>>;

export interface CorrelationRequest {
  base: string;
  /**
   * Assets in display order. Listing `base` itself asks for the basket
   * column: the cross-sectional mean of every other included return.
   */
  assets: readonly string[];
  range: DateRange;
  fetch: PairFetcher;
}

export interface CorrelationMatrix {
  assets: string[];
  /** values[i][j]; null where an asset has zero variance */
  values: (number | null)[][];
}

export interface CorrelationReport {
  status: 'OK';
  base: string;
  assets: string[];
  matrix: CorrelationMatrix;
  /** Arithmetic mean of each asset's return series, in percent */
  meanReturnsPct: Record<string, number>;
  /** Aligned return matrix the correlations were computed on */
  returns: { dates: string[]; columns: Record<string, number[]> };
  excluded: string[];
}

export interface InsufficientCorrelationData {
  status: 'INSUFFICIENT_DATA';
  base: string;
  reason: string;
  included: string[];
  excluded: string[];
}

export type CorrelationOutcome = CorrelationReport | InsufficientCorrelationData;

export interface CorrelationSummary {
  average: number;
  maximum: number;
  minimum: number;
  pairs: number;
}

export interface RollingPoint {
  date: string;
  value: number | null;
}

// ═══════════════════════════════════════════════════════════════
// MATRIX
// ═══════════════════════════════════════════════════════════════

/**
 * Symmetric Pearson matrix over aligned columns. Each pair is computed once
 * and mirrored; the diagonal is exactly 1 for any column with variance.
 */
export function correlationMatrix(columns: ReadonlyMap<string, readonly number[]>): CorrelationMatrix {
  const assets = [...columns.keys()];
  const data = assets.map((a) => columns.get(a) ?? []);
  const n = assets.length;
  const values: (number | null)[][] = assets.map(() => new Array<number | null>(n).fill(null));

  for (let i = 0; i < n; i++) {
    const self = pearson(data[i], data[i]);
    values[i][i] = self === null ? null : 1;
    for (let j = i + 1; j < n; j++) {
      const r = pearson(data[i], data[j]);
      values[i][j] = r;
      values[j][i] = r;
    }
  }

  return { assets, values };
}

export function correlationOf(matrix: CorrelationMatrix, a: string, b: string): number | null {
  const i = matrix.assets.indexOf(a);
  const j = matrix.assets.indexOf(b);
  if (i < 0 || j < 0) return null;
  return matrix.values[i][j];
}

/**
 * Average / max / min over the strict upper triangle, nulls skipped.
 */
export function summarizeCorrelation(matrix: CorrelationMatrix): CorrelationSummary | null {
  const tri: number[] = [];
  for (let i = 0; i < matrix.assets.length; i++) {
    for (let j = i + 1; j < matrix.assets.length; j++) {
      const v = matrix.values[i][j];
      if (v !== null) tri.push(v);
    }
  }
  if (tri.length === 0) return null;

  return {
    average: mean(tri),
    maximum: Math.max(...tri),
    minimum: Math.min(...tri),
    pairs: tri.length,
  };
}

// ═══════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════

export async function computeCorrelation(request: CorrelationRequest): Promise<CorrelationOutcome> {
  const { base, range, fetch } = request;
  const ordered = [...new Set(request.assets)];
  const includeBasket = ordered.includes(base);
  const counters = ordered.filter((a) => a !== base);

  // 1-2. fetch and convert, dropping anything without two observations
  const fetched = await Promise.all(
    counters.map(async (counter) => ({ counter, result: await fetch(base, counter, range) }))
  );

  const returnsById = new Map<string, ReturnSeries>();
  const meanReturnsPct: Record<string, number> = {};
  const excluded: string[] = [];

  for (const { counter, result } of fetched) {
    if (!result.ok || result.value.length < 2) {
      excluded.push(counter);
      continue;
    }
    const returns = toReturnSeries(result.value);
    returnsById.set(counter, returns);
    meanReturnsPct[counter] = mean(returns.map((r) => r.value)) * 100;
  }

  const included = [...returnsById.keys()];
  if (included.length === 0) {
    return insufficient(base, 'No returns data available for the selected assets', included, excluded);
  }

  const assetCount = included.length + (includeBasket ? 1 : 0);
  if (assetCount < 2) {
    return insufficient(base, 'Need at least 2 assets with valid data to compute correlation', included, excluded);
  }

  // 3. inner join
  const aligned = alignOnCommonDates(returnsById);
  if (aligned.dates.length < 2) {
    return insufficient(base, 'Fewer than 2 dates common to every series', included, excluded);
  }

  // 4. basket column for the base asset
  if (includeBasket) {
    const cols = [...aligned.columns.values()];
    const basket = aligned.dates.map((_, t) => mean(cols.map((c) => c[t])));
    aligned.columns.set(base, basket);
    meanReturnsPct[base] = mean(basket) * 100;
  }

  // 5. matrix in the caller's order
  const assets = ordered.filter((a) => aligned.columns.has(a));
  const columns = new Map<string, number[]>();
  for (const a of assets) {
    columns.set(a, aligned.columns.get(a) ?? []);
  }

  return {
    status: 'OK',
    base,
    assets,
    matrix: correlationMatrix(columns),
    meanReturnsPct,
    returns: { dates: aligned.dates, columns: Object.fromEntries(columns) },
    excluded,
  };
}

function insufficient(
  base: string,
  reason: string,
  included: string[],
  excluded: string[]
): InsufficientCorrelationData {
  return { status: 'INSUFFICIENT_DATA', base, reason, included, excluded };
}

// ═══════════════════════════════════════════════════════════════
// ROLLING
// ═══════════════════════════════════════════════════════════════

/**
 * Rolling Pearson correlation of two return series over `window` common
 * dates, one point per window end.
 */
export function rollingCorrelation(
  a: ReturnSeries,
  b: ReturnSeries,
  window: number
): RollingPoint[] {
  if (!Number.isInteger(window) || window < 2) {
    throw new RangeError(`window must be an integer >= 2, got ${window}`);
  }

  const aligned = alignOnCommonDates(new Map([['a', a], ['b', b]]));
  const xs = aligned.columns.get('a') ?? [];
  const ys = aligned.columns.get('b') ?? [];
  const out: RollingPoint[] = [];

  for (let end = window; end <= aligned.dates.length; end++) {
    out.push({
      date: aligned.dates[end - 1],
      value: pearson(xs.slice(end - window, end), ys.slice(end - window, end)),
    });
  }

  return out;
}
