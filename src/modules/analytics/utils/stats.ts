/**
 * Descriptive statistics over plain number arrays.
 * No side effects; NaN / null signal "undefined", never throw.
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/**
 * Sample variance (n - 1)
 */
export function sampleVariance(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  const m = mean(values);
  let s = 0;
  for (const v of values) s += (v - m) * (v - m);
  return s / (values.length - 1);
}

export function sampleStd(values: readonly number[]): number {
  return Math.sqrt(sampleVariance(values));
}

/**
 * Pearson correlation of two equally long samples.
 * null when fewer than two points or either side has zero variance.
 */
export function pearson(a: readonly number[], b: readonly number[]): number | null {
  if (a.length !== b.length || a.length < 2) return null;

  const n = a.length;
  const meanA = mean(a);
  const meanB = mean(b);

  let numerator = 0;
  let denomA = 0;
  let denomB = 0;

  for (let i = 0; i < n; i++) {
    const diffA = a[i] - meanA;
    const diffB = b[i] - meanB;

    numerator += diffA * diffB;
    denomA += diffA * diffA;
    denomB += diffB * diffB;
  }

  if (denomA === 0 || denomB === 0) return null;

  const r = numerator / Math.sqrt(denomA * denomB);
  // rounding can push |r| a hair past 1
  return Math.max(-1, Math.min(1, r));
}
