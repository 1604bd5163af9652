/**
 * Chart overlays: ordered lists, one item per key.
 */

export type ChartAssetType = 'Index' | 'Equity' | 'FX' | 'Indicator' | 'Commodity' | 'Rate';

export interface ChartItem {
  type: ChartAssetType;
  region: string;
  name: string;
  symbol: string;
}

export interface FxChartItem {
  pair: string;   // "EUR/USD"
  base: string;
  unit: string;
}

export function addUnique<T>(
  items: readonly T[],
  additions: readonly T[],
  keyOf: (item: T) => string
): T[] {
  const seen = new Set(items.map(keyOf));
  const out = [...items];
  for (const item of additions) {
    const key = keyOf(item);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(item);
  }
  return out;
}

export function removeByKey<T>(
  items: readonly T[],
  keys: readonly string[],
  keyOf: (item: T) => string
): T[] {
  const drop = new Set(keys);
  return items.filter((item) => !drop.has(keyOf(item)));
}

export const chartItemKey = (item: ChartItem): string => item.symbol;

export const fxChartItemKey = (item: FxChartItem): string => item.pair;

export function fxChartItem(base: string, unit: string): FxChartItem {
  return { pair: `${base}/${unit}`, base, unit };
}
