/**
 * SELECTION TYPES
 *
 * Watchlists are trees: region → category (index) → ordered entries.
 * No region or category is ever present with nothing under it.
 */

export interface SelectionEntry {
  symbol: string;
  label: string;
}

export type CategoryMap = Readonly<Record<string, readonly SelectionEntry[]>>;

export type SelectionTree = Readonly<Record<string, CategoryMap>>;

export interface FlatSelectionEntry {
  region: string;
  category: string;
  symbol: string;
  label: string;
}

export interface SelectionGroup {
  region: string;
  categories: {
    category: string;
    entries: FlatSelectionEntry[];
  }[];
}

export type LabelFn = (symbol: string) => string;

export const EMPTY_SELECTION: SelectionTree = Object.freeze({});
