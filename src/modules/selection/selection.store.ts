/**
 * SELECTION STORE
 *
 * Pure operations on a SelectionTree. Inputs are never mutated; every call
 * returns the tree to keep.
 */

import type {
  CategoryMap,
  FlatSelectionEntry,
  LabelFn,
  SelectionEntry,
  SelectionGroup,
  SelectionTree,
} from './selection.types.js';
import { EMPTY_SELECTION } from './selection.types.js';
import { ownValue } from '../../common/records.js';

const identity: LabelFn = (symbol) => symbol;

/**
 * Append `{ symbol, label: labelFn(symbol) }` for each symbol not yet in
 * tree[region][category]. Region and category are created on demand, but
 * only when at least one entry actually lands in them.
 */
export function addToSelection(
  tree: SelectionTree,
  region: string,
  category: string,
  symbols: readonly string[],
  labelFn: LabelFn = identity
): SelectionTree {
  const categories: CategoryMap = ownValue(tree, region) ?? {};
  const current = ownValue(categories, category) ?? [];
  const seen = new Set(current.map((e) => e.symbol));
  const added: SelectionEntry[] = [];

  for (const symbol of symbols) {
    if (seen.has(symbol)) continue;
    seen.add(symbol);
    added.push({ symbol, label: labelFn(symbol) });
  }

  if (added.length === 0) return tree;

  return {
    ...tree,
    [region]: {
      ...categories,
      [category]: [...current, ...added],
    },
  };
}

/**
 * Drop entries whose symbol is listed, pruning a category left empty and a
 * region left without categories. Absent region/category is a no-op.
 */
export function removeFromSelection(
  tree: SelectionTree,
  region: string,
  category: string,
  symbols: readonly string[]
): SelectionTree {
  const categories = ownValue(tree, region);
  const current = categories && ownValue(categories, category);
  if (!categories || !current) return tree;

  const drop = new Set(symbols);
  const kept = current.filter((e) => !drop.has(e.symbol));
  if (kept.length === current.length) return tree;

  const nextCategories: Record<string, readonly SelectionEntry[]> = { ...categories };
  if (kept.length > 0) {
    nextCategories[category] = kept;
  } else {
    delete nextCategories[category];
  }

  const next: Record<string, CategoryMap> = { ...tree };
  if (Object.keys(nextCategories).length > 0) {
    next[region] = nextCategories;
  } else {
    delete next[region];
  }
  return next;
}

/**
 * One record per leaf in (region, category, list) order. Lazy, and each
 * iteration starts over from the tree it was created with.
 */
export function flattenSelection(tree: SelectionTree): Iterable<FlatSelectionEntry> {
  return {
    *[Symbol.iterator]() {
      for (const [region, categories] of Object.entries(tree)) {
        for (const [category, entries] of Object.entries(categories)) {
          for (const entry of entries) {
            yield { region, category, symbol: entry.symbol, label: entry.label };
          }
        }
      }
    },
  };
}

export function clearSelection(): SelectionTree {
  return EMPTY_SELECTION;
}

export function selectionSize(tree: SelectionTree): number {
  let n = 0;
  for (const _ of flattenSelection(tree)) n++;
  return n;
}

/**
 * Regroup flattened records by region, then category, first-seen order.
 */
export function groupFlattened(entries: Iterable<FlatSelectionEntry>): SelectionGroup[] {
  const groups: SelectionGroup[] = [];

  for (const entry of entries) {
    let group = groups.find((g) => g.region === entry.region);
    if (!group) {
      group = { region: entry.region, categories: [] };
      groups.push(group);
    }
    let bucket = group.categories.find((c) => c.category === entry.category);
    if (!bucket) {
      bucket = { category: entry.category, entries: [] };
      group.categories.push(bucket);
    }
    bucket.entries.push(entry);
  }

  return groups;
}
