/**
 * Catalog-driven watchlists: "select all indices" and "select all
 * equities of these indices".
 */

import { constituentsOf, indexTicker, type Catalog } from '../catalog/catalog.registry.js';
import type { QuoteFetcher } from '../market-data/contracts/market-data.contracts.js';
import { addToSelection } from './selection.store.js';
import { EMPTY_SELECTION, type LabelFn, type SelectionTree } from './selection.types.js';

export interface IndexRef {
  region: string;
  index: string;
}

/**
 * Every catalog index under its region, labelled with the index name
 */
export function allIndicesSelection(catalog: Catalog): SelectionTree {
  let tree = EMPTY_SELECTION;
  for (const [region, indices] of Object.entries(catalog.equityIndices)) {
    for (const [index, ticker] of Object.entries(indices)) {
      tree = addToSelection(tree, region, index, [ticker], () => index);
    }
  }
  return tree;
}

/**
 * Add the named indices (as they are listed in the catalog) to a tree.
 * Unknown region/index pairs are skipped.
 */
export function addIndices(
  tree: SelectionTree,
  catalog: Catalog,
  refs: readonly IndexRef[]
): SelectionTree {
  let next = tree;
  for (const { region, index } of refs) {
    const ticker = indexTicker(region, index, catalog);
    if (ticker === null) continue;
    next = addToSelection(next, region, index, [ticker], () => index);
  }
  return next;
}

/**
 * Indices currently in an index watchlist
 */
export function indexRefsOf(tree: SelectionTree): IndexRef[] {
  return Object.entries(tree).flatMap(([region, categories]) =>
    Object.keys(categories).map((index) => ({ region, index }))
  );
}

/**
 * Label function backed by display names fetched up front, so the tree
 * itself can be updated synchronously.
 */
export async function displayNameLabels(
  quotes: QuoteFetcher,
  symbols: readonly string[]
): Promise<LabelFn> {
  const names = new Map<string, string>();
  await Promise.all(
    symbols.map(async (symbol) => {
      names.set(symbol, await quotes.fetchDisplayName(symbol));
    })
  );
  return (symbol) => names.get(symbol) ?? symbol;
}

/**
 * Add equities to a tree, labelled with their company names
 */
export async function addEquities(
  tree: SelectionTree,
  quotes: QuoteFetcher,
  ref: IndexRef,
  symbols: readonly string[]
): Promise<SelectionTree> {
  const labels = await displayNameLabels(quotes, symbols);
  return addToSelection(tree, ref.region, ref.index, symbols, labels);
}

/**
 * Constituents of every given index that has a constituent list, as a new
 * tree (replaces the equity watchlist wholesale).
 */
export async function allEquitiesSelection(
  quotes: QuoteFetcher,
  catalog: Catalog,
  refs: readonly IndexRef[]
): Promise<SelectionTree> {
  let tree = EMPTY_SELECTION;
  for (const ref of refs) {
    const symbols = constituentsOf(ref.index, catalog);
    if (symbols.length === 0) continue;
    tree = await addEquities(tree, quotes, ref, symbols);
  }
  return tree;
}
