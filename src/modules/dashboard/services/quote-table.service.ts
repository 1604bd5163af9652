/**
 * QUOTE TABLE SERVICE
 *
 * Snapshot rows (value, 1D, 1W, YTD) for flat lists and for grouped
 * watchlists. A failed instrument yields an N/A row; the table survives.
 */

import type { DateRange, QuoteFetcher } from '../../market-data/contracts/market-data.contracts.js';
import { yearStart } from '../../market-data/utils/dates.js';
import { flattenSelection, groupFlattened } from '../../selection/selection.store.js';
import type { SelectionTree } from '../../selection/selection.types.js';
import { cellOf, NOT_AVAILABLE, numeric, PENDING } from '../contracts/cells.js';
import type { GroupedQuoteTable, QuoteItem, QuoteRow } from '../contracts/dashboard.contracts.js';

/**
 * YTD is measured from January 1st of the range's end year, whatever the
 * range start.
 */
export function ytdStartFor(range: DateRange): string {
  return yearStart(range.end);
}

export async function buildQuoteRow(
  quotes: QuoteFetcher,
  item: QuoteItem,
  range: DateRange
): Promise<QuoteRow> {
  const snapshot = await quotes.fetchSnapshot(item.symbol, range, ytdStartFor(range));

  if (!snapshot.ok) {
    return unavailableRow(item);
  }

  const s = snapshot.value;
  return {
    label: item.label,
    symbol: item.symbol,
    value: numeric(s.value),
    dailyPct: cellOf(s.dailyPct),
    weekPct: cellOf(s.weekPct),
    ytdPct: cellOf(s.ytdPct),
    asOf: s.asOf,
  };
}

export function buildQuoteRows(
  quotes: QuoteFetcher,
  items: readonly QuoteItem[],
  range: DateRange
): Promise<QuoteRow[]> {
  return Promise.all(items.map((item) => buildQuoteRow(quotes, item, range)));
}

export function unavailableRow(item: QuoteItem): QuoteRow {
  return {
    label: item.label,
    symbol: item.symbol,
    value: NOT_AVAILABLE,
    dailyPct: NOT_AVAILABLE,
    weekPct: NOT_AVAILABLE,
    ytdPct: NOT_AVAILABLE,
    asOf: null,
  };
}

export function pendingRow(item: QuoteItem): QuoteRow {
  return {
    label: item.label,
    symbol: item.symbol,
    value: PENDING,
    dailyPct: PENDING,
    weekPct: PENDING,
    ytdPct: PENDING,
    asOf: null,
  };
}

/**
 * Items of a `{ label: symbol }` map, in map order
 */
export function itemsOf(tickers: Readonly<Record<string, string>>): QuoteItem[] {
  return Object.entries(tickers).map(([label, symbol]) => ({ label, symbol }));
}

/**
 * Grouped table for a watchlist. With `skeleton` no data is fetched and
 * every cell is pending, so a client can lay the table out first.
 */
export async function buildSelectionTable(
  quotes: QuoteFetcher,
  tree: SelectionTree,
  range: DateRange,
  options: { skeleton?: boolean } = {}
): Promise<GroupedQuoteTable> {
  const groups = groupFlattened(flattenSelection(tree));

  return {
    groups: await Promise.all(
      groups.map(async (group) => ({
        region: group.region,
        categories: await Promise.all(
          group.categories.map(async (bucket) => {
            const items = bucket.entries.map((e) => ({ label: e.label, symbol: e.symbol }));
            const rows = options.skeleton
              ? items.map(pendingRow)
              : await buildQuoteRows(quotes, items, range);
            return { category: bucket.category, rows };
          })
        ),
      }))
    ),
  };
}

export function flattenTableRows(table: GroupedQuoteTable): (QuoteRow & { region: string; category: string })[] {
  return table.groups.flatMap((group) =>
    group.categories.flatMap((bucket) =>
      bucket.rows.map((row) => ({ region: group.region, category: bucket.category, ...row }))
    )
  );
}
