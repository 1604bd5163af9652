import type { Catalog } from '../../catalog/catalog.registry.js';
import type { DateRange, QuoteFetcher } from '../../market-data/contracts/market-data.contracts.js';
import type { QuoteTable } from '../contracts/dashboard.contracts.js';
import { buildQuoteRows } from './quote-table.service.js';

/**
 * One table per commodity category (metals, agriculture, energy)
 */
export function buildCommodityTables(
  quotes: QuoteFetcher,
  catalog: Catalog,
  range: DateRange
): Promise<QuoteTable[]> {
  return Promise.all(
    Object.entries(catalog.commodities).map(async ([category, items]) => ({
      title: category,
      rows: await buildQuoteRows(
        quotes,
        items.map((c) => ({ label: c.name, symbol: c.ticker })),
        range
      ),
    }))
  );
}
