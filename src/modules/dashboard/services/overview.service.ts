/**
 * Market overview: major indices, major FX pairs and key indicators.
 */

import type { Catalog } from '../../catalog/catalog.registry.js';
import type { DateRange, QuoteFetcher } from '../../market-data/contracts/market-data.contracts.js';
import type { QuoteTable } from '../contracts/dashboard.contracts.js';
import { buildQuoteRows, itemsOf } from './quote-table.service.js';

export async function buildMarketOverview(
  quotes: QuoteFetcher,
  catalog: Catalog,
  range: DateRange
): Promise<QuoteTable[]> {
  const sections: [string, Record<string, string>][] = [
    ['Equity Markets', catalog.overview.indices],
    ['FX Markets', catalog.overview.fxPairs],
    ['Key Indicators', catalog.overview.indicators],
  ];

  return Promise.all(
    sections.map(async ([title, tickers]) => ({
      title,
      rows: await buildQuoteRows(quotes, itemsOf(tickers), range),
    }))
  );
}
