/**
 * Short-term rate tables and the sovereign yield matrix (tenor × country).
 */

import type { Catalog } from '../../catalog/catalog.registry.js';
import type { DateRange, QuoteFetcher } from '../../market-data/contracts/market-data.contracts.js';
import { cellOf, NOT_AVAILABLE, type Cell } from '../contracts/cells.js';
import type { QuoteTable, YieldMatrix } from '../contracts/dashboard.contracts.js';
import { buildQuoteRows } from './quote-table.service.js';

export function buildShortTermRates(
  quotes: QuoteFetcher,
  catalog: Catalog,
  range: DateRange
): Promise<QuoteTable[]> {
  return Promise.all(
    Object.entries(catalog.rates.shortTerm).map(async ([market, instruments]) => ({
      title: market,
      rows: await buildQuoteRows(
        quotes,
        instruments.map((i) => ({ label: i.instrument, symbol: i.ticker })),
        range
      ),
    }))
  );
}

/**
 * Latest close for every mapped (tenor, country); unmapped or failed
 * cells are not available.
 */
export async function buildYieldMatrix(
  quotes: QuoteFetcher,
  catalog: Catalog,
  range: DateRange
): Promise<YieldMatrix> {
  const { tenors, countries, yieldTickers } = catalog.rates;

  const tickers = [...new Set(yieldTickers.map((y) => y.ticker))];
  const latest = new Map<string, number | null>();
  await Promise.all(
    tickers.map(async (ticker) => {
      const result = await quotes.fetchSeries(ticker, range);
      latest.set(ticker, result.ok ? result.value[result.value.length - 1].price : null);
    })
  );

  const values: Cell[][] = tenors.map((tenor) =>
    countries.map((country) => {
      const entry = yieldTickers.find((y) => y.tenor === tenor && y.country === country);
      if (!entry) return NOT_AVAILABLE;
      return cellOf(latest.get(entry.ticker));
    })
  );

  return { tenors, countries, values };
}
