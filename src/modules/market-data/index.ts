/**
 * MARKET DATA MODULE
 *
 * Quote and macro fetchers wired to their providers.
 */

import type { Env } from '../../config/env.js';
import type { MacroFetcher, QuoteFetcher } from './contracts/market-data.contracts.js';
import { createFredLoader, FredMacroService } from './services/macro.service.js';
import { createYahooLoader, YahooQuoteService } from './services/quote.service.js';

export interface MarketData {
  quotes: QuoteFetcher;
  macro: MacroFetcher;
}

export function createMarketData(env: Env): MarketData {
  const quotes = new YahooQuoteService({
    loader: createYahooLoader(env),
    seriesTtlMs: env.QUOTE_CACHE_TTL_SEC * 1000,
    nameTtlMs: env.NAME_CACHE_TTL_SEC * 1000,
  });

  const macro = new FredMacroService({
    apiKey: env.FRED_API_KEY,
    loader: createFredLoader(env),
    ttlMs: env.MACRO_CACHE_TTL_SEC * 1000,
  });

  if (!macro.isConfigured()) {
    console.warn('[Macro] FRED_API_KEY not configured, central-bank data disabled');
  }

  return { quotes, macro };
}

export * from './contracts/market-data.contracts.js';
export { fxTicker, fetchFxSeries, fetchFxRateOn, lastOnOrBefore } from './services/fx.quotes.js';
