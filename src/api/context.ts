import type { Env } from '../config/env.js';
import type { Catalog } from '../modules/catalog/catalog.registry.js';
import type { MacroFetcher, QuoteFetcher } from '../modules/market-data/contracts/market-data.contracts.js';
import type { SessionStore } from '../modules/selection/session.store.js';

/**
 * Everything a route module needs, handed in by buildApp
 */
export interface ApiContext {
  env: Env;
  catalog: Catalog;
  quotes: QuoteFetcher;
  macro: MacroFetcher;
  sessions: SessionStore;
}
