/**
 * INSTRUMENT CATALOG
 *
 * Source of truth for every instrument the dashboard knows about: equity
 * indices by region, index constituents, currencies, rates, commodities and
 * the FRED series behind the central-bank table.
 *
 * The lists live in data/catalog.json at the repository root and are
 * validated on first access.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ownValue } from '../../common/records.js';

const TickerMap = z.record(z.string(), z.string());

const CatalogSchema = z.object({
  equityIndices: z.record(z.string(), TickerMap),
  equityConstituents: z.record(z.string(), z.array(z.string())),
  fx: z.object({
    g10: z.array(z.string().length(3)),
    emerging: z.array(z.string().length(3)),
    crosses: TickerMap,
    correlationDefaults: z.array(z.string().length(3)),
  }),
  overview: z.object({
    indices: TickerMap,
    fxPairs: TickerMap,
    indicators: TickerMap,
  }),
  rates: z.object({
    shortTerm: z.record(
      z.string(),
      z.array(z.object({ instrument: z.string(), ticker: z.string() }))
    ),
    tenors: z.array(z.string()),
    countries: z.array(z.string()),
    yieldTickers: z.array(
      z.object({ country: z.string(), tenor: z.string(), ticker: z.string() })
    ),
  }),
  commodities: z.record(
    z.string(),
    z.array(z.object({ name: z.string(), ticker: z.string() }))
  ),
  centralBanks: z.array(z.object({ name: z.string(), seriesId: z.string() })),
});

export type Catalog = z.infer<typeof CatalogSchema>;

const CATALOG_URL = new URL('../../../data/catalog.json', import.meta.url);

let cached: Catalog | null = null;

export function parseCatalog(raw: unknown): Catalog {
  return CatalogSchema.parse(raw);
}

export function getCatalog(): Catalog {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(CATALOG_URL, 'utf-8'));
    cached = parseCatalog(raw);
    console.log(
      `[Catalog] Loaded ${Object.keys(cached.equityIndices).length} regions, ` +
      `${Object.keys(cached.equityConstituents).length} constituent lists`
    );
  }
  return cached;
}

/**
 * All tradable currencies, sorted and de-duplicated (G10 + emerging)
 */
export function listCurrencies(catalog: Catalog = getCatalog()): string[] {
  return [...new Set([...catalog.fx.g10, ...catalog.fx.emerging])].sort();
}

export function indexTicker(
  region: string,
  indexName: string,
  catalog: Catalog = getCatalog()
): string | null {
  const indices = ownValue(catalog.equityIndices, region);
  return (indices && ownValue(indices, indexName)) ?? null;
}

/**
 * Constituent symbols of an index, empty when none are listed
 */
export function constituentsOf(indexName: string, catalog: Catalog = getCatalog()): string[] {
  return ownValue(catalog.equityConstituents, indexName) ?? [];
}
