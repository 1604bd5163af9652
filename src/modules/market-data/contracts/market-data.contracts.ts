/**
 * MARKET DATA CONTRACTS
 *
 * Shapes handed out by the quote and macro fetchers. Dates are ISO
 * calendar days (YYYY-MM-DD).
 */

import type { Result } from '../../../common/result.js';

// ═══════════════════════════════════════════════════════════════
// PRICE SERIES
// ═══════════════════════════════════════════════════════════════

export interface PricePoint {
  date: string;
  price: number;
}

/**
 * Strictly increasing by date, no duplicate dates.
 */
export type PriceSeries = readonly PricePoint[];

/**
 * Half-open [start, end): the end day itself is not requested.
 */
export interface DateRange {
  start: string;
  end: string;
}

// ═══════════════════════════════════════════════════════════════
// SNAPSHOT: last value plus headline changes
// ═══════════════════════════════════════════════════════════════

export interface Snapshot {
  value: number;
  previous: number;
  dailyPct: number;
  weekPct: number | null;   // null: fewer than 6 observations
  ytdPct: number | null;    // null: no usable YTD series
  asOf: string;
}

// ═══════════════════════════════════════════════════════════════
// FETCHERS
// ═══════════════════════════════════════════════════════════════

export interface QuoteFetcher {
  fetchSeries(symbol: string, range: DateRange): Promise<Result<PriceSeries>>;
  fetchSnapshot(symbol: string, range: DateRange, ytdStart: string): Promise<Result<Snapshot>>;
  /** Long or short instrument name; the symbol itself when unknown */
  fetchDisplayName(symbol: string): Promise<string>;
  clearCaches(): void;
}

export interface MacroFetcher {
  isConfigured(): boolean;
  fetchSeries(seriesId: string, range: Partial<DateRange>): Promise<Result<PriceSeries>>;
  clearCaches(): void;
}
