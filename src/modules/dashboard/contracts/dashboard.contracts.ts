/**
 * DASHBOARD CONTRACTS
 *
 * Rows and tables handed to the presentation layer.
 */

import type { CorrelationSummary, CorrelationReport } from '../../analytics/correlation.engine.js';
import type { PerformanceStats } from '../../analytics/performance.metrics.js';
import type { PricePoint } from '../../market-data/contracts/market-data.contracts.js';
import type { ChartAssetType } from '../../selection/chart-items.store.js';
import type { Cell } from './cells.js';

// ═══════════════════════════════════════════════════════════════
// QUOTE TABLES
// ═══════════════════════════════════════════════════════════════

export interface QuoteItem {
  label: string;
  symbol: string;
}

export interface QuoteRow {
  label: string;
  symbol: string;
  value: Cell;
  dailyPct: Cell;
  weekPct: Cell;
  ytdPct: Cell;
  asOf: string | null;
}

export interface QuoteTable {
  title: string;
  rows: QuoteRow[];
}

export interface GroupedQuoteTable {
  groups: {
    region: string;
    categories: { category: string; rows: QuoteRow[] }[];
  }[];
}

// ═══════════════════════════════════════════════════════════════
// FX
// ═══════════════════════════════════════════════════════════════

export interface FxRow {
  pair: string;
  currency: string;
  rate: Cell;
  dailyPct: Cell;
  ytdPct: Cell;
}

export interface FxTable {
  base: string;
  quoteDate: string;
  g10: FxRow[];
  emerging: FxRow[];
}

export interface FxPairView {
  pair: string;
  ticker: string;
  current: Cell;
  dailyPct: Cell;
  ytdPct: Cell;
  range: { low: number; high: number } | null;
  series: PricePoint[];
}

export interface CorrelationView extends CorrelationReport {
  summary: CorrelationSummary | null;
  /** "0.85\n(0.01%)": correlation with the column asset's mean return */
  annotated: string[][];
}

// ═══════════════════════════════════════════════════════════════
// RATES / MACRO
// ═══════════════════════════════════════════════════════════════

export interface YieldMatrix {
  tenors: string[];
  countries: string[];
  /** values[tenor][country]; not_available where no ticker is mapped */
  values: Cell[][];
}

export interface CentralBankRow {
  bank: string;
  seriesId: string;
  currentRate: Cell;
  lastChangePct: Cell;
  asOf: string | null;
  error: string | null;
}

// ═══════════════════════════════════════════════════════════════
// CHARTS
// ═══════════════════════════════════════════════════════════════

export interface ChartTrace {
  symbol: string;
  name: string;
  type: ChartAssetType;
  /** Plotted values (rebased when normalized) */
  points: PricePoint[];
  /** Raw closes */
  prices: PricePoint[];
}

export interface ComparisonChart {
  range: { start: string; end: string };
  normalized: boolean;
  yAxis: { title: string; type: 'linear' | 'log' };
  traces: ChartTrace[];
  missing: string[];
  stats: (PerformanceStats & { symbol: string; name: string })[];
}
