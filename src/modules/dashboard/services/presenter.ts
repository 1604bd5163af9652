/**
 * Output boundary for JSON responses: every Cell field is paired with its
 * display string and a colour hint.
 */

import { cellTone, formatCell, type Cell, type CellTone, type ValueFormat } from '../contracts/cells.js';
import type { FxRow, QuoteRow } from '../contracts/dashboard.contracts.js';

export type FieldFormats<K extends string> = readonly (readonly [K, ValueFormat])[];

export type Presented<T> = T & {
  display: Record<string, string>;
  tone: Record<string, CellTone | null>;
};

export function present<K extends string, T extends Record<K, Cell>>(
  row: T,
  fields: FieldFormats<K>,
  decimals: number
): Presented<T> {
  const display: Record<string, string> = {};
  const tone: Record<string, CellTone | null> = {};
  for (const [key, format] of fields) {
    display[key] = formatCell(row[key], format, decimals);
    if (format === 'percent' || format === 'signed_percent') {
      tone[key] = cellTone(row[key]);
    }
  }
  return { ...row, display, tone };
}

export const QUOTE_FIELDS: FieldFormats<'value' | 'dailyPct' | 'weekPct' | 'ytdPct'> = [
  ['value', 'compact'],
  ['dailyPct', 'percent'],
  ['weekPct', 'percent'],
  ['ytdPct', 'percent'],
];

/** Rates and yields read as plain numbers, never K/M */
export const NOMINAL_QUOTE_FIELDS: FieldFormats<'value' | 'dailyPct' | 'weekPct' | 'ytdPct'> = [
  ['value', 'nominal'],
  ['dailyPct', 'percent'],
  ['weekPct', 'percent'],
  ['ytdPct', 'percent'],
];

export const FX_FIELDS: FieldFormats<'rate' | 'dailyPct' | 'ytdPct'> = [
  ['rate', 'rate'],
  ['dailyPct', 'percent'],
  ['ytdPct', 'percent'],
];

export function presentQuoteRows(
  rows: readonly QuoteRow[],
  decimals: number,
  fields = QUOTE_FIELDS
): Presented<QuoteRow>[] {
  return rows.map((row) => present(row, fields, decimals));
}

export function presentFxRows(rows: readonly FxRow[], decimals: number): Presented<FxRow>[] {
  return rows.map((row) => present(row, FX_FIELDS, decimals));
}
