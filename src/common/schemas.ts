/**
 * Request schemas shared by the route modules.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { DateRange } from '../modules/market-data/contracts/market-data.contracts.js';
import { defaultRange } from '../modules/market-data/utils/dates.js';

/**
 * Date.parse rolls 2024-02-30 over to March 1st; a real date survives the
 * round trip unchanged.
 */
function isCalendarDate(s: string): boolean {
  const ms = Date.parse(`${s}T00:00:00Z`);
  return !Number.isNaN(ms) && new Date(ms).toISOString().slice(0, 10) === s;
}

export const IsoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine(isCalendarDate, 'Invalid calendar date');

export const Currency = z
  .string()
  .regex(/^[A-Za-z]{3}$/, 'Expected a 3-letter currency code')
  .transform((s) => s.toUpperCase());

export const Decimals = z.coerce.number().int().min(0).max(4);

export const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

export const OutputFormat = z.enum(['json', 'csv']).default('json');

export const RangeQuery = z.object({
  start: IsoDate.optional(),
  end: IsoDate.optional(),
});

export const TableQuery = RangeQuery.extend({
  decimals: Decimals.default(2),
  format: OutputFormat,
});

export type TableQueryInput = z.infer<typeof TableQuery>;

/**
 * Missing bounds default to the last 365 days ending at `end` (or today).
 */
export function resolveRange(query: { start?: string; end?: string }): DateRange {
  const fallback = defaultRange(query.end);
  const range = { start: query.start ?? fallback.start, end: query.end ?? fallback.end };
  if (range.start >= range.end) {
    throw new ValidationError(`start (${range.start}) must be before end (${range.end})`);
  }
  return range;
}

/**
 * Comma-separated list, trimmed, empties dropped
 */
export const CsvList = z
  .string()
  .transform((s) => s.split(',').map((x) => x.trim()).filter(Boolean));

export const CurrencyList = CsvList.pipe(z.array(Currency));
