/**
 * CENTRAL BANKS
 *
 * Policy rates from FRED: current level and change vs the previous
 * observation. Needs FRED_API_KEY; without it the whole table reports
 * the missing setting and nothing is fetched.
 */

import { describeIssue } from '../../../common/result.js';
import { ConfigurationMissingError } from '../../../common/errors.js';
import type { Catalog } from '../../catalog/catalog.registry.js';
import type { MacroFetcher } from '../../market-data/contracts/market-data.contracts.js';
import { cellOf, NOT_AVAILABLE } from '../contracts/cells.js';
import type { CentralBankRow } from '../contracts/dashboard.contracts.js';

export const POLICY_HISTORY_START = '2023-01-01';

export function assertMacroConfigured(macro: MacroFetcher): void {
  if (!macro.isConfigured()) {
    throw new ConfigurationMissingError(
      'FRED_API_KEY',
      'FRED API key not configured. Set FRED_API_KEY to enable central bank data.'
    );
  }
}

export async function buildCentralBankRow(
  macro: MacroFetcher,
  bank: { name: string; seriesId: string }
): Promise<CentralBankRow> {
  const result = await macro.fetchSeries(bank.seriesId, { start: POLICY_HISTORY_START });

  if (!result.ok) {
    return {
      bank: bank.name,
      seriesId: bank.seriesId,
      currentRate: NOT_AVAILABLE,
      lastChangePct: NOT_AVAILABLE,
      asOf: null,
      error: describeIssue(result.issue),
    };
  }

  const series = result.value;
  const last = series[series.length - 1];
  const lastChangePct = series.length > 1
    ? cellOf(nonZeroChange(series[series.length - 2].price, last.price))
    : NOT_AVAILABLE;

  return {
    bank: bank.name,
    seriesId: bank.seriesId,
    currentRate: cellOf(last.price),
    lastChangePct,
    asOf: last.date,
    error: null,
  };
}

function nonZeroChange(prev: number, current: number): number | null {
  return prev !== 0 ? ((current - prev) / prev) * 100 : null;
}

export async function buildCentralBankTable(
  macro: MacroFetcher,
  catalog: Catalog
): Promise<CentralBankRow[]> {
  assertMacroConfigured(macro);
  return Promise.all(catalog.centralBanks.map((bank) => buildCentralBankRow(macro, bank)));
}

export function describeRateChange(row: CentralBankRow): string {
  if (row.lastChangePct.kind !== 'numeric') return 'N/A';
  if (row.lastChangePct.value === 0) return 'No change';
  return `${row.lastChangePct.value.toFixed(2)}%`;
}
