/**
 * CSV EXPORT
 *
 * Raw numbers, not display strings. Cells that are not available export
 * as empty fields.
 */

import { stringify } from 'csv-stringify/sync';
import type { CorrelationMatrix } from '../../analytics/correlation.engine.js';
import { cellValue, type Cell } from '../contracts/cells.js';
import type {
  CentralBankRow,
  ComparisonChart,
  FxRow,
  QuoteRow,
  YieldMatrix,
} from '../contracts/dashboard.contracts.js';

type CsvValue = string | number;

function field(cell: Cell): CsvValue {
  return cellValue(cell) ?? '';
}

function nullable(value: number | null): CsvValue {
  return value ?? '';
}

export function toCsv(header: readonly string[], rows: readonly (readonly CsvValue[])[]): string {
  return stringify([[...header], ...rows.map((r) => [...r])]);
}

export function quoteRowsCsv(
  rows: readonly (QuoteRow & { region?: string; category?: string })[],
  nameColumn = 'Name'
): string {
  const grouped = rows.some((r) => r.region !== undefined);
  const header = grouped
    ? ['Region', 'Group', nameColumn, 'Ticker', 'Value', 'Daily %', '1 Week %', 'YTD %']
    : [nameColumn, 'Ticker', 'Value', 'Daily %', '1 Week %', 'YTD %'];

  return toCsv(
    header,
    rows.map((r) => {
      const cells = [r.label, r.symbol, field(r.value), field(r.dailyPct), field(r.weekPct), field(r.ytdPct)];
      return grouped ? [r.region ?? '', r.category ?? '', ...cells] : cells;
    })
  );
}

/**
 * Several titled tables in one file, the title in the first column
 */
export function quoteTablesCsv(tables: readonly { title: string; rows: readonly QuoteRow[] }[]): string {
  return toCsv(
    ['Section', 'Name', 'Ticker', 'Value', 'Daily %', '1 Week %', 'YTD %'],
    tables.flatMap((t) =>
      t.rows.map((r) => [
        t.title, r.label, r.symbol, field(r.value), field(r.dailyPct), field(r.weekPct), field(r.ytdPct),
      ])
    )
  );
}

export function fxRowsCsv(rows: readonly FxRow[]): string {
  return toCsv(
    ['Pair', 'Rate', 'Daily %', 'YTD %'],
    rows.map((r) => [r.pair, field(r.rate), field(r.dailyPct), field(r.ytdPct)])
  );
}

export function yieldMatrixCsv(matrix: YieldMatrix): string {
  return toCsv(
    ['Tenor', ...matrix.countries],
    matrix.tenors.map((tenor, i) => [tenor, ...matrix.values[i].map(field)])
  );
}

export function centralBanksCsv(rows: readonly CentralBankRow[]): string {
  return toCsv(
    ['Central Bank', 'Current Rate', 'Last Change %', 'As Of', 'FRED Series'],
    rows.map((r) => [r.bank, field(r.currentRate), field(r.lastChangePct), r.asOf ?? '', r.seriesId])
  );
}

/**
 * Matrix with an index column: first header cell empty, one row per asset
 */
export function correlationMatrixCsv(matrix: CorrelationMatrix): string {
  return toCsv(
    ['', ...matrix.assets],
    matrix.assets.map((asset, i) => [asset, ...matrix.values[i].map(nullable)])
  );
}

export function returnsCsv(returns: { dates: readonly string[]; columns: Readonly<Record<string, readonly number[]>> }): string {
  const assets = Object.keys(returns.columns);
  return toCsv(
    ['Date', ...assets],
    returns.dates.map((date, i) => [date, ...assets.map((a) => returns.columns[a][i])])
  );
}

/**
 * Long format: one line per (trace, date) with the raw close
 */
export function chartDataCsv(chart: ComparisonChart): string {
  return toCsv(
    ['Date', 'Asset', 'Ticker', 'Price'],
    chart.traces.flatMap((t) => t.prices.map((p) => [p.date, t.name, t.symbol, p.price]))
  );
}
