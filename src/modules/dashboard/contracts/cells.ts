/**
 * TABLE CELLS
 *
 * Every table value is one of three states. Formatting to text happens
 * only at the output boundary (JSON `display` fields and CSV).
 */

export type Cell =
  | { kind: 'numeric'; value: number }
  | { kind: 'not_available' }
  | { kind: 'pending' };

export type ValueFormat =
  | 'compact'         // 1.23K / 4.56M
  | 'nominal'         // 1,234.56
  | 'rate'            // 1.0842
  | 'percent'         // -1.25%
  | 'signed_percent'; // +1.25%

export type CellTone = 'positive' | 'negative' | 'neutral';

export const NOT_AVAILABLE: Cell = Object.freeze({ kind: 'not_available' });
export const PENDING: Cell = Object.freeze({ kind: 'pending' });

export const NA_TEXT = 'N/A';
export const PENDING_TEXT = '...';

export function numeric(value: number): Cell {
  return { kind: 'numeric', value };
}

/**
 * null, undefined and non-finite numbers are not available
 */
export function cellOf(value: number | null | undefined): Cell {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return NOT_AVAILABLE;
  }
  return numeric(value);
}

export function cellValue(cell: Cell): number | null {
  return cell.kind === 'numeric' ? cell.value : null;
}

function grouped(value: number, decimals: number): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });
}

export function formatNumber(value: number, format: ValueFormat, decimals = 2): string {
  switch (format) {
    case 'compact': {
      const abs = Math.abs(value);
      if (abs >= 1_000_000) return `${(value / 1_000_000).toFixed(decimals)}M`;
      if (abs >= 1_000) return `${(value / 1_000).toFixed(decimals)}K`;
      return grouped(value, decimals);
    }
    case 'nominal':
      return grouped(value, decimals);
    case 'rate':
      return value.toFixed(4);
    case 'percent':
      return `${value.toFixed(2)}%`;
    case 'signed_percent':
      return `${value > 0 ? '+' : ''}${value.toFixed(2)}%`;
  }
}

export function formatCell(cell: Cell, format: ValueFormat, decimals = 2): string {
  switch (cell.kind) {
    case 'numeric':
      return formatNumber(cell.value, format, decimals);
    case 'not_available':
      return NA_TEXT;
    case 'pending':
      return PENDING_TEXT;
  }
}

/**
 * Colour hint for change columns; null when there is nothing to colour
 */
export function cellTone(cell: Cell): CellTone | null {
  if (cell.kind !== 'numeric') return null;
  if (cell.value > 0) return 'positive';
  if (cell.value < 0) return 'negative';
  return 'neutral';
}
