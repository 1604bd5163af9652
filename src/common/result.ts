/**
 * RESULT: explicit outcome of a data fetch or derived metric.
 *
 * Providers never throw to their callers; they hand back one of these and
 * the caller decides how the affected cell or row degrades.
 */

export type DataIssue =
  | { kind: 'DATA_UNAVAILABLE'; detail: string }
  | { kind: 'INSUFFICIENT_HISTORY'; required: number; actual: number }
  | { kind: 'CONFIGURATION_MISSING'; setting: string };

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; issue: DataIssue };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function unavailable<T>(detail: string): Result<T> {
  return { ok: false, issue: { kind: 'DATA_UNAVAILABLE', detail } };
}

export function insufficientHistory<T>(required: number, actual: number): Result<T> {
  return { ok: false, issue: { kind: 'INSUFFICIENT_HISTORY', required, actual } };
}

export function configurationMissing<T>(setting: string): Result<T> {
  return { ok: false, issue: { kind: 'CONFIGURATION_MISSING', setting } };
}

export function describeIssue(issue: DataIssue): string {
  switch (issue.kind) {
    case 'DATA_UNAVAILABLE':
      return `data unavailable: ${issue.detail}`;
    case 'INSUFFICIENT_HISTORY':
      return `insufficient history: need ${issue.required} observations, got ${issue.actual}`;
    case 'CONFIGURATION_MISSING':
      return `${issue.setting} not configured`;
  }
}
