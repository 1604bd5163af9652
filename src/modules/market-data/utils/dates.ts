/**
 * Calendar-day helpers on YYYY-MM-DD strings (UTC, no time of day)
 */

const DAY_MS = 24 * 60 * 60 * 1000;

export function isoDate(d: Date): string {
  return d.toISOString().split('T')[0];
}

export function parseIsoDate(date: string): Date {
  return new Date(`${date}T00:00:00Z`);
}

export function addDays(date: string, days: number): string {
  return isoDate(new Date(parseIsoDate(date).getTime() + days * DAY_MS));
}

/**
 * January 1st of the year `date` falls in
 */
export function yearStart(date: string): string {
  return `${date.slice(0, 4)}-01-01`;
}

export function toEpochSeconds(date: string): number {
  return Math.floor(parseIsoDate(date).getTime() / 1000);
}

export function today(): string {
  return isoDate(new Date());
}

/**
 * Default dashboard window: the last 365 days up to today
 */
export function defaultRange(end: string = today()): { start: string; end: string } {
  return { start: addDays(end, -365), end };
}
