import { describe, it, expect } from 'vitest';
import { CurrencyList, IsoDate, resolveRange } from '../schemas.js';

describe('request schemas', () => {
  it('accepts only dates that exist on the calendar', () => {
    expect(IsoDate.safeParse('2024-02-29').success).toBe(true);
    expect(IsoDate.safeParse('2024-02-30').success).toBe(false);
    expect(IsoDate.safeParse('2023-02-29').success).toBe(false);
    expect(IsoDate.safeParse('2024-13-01').success).toBe(false);
    expect(IsoDate.safeParse('2024-2-01').success).toBe(false);
  });

  it('upper-cases and validates every currency of a list', () => {
    expect(CurrencyList.parse('usd, eur,,JPY')).toEqual(['USD', 'EUR', 'JPY']);
    expect(CurrencyList.safeParse('usd,eu1').success).toBe(false);
  });

  it('rejects a range that does not move forward', () => {
    expect(resolveRange({ start: '2024-01-10', end: '2024-02-01' })).toEqual({ start: '2024-01-10', end: '2024-02-01' });
    expect(() => resolveRange({ start: '2024-02-01', end: '2024-02-01' })).toThrow(
      'start (2024-02-01) must be before end (2024-02-01)'
    );
  });
});
