import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import type { YahooChart } from '../providers/yahoo.client.js';
import { YahooQuoteService, type ChartLoader } from '../services/quote.service.js';
import type { DateRange } from '../contracts/market-data.contracts.js';

const RANGE = { start: '2024-03-01', end: '2024-03-09' };

function chart(symbol: string, prices: number[], name: string | null = null): YahooChart {
  return {
    symbol,
    currency: 'USD',
    name,
    points: prices.map((price, i) => ({ date: `2024-03-0${i + 1}`, price })),
  };
}

describe('YahooQuoteService', () => {
  let loader: Mock<Parameters<ChartLoader>, ReturnType<ChartLoader>>;
  let service: YahooQuoteService;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    loader = vi.fn<Parameters<ChartLoader>, ReturnType<ChartLoader>>();
    service = new YahooQuoteService({ loader, seriesTtlMs: 60_000, nameTtlMs: 60_000 });
  });

  it('caches successful series per symbol and range', async () => {
    loader.mockResolvedValue(chart('AAPL', [10, 11]));

    const first = await service.fetchSeries('AAPL', RANGE);
    const second = await service.fetchSeries('AAPL', RANGE);

    expect(first).toEqual(second);
    expect(loader).toHaveBeenCalledTimes(1);

    await service.fetchSeries('AAPL', { start: '2024-03-02', end: '2024-03-09' });
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('coalesces concurrent identical requests', async () => {
    let release: (value: YahooChart) => void = () => undefined;
    loader.mockReturnValue(new Promise<YahooChart>((resolve) => { release = resolve; }));

    const a = service.fetchSeries('MSFT', RANGE);
    const b = service.fetchSeries('MSFT', RANGE);
    release(chart('MSFT', [1, 2]));

    const [ra, rb] = await Promise.all([a, b]);
    expect(ra.ok && rb.ok).toBe(true);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('turns provider failures into DATA_UNAVAILABLE and does not cache them', async () => {
    loader.mockRejectedValueOnce(new Error('timeout of 1000ms exceeded'));
    loader.mockResolvedValueOnce(chart('NVDA', [5, 6]));

    const failed = await service.fetchSeries('NVDA', RANGE);
    expect(failed).toEqual({
      ok: false,
      issue: { kind: 'DATA_UNAVAILABLE', detail: 'timeout of 1000ms exceeded' },
    });

    const retried = await service.fetchSeries('NVDA', RANGE);
    expect(retried.ok).toBe(true);
  });

  it('treats an empty chart as unavailable', async () => {
    loader.mockResolvedValue(chart('XYZ', []));
    const result = await service.fetchSeries('XYZ', RANGE);
    expect(result.ok).toBe(false);
  });

  it('builds a snapshot with a separate YTD leg', async () => {
    loader.mockImplementation(async (symbol: string, range: DateRange) =>
      range.start === '2024-01-01' ? chart(symbol, [50, 60]) : chart(symbol, [100, 110, 99])
    );

    const snapshot = await service.fetchSnapshot('SPY', RANGE, '2024-01-01');

    expect(loader).toHaveBeenCalledTimes(2);
    expect(snapshot.ok).toBe(true);
    if (!snapshot.ok) return;
    expect(snapshot.value.dailyPct).toBeCloseTo(-10, 10);
    expect(snapshot.value.ytdPct).toBeCloseTo(98, 10);
  });

  it('skips the YTD leg when the year starts after the range end', async () => {
    loader.mockResolvedValue(chart('SPY', [100, 110, 99]));

    const snapshot = await service.fetchSnapshot('SPY', RANGE, '2024-03-09');

    expect(loader).toHaveBeenCalledTimes(1);
    expect(snapshot.ok && snapshot.value.ytdPct).toBeNull();
  });

  it('resolves display names from chart metadata', async () => {
    loader.mockResolvedValue(chart('SAP.DE', [1, 2], 'SAP SE'));

    expect(await service.fetchDisplayName('SAP.DE')).toBe('SAP SE');
    expect(await service.fetchDisplayName('SAP.DE')).toBe('SAP SE');
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('falls back to the symbol when no name is known', async () => {
    loader.mockRejectedValue(new Error('404'));
    expect(await service.fetchDisplayName('ZZZ')).toBe('ZZZ');
  });

  it('refetches after the caches are cleared', async () => {
    loader.mockResolvedValue(chart('AAPL', [10, 11]));

    await service.fetchSeries('AAPL', RANGE);
    service.clearCaches();
    await service.fetchSeries('AAPL', RANGE);

    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('drops expired ranges when a new series is cached', async () => {
    let now = 0;
    const timed = new YahooQuoteService({ loader, seriesTtlMs: 60_000, nameTtlMs: 60_000, now: () => now });
    loader.mockResolvedValueOnce(chart('AAPL', [10, 11])).mockResolvedValueOnce(chart('MSFT', [20, 21]));

    await timed.fetchSeries('AAPL', RANGE);
    now = 61_000;
    await timed.fetchSeries('MSFT', RANGE);

    expect(timed.stats().series.size).toBe(1);
  });
});
