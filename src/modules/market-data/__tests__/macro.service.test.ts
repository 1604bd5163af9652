import { describe, it, expect, vi } from 'vitest';
import { FredMacroService, type FredLoader } from '../services/macro.service.js';

function service(apiKey: string, loader: FredLoader) {
  return new FredMacroService({ apiKey, loader, ttlMs: 60_000 });
}

describe('FredMacroService', () => {
  it('reports CONFIGURATION_MISSING without a key and never calls out', async () => {
    const loader = vi.fn<Parameters<FredLoader>, ReturnType<FredLoader>>();
    const macro = service('', loader);

    expect(macro.isConfigured()).toBe(false);
    expect(await macro.fetchSeries('FEDFUNDS', {})).toEqual({
      ok: false,
      issue: { kind: 'CONFIGURATION_MISSING', setting: 'FRED_API_KEY' },
    });
    expect(loader).not.toHaveBeenCalled();
  });

  it('maps observations to a price series and caches it', async () => {
    const loader = vi.fn<Parameters<FredLoader>, ReturnType<FredLoader>>()
      .mockResolvedValue([{ date: '2024-01-01', value: 5.33 }]);
    const macro = service('test-key', loader);

    const first = await macro.fetchSeries('FEDFUNDS', { start: '2023-01-01' });
    await macro.fetchSeries('FEDFUNDS', { start: '2023-01-01' });

    expect(first).toEqual({ ok: true, value: [{ date: '2024-01-01', price: 5.33 }] });
    expect(loader).toHaveBeenCalledTimes(1);
    expect(loader).toHaveBeenCalledWith('FEDFUNDS', '2023-01-01', undefined);
  });

  it('turns failures into DATA_UNAVAILABLE', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const loader = vi.fn<Parameters<FredLoader>, ReturnType<FredLoader>>()
      .mockRejectedValue(new Error('Bad Request'));

    const result = await service('test-key', loader).fetchSeries('NOPE', {});

    expect(result).toEqual({ ok: false, issue: { kind: 'DATA_UNAVAILABLE', detail: 'Bad Request' } });
  });

  it('drops expired series when a new one is cached', async () => {
    let now = 0;
    const loader = vi.fn<Parameters<FredLoader>, ReturnType<FredLoader>>()
      .mockResolvedValue([{ date: '2024-01-01', value: 5.33 }]);
    const macro = new FredMacroService({ apiKey: 'test-key', loader, ttlMs: 60_000, now: () => now });

    await macro.fetchSeries('FEDFUNDS', { start: '2023-01-01' });
    now = 61_000;
    await macro.fetchSeries('ECBDFR', { start: '2023-01-01' });

    expect(macro.stats().size).toBe(1);
  });
});
