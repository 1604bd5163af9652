import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import { loadEnv } from '../config/env.js';
import { testCatalog } from '../modules/dashboard/__tests__/catalog.fixture.js';
import { FakeMacro, FakeQuotes, seriesOf } from '../modules/market-data/__tests__/fakes.js';

const DAILY = ['2024-01-29', '2024-01-30', '2024-01-31', '2024-02-01', '2024-02-02', '2024-02-05', '2024-02-06'];

function daily(prices: number[]) {
  return seriesOf(Object.fromEntries(DAILY.map((d, i) => [d, prices[i]])));
}

function fakes(fredConfigured = true) {
  const quotes = new FakeQuotes(
    {
      '^GDAXI': daily([16900, 16950, 16903, 17000, 17100, 17200, 17000]),
      'SAP.DE': daily([170, 171, 172, 173, 174, 175, 176]),
      'EUR=X': daily([0.92, 0.93, 0.925, 0.921, 0.926, 0.93, 0.928]),
      'JPY=X': daily([147, 147.5, 146.9, 146.2, 148.1, 148.4, 148.2]),
    },
    { 'SAP.DE': 'SAP SE', 'SIE.DE': 'Siemens AG' }
  );
  const macro = new FakeMacro(
    { FEDFUNDS: seriesOf({ '2024-05-01': 5.33, '2024-06-01': 5.33 }) },
    fredConfigured
  );
  return { quotes, macro };
}

describe('HTTP API', () => {
  let app: FastifyInstance;
  let quotes: FakeQuotes;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const f = fakes();
    quotes = f.quotes;
    app = buildApp({ env: loadEnv({}), catalog: testCatalog(), quotes: f.quotes, macro: f.macro, logger: false });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, fred: { configured: true }, sessions: 0 });
  });

  it('answers unknown routes with the error envelope', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/nowhere' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });

  it('rejects an inverted date range', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/market/overview?start=2024-02-10&end=2024-01-01' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      ok: false,
      error: 'VALIDATION_ERROR',
      message: 'start (2024-02-10) must be before end (2024-01-01)',
    });
  });

  it('validates query parameters with the schemas', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/market/overview?decimals=9' });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('VALIDATION_ERROR');
  });

  it('renders table cells for display and CSV', async () => {
    const json = await app.inject({
      method: 'GET',
      url: '/api/market/overview?start=2024-01-15&end=2024-02-10&decimals=1',
    });
    const [equities] = json.json().tables;
    expect(equities.rows[0]).toMatchObject({
      symbol: '^GSPC',
      value: { kind: 'not_available' },
      display: { value: 'N/A', dailyPct: 'N/A', weekPct: 'N/A', ytdPct: 'N/A' },
    });

    const csv = await app.inject({
      method: 'GET',
      url: '/api/market/overview?start=2024-01-15&end=2024-02-10&format=csv',
    });
    expect(csv.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(csv.body.split('\n')[1]).toBe('Equity Markets,S&P 500,^GSPC,,,,');
  });

  it('computes the FX correlation with the basket column', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/fx/correlation?base=usd&assets=USD,EUR,JPY&start=2024-01-15&end=2024-02-10',
    });

    expect(res.statusCode).toBe(200);
    const { correlation } = res.json();
    expect(correlation.assets).toEqual(['USD', 'EUR', 'JPY']);
    expect(correlation.matrix.values[1][1]).toBe(1);
    expect(correlation.annotated[0]).toHaveLength(3);
  });

  it('normalizes currency case so the base is never fetched as a counter', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/fx/correlation?base=usd&assets=usd,eur,jpy&start=2024-01-15&end=2024-02-10',
    });

    expect(res.json().correlation.assets).toEqual(['USD', 'EUR', 'JPY']);
    expect(new Set(quotes.calls.map((c) => c.symbol))).toEqual(new Set(['EUR=X', 'JPY=X']));
  });

  it('rejects an impossible calendar date', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/market/overview?start=2024-02-30&end=2024-03-10' });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('VALIDATION_ERROR');
  });

  it('answers 422 when the correlation has too little data', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/fx/correlation?assets=EUR,CHF&start=2024-01-15&end=2024-02-10',
    });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ ok: false, error: 'INSUFFICIENT_DATA', included: ['EUR'], excluded: ['CHF'] });
  });

  it('clears the provider caches', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/cache/clear' });

    expect(res.json()).toEqual({ ok: true, cleared: true });
    expect(quotes.cleared).toBe(1);
  });

  describe('sessions', () => {
    async function createSession(): Promise<string> {
      const res = await app.inject({ method: 'POST', url: '/api/sessions' });
      expect(res.statusCode).toBe(201);
      return res.json().session.id;
    }

    it('seeds the index watchlist with every catalog index', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/sessions' });
      const { session } = res.json();

      expect(session.counts.indices).toBe(3);
      expect(session.indices.Europe['DAX (Germany)']).toEqual([{ symbol: '^GDAXI', label: 'DAX (Germany)' }]);
      expect(session.settings).toEqual({ decimals: 2, normalize: true, logScale: false });
    });

    it('answers 404 for an unknown session', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/sessions/8f14e45f-ceea-4672-a1d6-4b8c1d7f3a10' });

      expect(res.statusCode).toBe(404);
      expect(res.json().error).toBe('NOT_FOUND');
    });

    it('adds equities under their company names and prunes on removal', async () => {
      const id = await createSession();

      const added = await app.inject({
        method: 'POST',
        url: `/api/sessions/${id}/equities`,
        payload: { region: 'Europe', index: 'DAX (Germany)', symbols: ['SAP.DE', 'SAP.DE'] },
      });
      expect(added.json().equities).toEqual({
        Europe: { 'DAX (Germany)': [{ symbol: 'SAP.DE', label: 'SAP SE' }] },
      });

      const removed = await app.inject({
        method: 'POST',
        url: `/api/sessions/${id}/equities/remove`,
        payload: { region: 'Europe', category: 'DAX (Germany)', symbols: ['SAP.DE'] },
      });
      expect(removed.json().equities).toEqual({});
    });

    it('keeps equities added by overlapping requests', async () => {
      const id = await createSession();
      let releaseSap: () => void = () => undefined;
      const sapLookup = new Promise<void>((resolve) => { releaseSap = resolve; });
      const names = vi.spyOn(quotes, 'fetchDisplayName').mockImplementation(async (symbol) => {
        if (symbol === 'SAP.DE') await sapLookup;
        return symbol === 'SAP.DE' ? 'SAP SE' : 'Siemens AG';
      });
      const add = (symbol: string) => app.inject({
        method: 'POST',
        url: `/api/sessions/${id}/equities`,
        payload: { region: 'Europe', index: 'DAX (Germany)', symbols: [symbol] },
      });

      const slow = add('SAP.DE').then((res) => res);
      await vi.waitFor(() => expect(names).toHaveBeenCalledWith('SAP.DE'));
      await add('SIE.DE');
      releaseSap();
      await slow;

      const res = await app.inject({ method: 'GET', url: `/api/sessions/${id}` });
      expect(res.json().session.equities).toEqual({
        Europe: {
          'DAX (Germany)': [
            { symbol: 'SIE.DE', label: 'Siemens AG' },
            { symbol: 'SAP.DE', label: 'SAP SE' },
          ],
        },
      });
      expect(res.json().session.counts.equities).toBe(2);
    });

    it('answers 200 for object member names in watchlist requests', async () => {
      const id = await createSession();

      const indices = await app.inject({
        method: 'POST',
        url: `/api/sessions/${id}/indices`,
        payload: { refs: [{ region: 'constructor', index: 'name' }] },
      });
      expect(indices.statusCode).toBe(200);
      expect(Object.keys(indices.json().indices)).toEqual(['United States', 'Europe']);

      const equities = await app.inject({
        method: 'POST',
        url: `/api/sessions/${id}/equities/select-all`,
        payload: { refs: [{ region: 'Europe', index: 'constructor' }] },
      });
      expect(equities.statusCode).toBe(200);
      expect(equities.json().equities).toEqual({});
    });

    it('selects every constituent of the watched indices', async () => {
      const id = await createSession();

      const res = await app.inject({
        method: 'POST',
        url: `/api/sessions/${id}/equities/select-all`,
        payload: {},
      });

      expect(res.json().equities).toEqual({
        Europe: {
          'DAX (Germany)': [
            { symbol: 'SAP.DE', label: 'SAP SE' },
            { symbol: 'SIE.DE', label: 'Siemens AG' },
          ],
        },
      });
    });

    it('serves the watchlist table for the session range', async () => {
      const id = await createSession();
      await app.inject({ method: 'DELETE', url: `/api/sessions/${id}/indices` });
      await app.inject({
        method: 'POST',
        url: `/api/sessions/${id}/indices`,
        payload: { refs: [{ region: 'Europe', index: 'DAX (Germany)' }, { region: 'Mars', index: 'Nothing' }] },
      });
      await app.inject({
        method: 'PATCH',
        url: `/api/sessions/${id}/settings`,
        payload: { range: { start: '2024-01-15', end: '2024-02-10' }, decimals: 0 },
      });

      const res = await app.inject({ method: 'GET', url: `/api/sessions/${id}/tables/indices` });
      const row = res.json().groups[0].categories[0].rows[0];

      expect(row.symbol).toBe('^GDAXI');
      expect(row.display.value).toBe('17K');
      expect(row.tone.dailyPct).toBe('negative');

      const skeleton = await app.inject({ method: 'GET', url: `/api/sessions/${id}/tables/indices?skeleton=true` });
      expect(skeleton.json().groups[0].categories[0].rows[0].display.value).toBe('...');
    });

    it('rejects malformed settings', async () => {
      const id = await createSession();
      const res = await app.inject({
        method: 'PATCH',
        url: `/api/sessions/${id}/settings`,
        payload: { decimals: 7 },
      });

      expect(res.statusCode).toBe(400);
    });

    it('keeps chart overlays unique and serves their data', async () => {
      const id = await createSession();
      await app.inject({
        method: 'PATCH',
        url: `/api/sessions/${id}/settings`,
        payload: { chartRange: { start: '2024-01-29', end: '2024-02-07' } },
      });
      const item = { type: 'Equity', region: 'Europe', name: 'SAP SE', symbol: 'SAP.DE' };
      await app.inject({ method: 'POST', url: `/api/sessions/${id}/charts`, payload: { items: [item] } });
      const again = await app.inject({ method: 'POST', url: `/api/sessions/${id}/charts`, payload: { items: [item] } });
      expect(again.json().chartItems).toHaveLength(1);

      const data = await app.inject({ method: 'GET', url: `/api/sessions/${id}/charts/data` });
      const { chart } = data.json();
      expect(chart.traces[0].points[0]).toEqual({ date: '2024-01-29', price: 100 });
      expect(chart.stats[0].observations).toBe(7);

      const csv = await app.inject({ method: 'GET', url: `/api/sessions/${id}/charts/data?format=csv` });
      expect(csv.body.split('\n')[1]).toBe('2024-01-29,SAP SE,SAP.DE,170');
    });

    it('ignores same-currency FX chart pairs', async () => {
      const id = await createSession();
      const res = await app.inject({
        method: 'POST',
        url: `/api/sessions/${id}/fx-charts`,
        payload: { pairs: [{ base: 'eur', unit: 'usd' }, { base: 'USD', unit: 'USD' }] },
      });

      expect(res.json().fxChartItems).toEqual([{ pair: 'EUR/USD', base: 'EUR', unit: 'USD' }]);
    });
  });
});

describe('HTTP API without FRED credentials', () => {
  it('disables only the central-bank routes', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const { quotes, macro } = fakes(false);
    const app = buildApp({ env: loadEnv({}), catalog: testCatalog(), quotes, macro, logger: false });

    const banks = await app.inject({ method: 'GET', url: '/api/macro/central-banks' });
    expect(banks.statusCode).toBe(503);
    expect(banks.json()).toMatchObject({ ok: false, error: 'CONFIGURATION_MISSING' });

    const health = await app.inject({ method: 'GET', url: '/api/health' });
    expect(health.statusCode).toBe(200);
    expect(health.json().fred).toEqual({ configured: false });

    await app.close();
  });
});
