/**
 * MACRO SERVICE
 *
 * FRED-backed MacroFetcher for central-bank and money-market rates.
 * Without an API key every call reports CONFIGURATION_MISSING and nothing
 * is sent.
 */

import { configurationMissing, ok, unavailable, type Result } from '../../../common/result.js';
import type { Env } from '../../../config/env.js';
import { schedule } from '../../shared/runtime/rate-limiter.js';
import { TtlCache, type Clock } from '../../shared/runtime/ttl-cache.js';
import { fetchFredSeries, hasFredApiKey, type FredDataPoint } from '../providers/fred.client.js';
import type { DateRange, MacroFetcher, PriceSeries } from '../contracts/market-data.contracts.js';

export type FredLoader = (seriesId: string, start?: string, end?: string) => Promise<FredDataPoint[]>;

export interface MacroServiceOptions {
  apiKey: string;
  loader: FredLoader;
  ttlMs: number;
  now?: Clock;
}

export function createFredLoader(env: Env): FredLoader {
  return (seriesId, start, end) =>
    schedule('FRED', () =>
      fetchFredSeries(
        seriesId,
        { apiKey: env.FRED_API_KEY, baseUrl: env.FRED_API_URL, timeoutMs: env.HTTP_TIMEOUT_MS },
        start,
        end
      )
    );
}

export class FredMacroService implements MacroFetcher {
  private readonly cache: TtlCache<PriceSeries>;

  constructor(private readonly options: MacroServiceOptions) {
    this.cache = new TtlCache<PriceSeries>(options.ttlMs, options.now);
  }

  isConfigured(): boolean {
    return hasFredApiKey(this.options.apiKey);
  }

  async fetchSeries(seriesId: string, range: Partial<DateRange>): Promise<Result<PriceSeries>> {
    if (!this.isConfigured()) {
      return configurationMissing('FRED_API_KEY');
    }

    const key = `${seriesId}|${range.start ?? ''}|${range.end ?? ''}`;
    const hit = this.cache.get(key);
    if (hit) return ok(hit);

    try {
      const points = await this.options.loader(seriesId, range.start, range.end);
      if (points.length === 0) {
        return unavailable(`no observations for ${seriesId}`);
      }
      const series = points.map((p) => ({ date: p.date, price: p.value }));
      this.cache.prune();
      this.cache.set(key, series);
      return ok(series);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[FRED] Error fetching ${seriesId}: ${message}`);
      return unavailable(message);
    }
  }

  clearCaches(): void {
    this.cache.clear();
  }

  stats() {
    return this.cache.stats();
  }
}
