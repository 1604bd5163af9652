/**
 * QUOTE SERVICE
 *
 * Yahoo-backed QuoteFetcher. Every call is time-boxed cached, coalesced
 * with identical in-flight calls and never throws: provider failures come
 * back as DATA_UNAVAILABLE.
 */

import { ok, unavailable, type Result } from '../../../common/result.js';
import type { Env } from '../../../config/env.js';
import { computeSnapshot } from '../../analytics/snapshot.metrics.js';
import { RequestCoalescer } from '../../shared/runtime/request-coalescer.js';
import { schedule } from '../../shared/runtime/rate-limiter.js';
import { TtlCache, type Clock } from '../../shared/runtime/ttl-cache.js';
import { fetchYahooChart, type YahooChart } from '../providers/yahoo.client.js';
import { addDays, today } from '../utils/dates.js';
import type {
  DateRange,
  PriceSeries,
  QuoteFetcher,
  Snapshot,
} from '../contracts/market-data.contracts.js';

export type ChartLoader = (symbol: string, range: DateRange) => Promise<YahooChart>;

export interface QuoteServiceOptions {
  loader: ChartLoader;
  seriesTtlMs: number;
  nameTtlMs: number;
  now?: Clock;
}

export function createYahooLoader(env: Env): ChartLoader {
  return (symbol, range) =>
    schedule('YAHOO', () =>
      fetchYahooChart(symbol, range, {
        baseUrl: env.YAHOO_CHART_URL,
        timeoutMs: env.HTTP_TIMEOUT_MS,
      })
    );
}

export class YahooQuoteService implements QuoteFetcher {
  private readonly series: TtlCache<PriceSeries>;
  private readonly names: TtlCache<string>;
  private readonly inflight = new RequestCoalescer<Result<PriceSeries>>();

  constructor(private readonly options: QuoteServiceOptions) {
    this.series = new TtlCache<PriceSeries>(options.seriesTtlMs, options.now);
    this.names = new TtlCache<string>(options.nameTtlMs, options.now);
  }

  fetchSeries(symbol: string, range: DateRange): Promise<Result<PriceSeries>> {
    const key = `${symbol}|${range.start}|${range.end}`;
    const hit = this.series.get(key);
    if (hit) {
      return Promise.resolve(ok(hit));
    }

    return this.inflight.run(key, async (): Promise<Result<PriceSeries>> => {
      try {
        const chart = await this.options.loader(symbol, range);
        if (chart.name) {
          this.names.prune();
          this.names.set(symbol, chart.name);
        }
        if (chart.points.length === 0) {
          return unavailable(`no observations for ${symbol} in ${range.start}..${range.end}`);
        }
        // keys carry the date range, so expired ranges are only dropped here
        this.series.prune();
        this.series.set(key, chart.points);
        return ok(chart.points);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[Quotes] ${symbol} ${range.start}..${range.end} unavailable: ${message}`);
        return unavailable(message);
      }
    });
  }

  /**
   * Last value with 1D / 1W / YTD changes. The YTD leg is a second fetch
   * from `ytdStart`; if it fails only the YTD figure is lost.
   */
  async fetchSnapshot(symbol: string, range: DateRange, ytdStart: string): Promise<Result<Snapshot>> {
    const main = await this.fetchSeries(symbol, range);
    if (!main.ok) {
      return main;
    }

    let ytd: PriceSeries | null = null;
    if (ytdStart < range.end) {
      const ytdResult = await this.fetchSeries(symbol, { start: ytdStart, end: range.end });
      ytd = ytdResult.ok ? ytdResult.value : null;
    }

    return computeSnapshot(main.value, ytd);
  }

  async fetchDisplayName(symbol: string): Promise<string> {
    const hit = this.names.get(symbol);
    if (hit) return hit;

    // any recent chart carries the instrument name in its meta block
    const end = today();
    await this.fetchSeries(symbol, { start: addDays(end, -7), end });
    return this.names.get(symbol) ?? symbol;
  }

  clearCaches(): void {
    this.series.clear();
    this.names.clear();
    console.log('[Quotes] Caches cleared');
  }

  stats() {
    return { series: this.series.stats(), names: this.names.stats() };
  }
}
