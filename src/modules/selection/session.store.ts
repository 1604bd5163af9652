/**
 * SESSION STORE
 *
 * Explicit per-session application state (watchlists, chart overlays,
 * date ranges, display options). In memory only; a session idle longer
 * than the configured TTL is forgotten.
 */

import { v4 as uuidv4 } from 'uuid';
import { NotFoundError } from '../../common/errors.js';
import type { DateRange } from '../market-data/contracts/market-data.contracts.js';
import { defaultRange } from '../market-data/utils/dates.js';
import { TtlCache, type Clock } from '../shared/runtime/ttl-cache.js';
import type { ChartItem, FxChartItem } from './chart-items.store.js';
import { EMPTY_SELECTION, type SelectionTree } from './selection.types.js';

export interface DisplaySettings {
  decimals: number;     // 0..4
  normalize: boolean;   // rebase chart series to 100
  logScale: boolean;
}

export interface SessionState {
  id: string;
  createdAt: string;
  indices: SelectionTree;
  equities: SelectionTree;
  chartItems: ChartItem[];
  fxChartItems: FxChartItem[];
  range: DateRange;
  chartRange: DateRange;
  settings: DisplaySettings;
}

export const DEFAULT_SETTINGS: DisplaySettings = {
  decimals: 2,
  normalize: true,
  logScale: false,
};

export interface SessionStoreOptions {
  idleTtlMs: number;
  /** Index watchlist every new session starts with */
  seedIndices?: () => SelectionTree;
  now?: Clock;
}

export class SessionStore {
  private readonly sessions: TtlCache<SessionState>;

  constructor(private readonly options: SessionStoreOptions) {
    this.sessions = new TtlCache<SessionState>(options.idleTtlMs, options.now);
  }

  create(): SessionState {
    this.sessions.prune();

    const range = defaultRange();
    const state: SessionState = {
      id: uuidv4(),
      createdAt: new Date().toISOString(),
      indices: this.options.seedIndices?.() ?? EMPTY_SELECTION,
      equities: EMPTY_SELECTION,
      chartItems: [],
      fxChartItems: [],
      range,
      chartRange: { ...range },
      settings: { ...DEFAULT_SETTINGS },
    };

    this.sessions.set(state.id, state);
    return state;
  }

  get(id: string): SessionState {
    const state = this.sessions.get(id);
    if (!state) {
      throw new NotFoundError(`Session ${id} not found or expired`);
    }
    // touching a session keeps it alive
    this.sessions.set(id, state);
    return state;
  }

  update(id: string, fn: (state: SessionState) => SessionState): SessionState {
    const next = fn(this.get(id));
    this.sessions.set(id, next);
    return next;
  }

  delete(id: string): boolean {
    return this.sessions.del(id);
  }

  size(): number {
    return this.sessions.size();
  }
}
