import type { NextArrival, StationPair } from '@shared/types';
import { pairKey } from '@shared/station-pair';
import { describeError } from './errors.js';
import type { NextArrivalSource } from './next-arrival-client.js';
import { Publisher, type Listener } from './publisher.js';

export interface FavoritesRefreshOptions {
  intervalMs: number;
  arrivalCount: number;
}

export interface FavoriteArrivals {
  pair: StationPair;
  arrivals: NextArrival[];
}

/**
 * Keeps next-to-arrive results for every favorite station pair fresh.
 *
 * At most one request per pair is outstanding at a time; different pairs
 * refresh in parallel. Changing the favorites set throws away all results
 * and in-flight bookkeeping, so a removed pair never lingers and a re-added
 * one starts empty until its next fetch lands.
 */
export class FavoritesRefreshManager {
  private pairs: StationPair[] = [];
  private readonly results = new Map<string, NextArrival[]>();
  private readonly inFlight = new Map<string, boolean>();
  private timer: NodeJS.Timeout | null = null;
  private readonly publisher = new Publisher<ReadonlyMap<string, NextArrival[]>>('FAVORITES');

  // Bumped on every favorites change and on stop()
  private generation = 0;

  constructor(
    private readonly source: NextArrivalSource,
    private readonly options: FavoritesRefreshOptions,
  ) {}

  setFavorites(pairs: readonly StationPair[]): Promise<void> {
    this.generation++;
    this.pairs = [...pairs];
    this.results.clear();
    this.inFlight.clear();
    this.publisher.publish(new Map(this.results));

    console.log(`⭐ [FAVORITES] Favorites changed (${this.pairs.length} pairs); refreshing`);
    return this.refreshAll();
  }

  /**
   * Arm the refresh timer. The immediate refresh comes from setFavorites.
   */
  start(): void {
    if (this.timer) return;

    console.log(`⭐ [FAVORITES] Refreshing favorites every ${Math.round(this.options.intervalMs / 1000)}s`);
    this.timer = setInterval(() => {
      this.refreshAll().catch((error: unknown) => console.error('❌ [FAVORITES] Refresh error:', describeError(error)));
    }, this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.generation++;
    this.inFlight.clear();
  }

  async refreshAll(): Promise<void> {
    await Promise.all(this.pairs.map(pair => this.refresh(pair)));
  }

  async refresh(pair: StationPair): Promise<void> {
    const key = pairKey(pair);
    if (!this.pairs.some(favorite => pairKey(favorite) === key)) {
      console.warn(`⚠️ [FAVORITES] ${key} is not a favorite; skipping refresh`);
      return;
    }
    if (this.inFlight.get(key)) {
      return;
    }

    const generation = this.generation;
    this.inFlight.set(key, true);

    let arrivals: NextArrival[];
    try {
      arrivals = await this.source.fetch(pair.start, pair.end, this.options.arrivalCount);
    } catch (error: unknown) {
      console.error(`❌ [FAVORITES] ${key}: ${describeError(error)}`);
      arrivals = [];
    }

    // Favorites changed (or manager stopped) while this request was out
    if (generation !== this.generation) {
      return;
    }

    this.results.set(key, arrivals);
    this.inFlight.set(key, false);
    this.publisher.publish(new Map(this.results));
  }

  resultsFor(pair: StationPair): NextArrival[] | undefined {
    return this.results.get(pairKey(pair));
  }

  snapshot(): FavoriteArrivals[] {
    return this.pairs.map(pair => ({ pair, arrivals: this.results.get(pairKey(pair)) ?? [] }));
  }

  isInFlight(pair: StationPair): boolean {
    return this.inFlight.get(pairKey(pair)) ?? false;
  }

  subscribe(listener: Listener<ReadonlyMap<string, NextArrival[]>>): () => void {
    return this.publisher.subscribe(listener);
  }
}
