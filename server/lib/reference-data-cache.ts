import type { ReferenceDataMap, ReferenceKind } from '@shared/types';
import type { BlobStore } from '../db/blob-store.js';
import { describeError, FeedError } from './errors.js';
import type { FeedTransport } from './http.js';
import { Publisher, type Listener } from './publisher.js';
import {
  decodeAdvisories,
  decodeRouteShapes,
  decodeSchedules,
  decodeStops,
} from './decoders.js';

export interface ReferenceDataset<T> {
  url: string;
  decode(body: string): T;
}

export type ReferenceDatasets = { [K in ReferenceKind]: ReferenceDataset<ReferenceDataMap[K]> };

export interface LoadResult<T> {
  /** Value decoded from the local cache, or null on a cold start. */
  value: T | null;
  /** Background network revalidation; resolves with the fresh value or null. */
  revalidation: Promise<T | null>;
}

type CurrentValues = { [K in ReferenceKind]?: ReferenceDataMap[K] };
type Publishers = { [K in ReferenceKind]: Publisher<ReferenceDataMap[K]> };

export function cacheSlot(kind: ReferenceKind): string {
  return `reference:${kind}`;
}

export function createReferenceDatasets(baseUrl: string, paths: Record<ReferenceKind, string>): ReferenceDatasets {
  const url = (kind: ReferenceKind) => `${baseUrl.replace(/\/+$/, '')}${paths[kind]}`;
  return {
    stops: { url: url('stops'), decode: decodeStops },
    schedules: { url: url('schedules'), decode: decodeSchedules },
    advisories: { url: url('advisories'), decode: decodeAdvisories },
    routeShapes: { url: url('routeShapes'), decode: decodeRouteShapes },
  };
}

/**
 * Stale-while-revalidate store for slow-changing reference data.
 *
 * `load` serves whatever was cached last time straight away and refreshes
 * from the network in the background; the network result replaces both the
 * cached blob and the current value. There is no TTL: only `load` and
 * `refresh` revalidate.
 */
export class ReferenceDataCache {
  private readonly values: CurrentValues = {};
  private readonly publishers: Publishers = {
    stops: new Publisher('REFERENCE:stops'),
    schedules: new Publisher('REFERENCE:schedules'),
    advisories: new Publisher('REFERENCE:advisories'),
    routeShapes: new Publisher('REFERENCE:routeShapes'),
  };
  private readonly issued = new Map<ReferenceKind, number>();
  private readonly applied = new Map<ReferenceKind, number>();

  constructor(
    private readonly store: BlobStore,
    private readonly transport: FeedTransport,
    private readonly datasets: ReferenceDatasets,
  ) {}

  load<K extends ReferenceKind>(kind: K): LoadResult<ReferenceDataMap[K]> {
    const cached = this.readCache(kind);
    if (cached !== null) {
      console.log(`📦 [REFERENCE] Loaded ${kind} from cache`);
      this.apply(kind, cached);
    }
    return { value: cached, revalidation: this.refresh(kind) };
  }

  async refresh<K extends ReferenceKind>(kind: K): Promise<ReferenceDataMap[K] | null> {
    const dataset: ReferenceDataset<ReferenceDataMap[K]> = this.datasets[kind];
    const sequence = (this.issued.get(kind) ?? 0) + 1;
    this.issued.set(kind, sequence);

    console.log(`🌐 [REFERENCE] Fetching ${kind} from network`);
    try {
      const body = await this.transport.getText(dataset.url);
      if (body.trim().length === 0) {
        throw new FeedError('NoData', `${kind} returned an empty body`);
      }
      const value = dataset.decode(body);

      if (sequence < (this.applied.get(kind) ?? 0)) {
        console.log(`⏭️ [REFERENCE] Discarding out-of-order ${kind} response`);
        return null;
      }

      this.store.set(cacheSlot(kind), body);
      this.applied.set(kind, sequence);
      this.apply(kind, value);
      console.log(`✅ [REFERENCE] ${kind} refreshed and cached`);
      return value;
    } catch (error: unknown) {
      console.error(`❌ [REFERENCE] Failed to refresh ${kind}:`, describeError(error));
      return null;
    }
  }

  current<K extends ReferenceKind>(kind: K): ReferenceDataMap[K] | null {
    const value: ReferenceDataMap[K] | undefined = this.values[kind];
    return value ?? null;
  }

  subscribe<K extends ReferenceKind>(kind: K, listener: Listener<ReferenceDataMap[K]>): () => void {
    const publisher: Publisher<ReferenceDataMap[K]> = this.publishers[kind];
    return publisher.subscribe(listener);
  }

  private readCache<K extends ReferenceKind>(kind: K): ReferenceDataMap[K] | null {
    const raw = this.store.get(cacheSlot(kind));
    if (raw === null) return null;

    try {
      return this.datasets[kind].decode(raw);
    } catch (error: unknown) {
      // An old schema or a corrupt blob counts as a cold start
      console.warn(`⚠️ [REFERENCE] Ignoring unreadable cached ${kind}:`, describeError(error));
      return null;
    }
  }

  private apply<K extends ReferenceKind>(kind: K, value: ReferenceDataMap[K]): void {
    this.values[kind] = value;
    const publisher: Publisher<ReferenceDataMap[K]> = this.publishers[kind];
    publisher.publish(value);
  }
}
