import type { StationPair } from '@shared/types';
import { FAVORITES_STORAGE_KEY } from '@shared/constants';
import { samePair } from '@shared/station-pair';
import type { BlobStore } from '../db/blob-store.js';
import { describeError } from './errors.js';
import { Publisher, type Listener } from './publisher.js';

function decodeStoredPairs(raw: string): StationPair[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];

  const pairs: StationPair[] = [];
  for (const entry of parsed) {
    if (Array.isArray(entry) && typeof entry[0] === 'string' && typeof entry[1] === 'string') {
      pairs.push({ start: entry[0], end: entry[1] });
    }
  }
  return pairs;
}

/**
 * User-saved station pairs, persisted as a flat list of [start, end].
 */
export class FavoritesStore {
  private pairs: StationPair[];
  private readonly publisher = new Publisher<readonly StationPair[]>('FAVORITES');

  constructor(private readonly store: BlobStore) {
    this.pairs = this.read();
  }

  list(): readonly StationPair[] {
    return this.pairs;
  }

  has(pair: StationPair): boolean {
    return this.pairs.some(existing => samePair(existing, pair));
  }

  add(pair: StationPair): boolean {
    if (this.has(pair)) return false;
    this.pairs = [...this.pairs, { start: pair.start, end: pair.end }];
    this.save();
    return true;
  }

  remove(pair: StationPair): boolean {
    if (!this.has(pair)) return false;
    this.pairs = this.pairs.filter(existing => !samePair(existing, pair));
    this.save();
    return true;
  }

  subscribe(listener: Listener<readonly StationPair[]>): () => void {
    return this.publisher.subscribe(listener);
  }

  private read(): StationPair[] {
    const raw = this.store.get(FAVORITES_STORAGE_KEY);
    if (raw === null) return [];
    try {
      return decodeStoredPairs(raw);
    } catch (error: unknown) {
      console.warn('⚠️ [FAVORITES] Stored favorites are unreadable; starting empty:', describeError(error));
      return [];
    }
  }

  private save(): void {
    this.store.set(FAVORITES_STORAGE_KEY, JSON.stringify(this.pairs.map(pair => [pair.start, pair.end])));
    this.publisher.publish(this.pairs);
  }
}
