import type { ServerConfig } from '../config.js';
import type { FavoritesRefreshManager } from './favorites-refresh-manager.js';
import type { FavoritesStore } from './favorites-store.js';
import type { JourneyBoard } from './journey-board.js';
import type { LiveFeedPoller } from './live-feed-poller.js';
import type { NextArrivalSource } from './next-arrival-client.js';
import type { ReferenceDataCache } from './reference-data-cache.js';

/**
 * Everything the HTTP routes read from. Built once in index.ts and passed
 * down explicitly.
 */
export interface ServerContext {
  config: ServerConfig;
  poller: Pick<LiveFeedPoller, 'snapshot' | 'lastUpdated'>;
  nextArrivals: NextArrivalSource;
  board: Pick<JourneyBoard, 'build'>;
  favorites: Pick<FavoritesStore, 'list' | 'has' | 'add' | 'remove'>;
  favoritesManager: Pick<FavoritesRefreshManager, 'snapshot'>;
  reference: Pick<ReferenceDataCache, 'current' | 'refresh'>;
}
