import express from 'express';
import { createServer } from 'http';
import dotenv from 'dotenv';
import { REFERENCE_API } from '@shared/config';
import { REFERENCE_KINDS } from '@shared/constants';
import { loadConfig } from './config.js';
import { registerRoutes } from './routes.js';
import { openDatabase } from './db/schema.js';
import { SqliteBlobStore } from './db/blob-store.js';
import { createAxiosTransport } from './lib/http.js';
import { describeError } from './lib/errors.js';
import { LiveFeedPoller } from './lib/live-feed-poller.js';
import { NextArrivalClient } from './lib/next-arrival-client.js';
import { FavoritesStore } from './lib/favorites-store.js';
import { FavoritesRefreshManager } from './lib/favorites-refresh-manager.js';
import { JourneyBoard } from './lib/journey-board.js';
import { ReferenceDataCache, createReferenceDatasets } from './lib/reference-data-cache.js';
import type { ServerContext } from './lib/context.js';

dotenv.config();

function startServer(): void {
  const config = loadConfig();

  const db = openDatabase(config.databasePath);
  const blobStore = new SqliteBlobStore(db);
  console.log(`✅ Database ready at ${config.databasePath}`);

  const transport = createAxiosTransport(config.requestTimeoutMs);
  const poller = new LiveFeedPoller(transport, {
    url: config.trainViewUrl,
    intervalMs: config.vehiclePollIntervalMs,
  });
  const nextArrivals = new NextArrivalClient(transport, config.nextToArriveUrl);
  const favorites = new FavoritesStore(blobStore);
  const favoritesManager = new FavoritesRefreshManager(nextArrivals, {
    intervalMs: config.favoritesRefreshIntervalMs,
    arrivalCount: config.favoritesArrivalCount,
  });
  const reference = new ReferenceDataCache(
    blobStore,
    transport,
    createReferenceDatasets(config.referenceApiUrl, REFERENCE_API.PATHS),
  );
  const board = new JourneyBoard(nextArrivals, poller, config.boardArrivalCount);

  favorites.subscribe(pairs => {
    favoritesManager.setFavorites(pairs)
      .catch((error: unknown) => console.error('❌ [FAVORITES] Refresh after change failed:', describeError(error)));
  });

  const context: ServerContext = { config, poller, nextArrivals, board, favorites, favoritesManager, reference };

  const app = express();
  const server = createServer(app);
  app.use(express.json());
  registerRoutes(app, context);

  // Cached reference data is served immediately; revalidation runs in the background
  for (const kind of REFERENCE_KINDS) {
    reference.load(kind).revalidation
      .catch((error: unknown) => console.error(`❌ [REFERENCE] ${kind} revalidation failed:`, describeError(error)));
  }

  poller.start()
    .catch((error: unknown) => console.error('❌ [TRAINVIEW] Initial poll failed:', describeError(error)));

  // Seed the manager with persisted favorites, then keep them fresh
  favoritesManager.setFavorites(favorites.list())
    .catch((error: unknown) => console.error('❌ [FAVORITES] Initial refresh failed:', describeError(error)));
  favoritesManager.start();

  const shutdown = () => {
    console.log('🛑 Shutting down...');
    poller.stop();
    favoritesManager.stop();
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  server.listen(config.port, () => {
    console.log(`✅ Backend server running on http://localhost:${config.port}/`);
    console.log(`📡 API endpoints available at http://localhost:${config.port}/api/*`);
  });

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      console.error(`❌ Port ${config.port} is already in use. Set PORT to use a different one.`);
      process.exit(1);
    }
    console.error('Server error:', error);
  });
}

try {
  startServer();
} catch (error: unknown) {
  console.error('❌ Fatal error starting server:', error);
  process.exit(1);
}
