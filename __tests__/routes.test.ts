import express from 'express';
import type { Server } from 'http';
import type { StationPair } from '@shared/types';
import { REFERENCE_API } from '@shared/config';
import { DEFAULT_CONFIG } from '../server/config';
import { registerRoutes } from '../server/routes';
import type { ServerContext } from '../server/lib/context';
import { FeedError } from '../server/lib/errors';
import { buildBoard } from '../server/lib/journey-board';
import { cacheSlot, createReferenceDatasets, ReferenceDataCache } from '../server/lib/reference-data-cache';
import { makeArrival, makeVehicle, MemoryBlobStore, QueuedTransport, silenceConsole } from './support/fakes';

const PAOLI = { start: 'Suburban Station', end: 'Paoli' };

let server: Server;
let baseUrl: string;
let favorites: StationPair[];
let fetchArrivals: jest.Mock;

function createContext(reference: ReferenceDataCache): ServerContext {
  return {
    config: DEFAULT_CONFIG,
    poller: {
      snapshot: () => [makeVehicle('9545')],
      lastUpdated: () => new Date('2024-06-10T16:00:00Z'),
    },
    nextArrivals: { fetch: fetchArrivals },
    board: {
      build: async (start, end) => buildBoard(start, end, [makeVehicle('9545')], [makeArrival('9545')]),
    },
    favorites: {
      list: () => favorites,
      has: pair => favorites.some(f => f.start === pair.start && f.end === pair.end),
      add: pair => {
        if (favorites.some(f => f.start === pair.start && f.end === pair.end)) return false;
        favorites = [...favorites, pair];
        return true;
      },
      remove: pair => {
        const before = favorites.length;
        favorites = favorites.filter(f => f.start !== pair.start || f.end !== pair.end);
        return favorites.length !== before;
      },
    },
    favoritesManager: {
      snapshot: () => favorites.map(pair => ({ pair, arrivals: [makeArrival('9545')] })),
    },
    reference,
  };
}

beforeEach(async () => {
  silenceConsole();
  favorites = [];
  fetchArrivals = jest.fn();

  const app = express();
  app.use(express.json());
  const store = new MemoryBlobStore();
  store.set(cacheSlot('stops'), JSON.stringify({ stops: ['Suburban Station', 'Paoli'] }));
  store.set(cacheSlot('schedules'), JSON.stringify({
    'Paoli/Thorndale': {
      'mon-fri': {
        outbound: [
          {
            train: '9545',
            stops: [['Suburban Station', '3:15PM'], ['30th Street Station', '3:20PM'], ['Paoli', '3:52PM']],
          },
        ],
      },
    },
  }));
  const reference = new ReferenceDataCache(
    store,
    new QueuedTransport([new Error('offline'), new Error('offline'), new Error('offline')]),
    createReferenceDatasets('https://reference.example.test', REFERENCE_API.PATHS),
  );
  await reference.load('stops').revalidation;
  await reference.load('schedules').revalidation;
  registerRoutes(app, createContext(reference));

  await new Promise<void>(resolve => {
    server = app.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await new Promise<void>(resolve => server.close(() => resolve()));
  jest.restoreAllMocks();
});

describe('GET /api/trains', () => {
  it('returns the vehicle snapshot', async () => {
    const response = await fetch(`${baseUrl}/api/trains`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      count: 1,
      timestamp: '2024-06-10T16:00:00.000Z',
      trains: [{ trainNo: '9545' }],
    });
  });
});

describe('GET /api/trains/:trainNo/schedule', () => {
  it('returns the timetable and the stops a live train has left', async () => {
    const response = await fetch(`${baseUrl}/api/trains/9545/schedule`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      trainNo: '9545',
      line: 'Paoli/Thorndale',
      day: 'mon-fri',
      direction: 'outbound',
      remainingStops: [
        { stop: '30th Street Station', time: '3:20PM' },
        { stop: 'Paoli', time: '3:52PM' },
      ],
      vehicle: { trainNo: '9545', currentStop: 'Suburban Station' },
    });
  });

  it('returns 404 for a train with no timetable', async () => {
    const response = await fetch(`${baseUrl}/api/trains/0000/schedule`);
    expect(response.status).toBe(404);
  });
});

describe('GET /api/next-to-arrive', () => {
  it('rejects a request without both stations', async () => {
    const response = await fetch(`${baseUrl}/api/next-to-arrive?start=Paoli`);
    expect(response.status).toBe(400);
    expect(fetchArrivals).not.toHaveBeenCalled();
  });

  it('rejects a non-positive count', async () => {
    const response = await fetch(`${baseUrl}/api/next-to-arrive?start=Paoli&end=Malvern&n=0`);
    expect(response.status).toBe(400);
  });

  it('defaults the count to the board size', async () => {
    fetchArrivals.mockResolvedValue([]);

    await fetch(`${baseUrl}/api/next-to-arrive?start=Suburban%20Station&end=Paoli`);

    expect(fetchArrivals).toHaveBeenCalledWith('Suburban Station', 'Paoli', 10);
  });

  it('reports a feed failure as an empty list with its kind', async () => {
    fetchArrivals.mockRejectedValue(new FeedError('DecodingError', 'NextToArrive: expected a JSON array'));

    const response = await fetch(`${baseUrl}/api/next-to-arrive?start=Paoli&end=Malvern&n=3`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ arrivals: [], error: 'DecodingError' });
  });
});

describe('/api/favorites', () => {
  it('adds and removes pairs', async () => {
    const added = await fetch(`${baseUrl}/api/favorites`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(PAOLI),
    });
    expect(added.status).toBe(201);

    const duplicate = await fetch(`${baseUrl}/api/favorites`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(PAOLI),
    });
    expect(duplicate.status).toBe(200);
    expect(await duplicate.json()).toEqual({ added: false, favorites: [PAOLI] });

    const removed = await fetch(`${baseUrl}/api/favorites`, {
      method: 'DELETE',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(PAOLI),
    });
    expect(await removed.json()).toEqual({ removed: true, favorites: [] });
  });

  it('rejects a body without both stations', async () => {
    const response = await fetch(`${baseUrl}/api/favorites`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ start: 'Paoli' }),
    });
    expect(response.status).toBe(400);
  });

  it('builds a board for every favorite', async () => {
    favorites = [PAOLI];

    const response = await fetch(`${baseUrl}/api/favorites/arrivals`);

    expect(await response.json()).toMatchObject({
      favorites: [{ start: 'Suburban Station', end: 'Paoli', tracked: [{ rollingStock: 'silverliner-v', rollingStockColor: '#dc2626' }] }],
    });
  });
});

describe('/api/reference/:kind', () => {
  it('serves the current value', async () => {
    const response = await fetch(`${baseUrl}/api/reference/stops`);
    expect(await response.json()).toEqual({ kind: 'stops', data: ['Suburban Station', 'Paoli'] });
  });

  it('returns 404 for an unknown dataset', async () => {
    const response = await fetch(`${baseUrl}/api/reference/fares`);
    expect(response.status).toBe(404);
  });

  it('reports a failed refresh', async () => {
    const response = await fetch(`${baseUrl}/api/reference/advisories/refresh`, { method: 'POST' });
    expect(await response.json()).toEqual({ kind: 'advisories', refreshed: false, data: null });
  });
});
