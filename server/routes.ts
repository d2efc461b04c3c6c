import express from 'express';
import type { ReferenceKind, StationPair } from '@shared/types';
import { REFERENCE_KINDS } from '@shared/constants';
import type { ServerContext } from './lib/context.js';
import { describeError, isFeedError } from './lib/errors.js';
import { buildBoard } from './lib/journey-board.js';
import { findTrainSchedule, getServiceDayBucket, remainingStops } from './lib/schedule-lookup.js';

function isReferenceKind(value: string): value is ReferenceKind {
  return REFERENCE_KINDS.some(kind => kind === value);
}

function queryString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

function readPair(body: unknown): StationPair | null {
  if (typeof body !== 'object' || body === null) return null;
  const start: unknown = Reflect.get(body, 'start');
  const end: unknown = Reflect.get(body, 'end');
  if (typeof start !== 'string' || typeof end !== 'string' || start === '' || end === '') return null;
  return { start, end };
}

export function registerRoutes(app: express.Express, context: ServerContext) {
  // Live vehicle positions
  app.get('/api/trains', (_req, res) => {
    const trains = context.poller.snapshot();
    const updatedAt = context.poller.lastUpdated();
    res.json({
      trains,
      count: trains.length,
      timestamp: updatedAt ? updatedAt.toISOString() : null,
    });
  });

  // Timetable for one train, trimmed to the stops it has left when it is live
  app.get('/api/trains/:trainNo/schedule', (req, res) => {
    const { trainNo } = req.params;
    const schedules = context.reference.current('schedules');
    if (!schedules) {
      return res.status(503).json({ error: 'Schedules not loaded yet' });
    }

    const match = findTrainSchedule(schedules, trainNo, getServiceDayBucket(new Date()));
    if (!match) {
      return res.status(404).json({ error: `No schedule for train ${trainNo}` });
    }

    const vehicle = context.poller.snapshot().find(v => v.trainNo === trainNo) ?? null;
    return res.json({
      trainNo,
      line: match.line,
      day: match.day,
      direction: match.direction,
      stops: match.schedule.stops,
      remainingStops: remainingStops(match.schedule, vehicle ? vehicle.currentStop : null),
      vehicle,
    });
  });

  app.get('/api/next-to-arrive', async (req, res) => {
    const start = queryString(req.query.start);
    const end = queryString(req.query.end);
    if (!start || !end) {
      return res.status(400).json({ error: 'Missing start or end station' });
    }

    const rawCount = queryString(req.query.n);
    const n = rawCount === null ? context.config.boardArrivalCount : Number(rawCount);
    if (!Number.isInteger(n) || n < 1) {
      return res.status(400).json({ error: 'Invalid result count' });
    }

    try {
      const arrivals = await context.nextArrivals.fetch(start, end, n);
      return res.json({ arrivals });
    } catch (error: unknown) {
      if (isFeedError(error)) {
        console.error(`❌ [NEXT-TO-ARRIVE] ${start} -> ${end}: ${describeError(error)}`);
        return res.json({ arrivals: [], error: error.kind });
      }
      console.error('Error fetching next-to-arrive:', describeError(error));
      return res.status(500).json({ error: 'Failed to fetch next-to-arrive' });
    }
  });

  // Departures board: predictions correlated with live vehicles
  app.get('/api/board', async (req, res) => {
    const start = queryString(req.query.start);
    const end = queryString(req.query.end);
    if (!start || !end) {
      return res.status(400).json({ error: 'Missing start or end station' });
    }
    try {
      return res.json(await context.board.build(start, end));
    } catch (error: unknown) {
      console.error('Error building board:', describeError(error));
      return res.status(500).json({ error: 'Failed to build board' });
    }
  });

  app.get('/api/favorites', (_req, res) => {
    res.json({ favorites: context.favorites.list() });
  });

  app.post('/api/favorites', (req, res) => {
    const pair = readPair(req.body);
    if (!pair) {
      return res.status(400).json({ error: 'Body must be { start, end }' });
    }
    const added = context.favorites.add(pair);
    return res.status(added ? 201 : 200).json({ added, favorites: context.favorites.list() });
  });

  app.delete('/api/favorites', (req, res) => {
    const pair = readPair(req.body);
    if (!pair) {
      return res.status(400).json({ error: 'Body must be { start, end }' });
    }
    const removed = context.favorites.remove(pair);
    return res.json({ removed, favorites: context.favorites.list() });
  });

  app.get('/api/favorites/arrivals', (_req, res) => {
    const vehicles = context.poller.snapshot();
    const boards = context.favoritesManager.snapshot()
      .map(({ pair, arrivals }) => buildBoard(pair.start, pair.end, vehicles, arrivals));
    res.json({ favorites: boards });
  });

  app.get('/api/reference/:kind', (req, res) => {
    const { kind } = req.params;
    if (!isReferenceKind(kind)) {
      return res.status(404).json({ error: `Unknown reference dataset "${kind}"` });
    }
    return res.json({ kind, data: context.reference.current(kind) });
  });

  app.post('/api/reference/:kind/refresh', async (req, res) => {
    const { kind } = req.params;
    if (!isReferenceKind(kind)) {
      return res.status(404).json({ error: `Unknown reference dataset "${kind}"` });
    }
    const fresh = await context.reference.refresh(kind);
    return res.json({ kind, refreshed: fresh !== null, data: context.reference.current(kind) });
  });
}
