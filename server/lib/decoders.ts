import type {
  Advisory,
  AdvisoryFeed,
  NextArrival,
  RouteShape,
  ScheduleData,
  ScheduledStop,
  TrainSchedule,
  Vehicle,
} from '@shared/types';
import { DAY_BUCKETS, DIRECTIONS } from '@shared/constants';
import { FeedError } from './errors.js';
import { parseDelayMinutes } from './time-adjuster.js';

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON body. An empty body is NoData, anything unparsable is a
 * DecodingError.
 */
export function parseJsonBody(body: string, source: string): unknown {
  if (body.trim().length === 0) {
    throw new FeedError('NoData', `${source} returned an empty body`);
  }
  try {
    return JSON.parse(body);
  } catch (error: unknown) {
    throw new FeedError('DecodingError', `${source} returned malformed JSON`, { cause: error });
  }
}

function expectArray(value: unknown, source: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new FeedError('DecodingError', `${source}: expected a JSON array`);
  }
  return value;
}

function expectRecord(value: unknown, source: string): JsonRecord {
  if (!isRecord(value)) {
    throw new FeedError('DecodingError', `${source}: expected a JSON object`);
  }
  return value;
}

// Upstream feeds mix strings and numbers for the same field
function optionalString(record: JsonRecord, key: string): string | null {
  const value = record[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function parseCoordinate(value: unknown): number {
  const parsed = typeof value === 'number' ? value : parseFloat(String(value ?? ''));
  return Number.isFinite(parsed) ? parsed : 0;
}

function optionalInteger(value: unknown): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return parseInt(value, 10);
  return null;
}

// ---------------------------------------------------------------------------
// Live vehicles
// ---------------------------------------------------------------------------

export function decodeVehicle(raw: unknown): Vehicle | null {
  if (!isRecord(raw)) return null;
  const trainNo = optionalString(raw, 'trainno');
  if (!trainNo) return null;

  return {
    trainNo,
    lat: parseCoordinate(raw.lat),
    lon: parseCoordinate(raw.lon),
    line: optionalString(raw, 'line'),
    dest: optionalString(raw, 'dest'),
    currentStop: optionalString(raw, 'currentstop'),
    nextStop: optionalString(raw, 'nextstop'),
    service: optionalString(raw, 'service'),
    consist: optionalString(raw, 'consist'),
    track: optionalString(raw, 'TRACK'),
    trackChange: optionalString(raw, 'TRACK_CHANGE'),
    lateMinutes: optionalInteger(raw.late),
  };
}

export function decodeVehicles(body: string): Vehicle[] {
  const records = expectArray(parseJsonBody(body, 'TrainView'), 'TrainView');
  const vehicles: Vehicle[] = [];
  for (const record of records) {
    const vehicle = decodeVehicle(record);
    if (vehicle) {
      vehicles.push(vehicle);
    } else {
      console.warn('⚠️ [DECODE] Skipping vehicle record without a train number');
    }
  }
  return vehicles;
}

// ---------------------------------------------------------------------------
// Next-to-arrive
// ---------------------------------------------------------------------------

/**
 * Decide once whether a record is a direct trip or a trip with a connection.
 * A record flagged as indirect but missing any connection field is kept as a
 * direct trip so display code never has to guard individual fields.
 */
export function decodeNextArrival(raw: unknown): NextArrival | null {
  if (!isRecord(raw)) return null;
  const origTrain = optionalString(raw, 'orig_train');
  if (!origTrain) return null;

  const origin = {
    origTrain,
    origLine: optionalString(raw, 'orig_line') ?? '',
    origDepartureTime: optionalString(raw, 'orig_departure_time') ?? '',
    origArrivalTime: optionalString(raw, 'orig_arrival_time') ?? '',
    origDelayMinutes: parseDelayMinutes(optionalString(raw, 'orig_delay') ?? ''),
  };

  const isDirect = optionalString(raw, 'isdirect')?.trim().toLowerCase() !== 'false';
  if (isDirect) {
    return { ...origin, isDirect: true };
  }

  const connectionStation = optionalString(raw, 'Connection');
  const termTrain = optionalString(raw, 'term_train');
  const termLine = optionalString(raw, 'term_line');
  const termDepartureTime = optionalString(raw, 'term_depart_time');
  const termArrivalTime = optionalString(raw, 'term_arrival_time');
  if (!connectionStation || !termTrain || !termLine || !termDepartureTime || !termArrivalTime) {
    console.warn(`⚠️ [DECODE] Train ${origTrain} is flagged as a connection but has no connecting leg; treating as direct`);
    return { ...origin, isDirect: true };
  }

  return {
    ...origin,
    isDirect: false,
    connectionStation,
    termTrain,
    termLine,
    termDepartureTime,
    termArrivalTime,
    termDelayMinutes: parseDelayMinutes(optionalString(raw, 'term_delay') ?? ''),
  };
}

export function decodeNextArrivals(body: string): NextArrival[] {
  const records = expectArray(parseJsonBody(body, 'NextToArrive'), 'NextToArrive');
  const arrivals: NextArrival[] = [];
  for (const record of records) {
    const arrival = decodeNextArrival(record);
    if (arrival) {
      arrivals.push(arrival);
    } else {
      console.warn('⚠️ [DECODE] Skipping next-to-arrive record without an origin train');
    }
  }
  return arrivals;
}

// ---------------------------------------------------------------------------
// Reference data
// ---------------------------------------------------------------------------

export function decodeStops(body: string): string[] {
  const payload = expectRecord(parseJsonBody(body, 'Stops'), 'Stops');
  const stops = expectArray(payload.stops, 'Stops.stops');
  if (!stops.every((stop): stop is string => typeof stop === 'string')) {
    throw new FeedError('DecodingError', 'Stops.stops: expected a list of names');
  }
  return stops;
}

function decodeScheduledStop(raw: unknown, source: string): ScheduledStop {
  if (Array.isArray(raw) && raw.length === 2 && typeof raw[0] === 'string' && typeof raw[1] === 'string') {
    return { stop: raw[0], time: raw[1] };
  }
  throw new FeedError('DecodingError', `${source}: expected a [stop, time] pair`);
}

function decodeTrainSchedule(raw: unknown, source: string): TrainSchedule {
  const record = expectRecord(raw, source);
  const trainNo = optionalString(record, 'train');
  if (!trainNo) {
    throw new FeedError('DecodingError', `${source}: missing train number`);
  }
  const stops = expectArray(record.stops, `${source}.stops`)
    .map((stop, index) => decodeScheduledStop(stop, `${source}.stops[${index}]`));
  return { trainNo, stops };
}

export function decodeSchedules(body: string): ScheduleData {
  const payload = expectRecord(parseJsonBody(body, 'Schedules'), 'Schedules');
  const schedules: ScheduleData = {};

  for (const [line, rawDays] of Object.entries(payload)) {
    const days = expectRecord(rawDays, `Schedules.${line}`);
    schedules[line] = {};

    for (const day of DAY_BUCKETS) {
      if (days[day] === undefined) continue;
      const directions = expectRecord(days[day], `Schedules.${line}.${day}`);
      const bucket: Partial<Record<'inbound' | 'outbound', TrainSchedule[]>> = {};

      for (const direction of DIRECTIONS) {
        if (directions[direction] === undefined) continue;
        const source = `Schedules.${line}.${day}.${direction}`;
        bucket[direction] = expectArray(directions[direction], source)
          .map((train, index) => decodeTrainSchedule(train, `${source}[${index}]`));
      }
      schedules[line][day] = bucket;
    }
  }

  return schedules;
}

function decodeAdvisory(raw: unknown, index: number): Advisory {
  const record = expectRecord(raw, `Advisories.advisory[${index}]`);
  const title = optionalString(record, 'title');
  if (title === null) {
    throw new FeedError('DecodingError', `Advisories.advisory[${index}]: missing title`);
  }
  return {
    title,
    datesAffected: optionalString(record, 'dates_affected') ?? '',
    description: optionalString(record, 'description') ?? '',
  };
}

export function decodeAdvisories(body: string): AdvisoryFeed {
  const payload = expectRecord(parseJsonBody(body, 'Advisories'), 'Advisories');

  let current: string[] | null = null;
  if (payload.current !== null && payload.current !== undefined) {
    const items = expectArray(payload.current, 'Advisories.current');
    if (!items.every((item): item is string => typeof item === 'string')) {
      throw new FeedError('DecodingError', 'Advisories.current: expected a list of strings');
    }
    current = items;
  }

  const advisory = expectArray(payload.advisory ?? [], 'Advisories.advisory').map(decodeAdvisory);
  return { current, advisory };
}

function isPosition(value: unknown): value is [number, number] {
  return Array.isArray(value)
    && value.length >= 2
    && typeof value[0] === 'number'
    && typeof value[1] === 'number';
}

function toLine(value: unknown): Array<[number, number]> | null {
  if (!Array.isArray(value) || !value.every(isPosition)) return null;
  return value.map(([lon, lat]): [number, number] => [lon, lat]);
}

// MultiLineString coordinates, or a single LineString promoted to one
function decodeLines(coordinates: unknown): Array<Array<[number, number]>> {
  const single = toLine(coordinates);
  if (single) return [single];
  if (!Array.isArray(coordinates)) return [];

  const lines: Array<Array<[number, number]>> = [];
  for (const candidate of coordinates) {
    const line = toLine(candidate);
    if (!line) return [];
    lines.push(line);
  }
  return lines;
}

export function decodeRouteShapes(body: string): RouteShape[] {
  const collection = expectRecord(parseJsonBody(body, 'RouteShapes'), 'RouteShapes');
  const features = expectArray(collection.features, 'RouteShapes.features');
  const shapes: RouteShape[] = [];

  for (const feature of features) {
    if (!isRecord(feature) || !isRecord(feature.geometry)) continue;
    if (feature.geometry.type !== 'MultiLineString') continue;

    const properties = isRecord(feature.properties) ? feature.properties : {};
    shapes.push({
      routeId: optionalString(properties, 'route_id'),
      name: optionalString(properties, 'route_long_name') ?? optionalString(properties, 'route_short_name'),
      color: optionalString(properties, 'route_color'),
      lines: decodeLines(feature.geometry.coordinates),
    });
  }

  return shapes;
}
