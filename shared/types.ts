export type DayBucket = 'mon-fri' | 'sat' | 'sun';

export type Direction = 'inbound' | 'outbound';

export interface Vehicle {
  trainNo: string;
  lat: number;
  lon: number;
  line: string | null;
  dest: string | null;
  currentStop: string | null;
  nextStop: string | null;
  service: string | null;
  consist: string | null;
  track: string | null;
  trackChange: string | null;
  lateMinutes: number | null; // 0 = on time
}

interface ArrivalLeg {
  origTrain: string;
  origLine: string;
  origDepartureTime: string;
  origArrivalTime: string;
  origDelayMinutes: number | null;
}

export interface DirectArrival extends ArrivalLeg {
  isDirect: true;
}

export interface ConnectingArrival extends ArrivalLeg {
  isDirect: false;
  connectionStation: string;
  termTrain: string;
  termLine: string;
  termDepartureTime: string;
  termArrivalTime: string;
  termDelayMinutes: number | null;
}

export type NextArrival = DirectArrival | ConnectingArrival;

export interface StationPair {
  start: string;
  end: string;
}

export interface ScheduledStop {
  stop: string;
  time: string;
}

export interface TrainSchedule {
  trainNo: string;
  stops: ScheduledStop[]; // route order, never re-sorted
}

export type ScheduleData = Record<string, Partial<Record<DayBucket, Partial<Record<Direction, TrainSchedule[]>>>>>;

export interface Advisory {
  title: string;
  datesAffected: string;
  description: string;
}

export interface AdvisoryFeed {
  current: string[] | null;
  advisory: Advisory[];
}

export interface RouteShape {
  routeId: string | null;
  name: string | null;
  color: string | null;
  lines: Array<Array<[number, number]>>; // [lon, lat]
}

export type RollingStockClass = 'heritage' | 'push-pull' | 'silverliner-v' | 'silverliner-iv' | 'unknown';

export interface ReferenceDataMap {
  stops: string[];
  schedules: ScheduleData;
  advisories: AdvisoryFeed;
  routeShapes: RouteShape[];
}

export type ReferenceKind = keyof ReferenceDataMap;
