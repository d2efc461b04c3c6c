import type { DayBucket, Direction, ReferenceKind } from './types';

// Station picker value before the user has chosen anything
export const PLACEHOLDER_STATION = '---';

export const DAY_BUCKETS: DayBucket[] = ['mon-fri', 'sat', 'sun'];

export const DIRECTIONS: Direction[] = ['inbound', 'outbound'];

export const REFERENCE_KINDS: ReferenceKind[] = ['stops', 'schedules', 'advisories', 'routeShapes'];

export const FAVORITES_STORAGE_KEY = 'favoriteStationPairs';

export const SERVICE_TIMEZONE = 'America/New_York';
