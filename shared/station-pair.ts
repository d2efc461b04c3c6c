import { PLACEHOLDER_STATION } from './constants';
import type { StationPair } from './types';

export function pairKey(pair: StationPair): string {
  return `${pair.start}-${pair.end}`;
}

export function samePair(a: StationPair, b: StationPair): boolean {
  return a.start === b.start && a.end === b.end;
}

/**
 * A pair is worth querying only once both ends are chosen and differ.
 */
export function isQueryablePair(start: string, end: string): boolean {
  return start !== end && start !== PLACEHOLDER_STATION && end !== PLACEHOLDER_STATION;
}
