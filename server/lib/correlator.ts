import type { NextArrival, Vehicle } from '@shared/types';

export interface CorrelatedTrain {
  vehicle: Vehicle;
  arrival: NextArrival;
}

/**
 * Pair each predicted arrival with the live vehicle running it, keyed on the
 * origin train number. Output follows the order of `arrivals`; an arrival
 * whose train number was already paired is skipped, and if the feed reports
 * the same train number twice the first vehicle wins. Arrivals without a live
 * vehicle are left out (see unmatchedArrivals).
 */
export function matchVehiclesToArrivals(
  vehicles: readonly Vehicle[],
  arrivals: readonly NextArrival[],
): CorrelatedTrain[] {
  const consumed = new Set<string>();
  const matches: CorrelatedTrain[] = [];

  for (const arrival of arrivals) {
    if (consumed.has(arrival.origTrain)) continue;

    const vehicle = vehicles.find(v => v.trainNo === arrival.origTrain);
    if (vehicle) {
      matches.push({ vehicle, arrival });
      consumed.add(arrival.origTrain);
    }
  }

  return matches;
}

/**
 * Arrivals with no live vehicle, in their original order. Shown as
 * prediction-only entries.
 */
export function unmatchedArrivals(
  vehicles: readonly Vehicle[],
  arrivals: readonly NextArrival[],
): NextArrival[] {
  const live = new Set(vehicles.map(v => v.trainNo));
  return arrivals.filter(arrival => !live.has(arrival.origTrain));
}
