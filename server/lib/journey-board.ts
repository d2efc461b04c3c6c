import type { NextArrival, RollingStockClass, Vehicle } from '@shared/types';
import { classifyConsist, ROLLING_STOCK_COLORS } from '@shared/rolling-stock';
import { matchVehiclesToArrivals, unmatchedArrivals } from './correlator.js';
import { describeError } from './errors.js';
import type { NextArrivalSource } from './next-arrival-client.js';
import { adjustLegTime } from './time-adjuster.js';

export interface VehicleSnapshotSource {
  snapshot(): readonly Vehicle[];
}

export interface TrackedArrival {
  vehicle: Vehicle;
  arrival: NextArrival;
  adjustedDeparture: string;
  adjustedArrival: string;
  rollingStock: RollingStockClass;
  rollingStockColor: string;
}

export interface PredictedArrival {
  arrival: NextArrival;
  adjustedDeparture: string;
  adjustedArrival: string;
}

export interface JourneyBoardView {
  start: string;
  end: string;
  tracked: TrackedArrival[];
  predictionOnly: PredictedArrival[];
}

function predicted(arrival: NextArrival): PredictedArrival {
  return {
    arrival,
    adjustedDeparture: adjustLegTime(arrival.origDepartureTime, arrival.origDelayMinutes),
    adjustedArrival: arrival.isDirect
      ? adjustLegTime(arrival.origArrivalTime, arrival.origDelayMinutes)
      : adjustLegTime(arrival.termArrivalTime, arrival.termDelayMinutes),
  };
}

/**
 * Builds the departures board for one origin/destination: upcoming trips
 * with a live vehicle first-class, the rest as prediction-only rows.
 */
export function buildBoard(
  start: string,
  end: string,
  vehicles: readonly Vehicle[],
  arrivals: readonly NextArrival[],
): JourneyBoardView {
  const tracked = matchVehiclesToArrivals(vehicles, arrivals).map(({ vehicle, arrival }) => {
    const rollingStock = classifyConsist(vehicle.consist);
    return {
      vehicle,
      ...predicted(arrival),
      rollingStock,
      rollingStockColor: ROLLING_STOCK_COLORS[rollingStock],
    };
  });

  return {
    start,
    end,
    tracked,
    predictionOnly: unmatchedArrivals(vehicles, arrivals).map(predicted),
  };
}

export class JourneyBoard {
  constructor(
    private readonly source: NextArrivalSource,
    private readonly vehicles: VehicleSnapshotSource,
    private readonly arrivalCount: number,
  ) {}

  async build(start: string, end: string): Promise<JourneyBoardView> {
    let arrivals: NextArrival[] = [];
    try {
      arrivals = await this.source.fetch(start, end, this.arrivalCount);
    } catch (error: unknown) {
      console.error(`❌ [BOARD] ${start} -> ${end}: ${describeError(error)}`);
    }
    return buildBoard(start, end, this.vehicles.snapshot(), arrivals);
  }
}
