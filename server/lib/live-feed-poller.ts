import type { Vehicle } from '@shared/types';
import { decodeVehicles } from './decoders.js';
import { describeError } from './errors.js';
import type { FeedTransport } from './http.js';
import { Publisher, type Listener } from './publisher.js';

export interface LiveFeedPollerOptions {
  url: string;
  intervalMs: number;
}

export function vehiclesEqual(a: Vehicle, b: Vehicle): boolean {
  return a.trainNo === b.trainNo
    && a.lat === b.lat
    && a.lon === b.lon
    && a.line === b.line
    && a.dest === b.dest
    && a.currentStop === b.currentStop
    && a.nextStop === b.nextStop
    && a.service === b.service
    && a.consist === b.consist
    && a.track === b.track
    && a.trackChange === b.trackChange
    && a.lateMinutes === b.lateMinutes;
}

export function vehicleListsEqual(a: readonly Vehicle[], b: readonly Vehicle[]): boolean {
  return a.length === b.length && a.every((vehicle, index) => vehiclesEqual(vehicle, b[index]));
}

/**
 * Polls the live vehicle feed on a fixed interval and republishes the
 * decoded list. A failed tick is logged and skipped so the previous list
 * stays visible; the next tick is the retry.
 */
export class LiveFeedPoller {
  private vehicles: Vehicle[] = [];
  private updatedAt: Date | null = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly publisher = new Publisher<Vehicle[]>('TRAINVIEW');

  // Bumped on stop(); ticks started under an older generation are dropped
  private generation = 0;
  private issuedTicks = 0;
  private appliedTick = 0;

  constructor(
    private readonly transport: FeedTransport,
    private readonly options: LiveFeedPollerOptions,
  ) {}

  start(): Promise<void> {
    if (this.timer) {
      console.warn('⚠️ [TRAINVIEW] Poller already running');
      return Promise.resolve();
    }

    console.log(`🚆 [TRAINVIEW] Polling vehicle positions every ${Math.round(this.options.intervalMs / 1000)}s`);
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => console.error('❌ [TRAINVIEW] Tick error:', describeError(error)));
    }, this.options.intervalMs);

    return this.tick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.generation++;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  async tick(): Promise<void> {
    const generation = this.generation;
    const tick = ++this.issuedTicks;

    let vehicles: Vehicle[];
    try {
      const body = await this.transport.getText(this.options.url);
      vehicles = decodeVehicles(body);
    } catch (error: unknown) {
      console.error('❌ [TRAINVIEW] Failed to refresh vehicle positions:', describeError(error));
      return;
    }

    if (generation !== this.generation) {
      console.log('⏭️ [TRAINVIEW] Poller stopped; discarding in-flight result');
      return;
    }
    if (tick < this.appliedTick) {
      console.log(`⏭️ [TRAINVIEW] Discarding out-of-order tick #${tick}`);
      return;
    }

    this.appliedTick = tick;
    this.updatedAt = new Date();
    const changed = !vehicleListsEqual(this.vehicles, vehicles);
    this.vehicles = vehicles;

    if (changed) {
      this.publisher.publish([...vehicles]);
    }
  }

  snapshot(): readonly Vehicle[] {
    return this.vehicles;
  }

  lastUpdated(): Date | null {
    return this.updatedAt;
  }

  subscribe(listener: Listener<Vehicle[]>): () => void {
    return this.publisher.subscribe(listener);
  }
}
