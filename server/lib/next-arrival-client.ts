import type { NextArrival } from '@shared/types';
import { isQueryablePair } from '@shared/station-pair';
import { decodeNextArrivals } from './decoders.js';
import { FeedError } from './errors.js';
import type { FeedTransport } from './http.js';

export interface NextArrivalSource {
  fetch(start: string, end: string, n: number): Promise<NextArrival[]>;
}

/**
 * Next-to-arrive queries for a station pair. Failures surface as FeedError
 * and are never retried here; callers decide whether a timer retries.
 */
export class NextArrivalClient implements NextArrivalSource {
  constructor(
    private readonly transport: FeedTransport,
    private readonly baseUrl: string,
  ) {}

  buildUrl(start: string, end: string, n: number): string {
    let url: URL;
    try {
      url = new URL(this.baseUrl);
    } catch (error: unknown) {
      throw new FeedError('InvalidURL', `Invalid next-to-arrive URL "${this.baseUrl}"`, { cause: error });
    }
    if (!Number.isInteger(n) || n < 1) {
      throw new FeedError('InvalidURL', `Invalid result count ${n}`);
    }

    // Station names carry spaces and punctuation ("30th Street Station")
    const query = `req1=${encodeURIComponent(start)}&req2=${encodeURIComponent(end)}&req3=${n}`;
    url.search = url.search ? `${url.search}&${query}` : `?${query}`;
    return url.toString();
  }

  async fetch(start: string, end: string, n: number): Promise<NextArrival[]> {
    // Nothing to ask for until two different stations are chosen
    if (!isQueryablePair(start, end)) {
      return [];
    }

    const url = this.buildUrl(start, end, n);
    const body = await this.transport.getText(url);
    return decodeNextArrivals(body);
  }
}
