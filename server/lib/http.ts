import axios from 'axios';
import { FeedError } from './errors.js';

/**
 * Minimal GET-only transport shared by every feed consumer. Returns the raw
 * response body so each consumer decodes with its own schema.
 */
export interface FeedTransport {
  getText(url: string): Promise<string>;
}

export function createAxiosTransport(timeoutMs: number): FeedTransport {
  const client = axios.create({
    timeout: timeoutMs,
    responseType: 'text',
    // Keep the body as-is; decoding happens in the consumer
    transformResponse: [(data: unknown) => data],
    headers: { Accept: 'application/json' },
  });

  return {
    async getText(url: string): Promise<string> {
      try {
        const response = await client.get<unknown>(url);
        return typeof response.data === 'string' ? response.data : '';
      } catch (error: unknown) {
        if (axios.isAxiosError(error)) {
          const status = error.response ? ` (HTTP ${error.response.status})` : '';
          throw new FeedError('RequestFailed', `GET ${url} failed${status}: ${error.message}`, { cause: error });
        }
        throw error;
      }
    },
  };
}
