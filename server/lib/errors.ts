export type FeedErrorKind = 'InvalidURL' | 'NoData' | 'DecodingError' | 'RequestFailed';

/**
 * Typed failure of a feed request. Every component that issues a fetch
 * catches these, logs them and falls back to its empty/previous value.
 */
export class FeedError extends Error {
  constructor(
    public readonly kind: FeedErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FeedError';
  }
}

export function isFeedError(error: unknown): error is FeedError {
  return error instanceof FeedError;
}

export function describeError(error: unknown): string {
  if (isFeedError(error)) return `${error.kind}: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
