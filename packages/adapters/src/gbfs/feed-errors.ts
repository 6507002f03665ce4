import type { ZodIssue } from 'zod';

export type FeedName = 'gbfs' | 'station_information' | 'free_bike_status';

export class FeedError extends Error {
  constructor(
    readonly feed: FeedName,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FeedError';
  }
}

function requestFailureDetail(status: number | undefined, cause: unknown): string {
  if (status !== undefined) return `HTTP ${status}`;
  return cause instanceof Error ? cause.message : 'request failed';
}

/** Network failure, timeout or non-2xx response */
export class FeedRequestError extends FeedError {
  constructor(
    feed: FeedName,
    readonly url: string,
    readonly status?: number,
    cause?: unknown,
  ) {
    super(feed, `Could not load ${feed} feed from ${url}: ${requestFailureDetail(status, cause)}`, { cause });
    this.name = 'FeedRequestError';
  }
}

/** Body was not JSON or did not match the expected GBFS shape */
export class FeedDecodeError extends FeedError {
  constructor(
    feed: FeedName,
    message: string,
    readonly issues: ZodIssue[] = [],
    cause?: unknown,
  ) {
    super(feed, `Could not decode ${feed} feed: ${message}`, { cause });
    this.name = 'FeedDecodeError';
  }
}
