import { setTimeout as delay } from 'timers/promises';
import { FeedError } from '@fleet-trips/adapters';
import type { ClockPort, FeedSourcePort, FleetTracker, SnapshotResult, Trip } from '@fleet-trips/domain';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface PollSchedulerOptions {
  cityName: string;
  clock: ClockPort;
  /** Wait after a failed poll */
  retryDelayMs: number;
  /** Extra wait past `last_updated + ttl` to absorb publish delays and clock skew */
  graceMs: number;
  sleep?: Sleep;
}

export type PollOutcome =
  | { readonly kind: 'polled'; readonly result: SnapshotResult }
  | { readonly kind: 'failed'; readonly error: unknown };

/** Resolves after `ms`, or early and quietly once `signal` aborts. */
export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
};

function describeTrip(trip: Trip): string {
  return `bike ${trip.vehicleId} ${trip.startStation.name} → ${trip.endStation.name} (${trip.durationSeconds}s)`;
}

/**
 * Drives the tracker from the feed: fetch, reconcile, then sleep until the
 * feed's advertised refresh. Polls never overlap; a failed poll leaves the
 * tracker untouched and is retried after `retryDelayMs`.
 */
export class PollScheduler {
  private readonly controller = new AbortController();
  private readonly sleep: Sleep;

  constructor(
    private readonly source: FeedSourcePort,
    private readonly tracker: FleetTracker,
    private readonly options: PollSchedulerOptions,
  ) {
    this.sleep = options.sleep ?? abortableSleep;
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  async run(): Promise<void> {
    const { signal } = this.controller;
    while (!signal.aborted) {
      const outcome = await this.pollOnce();
      if (signal.aborted) break;
      await this.sleep(this.nextDelayMs(outcome), signal);
    }
    console.log('[poller] stopped');
  }

  /** Ends `run()` after the in-flight poll, if any, completes. */
  stop(): void {
    this.controller.abort();
  }

  async pollOnce(): Promise<PollOutcome> {
    let result: SnapshotResult;
    try {
      const snapshot = await this.source.fetchSnapshot();
      result = this.tracker.applySnapshot(snapshot);
    } catch (err) {
      if (err instanceof FeedError) {
        console.warn(`[poller] ${err.message}, retrying in ${this.options.retryDelayMs} ms`);
      } else {
        console.error('[poller] unexpected poll error', err);
      }
      return { kind: 'failed', error: err };
    }

    if (result.status === 'skipped') {
      if (result.reason === 'stale') {
        console.warn(`[poller] ignoring stale feed (last_updated=${result.lastUpdated})`);
      }
      return { kind: 'polled', result };
    }

    for (const trip of result.trips) {
      console.log(`[poller] new trip: ${describeTrip(trip)}`);
    }
    const now = new Date(this.options.clock.nowMs()).toISOString();
    console.log(
      `[poller] ${this.options.cityName} updated at ${now}: ${result.trips.length} new trips, ` +
        `${this.tracker.fleet.size} bikes tracked, ${this.tracker.trips.size} trips total`,
    );
    return { kind: 'polled', result };
  }

  /** Time until the feed is expected to refresh, plus grace; the retry delay when that is unknown. */
  nextDelayMs(outcome: PollOutcome): number {
    const { lastUpdated, ttl } = this.tracker.getSummary();
    if (outcome.kind === 'failed' || lastUpdated === null || ttl === null) {
      return this.options.retryDelayMs;
    }
    const refreshAtMs = (lastUpdated + ttl) * 1000;
    return Math.max(0, refreshAtMs - this.options.clock.nowMs()) + this.options.graceMs;
  }
}
