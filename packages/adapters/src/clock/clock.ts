import type { ClockPort } from '@fleet-trips/domain';

/** Wall clock for live polling. */
export const systemClock: ClockPort = {
  nowMs: () => Date.now(),
};

/**
 * Clock that only moves when told to. Lets the poll scheduler be driven
 * deterministically in tests.
 */
export class ManualClock implements ClockPort {
  constructor(private currentMs: number) {}

  nowMs(): number {
    return this.currentMs;
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }

  set(ms: number): void {
    this.currentMs = ms;
  }
}
