export interface ClockPort {
  /** Wall-clock time in epoch milliseconds */
  nowMs(): number;
}
