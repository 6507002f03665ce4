export interface DetectionThresholds {
  /** Displacement a trip must exceed; below it is treated as GPS noise */
  readonly minTripDistanceM: number;
  /** Elapsed time a trip must exceed; filters accidental unlocks and cancellations */
  readonly minTripDurationS: number;
}

export const DEFAULT_DETECTION_THRESHOLDS: DetectionThresholds = {
  minTripDistanceM: 50,
  minTripDurationS: 100,
};
