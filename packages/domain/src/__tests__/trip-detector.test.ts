import { describe, it, expect } from '@jest/globals';
import { TripDetector } from '../tracking/trip-detector.js';
import { StationIndex } from '../geo/station-index.js';
import type { TrackedVehicle, VehicleObservation } from '../entities/vehicle-observation.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function makeIndex(): StationIndex {
  const result = StationIndex.build([
    { id: 's1', name: 'Alexanderplatz', lat: 0, lon: 0 },
    { id: 's2', name: 'Hackescher Markt', lat: 0, lon: 0.002 },
  ]);
  if (!result.ok) throw result.error;
  return result.index;
}

function tracked(overrides: Partial<TrackedVehicle> = {}): TrackedVehicle {
  return { id: 'bike-1', lat: 0, lon: 0, lastSeen: 1000, ...overrides };
}

function observation(overrides: Partial<VehicleObservation> = {}): VehicleObservation {
  return { id: 'bike-1', lat: 0, lon: 0, observedAt: 1000, enabled: true, ...overrides };
}

const detector = new TripDetector(makeIndex());

// ─── First sighting ───────────────────────────────────────────────────────────

describe('TripDetector first sighting', () => {
  it('tracks an enabled vehicle', () => {
    const outcome = detector.reconcile(undefined, observation({ lat: 0.5, lon: 0.25, observedAt: 1234 }));
    expect(outcome).toEqual({
      kind: 'tracked',
      vehicle: { id: 'bike-1', lat: 0.5, lon: 0.25, lastSeen: 1234 },
    });
  });

  it('ignores a disabled vehicle', () => {
    expect(detector.reconcile(undefined, observation({ enabled: false }))).toEqual({ kind: 'ignored' });
  });
});

// ─── Known vehicle ────────────────────────────────────────────────────────────

describe('TripDetector known vehicle', () => {
  it('detects a trip when far and long enough apart', () => {
    const outcome = detector.reconcile(tracked(), observation({ lon: 0.002, observedAt: 1200 }));
    expect(outcome.kind).toBe('trip');
    if (outcome.kind !== 'trip') return;
    expect(outcome.trip.vehicleId).toBe('bike-1');
    expect(outcome.trip.startStation.id).toBe('s1');
    expect(outcome.trip.endStation.id).toBe('s2');
    expect(outcome.trip.startedAt).toBe(1000);
    expect(outcome.trip.endedAt).toBe(1200);
    expect(outcome.trip.durationSeconds).toBe(200);
    expect(outcome.vehicle).toEqual({ id: 'bike-1', lat: 0, lon: 0.002, lastSeen: 1200 });
  });

  it('resolves an off-station endpoint to flex parking', () => {
    const outcome = detector.reconcile(tracked(), observation({ lon: 0.0025, observedAt: 1200 }));
    expect(outcome.kind).toBe('trip');
    if (outcome.kind !== 'trip') return;
    expect(outcome.trip.startStation.id).toBe('s1');
    expect(outcome.trip.endStation).toEqual({ id: 0, name: 'Flex parking', lat: 0, lon: 0.0025 });
  });

  it('still records a trip for a tracked vehicle that is now disabled', () => {
    const outcome = detector.reconcile(tracked(), observation({ lon: 0.002, observedAt: 1200, enabled: false }));
    expect(outcome.kind).toBe('trip');
  });

  it('does not count a short hop as a trip, but moves the vehicle', () => {
    // ~33 m after 500 s
    const outcome = detector.reconcile(tracked(), observation({ lon: 0.0003, observedAt: 1500 }));
    expect(outcome).toEqual({
      kind: 'refreshed',
      moved: true,
      vehicle: { id: 'bike-1', lat: 0, lon: 0.0003, lastSeen: 1500 },
    });
  });

  it('does not count a quick relocation as a trip', () => {
    // ~222 m after exactly 100 s
    const outcome = detector.reconcile(tracked(), observation({ lon: 0.002, observedAt: 1100 }));
    expect(outcome).toEqual({
      kind: 'refreshed',
      moved: true,
      vehicle: { id: 'bike-1', lat: 0, lon: 0.002, lastSeen: 1100 },
    });
  });

  it('refreshes only lastSeen for a vehicle that did not move', () => {
    const outcome = detector.reconcile(tracked(), observation({ observedAt: 5000 }));
    expect(outcome).toEqual({
      kind: 'refreshed',
      moved: false,
      vehicle: { id: 'bike-1', lat: 0, lon: 0, lastSeen: 5000 },
    });
  });

  it('applies custom thresholds', () => {
    const strict = new TripDetector(makeIndex(), { minTripDistanceM: 500, minTripDurationS: 10 });
    const outcome = strict.reconcile(tracked(), observation({ lon: 0.002, observedAt: 1200 }));
    expect(outcome.kind).toBe('refreshed');
  });
});
