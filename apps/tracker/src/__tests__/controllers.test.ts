/**
 * Status API Tests
 *
 * Builds the Express app over a real in-memory tracker and drives it with supertest.
 */

import { describe, it, expect, beforeAll } from '@jest/globals';
import request from 'supertest';
import { buildApp } from '../app.js';
import { bike, makeTracker, snapshot } from './helpers.js';

let app: ReturnType<typeof buildApp>;

beforeAll(() => {
  const tracker = makeTracker();
  tracker.applySnapshot(snapshot(1000, [bike('a', 0, 0)]));
  tracker.applySnapshot(snapshot(1500, [bike('b', 0, 0)]));
  tracker.applySnapshot(snapshot(1700, [bike('b', 0, 0.002)]));
  tracker.applySnapshot(snapshot(2000, [bike('a', 0, 0.002)], 30));
  app = buildApp({ fleet: tracker, cityName: 'Testville' });
});

describe('GET /healthz', () => {
  it('returns status ok', async () => {
    const res = await request(app).get('/healthz').expect(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.ts).toBeDefined();
  });
});

describe('GET /api/fleet', () => {
  it('returns the fleet summary', async () => {
    const res = await request(app).get('/api/fleet').expect(200);
    expect(res.body).toEqual({
      city: 'Testville',
      lastUpdated: 2000,
      ttl: 30,
      trackedVehicles: 2,
      stations: 2,
      trips: 2,
    });
  });
});

describe('GET /api/fleet/vehicles/:vehicleId', () => {
  it('returns the tracked sample', async () => {
    const res = await request(app).get('/api/fleet/vehicles/b').expect(200);
    expect(res.body).toEqual({ id: 'b', lat: 0, lon: 0.002, lastSeen: 1700 });
  });

  it('returns 404 for an unknown bike', async () => {
    const res = await request(app).get('/api/fleet/vehicles/zzz').expect(404);
    expect(res.body.error).toBe('vehicle not found');
  });
});

describe('GET /api/trips', () => {
  it('lists trips by start time by default', async () => {
    const res = await request(app).get('/api/trips').expect(200);
    expect(res.body.total).toBe(2);
    expect(res.body.data.map((t: { started_at: string }) => t.started_at)).toEqual([
      '1970-01-01 00:16:40+00:00',
      '1970-01-01 00:25:00+00:00',
    ]);
    expect(res.body.data[0]).toMatchObject({
      duration: 1000,
      start_station_id: 's1',
      end_station_id: 's2',
      end_station_name: 'Station Two',
    });
  });

  it('supports detection order and paging', async () => {
    const res = await request(app).get('/api/trips?order=detected&limit=1').expect(200);
    expect(res.body.total).toBe(2);
    expect(res.body.data).toHaveLength(1);
    expect(res.body.data[0].duration).toBe(200);
  });

  it('rejects an invalid limit', async () => {
    const res = await request(app).get('/api/trips?limit=0').expect(400);
    expect(res.body.error).toBe('validation_error');
  });

  it('rejects an unknown order', async () => {
    const res = await request(app).get('/api/trips?order=random').expect(400);
    expect(res.body.error).toBe('validation_error');
  });
});
