import { describe, it, expect } from '@jest/globals';
import { ConfigError, loadConfig } from '../config/env.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});
    expect(config.cityName).toBe('Berlin');
    expect(config.feeds).toEqual({
      discoveryUrl: undefined,
      language: 'en',
      stationInformationUrl: 'https://gbfs.nextbike.net/maps/gbfs/v1/nextbike_bn/de/station_information.json',
      freeBikeStatusUrl: 'https://gbfs.nextbike.net/maps/gbfs/v1/nextbike_bn/de/free_bike_status.json',
      timeoutMs: 10_000,
    });
    expect(config.outputFile).toBe('data.json');
    expect(config.port).toBeUndefined();
    expect(config.databaseUrl).toBeUndefined();
    expect(config.stationMatchRadiusM).toBe(10);
    expect(config.thresholds).toEqual({ minTripDistanceM: 50, minTripDurationS: 100 });
    expect(config.retryDelayMs).toBe(1_000);
    expect(config.pollGraceMs).toBe(1_000);
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({
      PORT: '8080',
      MIN_TRIP_DISTANCE_M: '75',
      MIN_TRIP_DURATION_S: '120',
      STATION_MATCH_RADIUS_M: '15.5',
    });
    expect(config.port).toBe(8080);
    expect(config.thresholds).toEqual({ minTripDistanceM: 75, minTripDurationS: 120 });
    expect(config.stationMatchRadiusM).toBe(15.5);
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ PORT: '', DATABASE_URL: '  ', CITY_NAME: '' });
    expect(config.port).toBeUndefined();
    expect(config.databaseUrl).toBeUndefined();
    expect(config.cityName).toBe('Berlin');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
    const err = (() => {
      try {
        loadConfig({ STATION_MATCH_RADIUS_M: '-1', FREE_BIKE_STATUS_URL: 'not a url' });
        return null;
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(ConfigError);
    expect(err instanceof ConfigError && err.issues.map((i) => i.path[0])).toEqual([
      'FREE_BIKE_STATUS_URL',
      'STATION_MATCH_RADIUS_M',
    ]);
  });
});
