import { z } from 'zod';
import type { DetectionThresholds } from '@fleet-trips/domain';

const NEXTBIKE_BERLIN = 'https://gbfs.nextbike.net/maps/gbfs/v1/nextbike_bn/de';

const envSchema = z.object({
  CITY_NAME: z.string().min(1).default('Berlin'),
  GBFS_DISCOVERY_URL: z.string().url().optional(),
  GBFS_LANGUAGE: z.string().min(1).default('en'),
  STATION_INFO_URL: z.string().url().default(`${NEXTBIKE_BERLIN}/station_information.json`),
  FREE_BIKE_STATUS_URL: z.string().url().default(`${NEXTBIKE_BERLIN}/free_bike_status.json`),
  OUTPUT_FILE: z.string().min(1).default('data.json'),
  DATABASE_URL: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(1).max(65_535).optional(),
  CORS_ORIGIN: z.string().min(1).default('*'),
  STATION_MATCH_RADIUS_M: z.coerce.number().positive().default(10),
  MIN_TRIP_DISTANCE_M: z.coerce.number().nonnegative().default(50),
  MIN_TRIP_DURATION_S: z.coerce.number().nonnegative().default(100),
  RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  POLL_GRACE_MS: z.coerce.number().int().nonnegative().default(1_000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export interface FeedConfig {
  /** When set, the two feed URLs below are resolved from this gbfs.json instead */
  discoveryUrl?: string;
  language: string;
  stationInformationUrl: string;
  freeBikeStatusUrl: string;
  timeoutMs: number;
}

export interface TrackerConfig {
  cityName: string;
  feeds: FeedConfig;
  outputFile: string;
  databaseUrl?: string;
  port?: number;
  corsOrigin: string;
  stationMatchRadiusM: number;
  thresholds: DetectionThresholds;
  retryDelayMs: number;
  pollGraceMs: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Reads the tracker configuration from environment variables; blank values count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TrackerConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) throw new ConfigError(parsed.error.issues);
  const e = parsed.data;

  return {
    cityName: e.CITY_NAME,
    feeds: {
      discoveryUrl: e.GBFS_DISCOVERY_URL,
      language: e.GBFS_LANGUAGE,
      stationInformationUrl: e.STATION_INFO_URL,
      freeBikeStatusUrl: e.FREE_BIKE_STATUS_URL,
      timeoutMs: e.FETCH_TIMEOUT_MS,
    },
    outputFile: e.OUTPUT_FILE,
    databaseUrl: e.DATABASE_URL,
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    stationMatchRadiusM: e.STATION_MATCH_RADIUS_M,
    thresholds: {
      minTripDistanceM: e.MIN_TRIP_DISTANCE_M,
      minTripDurationS: e.MIN_TRIP_DURATION_S,
    },
    retryDelayMs: e.RETRY_DELAY_MS,
    pollGraceMs: e.POLL_GRACE_MS,
  };
}
