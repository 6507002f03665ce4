import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';
import type { FeedSourcePort, FleetSnapshot, Station } from '@fleet-trips/domain';
import { freeBikeStatusSchema, gbfsDiscoverySchema, stationInformationSchema } from './gbfs.schema.js';
import { FeedDecodeError, FeedRequestError } from './feed-errors.js';
import type { FeedName } from './feed-errors.js';

const DEFAULT_TIMEOUT_MS = 10_000;

export interface HttpOptions {
  timeoutMs?: number;
  /** Alternate undici dispatcher, e.g. a MockAgent or a proxy agent */
  dispatcher?: Dispatcher;
}

export interface GbfsFeedClientOptions extends HttpOptions {
  stationInformationUrl: string;
  freeBikeStatusUrl: string;
}

export interface GbfsFeedUrls {
  stationInformationUrl: string;
  freeBikeStatusUrl: string;
}

async function getFeed<T>(
  feed: FeedName,
  url: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  http: HttpOptions,
): Promise<T> {
  const res = await fetch(url, {
    headers: { accept: 'application/json' },
    signal: AbortSignal.timeout(http.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    dispatcher: http.dispatcher,
  }).catch((err: unknown) => {
    throw new FeedRequestError(feed, url, undefined, err);
  });

  if (!res.ok) {
    await res.body?.cancel();
    throw new FeedRequestError(feed, url, res.status);
  }

  const body = await res.json().catch((err: unknown) => {
    throw new FeedDecodeError(feed, 'response body is not valid JSON', [], err);
  });
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'invalid payload';
    throw new FeedDecodeError(feed, where, parsed.error.issues, parsed.error);
  }
  return parsed.data;
}

/**
 * Reads the GBFS auto-discovery document and returns the two feeds the
 * tracker needs. Falls back to the first language block when `language`
 * is not published.
 */
export async function discoverFeeds(
  discoveryUrl: string,
  language = 'en',
  http: HttpOptions = {},
): Promise<GbfsFeedUrls> {
  const doc = await getFeed('gbfs', discoveryUrl, gbfsDiscoverySchema, http);
  const block = doc.data[language] ?? Object.values(doc.data)[0];
  const feeds = block?.feeds ?? [];
  const stationInformationUrl = feeds.find((f) => f.name === 'station_information')?.url;
  const freeBikeStatusUrl = feeds.find((f) => f.name === 'free_bike_status')?.url;
  if (!stationInformationUrl || !freeBikeStatusUrl) {
    throw new FeedDecodeError('gbfs', 'station_information or free_bike_status feed is not listed');
  }
  return { stationInformationUrl, freeBikeStatusUrl };
}

/** HTTP collaborator that decodes GBFS station and free-bike feeds into domain values. */
export class GbfsFeedClient implements FeedSourcePort {
  private readonly http: HttpOptions;

  constructor(private readonly options: GbfsFeedClientOptions) {
    this.http = { timeoutMs: options.timeoutMs, dispatcher: options.dispatcher };
  }

  async loadStations(): Promise<Station[]> {
    const feed = await getFeed('station_information', this.options.stationInformationUrl, stationInformationSchema, this.http);
    return feed.data.stations.map((s) => ({
      id: s.station_id,
      name: s.name,
      lat: s.lat,
      lon: s.lon,
    }));
  }

  async fetchSnapshot(): Promise<FleetSnapshot> {
    const feed = await getFeed('free_bike_status', this.options.freeBikeStatusUrl, freeBikeStatusSchema, this.http);
    return {
      lastUpdated: feed.last_updated,
      ttl: feed.ttl,
      vehicles: feed.data.bikes.map((b) => ({
        id: b.bike_id,
        lat: b.lat,
        lon: b.lon,
        enabled: !b.is_disabled,
      })),
    };
  }
}
