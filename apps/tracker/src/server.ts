import 'dotenv/config';
import { createServer } from 'http';
import type { Server } from 'http';
import { FleetTracker, StationIndex } from '@fleet-trips/domain';
import type { TripSinkPort } from '@fleet-trips/domain';
import {
  GbfsFeedClient,
  JsonTripFileWriter,
  PgTripRepository,
  closePool,
  discoverFeeds,
  getPool,
  systemClock,
} from '@fleet-trips/adapters';
import { buildApp } from './app.js';
import { loadConfig } from './config/env.js';
import { PollScheduler } from './services/poll-scheduler.js';
import { exportTrips } from './services/trip-export.js';

async function main() {
  const config = loadConfig();
  const { feeds } = config;

  const urls = feeds.discoveryUrl
    ? await discoverFeeds(feeds.discoveryUrl, feeds.language, { timeoutMs: feeds.timeoutMs })
    : { stationInformationUrl: feeds.stationInformationUrl, freeBikeStatusUrl: feeds.freeBikeStatusUrl };
  const source = new GbfsFeedClient({ ...urls, timeoutMs: feeds.timeoutMs });

  // No retry: the tracker cannot run without stations
  const built = StationIndex.build(await source.loadStations(), { matchRadiusM: config.stationMatchRadiusM });
  if (!built.ok) throw built.error;
  console.log(`[server] loaded ${built.index.size} stations for ${config.cityName}`);

  const tracker = new FleetTracker(built.index, config.thresholds);
  const scheduler = new PollScheduler(source, tracker, {
    cityName: config.cityName,
    clock: systemClock,
    retryDelayMs: config.retryDelayMs,
    graceMs: config.pollGraceMs,
  });

  const sinks: TripSinkPort[] = [new JsonTripFileWriter(config.outputFile)];
  if (config.databaseUrl) {
    getPool(config.databaseUrl);
    sinks.push(new PgTripRepository());
  }

  let httpServer: Server | null = null;
  if (config.port !== undefined) {
    const port = config.port;
    httpServer = createServer(buildApp({ fleet: tracker, cityName: config.cityName, corsOrigin: config.corsOrigin }));
    httpServer.listen(port, () => {
      console.log(`[server] status API listening on http://0.0.0.0:${port}`);
    });
  }

  console.log(`[poller] polling ${urls.freeBikeStatusUrl}`);
  const polling = scheduler.run();

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('[server] shutting down...');
    scheduler.stop();
    await polling;
    httpServer?.close();
    const summary = await exportTrips(tracker, sinks);
    if (config.databaseUrl) await closePool();
    process.exit(summary.failedSinks.length > 0 ? 1 : 0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
