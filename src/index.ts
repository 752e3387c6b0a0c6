import 'dotenv/config';
import type { Server } from 'node:http';
import { createServer } from './api/server';
import { loadConfig, type AppConfig } from './config';
import type { DisplayDevice } from './display/DisplayDevice';
import { LocalApiBoard } from './display/LocalApiBoard';
import { LogBoard } from './display/LogBoard';
import { DetectionLoop } from './services/DetectionLoop';
import { MetadataCache } from './services/MetadataCache';
import { RetryingFetcher } from './services/RetryingFetcher';
import { TimerScheduler } from './services/Scheduler';
import { SeenAircraftTracker } from './services/SeenAircraftTracker';
import { StatsCollector } from './services/StatsCollector';
import { AeroDataBoxMetadataSource } from './sources/AeroDataBoxMetadataSource';
import { FallbackMetadataSource } from './sources/FallbackMetadataSource';
import { HexDbMetadataSource } from './sources/HexDbMetadataSource';
import { OpenSkyAuthService } from './sources/OpenSkyAuthService';
import { OpenSkyMetadataSource } from './sources/OpenSkyMetadataSource';
import { OpenSkyStateSource } from './sources/OpenSkyStateSource';
import type { AircraftMetadata, AircraftState, BoundingBox } from './types/Aircraft';
import { ConfigError } from './utils/errors';
import { logger } from './utils/logger';

function loadConfigOrExit(): Readonly<AppConfig> {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ error: error.message }, '❌ Invalid configuration');
      process.exit(1);
    }
    throw error;
  }
}

// Top-level code execution
const config = loadConfigOrExit();

logger.info('🚀 Starting overhead flight notifier...');
logger.info(
  {
    center: config.fence.center,
    radiusKm: config.fence.radiusKm,
    checkIntervalMs: config.checkIntervalMs,
    maxRetries: config.retry.maxRetries,
    retryDelayMs: config.retry.retryDelayMs,
  },
  '📍 Watching geofence'
);

const scheduler = new TimerScheduler();

// Upstreams
const auth = new OpenSkyAuthService({
  clientId: config.opensky.clientId,
  clientSecret: config.opensky.clientSecret,
  authUrl: config.opensky.authUrl,
  timeoutMs: config.requestTimeoutMs,
});
if (!auth.hasCredentials()) {
  logger.warn('⚠️  No OpenSky credentials configured, using anonymous access (lower rate limits)');
}

const stateSource = new OpenSkyStateSource(auth, { baseUrl: config.opensky.apiUrl, timeoutMs: config.requestTimeoutMs });
const hexdb = new HexDbMetadataSource({ baseUrl: config.hexdbApiUrl, timeoutMs: config.requestTimeoutMs });
const openskyMetadata = new OpenSkyMetadataSource(auth, {
  baseUrl: config.opensky.apiUrl,
  timeoutMs: config.requestTimeoutMs,
});
const aerodatabox = config.aerodatabox
  ? new AeroDataBoxMetadataSource({
      apiKey: config.aerodatabox.apiKey,
      apiHost: config.aerodatabox.apiHost,
      baseUrl: config.aerodatabox.apiUrl,
      timeoutMs: config.requestTimeoutMs,
    })
  : null;
if (!aerodatabox) {
  logger.info('ℹ️  No AeroDataBox key configured, enriching from hexdb and OpenSky only');
}

const metadataSources = aerodatabox ? [aerodatabox, hexdb, openskyMetadata] : [hexdb, openskyMetadata];
const metadataSource = new FallbackMetadataSource(metadataSources);

const fetcherOptions = { ...config.retry, requestTimeoutMs: config.requestTimeoutMs, scheduler };
const positionFetcher = new RetryingFetcher<BoundingBox, AircraftState[]>(
  (box, signal) => stateSource.fetchStates(box, signal),
  { ...fetcherOptions, name: stateSource.getName() }
);
const metadataFetcher = new RetryingFetcher<string, AircraftMetadata>(
  (id, signal) => metadataSource.fetchMetadata(id, signal),
  { ...fetcherOptions, name: metadataSource.getName() }
);

// Display
let display: DisplayDevice;
if (config.board) {
  display = new LocalApiBoard({ baseUrl: config.board.url, apiKey: config.board.apiKey, timeoutMs: config.requestTimeoutMs });
  if (await display.testConnection()) {
    logger.info('✅ Display board connected');
  } else {
    logger.warn('⚠️  Display board not reachable, notifications will fail until it is');
  }
} else {
  logger.info('📺 No display board configured, notifications go to the log');
  display = new LogBoard();
}

// Detection
const cache = new MetadataCache({ defaultTtlMs: config.metadataTtlMs });
const tracker = new SeenAircraftTracker({ rearmAfterMs: config.rearmAfterMs });
const stats = new StatsCollector({ summaryEveryTicks: config.summaryEveryTicks });

const loop = new DetectionLoop({
  fence: config.fence,
  positionFetcher,
  metadataFetcher,
  cache,
  tracker,
  stats,
  display,
  scheduler,
  intervalMs: config.checkIntervalMs,
  metadataTtlMs: config.metadataTtlMs,
  notFoundTtlMs: config.metadataNotFoundTtlMs,
});

// Status API
let server: Server | null = null;
if (config.statusPort !== null) {
  const app = createServer({ loop, stats, cache, tracker, display, sources: [stateSource, ...metadataSources] });
  server = app.listen(config.statusPort, () => {
    logger.info({ port: config.statusPort }, `✅ Status API running on http://localhost:${config.statusPort}`);
    logger.info('📊 API endpoints:');
    logger.info('   GET  /health           - Health check');
    logger.info('   GET  /api/stats        - Run statistics');
    logger.info('   GET  /api/cache/stats  - Metadata cache statistics');
    logger.info('   GET  /api/seen         - Aircraft notified so far');
    logger.info('   GET  /api/sources      - Upstream source statistics');
    logger.info('   GET  /api/status       - Loop phase, fence and display');
  });
}

loop.start();

// Graceful shutdown
const shutdown = async (signal: string) => {
  logger.info({ signal }, '🛑 Shutting down gracefully...');
  await loop.stop();
  cache.close();

  if (server) {
    await new Promise<void>((resolve, reject) => {
      server?.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('✅ Status API closed');
  }
  process.exit(0);
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error }, '❌ Error during shutdown');
      process.exit(1);
    });
  });
}
