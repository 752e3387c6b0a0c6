import type { GeoFence } from './types/Aircraft';
import { MetadataCache } from './services/MetadataCache';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './services/RetryPolicy';
import { DEFAULT_OPENSKY_API_URL } from './sources/OpenSkyStateSource';
import { DEFAULT_OPENSKY_AUTH_URL } from './sources/OpenSkyAuthService';
import { DEFAULT_HEXDB_API_URL } from './sources/HexDbMetadataSource';
import { DEFAULT_AERODATABOX_API_HOST, DEFAULT_AERODATABOX_API_URL } from './sources/AeroDataBoxMetadataSource';
import { ConfigError, InvalidInputError } from './utils/errors';
import { validateFence } from './utils/geo';

/**
 * Typed configuration read from the environment (.env is loaded by the entry point)
 */

// =============================================================================
// Types
// =============================================================================

export interface AppConfig {
  fence: GeoFence;
  checkIntervalMs: number;
  retry: RetryPolicy;
  requestTimeoutMs: number;
  metadataTtlMs: number;
  metadataNotFoundTtlMs: number;
  summaryEveryTicks: number;
  rearmAfterMs: number | null;
  opensky: {
    apiUrl: string;
    authUrl: string;
    clientId?: string;
    clientSecret?: string;
  };
  hexdbApiUrl: string;
  aerodatabox: { apiKey: string; apiHost: string; apiUrl: string } | null;
  board: { url: string; apiKey: string } | null;
  statusPort: number | null;
}

type Env = Record<string, string | undefined>;

// =============================================================================
// Loading
// =============================================================================

export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const fence: GeoFence = {
    center: {
      latitude: readNumber(env, 'FENCE_LAT', 51.5995),
      longitude: readNumber(env, 'FENCE_LON', -0.5545),
    },
    radiusKm: readNumber(env, 'FENCE_RADIUS_KM', 5),
  };

  try {
    validateFence(fence);
  } catch (error) {
    if (error instanceof InvalidInputError) {
      throw new ConfigError(`Invalid geofence: ${error.message}`, { cause: error });
    }
    throw error;
  }

  const boardUrl = readString(env, 'BOARD_URL');
  const boardApiKey = readString(env, 'BOARD_API_KEY');
  if (Boolean(boardUrl) !== Boolean(boardApiKey)) {
    throw new ConfigError('BOARD_URL and BOARD_API_KEY must be set together');
  }

  const aerodataboxKey = readString(env, 'AERODATABOX_API_KEY');

  const rearmAfterMs = readOptionalNumber(env, 'REARM_AFTER_MS');
  const statusPort = readOptionalNumber(env, 'STATUS_PORT');

  return Object.freeze({
    fence,
    checkIntervalMs: readNumber(env, 'CHECK_INTERVAL_MS', 1000, { min: 0 }),
    retry: {
      maxRetries: readInteger(env, 'MAX_RETRIES', DEFAULT_RETRY_POLICY.maxRetries, { min: 1 }),
      retryDelayMs: readNumber(env, 'RETRY_DELAY_MS', DEFAULT_RETRY_POLICY.retryDelayMs, { min: 0 }),
      backoffFactor: readNumber(env, 'RETRY_BACKOFF_FACTOR', DEFAULT_RETRY_POLICY.backoffFactor, { min: 1 }),
      maxDelayMs: readNumber(env, 'RETRY_MAX_DELAY_MS', DEFAULT_RETRY_POLICY.maxDelayMs, { min: 0 }),
    },
    requestTimeoutMs: readNumber(env, 'REQUEST_TIMEOUT_MS', 10_000, { min: 1 }),
    metadataTtlMs: readNumber(env, 'METADATA_TTL_MS', MetadataCache.DEFAULT_TTL_MS, { min: 1 }),
    metadataNotFoundTtlMs: readNumber(env, 'METADATA_NOT_FOUND_TTL_MS', 60 * 60 * 1000, { min: 1 }),
    summaryEveryTicks: readInteger(env, 'SUMMARY_EVERY_TICKS', 100, { min: 1 }),
    rearmAfterMs: rearmAfterMs === null ? null : positive('REARM_AFTER_MS', rearmAfterMs),
    opensky: {
      apiUrl: readString(env, 'OPENSKY_API_URL') ?? DEFAULT_OPENSKY_API_URL,
      authUrl: readString(env, 'OPENSKY_AUTH_URL') ?? DEFAULT_OPENSKY_AUTH_URL,
      clientId: readString(env, 'OPENSKY_CLIENT_ID'),
      clientSecret: readString(env, 'OPENSKY_CLIENT_SECRET'),
    },
    hexdbApiUrl: readString(env, 'HEXDB_API_URL') ?? DEFAULT_HEXDB_API_URL,
    aerodatabox: aerodataboxKey
      ? {
          apiKey: aerodataboxKey,
          apiHost: readString(env, 'AERODATABOX_API_HOST') ?? DEFAULT_AERODATABOX_API_HOST,
          apiUrl: readString(env, 'AERODATABOX_API_URL') ?? DEFAULT_AERODATABOX_API_URL,
        }
      : null,
    board: boardUrl && boardApiKey ? { url: boardUrl, apiKey: boardApiKey } : null,
    statusPort: statusPort === null ? null : port('STATUS_PORT', statusPort),
  });
}

// =============================================================================
// Helpers
// =============================================================================

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readOptionalNumber(env: Env, name: string): number | null {
  const raw = readString(env, name);
  if (raw === undefined) {
    return null;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readNumber(env: Env, name: string, fallback: number, bounds: { min?: number } = {}): number {
  const value = readOptionalNumber(env, name) ?? fallback;
  if (bounds.min !== undefined && value < bounds.min) {
    throw new ConfigError(`${name} must be at least ${bounds.min}, got ${value}`);
  }
  return value;
}

function readInteger(env: Env, name: string, fallback: number, bounds: { min?: number } = {}): number {
  const value = readNumber(env, name, fallback, bounds);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got ${value}`);
  }
  return value;
}

function positive(name: string, value: number): number {
  if (value <= 0) {
    throw new ConfigError(`${name} must be greater than zero, got ${value}`);
  }
  return value;
}

function port(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 65535) {
    throw new ConfigError(`${name} must be a port number, got ${value}`);
  }
  return value;
}
