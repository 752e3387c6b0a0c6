import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';
import { ConfigError } from '../utils/errors';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      fence: { center: { latitude: 51.5995, longitude: -0.5545 }, radiusKm: 5 },
      checkIntervalMs: 1000,
      retry: { maxRetries: 3, retryDelayMs: 5000, backoffFactor: 1, maxDelayMs: 60000 },
      requestTimeoutMs: 10000,
      metadataTtlMs: 2592000000,
      metadataNotFoundTtlMs: 3600000,
      summaryEveryTicks: 100,
      rearmAfterMs: null,
      opensky: {
        apiUrl: 'https://opensky-network.org/api',
        authUrl: 'https://auth.opensky-network.org/auth/realms/opensky-network/protocol/openid-connect/token',
        clientId: undefined,
        clientSecret: undefined,
      },
      hexdbApiUrl: 'https://hexdb.io/api/v1',
      aerodatabox: null,
      board: null,
      statusPort: null,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      FENCE_LAT: '40.6413',
      FENCE_LON: '-73.7781',
      FENCE_RADIUS_KM: '3.5',
      MAX_RETRIES: '5',
      RETRY_BACKOFF_FACTOR: '2',
      REARM_AFTER_MS: '1800000',
      OPENSKY_CLIENT_ID: 'test-client',
      OPENSKY_CLIENT_SECRET: 'test-secret',
      BOARD_URL: 'http://board.test:7000',
      BOARD_API_KEY: 'test-key',
      STATUS_PORT: '3000',
    });

    expect(config.fence).toEqual({ center: { latitude: 40.6413, longitude: -73.7781 }, radiusKm: 3.5 });
    expect(config.retry).toMatchObject({ maxRetries: 5, backoffFactor: 2 });
    expect(config.rearmAfterMs).toBe(1800000);
    expect(config.opensky).toMatchObject({ clientId: 'test-client', clientSecret: 'test-secret' });
    expect(config.board).toEqual({ url: 'http://board.test:7000', apiKey: 'test-key' });
    expect(config.statusPort).toBe(3000);
  });

  it('should enable AeroDataBox only when a key is set', () => {
    expect(loadConfig({ AERODATABOX_API_KEY: 'test-key' }).aerodatabox).toEqual({
      apiKey: 'test-key',
      apiHost: 'aerodatabox.p.rapidapi.com',
      apiUrl: 'https://aerodatabox.p.rapidapi.com',
    });
    expect(loadConfig({ AERODATABOX_API_HOST: 'custom.test' }).aerodatabox).toBeNull();
  });

  it('should treat blank values as unset', () => {
    expect(loadConfig({ FENCE_RADIUS_KM: '  ', STATUS_PORT: '' })).toMatchObject({
      fence: { radiusKm: 5 },
      statusPort: null,
    });
  });

  it('should reject a non-positive radius', () => {
    expect(() => loadConfig({ FENCE_RADIUS_KM: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ FENCE_RADIUS_KM: '-2' })).toThrow(
      'Invalid geofence: Fence radius must be greater than zero, got -2'
    );
  });

  it('should reject coordinates out of range', () => {
    expect(() => loadConfig({ FENCE_LAT: '91' })).toThrow('Invalid geofence: Latitude out of range: 91');
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ CHECK_INTERVAL_MS: 'soon' })).toThrow('CHECK_INTERVAL_MS must be a number, got "soon"');
    expect(() => loadConfig({ MAX_RETRIES: '2.5' })).toThrow('MAX_RETRIES must be an integer, got 2.5');
    expect(() => loadConfig({ MAX_RETRIES: '0' })).toThrow('MAX_RETRIES must be at least 1, got 0');
    expect(() => loadConfig({ REARM_AFTER_MS: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ STATUS_PORT: '70000' })).toThrow(ConfigError);
  });

  it('should require board URL and key together', () => {
    expect(() => loadConfig({ BOARD_URL: 'http://board.test:7000' })).toThrow(
      'BOARD_URL and BOARD_API_KEY must be set together'
    );
  });
});
