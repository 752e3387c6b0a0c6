import type { AircraftState, BoundingBox, PositionSource } from '../types/Aircraft';
import { UpstreamSource } from '../services/UpstreamSource';
import { normalizeAircraftId } from '../utils/aircraftId';
import type { OpenSkyAuthService } from './OpenSkyAuthService';

/**
 * Live state vectors from the OpenSky Network
 * https://openskynetwork.github.io/opensky-api/rest.html#all-state-vectors
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Positional row: [icao24, callsign, origin_country, time_position,
 * last_contact, longitude, latitude, baro_altitude, on_ground, velocity,
 * true_track, vertical_rate, sensors, geo_altitude, squawk, spi, position_source]
 */
type StateVectorRow = readonly unknown[];

interface StatesResponse {
  time?: number;
  states?: StateVectorRow[] | null;
}

export const DEFAULT_OPENSKY_API_URL = 'https://opensky-network.org/api';

const FEET_PER_METER = 3.28084;
const KNOTS_PER_MPS = 1.94384;
const FPM_PER_MPS = 196.85;

// =============================================================================
// OpenSky State Source
// =============================================================================

export class OpenSkyStateSource extends UpstreamSource implements PositionSource {
  constructor(
    private readonly auth: OpenSkyAuthService,
    options: { baseUrl?: string; timeoutMs?: number } = {}
  ) {
    super({ name: 'opensky-states', baseUrl: options.baseUrl ?? DEFAULT_OPENSKY_API_URL, timeoutMs: options.timeoutMs });
  }

  async fetchStates(box: BoundingBox, signal?: AbortSignal): Promise<AircraftState[]> {
    const response = await this.auth.withAuthorization((headers) =>
      this.get<StatesResponse>('states/all', {
        params: { lamin: box.minLat, lomin: box.minLon, lamax: box.maxLat, lomax: box.maxLon },
        headers,
        signal,
      })
    );

    const rows = response?.states ?? [];
    const states = rows.map(parseStateVector).filter((state): state is AircraftState => state !== null);

    this.logger.debug({ received: rows.length, usable: states.length }, 'State vectors fetched');
    return states;
  }
}

/**
 * Translate one positional row; null when it has no id or no position
 */
export function parseStateVector(row: StateVectorRow): AircraftState | null {
  const id = asString(row[0]);
  const longitude = asNumber(row[5]);
  const latitude = asNumber(row[6]);

  if (!id || longitude === null || latitude === null) {
    return null;
  }

  const altitudeMeters = asNumber(row[7]) ?? asNumber(row[13]);
  const velocity = asNumber(row[9]);
  const verticalRate = asNumber(row[11]);
  const observedSeconds = asNumber(row[3]) ?? asNumber(row[4]);

  return {
    id: normalizeAircraftId(id),
    position: { latitude, longitude },
    altitude: altitudeMeters === null ? null : altitudeMeters * FEET_PER_METER,
    groundSpeed: velocity === null ? null : velocity * KNOTS_PER_MPS,
    heading: asNumber(row[10]),
    verticalRate: verticalRate === null ? null : verticalRate * FPM_PER_MPS,
    onGround: row[8] === true,
    callsign: asString(row[1])?.trim() || null,
    squawk: asString(row[14]),
    originCountry: asString(row[2]),
    timestampObservedUtc: observedSeconds === null ? new Date() : new Date(observedSeconds * 1000),
  };
}

function asNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function asString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}
