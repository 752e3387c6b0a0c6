/**
 * Core types for the detection pipeline
 * Provider agnostic: sources translate their payloads into these shapes
 */

// =============================================================================
// Geography
// =============================================================================

/** WGS84 degrees */
export interface Position {
  latitude: number;
  longitude: number;
}

export interface GeoFence {
  readonly center: Position;
  readonly radiusKm: number;
}

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

// =============================================================================
// Aircraft
// =============================================================================

/**
 * One observation of an aircraft, produced fresh every tick.
 * Kinematics are already converted to aviation units.
 */
export interface AircraftState {
  id: string; // ICAO24, lower-case hex
  position: Position;
  altitude: number | null; // feet
  groundSpeed: number | null; // knots
  heading: number | null; // degrees true
  verticalRate: number | null; // feet per minute
  onGround: boolean;
  callsign: string | null;
  squawk: string | null;
  originCountry: string | null;
  timestampObservedUtc: Date;
}

export interface AircraftMetadata {
  id: string;
  aircraftType: string | null;
  manufacturer?: string | null;
  operator: string | null;
  registration: string | null;
  fetchedAtUtc: Date;
}

export interface CacheEntry {
  readonly metadata: AircraftMetadata;
  readonly expiresAt: number; // epoch ms
}

export interface SeenRecord {
  readonly id: string;
  readonly firstNotifiedAtUtc: Date;
}

// =============================================================================
// Statistics
// =============================================================================

export interface RunStatistics {
  startedAtUtc: Date;
  checksPerformed: number;
  totalAircraftDetected: number;
  errorCount: number;
  currentAircraftCount: number;
  notificationsSent: number;
  lastTickAtUtc: Date | null;
}

export interface TickOutcome {
  at: Date;
  aircraftInFence: number;
  newDetections: number;
  notificationsSent: number;
  errors: number;
  positionFetchFailed: boolean;
}

export type LoopPhase = 'idle' | 'polling' | 'filtering' | 'enriching' | 'notifying';

// =============================================================================
// Collaborators
// =============================================================================

export interface PositionSource {
  getName(): string;
  fetchStates(box: BoundingBox, signal?: AbortSignal): Promise<AircraftState[]>;
}

/**
 * Resolves static attributes of an aircraft.
 * Rejects with NotFoundError when the source has no record of it.
 */
export interface MetadataSource {
  getName(): string;
  fetchMetadata(id: string, signal?: AbortSignal): Promise<AircraftMetadata>;
}
