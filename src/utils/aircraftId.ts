/**
 * ICAO24 addresses are hex and case-insensitive; everything keyed by
 * aircraft id goes through here so "ABC123" and "abc123" collide.
 */
export function normalizeAircraftId(id: string): string {
  return id.trim().toLowerCase();
}
