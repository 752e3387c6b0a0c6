import type { BoundingBox, GeoFence, Position } from '../types/Aircraft';
import { InvalidInputError } from './errors';

const EARTH_RADIUS_KM = 6371;
// 1 degree of latitude is approximately 111.32 km
const KM_PER_DEGREE = 111.32;

const toRadians = (degrees: number) => degrees * (Math.PI / 180);

export function validatePosition(position: Position): void {
  const { latitude, longitude } = position;
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new InvalidInputError(`Latitude out of range: ${latitude}`);
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new InvalidInputError(`Longitude out of range: ${longitude}`);
  }
}

export function validateFence(fence: GeoFence): void {
  validatePosition(fence.center);
  if (!Number.isFinite(fence.radiusKm) || fence.radiusKm <= 0) {
    throw new InvalidInputError(`Fence radius must be greater than zero, got ${fence.radiusKm}`);
  }
}

/**
 * Great-circle distance between two points using the Haversine formula
 * @returns distance in kilometers
 */
export function distanceKm(from: Position, to: Position): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(from.latitude)) *
      Math.cos(toRadians(to.latitude)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_KM * c;
}

/**
 * True when the position lies within the fence, boundary included
 */
export function isInside(position: Position, fence: GeoFence): boolean {
  validatePosition(position);
  validateFence(fence);
  return distanceKm(position, fence.center) <= fence.radiusKm;
}

/**
 * Rectangle enclosing the fence, used for the upstream query.
 * It over-fetches at the corners; isInside narrows the result.
 */
export function boundingBox(fence: GeoFence): BoundingBox {
  validateFence(fence);
  const { latitude, longitude } = fence.center;

  const latDelta = fence.radiusKm / KM_PER_DEGREE;
  // Longitude degrees shrink towards the poles; keep the divisor away from zero
  const lonDelta = fence.radiusKm / (KM_PER_DEGREE * Math.max(Math.cos(toRadians(latitude)), 0.01));

  return {
    minLat: Math.max(latitude - latDelta, -90),
    maxLat: Math.min(latitude + latDelta, 90),
    minLon: Math.max(longitude - lonDelta, -180),
    maxLon: Math.min(longitude + lonDelta, 180),
  };
}
