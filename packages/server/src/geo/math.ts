import type { DistanceUnit, LatLon } from '@sitescope/shared';
import { KM_TO_UNIT, UNIT_TO_KM, UNIT_LABELS } from '@sitescope/shared';
import { InvalidCoordinateError } from '../errors.js';

/** Mean Earth radius, km */
export const EARTH_RADIUS_KM = 6371.0;

const DEG = Math.PI / 180;

const COMPASS_POINTS = ['N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW'] as const;

export function isValidLatLon(latitude: number, longitude: number): boolean {
  return Number.isFinite(latitude) && Number.isFinite(longitude)
    && latitude >= -90 && latitude <= 90
    && longitude >= -180 && longitude <= 180;
}

export function assertLatLon(p: LatLon): void {
  if (!isValidLatLon(p.latitude, p.longitude)) {
    throw new InvalidCoordinateError(p.latitude, p.longitude);
  }
}

/**
 * Great-circle (haversine) distance between two points.
 * Computed in km on a sphere of mean radius, then scaled to `unit`.
 */
export function distance(a: LatLon, b: LatLon, unit: DistanceUnit = 'mi'): number {
  assertLatLon(a);
  assertLatLon(b);
  const lat1 = a.latitude * DEG;
  const lat2 = b.latitude * DEG;
  const dLat = lat2 - lat1;
  const dLon = (b.longitude - a.longitude) * DEG;
  const h = Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
  return EARTH_RADIUS_KM * c * KM_TO_UNIT[unit];
}

/** Initial true bearing from a to b in [0, 360). Identical points give 0. */
export function bearing(a: LatLon, b: LatLon): number {
  assertLatLon(a);
  assertLatLon(b);
  if (a.latitude === b.latitude && a.longitude === b.longitude) return 0;
  const lat1 = a.latitude * DEG;
  const lat2 = b.latitude * DEG;
  const dLon = (b.longitude - a.longitude) * DEG;
  const y = Math.sin(dLon) * Math.cos(lat2);
  const x = Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLon);
  const deg = Math.atan2(y, x) / DEG;
  const normalized = (deg + 360) % 360;
  // -1e-15 + 360 rounds to 360
  return normalized >= 360 ? 0 : normalized;
}

export function convertDistance(value: number, from: DistanceUnit, to: DistanceUnit): number {
  if (from === to) return value;
  return value * UNIT_TO_KM[from] * KM_TO_UNIT[to];
}

export function unitLabel(unit: DistanceUnit): string {
  return UNIT_LABELS[unit];
}

/** 16-point compass name for a bearing, e.g. 20 → 'NNE' */
export function cardinal(bearingDeg: number): string {
  const normalized = ((bearingDeg % 360) + 360) % 360;
  return COMPASS_POINTS[Math.floor((normalized + 11.25) / 22.5) % 16];
}
