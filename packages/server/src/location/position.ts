import type { FixMode, LocationSource, Position } from '@sitescope/shared';
import { InvalidCoordinateError } from '../errors.js';
import { isValidLatLon } from '../geo/math.js';

export interface PositionInput {
  latitude: number;
  longitude: number;
  altitude?: number | null;
  speed?: number | null;
  track?: number | null;
  fixMode: FixMode;
  source: LocationSource;
  timestamp?: string;
}

const finite = (value: number | null | undefined): value is number =>
  typeof value === 'number' && Number.isFinite(value);

/**
 * The only way a Position is made. Out-of-range coordinates throw
 * InvalidCoordinateError; nothing is clamped. The result is frozen.
 */
export function createPosition(input: PositionInput): Position {
  const { latitude, longitude, altitude, speed, track } = input;
  if (!isValidLatLon(latitude, longitude)) {
    throw new InvalidCoordinateError(latitude, longitude);
  }
  return Object.freeze({
    latitude,
    longitude,
    ...(finite(altitude) ? { altitude } : {}),
    ...(finite(speed) ? { speed } : {}),
    ...(finite(track) ? { track } : {}),
    fixMode: input.fixMode,
    source: input.source,
    timestamp: input.timestamp ?? new Date().toISOString(),
  });
}

export function hasFix(position: Position): boolean {
  return position.fixMode === 'Fix2D' || position.fixMode === 'Fix3D';
}
