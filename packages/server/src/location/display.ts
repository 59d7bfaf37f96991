import type { Position } from '@sitescope/shared';
import { FIX_MODE_LABELS } from '@sitescope/shared';
import { cardinal } from '../geo/math.js';

export const MPS_TO_MPH = 2.23694;
export const MPS_TO_KNOTS = 1.94384;
export const M_TO_FEET = 3.28084;
/** Below this a receiver's reported speed is treated as noise. */
export const STATIONARY_SPEED_MPS = 0.5;

export function isMoving(speedMps: number | undefined): boolean {
  return speedMps !== undefined && speedMps >= STATIONARY_SPEED_MPS;
}

export function formatSpeed(speedMps: number | undefined): string {
  if (speedMps === undefined || !isMoving(speedMps)) return '0.0 m/s (0.0 mph, 0.0 kt)';
  return `${speedMps.toFixed(1)} m/s (${(speedMps * MPS_TO_MPH).toFixed(1)} mph, ${(speedMps * MPS_TO_KNOTS).toFixed(1)} kt)`;
}

/** Heading only means something while moving. */
export function formatHeading(track: number | undefined, speedMps: number | undefined): string {
  if (track === undefined || track < 0 || !isMoving(speedMps)) return '--° (--)';
  return `${track.toFixed(0)}° (${cardinal(track)})`;
}

export function formatVector(track: number | undefined, speedMps: number | undefined): string {
  if (speedMps === undefined || track === undefined || track < 0 || !isMoving(speedMps)) return 'Stationary';
  return `${(speedMps * MPS_TO_MPH).toFixed(1)} mph ${cardinal(track)}`;
}

export function formatAltitude(meters: number): string {
  return `${meters.toFixed(1)} m (${(meters * M_TO_FEET).toFixed(1)} ft)`;
}

/** Lines describing a fix, as printed by the CLI. */
export function describePosition(position: Position): string[] {
  const lines = [`${position.latitude.toFixed(6)}, ${position.longitude.toFixed(6)}`];
  if (position.altitude !== undefined) lines.push(`Altitude: ${formatAltitude(position.altitude)}`);
  lines.push(`Fix Quality: ${FIX_MODE_LABELS[position.fixMode]} (${position.source})`);
  if (position.speed !== undefined) {
    lines.push(`Speed: ${formatSpeed(position.speed)}`);
    lines.push(`Heading: ${formatHeading(position.track, position.speed)}`);
  }
  return lines;
}
