import type { GridRepresentation, LatLon, UTMCoordinate } from '@sitescope/shared';
import { UndefinedProjectionError } from '../errors.js';
import { assertLatLon } from './math.js';
import {
  centralMeridian, latitudeBand, MAX_UTM_LATITUDE, MIN_UTM_LATITUDE, utmZone,
} from './zones.js';

// ── WGS84 ellipsoid / UTM constants ─────────────────────────────────

const WGS84_A = 6378137.0;
const WGS84_F = 1 / 298.257223563;
const E2 = WGS84_F * (2 - WGS84_F);       // first eccentricity²
const EP2 = E2 / (1 - E2);                // second eccentricity²
const K0 = 0.9996;
const FALSE_EASTING = 500000;
const FALSE_NORTHING_SOUTH = 10000000;

const DEG = Math.PI / 180;

// ── MGRS 100 km square letters (I and O never used) ─────────────────

const MGRS_COLUMN_LETTERS = 'ABCDEFGHJKLMNPQRSTUVWXYZ';
const MGRS_ROW_LETTERS = 'ABCDEFGHJKLMNPQRSTUV';

/**
 * Project a point onto Universal Transverse Mercator.
 * Throws UndefinedProjectionError outside 80°S–84°N instead of extrapolating.
 */
export function toUTM(p: LatLon): UTMCoordinate {
  assertLatLon(p);
  const { latitude, longitude } = p;
  if (latitude < MIN_UTM_LATITUDE || latitude > MAX_UTM_LATITUDE) {
    throw new UndefinedProjectionError(latitude);
  }

  const zone = utmZone(latitude, longitude);
  const phi = latitude * DEG;
  const dLambda = (longitude - centralMeridian(zone)) * DEG;

  const sinPhi = Math.sin(phi);
  const cosPhi = Math.cos(phi);
  const tanPhi = Math.tan(phi);

  const N = WGS84_A / Math.sqrt(1 - E2 * sinPhi * sinPhi);
  const T = tanPhi * tanPhi;
  const C = EP2 * cosPhi * cosPhi;
  const A = dLambda * cosPhi;

  // Meridional arc
  const M = WGS84_A * (
    (1 - E2 / 4 - 3 * E2 ** 2 / 64 - 5 * E2 ** 3 / 256) * phi
    - (3 * E2 / 8 + 3 * E2 ** 2 / 32 + 45 * E2 ** 3 / 1024) * Math.sin(2 * phi)
    + (15 * E2 ** 2 / 256 + 45 * E2 ** 3 / 1024) * Math.sin(4 * phi)
    - (35 * E2 ** 3 / 3072) * Math.sin(6 * phi)
  );

  const easting = K0 * N * (
    A
    + (1 - T + C) * A ** 3 / 6
    + (5 - 18 * T + T * T + 72 * C - 58 * EP2) * A ** 5 / 120
  ) + FALSE_EASTING;

  let northing = K0 * (
    M + N * tanPhi * (
      A * A / 2
      + (5 - T + 9 * C + 4 * C * C) * A ** 4 / 24
      + (61 - 58 * T + T * T + 600 * C - 330 * EP2) * A ** 6 / 720
    )
  );

  const hemisphere = latitude < 0 ? 'S' : 'N';
  if (hemisphere === 'S') northing += FALSE_NORTHING_SOUTH;

  return { zone, band: latitudeBand(latitude), hemisphere, easting, northing };
}

/** Two-letter 100 km square ID; the lettering repeats every six zones. */
export function squareId(zone: number, easting: number, northing: number): string {
  const set = zone % 6 === 0 ? 6 : zone % 6;
  // column origins A, J, S repeat; rows start at A for odd sets, F for even
  const columnOrigin = ((set - 1) % 3) * 8;
  const column = MGRS_COLUMN_LETTERS[(columnOrigin + Math.floor(easting / 100000) - 1) % 24];
  const rowOffset = set % 2 === 0 ? 5 : 0;
  const row = MGRS_ROW_LETTERS[(Math.floor(northing / 100000) + rowOffset) % 20];
  return column + row;
}

/**
 * Military Grid Reference System string, e.g. `15TVK7910580518`.
 * Easting and northing are truncated, never rounded, to `precision` digits each.
 */
export function toMGRS(p: LatLon, precision = 5): string {
  if (!Number.isInteger(precision) || precision < 1 || precision > 5) {
    throw new RangeError(`MGRS precision must be 1-5 digits, got ${precision}`);
  }
  const utm = toUTM(p);
  const digits = (meters: number) =>
    String(Math.floor(meters) % 100000).padStart(5, '0').slice(0, precision);
  return `${utm.zone}${utm.band}${squareId(utm.zone, utm.easting, utm.northing)}`
    + digits(utm.easting) + digits(utm.northing);
}

/**
 * Maidenhead locator: field (A-R), square (0-9), subsquare (a-x), extended square (0-9).
 * The north pole and the antimeridian fold into the last cell.
 */
export function toMaidenhead(p: LatLon, precision = 6): string {
  assertLatLon(p);
  if (precision !== 4 && precision !== 6 && precision !== 8) {
    throw new RangeError(`Maidenhead precision must be 4, 6 or 8 characters, got ${precision}`);
  }

  const cell = (value: number, size: number, count: number) =>
    Math.min(Math.floor(value / size), count - 1);

  let lon = p.longitude + 180;
  let lat = p.latitude + 90;

  const fieldLon = cell(lon, 20, 18);
  const fieldLat = cell(lat, 10, 18);
  lon -= fieldLon * 20;
  lat -= fieldLat * 10;
  let locator = String.fromCharCode(65 + fieldLon, 65 + fieldLat);

  const squareLon = cell(lon, 2, 10);
  const squareLat = cell(lat, 1, 10);
  lon -= squareLon * 2;
  lat -= squareLat;
  locator += `${squareLon}${squareLat}`;
  if (precision === 4) return locator;

  const subLon = cell(lon, 2 / 24, 24);
  const subLat = cell(lat, 1 / 24, 24);
  lon -= subLon * (2 / 24);
  lat -= subLat * (1 / 24);
  locator += String.fromCharCode(97 + subLon, 97 + subLat);
  if (precision === 6) return locator;

  const extLon = cell(lon, 2 / 240, 10);
  const extLat = cell(lat, 1 / 240, 10);
  return locator + `${extLon}${extLat}`;
}

export function formatUTM(utm: UTMCoordinate): string {
  return `${utm.zone}${utm.band} ${Math.round(utm.easting)}E ${Math.round(utm.northing)}N`;
}

/** Split `15TVK7910580518` into `15T VK 79105 80518` for display */
export function formatMGRS(mgrs: string): string {
  const match = /^(\d{1,2}[C-X])([A-Z]{2})(\d*)$/.exec(mgrs);
  if (!match) return mgrs;
  const [, gzd, square, digits] = match;
  const half = digits.length / 2;
  return [gzd, square, digits.slice(0, half), digits.slice(half)].filter(Boolean).join(' ');
}

/**
 * All display grids for a position. Outside the UTM bands the projection
 * fields are null and `error` is set; Maidenhead is always available.
 */
export function toGrid(p: LatLon): GridRepresentation {
  const maidenhead = toMaidenhead(p);
  try {
    const utm = toUTM(p);
    return { utm, mgrs: toMGRS(p), maidenhead };
  } catch (err) {
    if (err instanceof UndefinedProjectionError) {
      return { utm: null, mgrs: null, maidenhead, error: 'UndefinedProjection' };
    }
    throw err;
  }
}
