/**
 * UTM zone assignment, including the irregular zones over Norway (band V)
 * and Svalbard (band X).
 */

/** MGRS latitude bands, 8° each from 80°S; X is stretched to 12° (72–84°N). */
export const LATITUDE_BANDS = 'CDEFGHJKLMNPQRSTUVWX';

export const MIN_UTM_LATITUDE = -80;
export const MAX_UTM_LATITUDE = 84;

export interface ZoneException {
  band: string;
  minLon: number;   // inclusive
  maxLon: number;   // exclusive
  zone: number;
}

export const ZONE_EXCEPTIONS: readonly ZoneException[] = [
  // Norway: zone 32V widened west to 3°E
  { band: 'V', minLon: 3, maxLon: 12, zone: 32 },
  // Svalbard: 32X, 34X and 36X do not exist
  { band: 'X', minLon: 0, maxLon: 9, zone: 31 },
  { band: 'X', minLon: 9, maxLon: 21, zone: 33 },
  { band: 'X', minLon: 21, maxLon: 33, zone: 35 },
  { band: 'X', minLon: 33, maxLon: 42, zone: 37 },
];

/** Band letter for a latitude inside [-80, 84]; callers check the range. */
export function latitudeBand(latitude: number): string {
  const index = Math.min(Math.floor((latitude - MIN_UTM_LATITUDE) / 8), LATITUDE_BANDS.length - 1);
  return LATITUDE_BANDS[index];
}

export function standardZone(longitude: number): number {
  // 180° belongs to zone 60, not a 61st zone
  return Math.min(Math.floor((longitude + 180) / 6) + 1, 60);
}

export function zoneException(band: string, longitude: number): ZoneException | undefined {
  return ZONE_EXCEPTIONS.find(ex => ex.band === band && longitude >= ex.minLon && longitude < ex.maxLon);
}

export function utmZone(latitude: number, longitude: number): number {
  const exception = zoneException(latitudeBand(latitude), longitude);
  return exception ? exception.zone : standardZone(longitude);
}

/** Central meridian of a zone, degrees */
export function centralMeridian(zone: number): number {
  return (zone - 1) * 6 - 180 + 3;
}
