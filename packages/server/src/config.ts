import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { DistanceUnit } from '@sitescope/shared';
import type { LocationSettingsPatch } from './location/settings.js';

export const DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url));
export const SAMPLE_CATALOG = path.join(DATA_DIR, 'sample-sites.csv');

const optionalText = z.string().trim().min(1).optional();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3402),
  HOST: z.string().default('0.0.0.0'),
  SITESCOPE_CATALOG: optionalText,
  SITESCOPE_SETTINGS: optionalText,
  SITESCOPE_UNIT: z.enum(['km', 'mi', 'nm']).default('mi'),
  SITESCOPE_RANGE: z.coerce.number().nonnegative().default(30),
  SITESCOPE_LIMIT: z.coerce.number().int().positive().default(5),
  GPS_SOURCE: z.enum(['auto', 'gpsd', 'nmea', 'file', 'manual']).optional(),
  GPSD_HOST: optionalText,
  GPSD_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  GPS_DEVICE: optionalText,
  GPS_BAUD: z.coerce.number().int().positive().optional(),
  GPS_FILE: optionalText,
  DEBUG: z.string().optional().transform(v => v === '1' || v === 'true'),
});

export interface AppConfig {
  port: number;
  host: string;
  catalogPath: string;
  settingsFile: string;
  unit: DistanceUnit;
  range: number;
  limit: number;
  debug: boolean;
  /** Location settings named by the environment; win over the settings file. */
  location: LocationSettingsPatch;
}

/** Empty strings count as unset. */
function present(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(present(env));
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${JSON.stringify(parsed.error.flatten().fieldErrors)}`);
  }
  const e = parsed.data;

  const location: LocationSettingsPatch = {};
  if (e.GPS_SOURCE) location.source = e.GPS_SOURCE;
  if (e.GPSD_HOST || e.GPSD_PORT) {
    location.gpsd = {
      ...(e.GPSD_HOST ? { host: e.GPSD_HOST } : {}),
      ...(e.GPSD_PORT ? { port: e.GPSD_PORT } : {}),
    };
  }
  if (e.GPS_DEVICE || e.GPS_BAUD) {
    location.nmea = {
      ...(e.GPS_DEVICE ? { device: e.GPS_DEVICE } : {}),
      ...(e.GPS_BAUD ? { baud: e.GPS_BAUD } : {}),
    };
  }
  if (e.GPS_FILE) location.file = { path: e.GPS_FILE };

  return {
    port: e.PORT,
    host: e.HOST,
    catalogPath: e.SITESCOPE_CATALOG ?? SAMPLE_CATALOG,
    settingsFile: e.SITESCOPE_SETTINGS ?? path.join(process.cwd(), 'data', 'location-settings.json'),
    unit: e.SITESCOPE_UNIT,
    range: e.SITESCOPE_RANGE,
    limit: e.SITESCOPE_LIMIT,
    debug: e.DEBUG,
    location,
  };
}
