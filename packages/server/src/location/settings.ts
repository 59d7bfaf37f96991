import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { LocationSettings } from '@sitescope/shared';
import { DEFAULT_LOCATION_SETTINGS } from '@sitescope/shared';

const LatLonSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

/** Partial settings as accepted from the settings file, the REST API and the environment. */
export const LocationSettingsPatchSchema = z.object({
  source: z.enum(['auto', 'gpsd', 'nmea', 'file', 'manual']).optional(),
  gpsd: z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    transport: z.enum(['tcp', 'gpspipe']),
  }).partial().optional(),
  nmea: z.object({
    device: z.string().min(1),
    baud: z.number().int().positive(),
  }).partial().optional(),
  file: z.object({ path: z.string().min(1) }).partial().optional(),
  manual: LatLonSchema.nullable().optional(),
  timeoutMs: z.number().int().positive().optional(),
  autoDaemonTimeoutMs: z.number().int().positive().optional(),
  pollIntervalMs: z.number().int().positive().optional(),
});

export type LocationSettingsPatch = z.infer<typeof LocationSettingsPatchSchema>;

export function mergeSettings(base: LocationSettings, patch: LocationSettingsPatch): LocationSettings {
  return {
    source: patch.source ?? base.source,
    gpsd: { ...base.gpsd, ...patch.gpsd },
    nmea: { ...base.nmea, ...patch.nmea },
    file: { ...base.file, ...patch.file },
    manual: patch.manual === undefined ? base.manual : patch.manual,
    timeoutMs: patch.timeoutMs ?? base.timeoutMs,
    autoDaemonTimeoutMs: patch.autoDaemonTimeoutMs ?? base.autoDaemonTimeoutMs,
    pollIntervalMs: patch.pollIntervalMs ?? base.pollIntervalMs,
  };
}

/** Layers two patches; nested sections merge field by field. */
export function combinePatches(base: LocationSettingsPatch, patch: LocationSettingsPatch): LocationSettingsPatch {
  const combined: LocationSettingsPatch = { ...base, ...patch };
  if (base.gpsd || patch.gpsd) combined.gpsd = { ...base.gpsd, ...patch.gpsd };
  if (base.nmea || patch.nmea) combined.nmea = { ...base.nmea, ...patch.nmea };
  if (base.file || patch.file) combined.file = { ...base.file, ...patch.file };
  return combined;
}

export function defaultSettings(): LocationSettings {
  return mergeSettings(DEFAULT_LOCATION_SETTINGS, {});
}

/** Loads the settings file over the defaults; a missing or invalid file yields the defaults. */
export function loadSettingsFile(file: string, base: LocationSettings = defaultSettings()): LocationSettings {
  try {
    if (!fs.existsSync(file)) return base;
    const parsed = LocationSettingsPatchSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
    if (!parsed.success) {
      console.error(`⚠️ Ignoring invalid location settings in ${file}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
      return base;
    }
    return mergeSettings(base, parsed.data);
  } catch (err) {
    console.error('⚠️ Failed to load location settings:', err);
    return base;
  }
}

export function saveSettingsFile(file: string, settings: LocationSettings): void {
  try {
    const dir = path.dirname(file);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(file, JSON.stringify(settings, null, 2));
  } catch (err) {
    console.error('⚠️ Failed to save location settings:', err);
  }
}
