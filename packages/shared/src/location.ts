// ============================================================================
// SiteScope Position & Location Source Types
// ============================================================================

export type FixMode = 'NoFix' | 'Fix2D' | 'Fix3D';

/** Backends selectable for `--gps` / settings.source */
export type LocationSource = 'auto' | 'gpsd' | 'nmea' | 'file' | 'manual';

export interface LatLon {
  latitude: number;
  longitude: number;
}

export interface Position {
  readonly latitude: number;
  readonly longitude: number;
  readonly altitude?: number;   // meters
  readonly speed?: number;      // m/s
  readonly track?: number;      // degrees true, course over ground
  readonly fixMode: FixMode;
  readonly source: LocationSource;
  readonly timestamp: string;   // ISO
}

export interface GpsdConfig {
  host: string;                 // default 127.0.0.1
  port: number;                 // default 2947
  transport: 'tcp' | 'gpspipe';
}

export interface NmeaConfig {
  device: string;               // e.g. /dev/ttyUSB0, /dev/ttyACM0
  baud: number;
}

export interface LocationSettings {
  source: LocationSource;
  gpsd: GpsdConfig;
  nmea: NmeaConfig;
  file: { path: string };
  manual: LatLon | null;
  timeoutMs: number;
  autoDaemonTimeoutMs: number;  // gpsd attempt before falling back to the file
  pollIntervalMs: number;       // pause between fixes in tracking mode
}

/** gpsd TPV `mode` → FixMode */
export const GPSD_FIX_MODES: Record<number, FixMode> = {
  0: 'NoFix',
  1: 'NoFix',
  2: 'Fix2D',
  3: 'Fix3D',
};

export const FIX_MODE_LABELS: Record<FixMode, string> = {
  NoFix: 'No fix',
  Fix2D: '2D fix',
  Fix3D: '3D fix',
};

export const DEFAULT_GPS_FILE = 'gps_position.txt';

export const DEFAULT_LOCATION_SETTINGS: LocationSettings = {
  source: 'auto',
  gpsd: { host: '127.0.0.1', port: 2947, transport: 'tcp' },
  nmea: { device: '/dev/ttyUSB0', baud: 9600 },
  file: { path: DEFAULT_GPS_FILE },
  manual: null,
  timeoutMs: 10000,
  autoDaemonTimeoutMs: 3000,
  pollIntervalMs: 5000,
};
