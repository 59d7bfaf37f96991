import { realpathSync } from 'fs';
import { parseArgs } from 'util';
import { fileURLToPath } from 'url';
import type { DistanceUnit, LocationSource, Position } from '@sitescope/shared';
import { DISTANCE_UNITS, UNIT_LABELS } from '@sitescope/shared';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { CatalogError } from './errors.js';
import { formatMGRS, formatUTM, toGrid } from './geo/grid.js';
import { createAcquisitionLogger, createPositionSource, savePositionFile } from './location/index.js';
import type { AcquisitionObserver, PositionSource, PositionSourceOptions } from './location/index.js';
import { describePosition } from './location/display.js';
import { combinePatches, loadSettingsFile, mergeSettings } from './location/settings.js';
import type { LocationSettingsPatch } from './location/settings.js';
import { loadCatalogFile } from './sites/catalog.js';
import type { SiteCatalog } from './sites/catalog.js';
import { nearest, nearestOne } from './sites/ranker.js';
import { formatRankedLine, formatSiteReport } from './sites/report.js';
import { startServer } from './server.js';
import type { StartOptions } from './server.js';

export const EXIT_OK = 0;
export const EXIT_NO_POSITION = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: sitescope [options]

Position
  --gps SOURCE        auto | gpsd | nmea | file | manual (default auto)
  --lat DEG --lon DEG manual position; implies --gps manual
  --gps-host HOST     gpsd host (default 127.0.0.1)
  --gps-port PORT     gpsd port (default 2947)
  --gps-device PATH   serial NMEA receiver (default /dev/ttyUSB0)
  --gps-baud N        serial speed (default 9600)
  --gps-file PATH     saved position file (default gps_position.txt)
  --timeout SECONDS   give up on a fix after this long
  --save-gps          write the position to the position file

Sites
  --csv PATH          tabular catalog
  --json PATH         structured catalog
  --unit UNIT         km | mi | nm
  --range N           list sites within this distance
  --limit N           at most this many sites in the list
  --control-only      only sites with control channels

  --serve             run the HTTP and WebSocket server instead
  --debug             print every line read from the receiver
  -h, --help          show this help
`;

const OPTIONS = {
  gps: { type: 'string' },
  lat: { type: 'string' },
  lon: { type: 'string' },
  'gps-host': { type: 'string' },
  'gps-port': { type: 'string' },
  'gps-device': { type: 'string' },
  'gps-baud': { type: 'string' },
  'gps-file': { type: 'string' },
  timeout: { type: 'string' },
  'save-gps': { type: 'boolean' },
  csv: { type: 'string' },
  json: { type: 'string' },
  unit: { type: 'string' },
  range: { type: 'string' },
  limit: { type: 'string' },
  'control-only': { type: 'boolean' },
  serve: { type: 'boolean' },
  debug: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

const SOURCES: readonly LocationSource[] = ['auto', 'gpsd', 'nmea', 'file', 'manual'];

class UsageError extends Error {}

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  io?: CliIo;
  onEvent?: AcquisitionObserver;
  openers?: PositionSourceOptions['openers'];
  /** Replaces startServer for `--serve`. */
  serve?: (config: AppConfig, options: StartOptions) => Promise<unknown>;
}

const consoleIo: CliIo = {
  out: line => console.log(line),
  err: line => console.error(line),
};

/** `--lon -93.2` reads as a value, not an unknown short flag. */
export function attachNegativeValues(argv: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    const name = arg.startsWith('--') ? arg.slice(2) : '';
    if (name in OPTIONS && !arg.includes('=') && next !== undefined && /^-\d/.test(next)) {
      out.push(`${arg}=${next}`);
      i++;
    } else {
      out.push(arg);
    }
  }
  return out;
}

function numberFlag(name: string, raw: string | undefined, check: (n: number) => boolean): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || !check(value)) {
    throw new UsageError(`Invalid value for --${name}: ${raw}`);
  }
  return value;
}

const isUnit = (value: string): value is DistanceUnit => DISTANCE_UNITS.some(u => u === value);
const isSource = (value: string): value is LocationSource => SOURCES.some(s => s === value);

interface CliPlan {
  location: LocationSettingsPatch;
  unit?: DistanceUnit;
  range?: number;
  limit?: number;
  catalog?: { path: string; format: 'csv' | 'json' };
  savePosition: boolean;
  controlOnly: boolean;
  serve: boolean;
  debug: boolean;
  help: boolean;
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({ args: attachNegativeValues(argv), options: OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function plan(argv: readonly string[]): CliPlan {
  const values = parseFlags(argv);

  const location: LocationSettingsPatch = {};
  if (values.gps !== undefined) {
    if (!isSource(values.gps)) throw new UsageError(`Unknown GPS source: ${values.gps}`);
    location.source = values.gps;
  }

  const lat = numberFlag('lat', values.lat, n => n >= -90 && n <= 90);
  const lon = numberFlag('lon', values.lon, n => n >= -180 && n <= 180);
  if ((lat === undefined) !== (lon === undefined)) throw new UsageError('--lat and --lon must be given together');
  if (lat !== undefined && lon !== undefined) {
    location.manual = { latitude: lat, longitude: lon };
    location.source ??= 'manual';
  }

  const host = values['gps-host'];
  const port = numberFlag('gps-port', values['gps-port'], n => Number.isInteger(n) && n >= 1 && n <= 65535);
  if (host !== undefined || port !== undefined) {
    location.gpsd = { ...(host !== undefined ? { host } : {}), ...(port !== undefined ? { port } : {}) };
  }
  const device = values['gps-device'];
  const baud = numberFlag('gps-baud', values['gps-baud'], n => Number.isInteger(n) && n > 0);
  if (device !== undefined || baud !== undefined) {
    location.nmea = { ...(device !== undefined ? { device } : {}), ...(baud !== undefined ? { baud } : {}) };
  }
  if (values['gps-file'] !== undefined) location.file = { path: values['gps-file'] };

  const timeout = numberFlag('timeout', values.timeout, n => n > 0);
  if (timeout !== undefined) location.timeoutMs = Math.max(1, Math.round(timeout * 1000));

  let unit: DistanceUnit | undefined;
  if (values.unit !== undefined) {
    if (!isUnit(values.unit)) throw new UsageError(`Unknown unit: ${values.unit} (expected ${DISTANCE_UNITS.join(', ')})`);
    unit = values.unit;
  }

  if (values.csv !== undefined && values.json !== undefined) throw new UsageError('Give either --csv or --json, not both');
  const catalog = values.json !== undefined
    ? { path: values.json, format: 'json' as const }
    : values.csv !== undefined ? { path: values.csv, format: 'csv' as const } : undefined;

  return {
    location,
    unit,
    range: numberFlag('range', values.range, n => n >= 0),
    limit: numberFlag('limit', values.limit, n => Number.isInteger(n) && n >= 0),
    catalog,
    savePosition: values['save-gps'] ?? false,
    controlOnly: values['control-only'] ?? false,
    serve: values.serve ?? false,
    debug: values.debug ?? false,
    help: values.help ?? false,
  };
}

function printPosition(io: CliIo, position: Position) {
  const [coordinates, ...details] = describePosition(position);
  io.out(`📍 Your position: ${coordinates}`);
  for (const line of details) io.out(`   ${line}`);

  const grid = toGrid(position);
  if (grid.utm && grid.mgrs) {
    io.out(`   UTM: ${formatUTM(grid.utm)}`);
    io.out(`   MGRS: ${formatMGRS(grid.mgrs)}`);
  } else {
    io.out('   UTM/MGRS: undefined at this latitude');
  }
  io.out(`   Maidenhead: ${grid.maidenhead}`);
}

function printSites(io: CliIo, position: Position, catalog: SiteCatalog, unit: DistanceUnit, range: number, limit: number, controlOnly: boolean) {
  const closest = controlOnly
    ? nearest(position, catalog, unit, 1, { controlOnly }).at(0) ?? null
    : nearestOne(position, catalog, unit);
  if (!closest) {
    io.out(controlOnly ? '🗼 No sites with control channels in the catalog' : '🗼 No sites in the catalog');
    return;
  }
  io.out('');
  io.out('🗼 Nearest site');
  io.out(formatSiteReport(closest, { allUnits: true }));

  const inRange = nearest(position, catalog, unit, catalog.size, { controlOnly })
    .filter(r => r.distance <= range)
    .slice(0, limit);
  if (!inRange.length) {
    io.out(`🗼 No sites within ${range} ${UNIT_LABELS[unit]}`);
    return;
  }
  io.out(`🗼 Sites within ${range} ${UNIT_LABELS[unit]}:`);
  inRange.forEach((r, i) => io.out(formatRankedLine(i + 1, r)));
}

/** Runs one lookup (or starts the server with `--serve`) and returns the exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIo;

  let options: CliPlan;
  let config: AppConfig;
  try {
    options = plan(argv);
    config = loadConfig(deps.env ?? process.env);
  } catch (err) {
    io.err(`⚠️ ${err instanceof Error ? err.message : String(err)}`);
    io.err(USAGE);
    return EXIT_USAGE;
  }
  if (options.help) {
    io.out(USAGE);
    return EXIT_OK;
  }

  const location = combinePatches(config.location, options.location);
  const debug = options.debug || config.debug;

  if (options.serve) {
    const serve = deps.serve ?? startServer;
    await serve(
      { ...config, debug, catalogPath: options.catalog?.path ?? config.catalogPath, unit: options.unit ?? config.unit, range: options.range ?? config.range, limit: options.limit ?? config.limit },
      { location, openers: deps.openers },
    );
    return EXIT_OK;
  }

  let catalog: SiteCatalog;
  try {
    catalog = await loadCatalogFile(options.catalog?.path ?? config.catalogPath, { format: options.catalog?.format });
  } catch (err) {
    if (!(err instanceof CatalogError)) throw err;
    io.err(`⚠️ ${err.message}`);
    return EXIT_USAGE;
  }

  const settings = mergeSettings(loadSettingsFile(config.settingsFile), location);
  let source: PositionSource;
  try {
    source = createPositionSource(settings, {
      onEvent: deps.onEvent ?? createAcquisitionLogger(debug),
      openers: deps.openers,
    });
  } catch (err) {
    io.err(`⚠️ ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_USAGE;
  }

  const result = await source.acquire(settings.timeoutMs);
  if (!result.ok) {
    io.err(`⚠️ Could not determine position: ${result.error.message}`);
    return EXIT_NO_POSITION;
  }

  const position = result.position;
  printPosition(io, position);

  if (options.savePosition) {
    await savePositionFile(settings.file.path, position);
    io.out(`💾 Position saved to ${settings.file.path}`);
  }

  printSites(io, position, catalog, options.unit ?? config.unit, options.range ?? config.range, options.limit ?? config.limit, options.controlOnly);
  return EXIT_OK;
}

const entry = process.argv[1];
if (entry && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error('⚠️ Unexpected failure:', err);
      process.exitCode = EXIT_USAGE;
    },
  );
}
