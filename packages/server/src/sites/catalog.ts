import { readFile } from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { CatalogFormat, CatalogWarning, Site, SiteFrequency } from '@sitescope/shared';
import { CatalogError } from '../errors.js';
import { isValidLatLon } from '../geo/math.js';
import { parseCsv } from './csv.js';

export interface FrequencyBand {
  min: number;
  max: number;
}

/** Trunked-system frequencies kept from tabular catalogs, MHz. */
export const DEFAULT_FREQUENCY_BAND: FrequencyBand = { min: 800, max: 900 };

/** Frequency columns start here in the tabular layout. */
export const CSV_FREQUENCY_COLUMN = 9;

export interface CatalogLoadOptions {
  /** Tabular catalogs only; null keeps every numeric frequency. */
  band?: FrequencyBand | null;
}

export interface CatalogFileOptions extends CatalogLoadOptions {
  /** Overrides the choice by file extension. */
  format?: CatalogFormat;
}

export interface CatalogLoadResult {
  sites: Site[];
  warnings: CatalogWarning[];
}

export function isControlFrequency(raw: string): boolean {
  return raw.endsWith('c') || raw.endsWith('C');
}

export function parseFrequency(raw: string): SiteFrequency {
  const isControl = isControlFrequency(raw);
  return { value: isControl ? raw.slice(0, -1) : raw, isControl };
}

function buildSite(
  fields: Omit<Site, 'frequencies' | 'controlFrequencies'>,
  frequencies: SiteFrequency[],
): Site {
  return Object.freeze({
    ...fields,
    frequencies: Object.freeze(frequencies.map(f => Object.freeze(f))),
    controlFrequencies: Object.freeze(frequencies.filter(f => f.isControl).map(f => f.value)),
    attributes: Object.freeze({ ...fields.attributes }),
  });
}

// ── JSON catalog ─────────────────────────────────────────────────────────

const coordinate = z.union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())]).pipe(z.number().finite());
const text = z.union([z.string(), z.number()]).transform(String);

const JsonSiteSchema = z.object({
  description: z.string().default('Unknown'),
  county: z.string().default(''),
  latitude: coordinate,
  longitude: coordinate,
  control_frequencies: z.array(text).default([]),
  frequencies: z.array(text).default([]),
  rfss: text.optional(),
  site_dec: text.optional(),
  site_hex: text.optional(),
  site_nac: text.optional(),
  range: text.optional(),
});

const JsonCatalogSchema = z.union([
  z.array(z.unknown()),
  z.object({ sites: z.array(z.unknown()) }).transform(c => c.sites),
]);

const ATTRIBUTE_KEYS = [
  ['rfss', 'rfss'],
  ['site_dec', 'siteDec'],
  ['site_hex', 'siteHex'],
  ['site_nac', 'nac'],
  ['range', 'range'],
] as const;

function recordDescription(record: unknown): string | undefined {
  const named = z.object({ description: z.string() }).safeParse(record);
  return named.success ? named.data.description : undefined;
}

/** Structured records; each is validated on its own so one bad record cannot abort the load. */
export function loadJsonRecords(records: readonly unknown[]): CatalogLoadResult {
  const sites: Site[] = [];
  const warnings: CatalogWarning[] = [];

  records.forEach((record, index) => {
    const parsed = JsonSiteSchema.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const reason = issue ? `${issue.path.join('.') || 'record'}: ${issue.message}` : 'invalid record';
      warnings.push({ code: 'CatalogRecordSkipped', index, reason, description: recordDescription(record) });
      return;
    }
    const r = parsed.data;
    if (!isValidLatLon(r.latitude, r.longitude)) {
      warnings.push({ code: 'CatalogRecordSkipped', index, reason: `coordinate out of range: ${r.latitude}, ${r.longitude}`, description: r.description });
      return;
    }
    const attributes: Record<string, string> = {};
    for (const [from, to] of ATTRIBUTE_KEYS) {
      const value = r[from];
      if (value !== undefined) attributes[to] = value;
    }
    sites.push(buildSite(
      { description: r.description, county: r.county, latitude: r.latitude, longitude: r.longitude, attributes },
      [...r.control_frequencies, ...r.frequencies].map(f => parseFrequency(f.trim())).filter(f => f.value !== ''),
    ));
  });

  return { sites, warnings };
}

// ── Tabular catalog ──────────────────────────────────────────────────────
// RFSS, Site Dec, Site Hex, Site NAC, Description, County Name, Lat, Lon, Range, Frequencies...

const FREQUENCY_PATTERN = /^\d+(\.\d+)?$/;

function parseCoordinate(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') return null;
  const n = Number(value.trim());
  return Number.isFinite(n) ? n : null;
}

/** Data rows without the header. Blank rows are not records and are passed over silently. */
export function loadCsvRows(rows: readonly string[][], options: CatalogLoadOptions = {}): CatalogLoadResult {
  const band = options.band === undefined ? DEFAULT_FREQUENCY_BAND : options.band;
  const sites: Site[] = [];
  const warnings: CatalogWarning[] = [];

  rows.forEach((row, index) => {
    if (row.every(cell => cell.trim() === '')) return;
    const cell = (i: number) => (row[i] ?? '').trim();
    const description = cell(4) || 'Unknown';

    const latitude = parseCoordinate(row[6]);
    const longitude = parseCoordinate(row[7]);
    if (latitude === null || longitude === null) {
      const reason = !cell(6) || !cell(7) ? 'missing latitude/longitude' : `unparseable latitude/longitude "${cell(6)}", "${cell(7)}"`;
      warnings.push({ code: 'CatalogRecordSkipped', index, reason, description });
      return;
    }
    if (!isValidLatLon(latitude, longitude)) {
      warnings.push({ code: 'CatalogRecordSkipped', index, reason: `coordinate out of range: ${latitude}, ${longitude}`, description });
      return;
    }

    const frequencies: SiteFrequency[] = [];
    for (let i = CSV_FREQUENCY_COLUMN; i < row.length; i++) {
      const raw = cell(i);
      if (!raw) continue;
      const frequency = parseFrequency(raw);
      if (!FREQUENCY_PATTERN.test(frequency.value)) continue;
      const mhz = Number(frequency.value);
      if (band && (mhz < band.min || mhz > band.max)) continue;
      frequencies.push(frequency);
    }

    sites.push(buildSite({
      description,
      county: cell(5),
      latitude,
      longitude,
      attributes: { rfss: cell(0), siteDec: cell(1), siteHex: cell(2), nac: cell(3), range: cell(8) },
    }, frequencies));
  });

  return { sites, warnings };
}

// ── Entry points ─────────────────────────────────────────────────────────

export function catalogFormatOf(file: string): CatalogFormat {
  return path.extname(file).toLowerCase() === '.json' ? 'json' : 'csv';
}

/** Parses catalog text; throws CatalogError only when the document as a whole is unusable. */
export function loadCatalog(content: string, format: CatalogFormat, options: CatalogLoadOptions = {}, origin = '<input>'): CatalogLoadResult {
  const body = content.replace(/^\uFEFF/, '');
  if (format === 'csv') {
    const [, ...rows] = parseCsv(body);
    return loadCsvRows(rows, options);
  }

  let document: unknown;
  try {
    document = JSON.parse(body);
  } catch (err) {
    throw new CatalogError(origin, err instanceof Error ? err.message : String(err));
  }
  const records = JsonCatalogSchema.safeParse(document);
  if (!records.success) throw new CatalogError(origin, 'expected an array of sites');
  return loadJsonRecords(records.data);
}

/** Immutable site list for one session. */
export class SiteCatalog {
  readonly sites: readonly Site[];
  readonly warnings: readonly CatalogWarning[];

  constructor(sites: readonly Site[], warnings: readonly CatalogWarning[] = [], readonly origin: string | null = null) {
    this.sites = Object.freeze([...sites]);
    this.warnings = Object.freeze([...warnings]);
  }

  get size(): number {
    return this.sites.length;
  }

  static empty(): SiteCatalog {
    return new SiteCatalog([]);
  }

  static fromContent(content: string, format: CatalogFormat, options: CatalogLoadOptions = {}): SiteCatalog {
    const { sites, warnings } = loadCatalog(content, format, options);
    return new SiteCatalog(sites, warnings);
  }
}

/** Reads a catalog file, choosing the format by extension (`.json`, anything else tabular) unless one is given. */
export async function loadCatalogFile(file: string, options: CatalogFileOptions = {}): Promise<SiteCatalog> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (err) {
    throw new CatalogError(file, err instanceof Error ? err.message : String(err));
  }
  const { sites, warnings } = loadCatalog(content, options.format ?? catalogFormatOf(file), options, file);
  for (const w of warnings) {
    console.warn(`🗼 Sites: skipped record ${w.index}${w.description ? ` (${w.description})` : ''}: ${w.reason}`);
  }
  console.log(`🗼 Sites: loaded ${sites.length} sites from ${path.basename(file)}`);
  return new SiteCatalog(sites, warnings, file);
}
