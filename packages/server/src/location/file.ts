import { mkdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { LatLon } from '@sitescope/shared';
import { InvalidCoordinateError, InvalidPositionError, MalformedPositionError, PositionFileNotFoundError, SourceUnavailableError } from '../errors.js';
import { assertLatLon } from '../geo/math.js';
import type { AcquisitionObserver } from './events.js';
import { createPosition } from './position.js';
import { failed, fixed } from './source.js';
import type { AcquisitionResult, PositionSource } from './source.js';

/** A number, or a string holding one. */
const numeric = z
  .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
  .pipe(z.number().finite());

/** `null` and a missing key both mean no altitude. */
const altitude = numeric.nullish().transform(v => v ?? undefined);

const PositionFileSchema = z.union([
  z.object({ latitude: numeric, longitude: numeric, altitude }),
  z.object({ lat: numeric, lon: numeric, alt: altitude })
    .transform(({ lat, lon, alt }) => ({ latitude: lat, longitude: lon, altitude: alt })),
]);

export interface StoredPosition {
  latitude: number;
  longitude: number;
  altitude?: number;
}

function parseJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return undefined;
  }
}

/**
 * Reads `{latitude, longitude[, altitude]}`, `{lat, lon[, alt]}` or a flat
 * `lat,lon[,alt,...]` line. Fields past the third are ignored, and so is a
 * third that is empty or not a number. Range is not checked here.
 */
export function parsePositionFile(content: string, file: string): StoredPosition {
  const text = content.trim();
  if (!text) throw new MalformedPositionError(file, 'file is empty');

  const json = PositionFileSchema.safeParse(parseJson(text));
  if (json.success) return json.data;

  const parts = text.split(/\r?\n/)[0].split(',').map(part => part.trim());
  if (parts.length < 2) {
    throw new MalformedPositionError(file, 'expected JSON with latitude/longitude or a "lat,lon" line');
  }
  const [latitude, longitude] = parts.slice(0, 2).map((part) => {
    const value = numeric.safeParse(part);
    if (!value.success) throw new MalformedPositionError(file, `non-numeric value "${part}"`);
    return value.data;
  });
  const third = parts.length > 2 ? numeric.safeParse(parts[2]) : undefined;
  return third?.success ? { latitude, longitude, altitude: third.data } : { latitude, longitude };
}

const isMissingFile = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

export class FileSource implements PositionSource {
  readonly kind = 'file';

  constructor(readonly path: string, private readonly onEvent?: AcquisitionObserver) {}

  async acquire(): Promise<AcquisitionResult> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return failed(new PositionFileNotFoundError(this.path));
      return failed(new SourceUnavailableError('file', err instanceof Error ? err.message : String(err)));
    }

    try {
      const stored = parsePositionFile(content, this.path);
      const position = createPosition({
        ...stored,
        fixMode: stored.altitude !== undefined ? 'Fix3D' : 'Fix2D',
        source: 'file',
      });
      this.onEvent?.({ type: 'resolved', source: `file ${this.path}`, position });
      return fixed(position);
    } catch (err) {
      if (err instanceof MalformedPositionError) return failed(err);
      if (err instanceof InvalidCoordinateError) return failed(new InvalidPositionError('file', err));
      throw err;
    }
  }
}

/** Writes the position as `{"latitude", "longitude"}` for a later `file` acquisition. */
export async function savePositionFile(file: string, position: LatLon): Promise<void> {
  assertLatLon(position);
  await mkdir(path.dirname(path.resolve(file)), { recursive: true });
  const record = { latitude: position.latitude, longitude: position.longitude };
  await writeFile(file, JSON.stringify(record, null, 2) + '\n', 'utf-8');
}
