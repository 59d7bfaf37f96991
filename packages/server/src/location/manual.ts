import { InvalidCoordinateError, InvalidPositionError } from '../errors.js';
import { createPosition } from './position.js';
import { failed, fixed } from './source.js';
import type { AcquisitionResult, PositionSource } from './source.js';

/** Caller-supplied coordinates, trusted as a 3D fix once they pass the range check. */
export class ManualSource implements PositionSource {
  readonly kind = 'manual';

  constructor(readonly latitude: number, readonly longitude: number, readonly altitude?: number) {}

  async acquire(): Promise<AcquisitionResult> {
    try {
      return fixed(createPosition({
        latitude: this.latitude,
        longitude: this.longitude,
        altitude: this.altitude,
        fixMode: 'Fix3D',
        source: 'manual',
      }));
    } catch (err) {
      if (err instanceof InvalidCoordinateError) return failed(new InvalidPositionError('manual', err));
      throw err;
    }
  }
}
