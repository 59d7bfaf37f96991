import type { LocationSource, Position } from '@sitescope/shared';
import type { AcquisitionError } from '../errors.js';

export type AcquisitionResult =
  | { ok: true; position: Position }
  | { ok: false; error: AcquisitionError };

/**
 * One backend able to produce a Position. `acquire` resolves with a failure
 * result instead of rejecting, and releases whatever handle it opened.
 */
export interface PositionSource {
  readonly kind: LocationSource;
  acquire(timeoutMs: number, signal?: AbortSignal): Promise<AcquisitionResult>;
}

export const fixed = (position: Position): AcquisitionResult => ({ ok: true, position });
export const failed = (error: AcquisitionError): AcquisitionResult => ({ ok: false, error });
