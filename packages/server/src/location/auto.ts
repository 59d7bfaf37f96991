import { NoSourceAvailableError } from '../errors.js';
import { failed } from './source.js';
import type { AcquisitionResult, PositionSource } from './source.js';

/**
 * Tries the daemon with a short deadline, then the position file.
 * Reports NoSourceAvailable with both causes when neither yields a position.
 */
export class AutoSource implements PositionSource {
  readonly kind = 'auto';

  constructor(
    private readonly daemon: PositionSource,
    private readonly file: PositionSource,
    private readonly daemonTimeoutMs: number,
  ) {}

  async acquire(timeoutMs: number, signal?: AbortSignal): Promise<AcquisitionResult> {
    const first = await this.daemon.acquire(Math.min(this.daemonTimeoutMs, timeoutMs), signal);
    if (first.ok) return first;
    if (signal?.aborted) return first;

    console.log(`🛰️ GPS: ${first.error.message}, falling back to position file`);
    const second = await this.file.acquire(timeoutMs, signal);
    if (second.ok) return second;
    return failed(new NoSourceAvailableError([first.error, second.error]));
  }
}
