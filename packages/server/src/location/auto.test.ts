import { describe, it, expect } from 'vitest';
import { AutoSource } from './auto.js';
import { AcquisitionTimeoutError, NoSourceAvailableError, PositionFileNotFoundError } from '../errors.js';
import { createPosition } from './position.js';
import { failed, fixed } from './source.js';
import type { AcquisitionResult, PositionSource } from './source.js';
import type { LocationSource } from '@sitescope/shared';

function stub(kind: LocationSource, result: AcquisitionResult) {
  const calls: number[] = [];
  const source: PositionSource = {
    kind,
    acquire: async (timeoutMs: number) => {
      calls.push(timeoutMs);
      return result;
    },
  };
  return { source, calls };
}

const daemonFix = createPosition({ latitude: 10, longitude: 20, fixMode: 'Fix3D', source: 'gpsd' });
const fileFix = createPosition({ latitude: 30, longitude: 40, fixMode: 'Fix2D', source: 'file' });

describe('AutoSource', () => {
  it('uses the daemon when it answers, with the short deadline', async () => {
    const daemon = stub('gpsd', fixed(daemonFix));
    const file = stub('file', fixed(fileFix));
    const result = await new AutoSource(daemon.source, file.source, 3000).acquire(10000);

    expect(result.ok && result.position.source).toBe('gpsd');
    expect(daemon.calls).toEqual([3000]);
    expect(file.calls).toEqual([]);
  });

  it('never gives the daemon more than the overall timeout', async () => {
    const daemon = stub('gpsd', fixed(daemonFix));
    const file = stub('file', fixed(fileFix));
    await new AutoSource(daemon.source, file.source, 3000).acquire(1000);
    expect(daemon.calls).toEqual([1000]);
  });

  it('falls back to the file on any daemon failure', async () => {
    const daemon = stub('gpsd', failed(new AcquisitionTimeoutError('gpsd', 3000)));
    const file = stub('file', fixed(fileFix));
    const result = await new AutoSource(daemon.source, file.source, 3000).acquire(10000);
    expect(result.ok && result.position.source).toBe('file');
  });

  it('signals NoSourceAvailable with both causes', async () => {
    const daemonError = new AcquisitionTimeoutError('gpsd', 3000);
    const fileError = new PositionFileNotFoundError('gps_position.txt');
    const daemon = stub('gpsd', failed(daemonError));
    const file = stub('file', failed(fileError));

    const result = await new AutoSource(daemon.source, file.source, 3000).acquire(10000);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(NoSourceAvailableError);
    expect(result.error.code).toBe('NoSourceAvailable');
    expect(result.error instanceof NoSourceAvailableError && result.error.attempts).toEqual([daemonError, fileError]);
  });
});
