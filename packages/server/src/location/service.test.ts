import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LocationService } from './service.js';
import { AcquisitionError, AcquisitionTimeoutError, SourceUnavailableError } from '../errors.js';
import { createPosition } from './position.js';
import { failed, fixed } from './source.js';
import type { AcquisitionResult, PositionSource } from './source.js';
import type { Position } from '@sitescope/shared';

const quiet = () => undefined;
const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));
const FIX = createPosition({ latitude: 44.9778, longitude: -93.265, fixMode: 'Fix3D', source: 'gpsd' });

function countingSource(result: AcquisitionResult) {
  const state = { calls: 0 };
  const source: PositionSource = {
    kind: 'gpsd',
    acquire: async () => {
      state.calls++;
      await sleep(5);
      return result;
    },
  };
  return { source, state };
}

describe('LocationService', () => {
  const services: LocationService[] = [];
  const make = (options: ConstructorParameters<typeof LocationService>[0]) => {
    const service = new LocationService({ onEvent: quiet, ...options });
    services.push(service);
    return service;
  };

  afterEach(() => {
    for (const s of services.splice(0)) s.stop();
  });

  it('publishes each fix as the last known position', async () => {
    const { source } = countingSource(fixed(FIX));
    const service = make({ sourceFactory: () => source });
    const seen: Position[] = [];
    service.on('location', (p: Position) => seen.push(p));

    expect(service.getLastPosition()).toBeNull();
    const result = await service.acquireOnce();

    expect(result.ok).toBe(true);
    expect(service.getLastPosition()).toBe(FIX);
    expect(seen).toEqual([FIX]);
  });

  it('emits acquisition_error and keeps the previous position on failure', async () => {
    const { source } = countingSource(failed(new AcquisitionTimeoutError('gpsd', 100)));
    const service = make({ sourceFactory: () => source });
    service.setManualPosition(10, 20);
    const errors: AcquisitionError[] = [];
    service.on('acquisition_error', (e: AcquisitionError) => errors.push(e));

    await service.acquireOnce();

    expect(errors.map(e => e.code)).toEqual(['AcquisitionTimeout']);
    expect(service.getLastPosition()?.latitude).toBe(10);
  });

  it('shares one attempt between concurrent callers', async () => {
    const { source, state } = countingSource(fixed(FIX));
    const service = make({ sourceFactory: () => source });
    const [a, b] = await Promise.all([service.acquireOnce(), service.acquireOnce()]);
    expect(a).toBe(b);
    expect(state.calls).toBe(1);
  });

  it('rejects a manual position out of range', () => {
    const service = make({});
    expect(() => service.setManualPosition(91, 0)).toThrow('Invalid coordinate');
    expect(service.getLastPosition()).toBeNull();
  });

  it('keeps acquiring until stopped', async () => {
    const { source, state } = countingSource(fixed(FIX));
    const service = make({ sourceFactory: () => source, overrides: { pollIntervalMs: 10 } });
    service.start();
    expect(service.isRunning()).toBe(true);
    await sleep(150);
    service.stop();
    const calls = state.calls;
    expect(calls).toBeGreaterThanOrEqual(2);
    await sleep(50);
    expect(state.calls).toBe(calls);
  });

  it('keeps a single polling loop when restarted during an attempt', async () => {
    let release: (result: AcquisitionResult) => void = () => undefined;
    const held: PositionSource = {
      kind: 'gpsd',
      acquire: () => new Promise((resolve) => {
        release = resolve;
      }),
    };
    const service = make({ sourceFactory: () => held, overrides: { pollIntervalMs: 60000 } });
    const timers = vi.spyOn(globalThis, 'setTimeout');
    try {
      service.start();
      service.stop();
      service.start();
      const attempt = service.acquireOnce();
      release(fixed(FIX));
      await attempt;
      await sleep(0);

      const polls = timers.mock.calls.filter(([, ms]) => ms === 60000);
      expect(polls).toHaveLength(1);
    } finally {
      timers.mockRestore();
    }
  });

  it('aborts the pending acquisition on stop', async () => {
    let seenSignal: AbortSignal | undefined;
    const waiting: PositionSource = {
      kind: 'gpsd',
      acquire: (_timeoutMs, signal) => new Promise((resolve) => {
        seenSignal = signal;
        signal?.addEventListener('abort', () => resolve(failed(new SourceUnavailableError('gpsd', 'acquisition cancelled'))));
      }),
    };
    const service = make({ sourceFactory: () => waiting });
    const pending = service.acquireOnce();
    service.stop();
    const result = await pending;
    expect(seenSignal?.aborted).toBe(true);
    expect(result.ok ? 'ok' : result.error.code).toBe('SourceUnavailable');
  });

  it('builds the configured source when no factory is given', async () => {
    const service = make({ overrides: { source: 'manual', manual: { latitude: 1.5, longitude: 2.5 } } });
    const result = await service.acquireOnce();
    expect(result.ok && result.position).toMatchObject({ latitude: 1.5, longitude: 2.5, source: 'manual', fixMode: 'Fix3D' });
  });

  it('rejects when manual is selected without coordinates', async () => {
    const service = make({ overrides: { source: 'manual' } });
    await expect(service.acquireOnce()).rejects.toThrow('needs a latitude and longitude');
  });

  describe('settings', () => {
    let dir = '';

    afterEach(() => {
      if (dir) fs.rmSync(dir, { recursive: true, force: true });
      dir = '';
    });

    it('persists validated updates and loads them back', () => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sitescope-settings-'));
      const file = path.join(dir, 'data', 'location-settings.json');

      const first = make({ settingsFile: file });
      expect(first.getSettings().source).toBe('auto');
      first.updateSettings({ source: 'gpsd', gpsd: { port: 2948 } });

      const second = make({ settingsFile: file });
      expect(second.getSettings().source).toBe('gpsd');
      expect(second.getSettings().gpsd).toEqual({ host: '127.0.0.1', port: 2948, transport: 'tcp' });
    });

    it('does not persist overrides', () => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sitescope-settings-'));
      const file = path.join(dir, 'location-settings.json');
      const service = make({ settingsFile: file, overrides: { source: 'file' } });
      expect(service.getSettings().source).toBe('file');
      expect(fs.existsSync(file)).toBe(false);
    });

    it('throws on invalid updates and keeps the old settings', () => {
      const service = make({});
      expect(() => service.updateSettings({ source: 'starlink' })).toThrow();
      expect(() => service.updateSettings({ gpsd: { port: 70000 } })).toThrow();
      expect(service.getSettings().source).toBe('auto');
      expect(service.getSettings().gpsd.port).toBe(2947);
    });

    it('falls back to defaults for an unreadable settings file', () => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sitescope-settings-'));
      const file = path.join(dir, 'location-settings.json');
      fs.writeFileSync(file, '{ not json');
      const service = make({ settingsFile: file });
      expect(service.getSettings().source).toBe('auto');
    });
  });
});
