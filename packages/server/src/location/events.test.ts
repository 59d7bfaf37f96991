import { describe, it, expect, afterEach, vi } from 'vitest';
import { createAcquisitionLogger, logAcquisitionEvent } from './events.js';
import { createPosition } from './position.js';

describe('logAcquisitionEvent', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints raw lines only in debug mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logAcquisitionEvent({ type: 'line', source: 'gpsd 127.0.0.1:2947', line: '{"class":"SKY"}' });
    expect(log).not.toHaveBeenCalled();

    createAcquisitionLogger(true)({ type: 'line', source: 'gpsd 127.0.0.1:2947', line: '{"class":"SKY"}' });
    expect(log).toHaveBeenCalledWith('🛰️ GPS [gpsd 127.0.0.1:2947] {"class":"SKY"}');
  });

  it('reports a resolved fix with six decimals', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const position = createPosition({ latitude: 44.9778, longitude: -93.265, fixMode: 'Fix2D', source: 'nmea' });
    logAcquisitionEvent({ type: 'resolved', source: '/dev/ttyUSB0@9600', position });
    expect(log).toHaveBeenCalledWith('🛰️ GPS [/dev/ttyUSB0@9600] ✓ 2D fix 44.977800°, -93.265000°');
  });

  it('warns on timeouts and degraded fixes', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    logAcquisitionEvent({ type: 'timeout', source: 'gpsd 127.0.0.1:2947', timeoutMs: 3000 });
    logAcquisitionEvent({ type: 'degraded', source: 'gpsd 127.0.0.1:2947', fixMode: 'NoFix', message: 'TPV mode 1' });
    expect(warn.mock.calls).toEqual([
      ['🛰️ GPS [gpsd 127.0.0.1:2947] timeout after 3000ms waiting for fix'],
      ['🛰️ GPS [gpsd 127.0.0.1:2947] position without usable fix: TPV mode 1'],
    ]);
  });
});
