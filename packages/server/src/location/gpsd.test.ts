import { describe, it, expect, afterEach } from 'vitest';
import * as net from 'net';
import { PassThrough } from 'stream';
import { GpsdSource, interpretGpsdLine } from './gpsd.js';
import { GPSD_WATCH_COMMAND } from './channel.js';

const TPV_3D = '{"class":"TPV","device":"/dev/ttyACM0","mode":3,"lat":44.9778,"lon":-93.265,"alt":225.0,"altMSL":256.2,"speed":1.5,"track":20.5}';
const TPV_2D = '{"class":"TPV","mode":2,"lat":51.5007,"lon":-0.1246,"alt":12.0}';
const TPV_NO_FIX = '{"class":"TPV","mode":1}';
const VERSION = '{"class":"VERSION","release":"3.25","rev":"3.25","proto_major":3,"proto_minor":15}';
const DEVICES = '{"class":"DEVICES","devices":[{"class":"DEVICE","path":"/dev/ttyACM0","driver":"u-blox"}]}';
const SKY = '{"class":"SKY","satellites":[]}';

describe('interpretGpsdLine', () => {
  it('turns a 3D TPV into a fix, preferring altMSL', () => {
    const out = interpretGpsdLine(TPV_3D);
    expect(out.kind).toBe('fix');
    if (out.kind !== 'fix') return;
    expect(out.position).toMatchObject({
      latitude: 44.9778,
      longitude: -93.265,
      altitude: 256.2,
      speed: 1.5,
      track: 20.5,
      fixMode: 'Fix3D',
      source: 'gpsd',
    });
  });

  it('drops altitude from a 2D fix', () => {
    const out = interpretGpsdLine(TPV_2D);
    expect(out.kind).toBe('fix');
    if (out.kind !== 'fix') return;
    expect(out.position.fixMode).toBe('Fix2D');
    expect(out.position.altitude).toBeUndefined();
  });

  it('reports TPV without a fix as degraded', () => {
    expect(interpretGpsdLine(TPV_NO_FIX)).toEqual({ kind: 'degraded', fixMode: 'NoFix', message: 'TPV mode 1' });
    expect(interpretGpsdLine('{"class":"TPV"}')).toEqual({ kind: 'degraded', fixMode: 'NoFix', message: 'TPV mode missing' });
    expect(interpretGpsdLine('{"class":"TPV","mode":2,"lat":1}')).toEqual({
      kind: 'degraded', fixMode: 'Fix2D', message: 'TPV mode 2 without coordinates',
    });
  });

  it('reports VERSION and DEVICES as information', () => {
    expect(interpretGpsdLine(VERSION)).toEqual({ kind: 'info', message: 'gpsd 3.25' });
    expect(interpretGpsdLine(DEVICES)).toEqual({ kind: 'info', message: 'devices: /dev/ttyACM0' });
    expect(interpretGpsdLine('{"class":"DEVICES","devices":[]}')).toEqual({ kind: 'info', message: 'no GPS devices attached to gpsd' });
  });

  it('ignores other classes, bad JSON and malformed TPV', () => {
    expect(interpretGpsdLine(SKY)).toEqual({ kind: 'ignored', reason: 'SKY report' });
    expect(interpretGpsdLine('{"class":"TPV","mode":3,"lat')).toEqual({ kind: 'ignored', reason: 'not a gpsd JSON report' });
    expect(interpretGpsdLine('[1,2,3]')).toEqual({ kind: 'ignored', reason: 'not a gpsd JSON report' });
    expect(interpretGpsdLine('{"class":"TPV","mode":3,"lat":"north","lon":1}')).toEqual({ kind: 'ignored', reason: 'malformed TPV report' });
  });
});

describe('GpsdSource over a stream', () => {
  it('skips noise and resolves on the first usable TPV', async () => {
    const stream = new PassThrough();
    let closed = 0;
    const source = new GpsdSource({ host: '127.0.0.1', port: 2947, transport: 'tcp' }, {
      openChannel: async () => ({ stream, close: () => { closed++; stream.destroy(); } }),
    });
    const pending = source.acquire(2000);
    stream.write([VERSION, DEVICES, '{"class":"WATCH","enable":true}', TPV_NO_FIX, SKY, TPV_2D, TPV_3D].join('\n') + '\n');

    const result = await pending;
    expect(result.ok && result.position.latitude).toBe(51.5007);
    expect(closed).toBe(1);
  });
});

describe('GpsdSource over TCP', () => {
  let server: net.Server | null = null;
  const accepted = new Set<net.Socket>();

  afterEach(async () => {
    const s = server;
    server = null;
    for (const sock of accepted) sock.destroy();
    accepted.clear();
    if (s?.listening) await new Promise<void>(resolve => s.close(() => resolve()));
  });

  function listen(onConnection: (socket: net.Socket) => void): Promise<number> {
    const s = net.createServer((sock) => {
      accepted.add(sock);
      onConnection(sock);
    });
    server = s;
    return new Promise((resolve, reject) => {
      s.once('error', reject);
      s.listen(0, '127.0.0.1', () => {
        const address = s.address();
        if (address === null || typeof address === 'string') reject(new Error('no TCP address'));
        else resolve(address.port);
      });
    });
  }

  it('sends the WATCH command and reads the TPV stream', async () => {
    const received: string[] = [];
    const port = await listen((socket) => {
      socket.write(VERSION + '\n');
      socket.on('data', (data) => {
        received.push(data.toString());
        socket.write(TPV_NO_FIX + '\n' + TPV_3D + '\n');
      });
      socket.on('error', () => socket.destroy());
    });

    const result = await new GpsdSource({ host: '127.0.0.1', port, transport: 'tcp' }).acquire(3000);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.position.fixMode).toBe('Fix3D');
    expect(result.position.altitude).toBe(256.2);
    expect(received.join('')).toBe(GPSD_WATCH_COMMAND);
  });

  it('times out when the daemon never reports a fix', async () => {
    const port = await listen((socket) => {
      socket.write(TPV_NO_FIX + '\n');
      socket.on('error', () => socket.destroy());
    });
    const result = await new GpsdSource({ host: '127.0.0.1', port, transport: 'tcp' }).acquire(300);
    expect(result.ok ? 'ok' : result.error.code).toBe('AcquisitionTimeout');
  });

  it('gives up after one second while reports keep arriving without a fix', async () => {
    const port = await listen((socket) => {
      socket.write(VERSION + '\n');
      const ticker = setInterval(() => socket.write(TPV_NO_FIX + '\n'), 100);
      socket.on('close', () => clearInterval(ticker));
      socket.on('error', () => {
        clearInterval(ticker);
        socket.destroy();
      });
    });

    const started = Date.now();
    const result = await new GpsdSource({ host: '127.0.0.1', port, transport: 'tcp' }).acquire(1000);
    const elapsed = Date.now() - started;

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('AcquisitionTimeout');
    expect(elapsed).toBeGreaterThanOrEqual(990);
    expect(elapsed).toBeLessThan(1500);
  });

  it('reports SourceUnavailable when the daemon hangs up', async () => {
    const port = await listen((socket) => {
      socket.end(VERSION + '\n');
    });
    const result = await new GpsdSource({ host: '127.0.0.1', port, transport: 'tcp' }).acquire(3000);
    expect(result.ok ? 'ok' : result.error.code).toBe('SourceUnavailable');
  });

  it('reports SourceUnavailable when nothing listens', async () => {
    const port = await listen(() => undefined);
    await new Promise<void>((resolve) => server?.close(() => resolve()));
    const result = await new GpsdSource({ host: '127.0.0.1', port, transport: 'tcp' }).acquire(3000);
    expect(result.ok ? 'ok' : result.error.code).toBe('SourceUnavailable');
  });
});
