import * as net from 'net';
import { spawn } from 'child_process';
import type { Readable } from 'stream';

/** A line-oriented byte stream plus the way to release it. */
export interface LineChannel {
  readonly stream: Readable;
  close(): void;
}

export type ChannelOpener = (signal: AbortSignal) => Promise<LineChannel>;

export const GPSD_WATCH_COMMAND = '?WATCH={"enable":true,"json":true}\n';
export const DEFAULT_GPSD_HOST = '127.0.0.1';
export const DEFAULT_GPSD_PORT = 2947;

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('aborted');
}

/** TCP connection to gpsd with JSON streaming requested. */
export function openGpsdSocket(host: string, port: number, signal: AbortSignal): Promise<LineChannel> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const socket = net.createConnection({ host, port });
    const onAbort = () => {
      socket.destroy();
      reject(abortReason(signal));
    };
    const onError = (err: Error) => {
      signal.removeEventListener('abort', onAbort);
      socket.destroy();
      reject(err);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    socket.once('error', onError);
    socket.once('connect', () => {
      signal.removeEventListener('abort', onAbort);
      socket.off('error', onError);
      console.log(`🛰️ GPS: Connected to gpsd at ${host}:${port}`);
      socket.write(GPSD_WATCH_COMMAND);
      resolve({ stream: socket, close: () => socket.destroy() });
    });
  });
}

/**
 * `gpspipe -w` as a child process. A non-default endpoint is passed as the
 * positional `host:port` argument.
 */
export function spawnGpspipe(host: string, port: number, signal: AbortSignal): Promise<LineChannel> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const args = ['-w'];
    if (host !== DEFAULT_GPSD_HOST || port !== DEFAULT_GPSD_PORT) args.push(`${host}:${port}`);

    const proc = spawn('gpspipe', args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let lastStderr = '';
    proc.stderr.on('data', (data: Buffer) => {
      const text = data.toString().trim();
      if (text) lastStderr = text;
    });

    const onAbort = () => {
      proc.kill('SIGTERM');
      reject(abortReason(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    proc.on('error', (err: Error) => {
      signal.removeEventListener('abort', onAbort);
      reject(err);
      proc.stdout.destroy(err);
    });
    proc.once('exit', (code) => {
      if (code !== null && code !== 0 && lastStderr) {
        proc.stdout.destroy(new Error(`gpspipe exited with code ${code}: ${lastStderr}`));
      }
    });
    proc.once('spawn', () => {
      signal.removeEventListener('abort', onAbort);
      resolve({
        stream: proc.stdout,
        close: () => {
          if (proc.exitCode === null) proc.kill('SIGTERM');
        },
      });
    });
  });
}

/** Serial NMEA receiver. serialport is loaded on first use so hosts without it can still run other sources. */
export async function openSerialPort(device: string, baud: number, signal: AbortSignal): Promise<LineChannel> {
  const { SerialPort } = await import('serialport');
  if (signal.aborted) throw abortReason(signal);

  const port = new SerialPort({ path: device, baudRate: baud, autoOpen: false });
  await new Promise<void>((resolve, reject) => {
    port.open((err) => (err ? reject(err) : resolve()));
  });
  const release = () => {
    if (!port.isOpen) return;
    port.close((err) => {
      if (err) console.warn(`🛰️ GPS: Failed to close ${device}: ${err.message}`);
    });
  };
  if (signal.aborted) {
    release();
    throw abortReason(signal);
  }
  console.log(`🛰️ GPS: Opened ${device} at ${baud} baud`);
  return { stream: port, close: release };
}
