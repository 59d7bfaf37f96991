import type { NmeaConfig } from '@sitescope/shared';
import { acquireFromChannel } from './acquire.js';
import type { LineInterpretation } from './acquire.js';
import { openSerialPort } from './channel.js';
import type { ChannelOpener } from './channel.js';
import type { AcquisitionObserver } from './events.js';
import { createPosition } from './position.js';
import type { AcquisitionResult, PositionSource } from './source.js';

export const KNOTS_TO_MPS = 1852 / 3600;

export interface GgaSentence {
  type: 'GGA';
  talker: string;
  latitude: number | null;
  longitude: number | null;
  /** 0 = no fix */
  quality: number;
  satellites: number | null;
  altitude: number | null;
}

export interface RmcSentence {
  type: 'RMC';
  talker: string;
  active: boolean;
  latitude: number | null;
  longitude: number | null;
  speedKnots: number | null;
  track: number | null;
}

export type NmeaSentence = GgaSentence | RmcSentence;

/** XOR of every character between `$` and `*`, as two uppercase hex digits. */
export function nmeaChecksum(body: string): string {
  let sum = 0;
  for (let i = 0; i < body.length; i++) sum ^= body.charCodeAt(i);
  return sum.toString(16).toUpperCase().padStart(2, '0');
}

function numberField(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/** `ddmm.mmmm` / `dddmm.mmmm` plus hemisphere letter to signed decimal degrees. */
export function parseNmeaCoordinate(value: string | undefined, hemisphere: string | undefined): number | null {
  if (!value || !/^\d+(\.\d+)?$/.test(value)) return null;
  const raw = parseFloat(value);
  const degrees = Math.floor(raw / 100);
  const minutes = raw - degrees * 100;
  if (minutes >= 60) return null;
  const decimal = degrees + minutes / 60;
  switch (hemisphere) {
    case 'N':
    case 'E':
      return decimal;
    case 'S':
    case 'W':
      return -decimal;
    default:
      return null;
  }
}

/**
 * Parses GGA and RMC sentences from any talker. Returns null for other
 * sentence types and for sentences whose checksum does not match.
 */
export function parseNmeaSentence(line: string): NmeaSentence | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('$')) return null;

  const star = trimmed.indexOf('*');
  const body = star >= 0 ? trimmed.slice(1, star) : trimmed.slice(1);
  if (star >= 0 && trimmed.slice(star + 1, star + 3).toUpperCase() !== nmeaChecksum(body)) return null;

  const fields = body.split(',');
  const id = fields[0] ?? '';
  if (id.length !== 5) return null;
  const talker = id.slice(0, 2);

  switch (id.slice(2)) {
    case 'GGA':
      return {
        type: 'GGA',
        talker,
        latitude: parseNmeaCoordinate(fields[2], fields[3]),
        longitude: parseNmeaCoordinate(fields[4], fields[5]),
        quality: numberField(fields[6]) ?? 0,
        satellites: numberField(fields[7]),
        altitude: numberField(fields[9]),
      };
    case 'RMC':
      return {
        type: 'RMC',
        talker,
        active: fields[2] === 'A',
        latitude: parseNmeaCoordinate(fields[3], fields[4]),
        longitude: parseNmeaCoordinate(fields[5], fields[6]),
        speedKnots: numberField(fields[7]),
        track: numberField(fields[8]),
      };
    default:
      return null;
  }
}

export function interpretNmeaLine(line: string): LineInterpretation {
  const sentence = parseNmeaSentence(line);
  if (!sentence) return { kind: 'ignored', reason: 'unsupported or corrupt sentence' };

  if (sentence.type === 'GGA') {
    if (sentence.quality === 0 || sentence.latitude === null || sentence.longitude === null) {
      return { kind: 'degraded', fixMode: 'NoFix', message: `${sentence.talker}GGA without fix` };
    }
    return {
      kind: 'fix',
      position: createPosition({
        latitude: sentence.latitude,
        longitude: sentence.longitude,
        altitude: sentence.altitude,
        fixMode: sentence.altitude !== null ? 'Fix3D' : 'Fix2D',
        source: 'nmea',
      }),
    };
  }

  if (!sentence.active || sentence.latitude === null || sentence.longitude === null) {
    return { kind: 'degraded', fixMode: 'NoFix', message: `${sentence.talker}RMC status void` };
  }
  return {
    kind: 'fix',
    position: createPosition({
      latitude: sentence.latitude,
      longitude: sentence.longitude,
      speed: sentence.speedKnots !== null ? sentence.speedKnots * KNOTS_TO_MPS : null,
      track: sentence.track,
      fixMode: 'Fix2D',
      source: 'nmea',
    }),
  };
}

export interface NmeaSourceOptions {
  onEvent?: AcquisitionObserver;
  openChannel?: ChannelOpener;
}

export class NmeaSource implements PositionSource {
  readonly kind = 'nmea';

  constructor(private readonly config: NmeaConfig, private readonly options: NmeaSourceOptions = {}) {}

  acquire(timeoutMs: number, signal?: AbortSignal): Promise<AcquisitionResult> {
    const { device, baud } = this.config;
    const open: ChannelOpener = this.options.openChannel ?? ((sig) => openSerialPort(device, baud, sig));
    return acquireFromChannel(open, interpretNmeaLine, {
      source: 'nmea',
      label: `${device}@${baud}`,
      timeoutMs,
      signal,
      onEvent: this.options.onEvent,
    });
  }
}
