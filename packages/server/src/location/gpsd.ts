import { z } from 'zod';
import type { GpsdConfig } from '@sitescope/shared';
import { GPSD_FIX_MODES } from '@sitescope/shared';
import { acquireFromChannel } from './acquire.js';
import type { LineInterpretation } from './acquire.js';
import { openGpsdSocket, spawnGpspipe } from './channel.js';
import type { ChannelOpener } from './channel.js';
import type { AcquisitionObserver } from './events.js';
import { createPosition } from './position.js';
import type { AcquisitionResult, PositionSource } from './source.js';

const ReportSchema = z.object({ class: z.string() }).passthrough();

const VersionSchema = z.object({ release: z.string().optional(), rev: z.string().optional() }).passthrough();

const DevicesSchema = z.object({
  devices: z.array(z.object({ path: z.string().optional(), driver: z.string().optional() }).passthrough()).default([]),
});

const TpvSchema = z.object({
  class: z.literal('TPV'),
  mode: z.number().int().optional(),
  lat: z.number().optional(),
  lon: z.number().optional(),
  alt: z.number().optional(),
  altMSL: z.number().optional(),
  speed: z.number().optional(),
  track: z.number().optional(),
  time: z.string().optional(),
});

export type TpvReport = z.infer<typeof TpvSchema>;

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

/** Interprets one line of gpsd's JSON stream. Only TPV reports with mode ≥ 2 produce a fix. */
export function interpretGpsdLine(line: string): LineInterpretation {
  const report = ReportSchema.safeParse(parseJson(line));
  if (!report.success) return { kind: 'ignored', reason: 'not a gpsd JSON report' };

  switch (report.data.class) {
    case 'TPV':
      break;
    case 'VERSION': {
      const version = VersionSchema.parse(report.data);
      return { kind: 'info', message: `gpsd ${version.release ?? 'unknown release'}` };
    }
    case 'DEVICES': {
      const { devices } = DevicesSchema.parse(report.data);
      const paths = devices.map(d => d.path ?? '?').join(', ');
      return { kind: 'info', message: devices.length ? `devices: ${paths}` : 'no GPS devices attached to gpsd' };
    }
    default:
      return { kind: 'ignored', reason: `${report.data.class} report` };
  }

  const parsed = TpvSchema.safeParse(report.data);
  if (!parsed.success) return { kind: 'ignored', reason: 'malformed TPV report' };
  const tpv = parsed.data;

  const fixMode = GPSD_FIX_MODES[tpv.mode ?? 0] ?? 'NoFix';
  if (fixMode === 'NoFix') {
    return { kind: 'degraded', fixMode, message: `TPV mode ${tpv.mode ?? 'missing'}` };
  }
  if (tpv.lat === undefined || tpv.lon === undefined) {
    return { kind: 'degraded', fixMode, message: `TPV mode ${tpv.mode} without coordinates` };
  }

  return {
    kind: 'fix',
    position: createPosition({
      latitude: tpv.lat,
      longitude: tpv.lon,
      altitude: fixMode === 'Fix3D' ? tpv.altMSL ?? tpv.alt : undefined,
      speed: tpv.speed,
      track: tpv.track,
      fixMode,
      source: 'gpsd',
    }),
  };
}

export interface GpsdSourceOptions {
  onEvent?: AcquisitionObserver;
  /** Replaces the TCP/gpspipe channel, e.g. with an in-memory stream. */
  openChannel?: ChannelOpener;
}

export class GpsdSource implements PositionSource {
  readonly kind = 'gpsd';

  constructor(private readonly config: GpsdConfig, private readonly options: GpsdSourceOptions = {}) {}

  get label(): string {
    return `gpsd ${this.config.host}:${this.config.port}`;
  }

  acquire(timeoutMs: number, signal?: AbortSignal): Promise<AcquisitionResult> {
    const { host, port, transport } = this.config;
    const open: ChannelOpener = this.options.openChannel
      ?? (transport === 'gpspipe'
        ? (sig) => spawnGpspipe(host, port, sig)
        : (sig) => openGpsdSocket(host, port, sig));
    return acquireFromChannel(open, interpretGpsdLine, {
      source: 'gpsd',
      label: this.label,
      timeoutMs,
      signal,
      onEvent: this.options.onEvent,
    });
  }
}
