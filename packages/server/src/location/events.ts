import type { FixMode, Position } from '@sitescope/shared';
import { FIX_MODE_LABELS } from '@sitescope/shared';

/** Diagnostic observations from a position source; the core never logs on its own. */
export type AcquisitionEvent =
  | { type: 'line'; source: string; line: string }
  | { type: 'ignored'; source: string; line: string; reason: string }
  | { type: 'info'; source: string; message: string }
  | { type: 'degraded'; source: string; fixMode: FixMode; message: string }
  | { type: 'resolved'; source: string; position: Position }
  | { type: 'timeout'; source: string; timeoutMs: number }
  | { type: 'closed'; source: string; reason: string };

export type AcquisitionObserver = (event: AcquisitionEvent) => void;

/** Console output for one event; `line` and `ignored` only show with debug on. */
export function logAcquisitionEvent(event: AcquisitionEvent, debug = false): void {
  switch (event.type) {
    case 'line':
      if (debug) console.log(`🛰️ GPS [${event.source}] ${event.line.slice(0, 100)}`);
      break;
    case 'ignored':
      if (debug) console.log(`🛰️ GPS [${event.source}] skipped (${event.reason})`);
      break;
    case 'info':
      console.log(`🛰️ GPS [${event.source}] ${event.message}`);
      break;
    case 'degraded':
      console.warn(`🛰️ GPS [${event.source}] position without usable fix: ${event.message}`);
      break;
    case 'resolved': {
      const p = event.position;
      console.log(`🛰️ GPS [${event.source}] ✓ ${FIX_MODE_LABELS[p.fixMode]} ${p.latitude.toFixed(6)}°, ${p.longitude.toFixed(6)}°`);
      break;
    }
    case 'timeout':
      console.warn(`🛰️ GPS [${event.source}] timeout after ${event.timeoutMs}ms waiting for fix`);
      break;
    case 'closed':
      console.warn(`🛰️ GPS [${event.source}] channel closed: ${event.reason}`);
      break;
  }
}

export function createAcquisitionLogger(debug = false): AcquisitionObserver {
  return (event) => logAcquisitionEvent(event, debug);
}
