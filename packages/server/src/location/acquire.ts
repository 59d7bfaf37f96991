import type { FixMode, LocationSource, Position } from '@sitescope/shared';
import { AcquisitionTimeoutError, SourceUnavailableError } from '../errors.js';
import type { AcquisitionEvent, AcquisitionObserver } from './events.js';
import type { ChannelOpener, LineChannel } from './channel.js';
import { failed, fixed } from './source.js';
import type { AcquisitionResult } from './source.js';

/** What one protocol line means to the acquisition loop. */
export type LineInterpretation =
  | { kind: 'fix'; position: Position }
  | { kind: 'degraded'; fixMode: FixMode; message: string }
  | { kind: 'info'; message: string }
  | { kind: 'ignored'; reason: string };

export type LineInterpreter = (line: string) => LineInterpretation;

export interface ChannelAcquisitionOptions {
  source: LocationSource;
  /** Endpoint shown in diagnostics, e.g. `gpsd 127.0.0.1:2947`. */
  label: string;
  timeoutMs: number;
  signal?: AbortSignal;
  onEvent?: AcquisitionObserver;
}

/**
 * Reads lines from a channel until the interpreter yields a fix.
 *
 * The deadline covers opening as well as reading. Lines without a usable fix
 * are reported and skipped, they never restart the clock. Whatever way the
 * wait ends (fix, deadline, stream closed or failed, caller abort) the
 * channel is closed exactly once and the promise resolves; it never rejects.
 */
export function acquireFromChannel(
  open: ChannelOpener,
  interpret: LineInterpreter,
  options: ChannelAcquisitionOptions,
): Promise<AcquisitionResult> {
  const { source, label, timeoutMs, signal, onEvent } = options;
  const emit = (event: AcquisitionEvent) => onEvent?.(event);

  return new Promise((resolve) => {
    const opening = new AbortController();
    let settled = false;
    let channel: LineChannel | null = null;
    let buffer = '';

    const finish = (result: AcquisitionResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      opening.abort();
      channel?.close();
      resolve(result);
    };

    const unavailable = (reason: string) => {
      if (settled) return;
      emit({ type: 'closed', source: label, reason });
      finish(failed(new SourceUnavailableError(source, reason)));
    };

    const timer = setTimeout(() => {
      emit({ type: 'timeout', source: label, timeoutMs });
      finish(failed(new AcquisitionTimeoutError(source, timeoutMs)));
    }, timeoutMs);

    const onAbort = () => unavailable('acquisition cancelled');
    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    const handleLine = (raw: string) => {
      const line = raw.trim();
      if (!line || settled) return;
      emit({ type: 'line', source: label, line });

      let outcome: LineInterpretation;
      try {
        outcome = interpret(line);
      } catch (err) {
        outcome = { kind: 'ignored', reason: err instanceof Error ? err.message : String(err) };
      }

      switch (outcome.kind) {
        case 'fix':
          emit({ type: 'resolved', source: label, position: outcome.position });
          finish(fixed(outcome.position));
          break;
        case 'degraded':
          emit({ type: 'degraded', source: label, fixMode: outcome.fixMode, message: outcome.message });
          break;
        case 'info':
          emit({ type: 'info', source: label, message: outcome.message });
          break;
        case 'ignored':
          emit({ type: 'ignored', source: label, line, reason: outcome.reason });
          break;
      }
    };

    const onData = (chunk: Buffer | string) => {
      buffer += chunk.toString();
      const lines = buffer.split('\n');
      buffer = lines.pop() || '';
      for (const line of lines) {
        handleLine(line);
        if (settled) return;
      }
    };

    const onEnd = () => {
      if (buffer) {
        const rest = buffer;
        buffer = '';
        handleLine(rest);
      }
      unavailable('channel closed before a fix');
    };

    void open(opening.signal).then(
      (opened) => {
        if (settled) {
          opened.close();
          return;
        }
        channel = opened;
        opened.stream.on('data', onData);
        opened.stream.once('end', onEnd);
        opened.stream.once('close', onEnd);
        opened.stream.on('error', (err: Error) => unavailable(err.message));
      },
      (err: unknown) => unavailable(err instanceof Error ? err.message : String(err)),
    );
  });
}
