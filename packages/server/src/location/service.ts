import { EventEmitter } from 'events';
import type { LocationSettings, Position } from '@sitescope/shared';
import { createAcquisitionLogger } from './events.js';
import type { AcquisitionObserver } from './events.js';
import { createPositionSource } from './index.js';
import type { PositionSourceOptions } from './index.js';
import { createPosition } from './position.js';
import { LocationSettingsPatchSchema, defaultSettings, loadSettingsFile, mergeSettings, saveSettingsFile } from './settings.js';
import type { LocationSettingsPatch } from './settings.js';
import type { AcquisitionResult, PositionSource } from './source.js';

export interface LocationServiceOptions {
  /** Persisted settings; null keeps everything in memory. */
  settingsFile?: string | null;
  /** Applied over the loaded settings and never persisted (CLI flags, environment). */
  overrides?: LocationSettingsPatch;
  debug?: boolean;
  onEvent?: AcquisitionObserver;
  openers?: PositionSourceOptions['openers'];
  /** Replaces createPositionSource, for tests. */
  sourceFactory?: (settings: LocationSettings) => PositionSource;
}

/**
 * Owns the acquisition loop and the last known position.
 * Emits `location` (Position) on every fix and `acquisition_error` (AcquisitionError)
 * on every failed attempt.
 */
export class LocationService extends EventEmitter {
  private settings: LocationSettings;
  private lastPosition: Position | null = null;
  private pending: Promise<AcquisitionResult> | null = null;
  private controller: AbortController | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  /** Bumped on every start and stop so a loop from an earlier run cannot reschedule. */
  private generation = 0;
  private readonly onEvent: AcquisitionObserver;

  constructor(private readonly options: LocationServiceOptions = {}) {
    super();
    const stored = options.settingsFile ? loadSettingsFile(options.settingsFile) : defaultSettings();
    this.settings = options.overrides ? mergeSettings(stored, options.overrides) : stored;
    this.onEvent = options.onEvent ?? createAcquisitionLogger(options.debug);
  }

  // ── Settings ─────────────────────────────────────────────────────────

  getSettings(): LocationSettings {
    return mergeSettings(this.settings, {});
  }

  /** Validates and applies a partial update; throws ZodError on bad input. */
  updateSettings(patch: unknown): LocationSettings {
    const parsed = LocationSettingsPatchSchema.parse(patch);
    this.settings = mergeSettings(this.settings, parsed);
    if (this.options.settingsFile) saveSettingsFile(this.options.settingsFile, this.settings);
    this.emit('settings_changed', this.getSettings());
    console.log(`📍 Location source: ${this.settings.source}`);
    return this.getSettings();
  }

  // ── Positions ────────────────────────────────────────────────────────

  getLastPosition(): Position | null {
    return this.lastPosition;
  }

  /** Manual position from any caller; throws InvalidCoordinateError when out of range. */
  setManualPosition(latitude: number, longitude: number, altitude?: number): Position {
    const position = createPosition({ latitude, longitude, altitude, fixMode: 'Fix3D', source: 'manual' });
    this.publish(position);
    return position;
  }

  private publish(position: Position) {
    this.lastPosition = position;
    this.emit('location', position);
    console.log(`📍 Position updated: ${position.latitude.toFixed(4)}°, ${position.longitude.toFixed(4)}° (${position.source})`);
  }

  private createSource(): PositionSource {
    if (this.options.sourceFactory) return this.options.sourceFactory(this.settings);
    return createPositionSource(this.settings, { onEvent: this.onEvent, openers: this.options.openers });
  }

  /**
   * One acquisition with the configured source. Concurrent callers share the
   * attempt already in flight so only one channel is ever open. Rejects only
   * when the settings cannot build a source.
   */
  acquireOnce(): Promise<AcquisitionResult> {
    if (this.pending) return this.pending;

    let source: PositionSource;
    try {
      source = this.createSource();
    } catch (err) {
      return Promise.reject(err);
    }
    const controller = new AbortController();
    this.controller = controller;
    const attempt = source
      .acquire(this.settings.timeoutMs, controller.signal)
      .then((result) => {
        if (result.ok) this.publish(result.position);
        else this.emit('acquisition_error', result.error);
        return result;
      })
      .finally(() => {
        this.pending = null;
        if (this.controller === controller) this.controller = null;
      });
    this.pending = attempt;
    return attempt;
  }

  // ── Tracking loop ────────────────────────────────────────────────────

  isRunning(): boolean {
    return this.running;
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.generation++;
    console.log(`📍 Location service started (source: ${this.settings.source}, every ${this.settings.pollIntervalMs}ms)`);
    this.tick(this.generation);
  }

  private tick(generation: number) {
    if (!this.running || generation !== this.generation) return;
    void this.acquireOnce()
      .catch((err: unknown) => {
        console.error('⚠️ Location acquisition failed unexpectedly:', err);
      })
      .finally(() => {
        if (!this.running || generation !== this.generation) return;
        if (this.timer) clearTimeout(this.timer);
        this.timer = setTimeout(() => this.tick(generation), this.settings.pollIntervalMs);
      });
  }

  stop() {
    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
  }
}
