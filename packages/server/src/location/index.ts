import type { LocationSettings } from '@sitescope/shared';
import { AutoSource } from './auto.js';
import type { ChannelOpener } from './channel.js';
import type { AcquisitionObserver } from './events.js';
import { FileSource } from './file.js';
import { GpsdSource } from './gpsd.js';
import { ManualSource } from './manual.js';
import { NmeaSource } from './nmea.js';
import type { PositionSource } from './source.js';

export interface PositionSourceOptions {
  onEvent?: AcquisitionObserver;
  /** Channel overrides, used to run sources against in-memory streams. */
  openers?: { gpsd?: ChannelOpener; nmea?: ChannelOpener };
}

/** Builds the source named by `settings.source`. */
export function createPositionSource(settings: LocationSettings, options: PositionSourceOptions = {}): PositionSource {
  const { onEvent, openers = {} } = options;
  const gpsd = () => new GpsdSource(settings.gpsd, { onEvent, openChannel: openers.gpsd });
  const file = () => new FileSource(settings.file.path, onEvent);

  switch (settings.source) {
    case 'manual':
      if (!settings.manual) throw new Error('Manual location source needs a latitude and longitude');
      return new ManualSource(settings.manual.latitude, settings.manual.longitude);
    case 'file':
      return file();
    case 'gpsd':
      return gpsd();
    case 'nmea':
      return new NmeaSource(settings.nmea, { onEvent, openChannel: openers.nmea });
    case 'auto':
      return new AutoSource(gpsd(), file(), settings.autoDaemonTimeoutMs);
  }
}

export { AutoSource, FileSource, GpsdSource, ManualSource, NmeaSource };
export { savePositionFile, parsePositionFile } from './file.js';
export { createPosition, hasFix } from './position.js';
export { createAcquisitionLogger, logAcquisitionEvent } from './events.js';
export type { AcquisitionEvent, AcquisitionObserver } from './events.js';
export { failed, fixed } from './source.js';
export type { AcquisitionResult, PositionSource } from './source.js';
export type { LineChannel, ChannelOpener } from './channel.js';
