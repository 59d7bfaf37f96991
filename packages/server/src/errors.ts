export type AcquisitionErrorCode =
  | 'InvalidCoordinate'
  | 'AcquisitionTimeout'
  | 'SourceUnavailable'
  | 'NotFound'
  | 'Malformed'
  | 'NoSourceAvailable';

export class InvalidCoordinateError extends Error {
  readonly code = 'InvalidCoordinate';

  constructor(readonly latitude: number, readonly longitude: number) {
    super(`Invalid coordinate ${latitude}, ${longitude} (latitude must be within ±90°, longitude within ±180°)`);
    this.name = 'InvalidCoordinateError';
  }
}

/** Grid projection asked for outside the UTM/MGRS latitude bands (80°S–84°N). */
export class UndefinedProjectionError extends Error {
  readonly code = 'UndefinedProjection';

  constructor(readonly latitude: number) {
    super(`UTM/MGRS undefined at latitude ${latitude}° (valid from 80°S to 84°N)`);
    this.name = 'UndefinedProjectionError';
  }
}

export class AcquisitionError extends Error {
  constructor(readonly code: AcquisitionErrorCode, readonly source: string, message: string) {
    super(message);
    this.name = 'AcquisitionError';
  }
}

export class AcquisitionTimeoutError extends AcquisitionError {
  constructor(source: string, readonly timeoutMs: number) {
    super('AcquisitionTimeout', source, `${source}: no fix within ${timeoutMs}ms`);
    this.name = 'AcquisitionTimeoutError';
  }
}

export class SourceUnavailableError extends AcquisitionError {
  constructor(source: string, reason: string) {
    super('SourceUnavailable', source, `${source}: ${reason}`);
    this.name = 'SourceUnavailableError';
  }
}

export class PositionFileNotFoundError extends AcquisitionError {
  constructor(readonly path: string) {
    super('NotFound', 'file', `Position file not found: ${path}`);
    this.name = 'PositionFileNotFoundError';
  }
}

export class MalformedPositionError extends AcquisitionError {
  constructor(readonly path: string, reason: string) {
    super('Malformed', 'file', `Position file ${path} is malformed: ${reason}`);
    this.name = 'MalformedPositionError';
  }
}

export class InvalidPositionError extends AcquisitionError {
  constructor(source: string, cause: InvalidCoordinateError) {
    super('InvalidCoordinate', source, cause.message);
    this.name = 'InvalidPositionError';
  }
}

export class NoSourceAvailableError extends AcquisitionError {
  constructor(readonly attempts: readonly AcquisitionError[]) {
    super('NoSourceAvailable', 'auto', `No position source available (${attempts.map(e => e.message).join('; ')})`);
    this.name = 'NoSourceAvailableError';
  }
}

/** A catalog that cannot be read at all; single bad records are warnings instead. */
export class CatalogError extends Error {
  readonly code = 'CatalogUnreadable';

  constructor(readonly path: string, reason: string) {
    super(`Cannot load site catalog ${path}: ${reason}`);
    this.name = 'CatalogError';
  }
}
