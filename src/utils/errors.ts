/**
 * Custom Error Types for geoframes
 */

export class GeoFramesError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'GeoFramesError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InputError extends GeoFramesError {
  constructor(message: string, details?: unknown) {
    super(message, 'INPUT_ERROR', details);
    this.name = 'InputError';
  }
}

/**
 * Raised for an SRID code that names neither Lambert-93 nor a UTM zone
 */
export class UnsupportedProjectionError extends GeoFramesError {
  constructor(public srid: number) {
    super(`SRID code ${srid} is not supported`, 'UNSUPPORTED_PROJECTION', { srid });
    this.name = 'UnsupportedProjectionError';
  }
}

export class ProjectionError extends GeoFramesError {
  constructor(message: string, details?: unknown) {
    super(message, 'PROJECTION_ERROR', details);
    this.name = 'ProjectionError';
  }
}
