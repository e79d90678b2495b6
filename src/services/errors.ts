/**
 * Error taxonomy for the satellite pipeline
 * Location: src/services/errors.ts
 */

import type { CalendarDate, ImageryRequest } from '../types/satellite';

export type SatelliteErrorCode =
  | 'INVALID_COORDINATE'
  | 'INVALID_TIME_WINDOW'
  | 'INVALID_INPUT'
  | 'IMAGERY_UNAVAILABLE'
  | 'TRANSIENT_FETCH_FAILURE'
  | 'UNSUPPORTED_CHANGE_TYPE'
  | 'INCOMPLETE_REPORT'
  | 'ANALYSIS_CANCELLED'
  | 'UNKNOWN_REGION'
  | 'VISION_CALL_FAILED';

export abstract class SatelliteError extends Error {
  abstract readonly code: SatelliteErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidCoordinateError extends SatelliteError {
  readonly code = 'INVALID_COORDINATE';

  constructor(readonly latitude: number, readonly longitude: number, reason: string) {
    super(`Invalid coordinates (${latitude}, ${longitude}): ${reason}`);
  }
}

export class InvalidTimeWindowError extends SatelliteError {
  readonly code = 'INVALID_TIME_WINDOW';
}

export class InvalidInputError extends SatelliteError {
  readonly code = 'INVALID_INPUT';
}

/**
 * No usable raster within the fallback window.
 * `datesTried` lists every date attempted, in attempt order.
 */
export class ImageryUnavailableError extends SatelliteError {
  readonly code = 'IMAGERY_UNAVAILABLE';

  constructor(
    readonly request: ImageryRequest,
    readonly datesTried: CalendarDate[],
    options?: { cause?: unknown }
  ) {
    super(
      `No ${request.layer} imagery for ${request.date} within ±${request.fallbackWindowDays} days ` +
        `(tried ${datesTried.length} date${datesTried.length === 1 ? '' : 's'})`,
      options
    );
  }
}

// Retried internally; only escapes as the cause of ImageryUnavailableError
export class TransientFetchError extends SatelliteError {
  readonly code = 'TRANSIENT_FETCH_FAILURE';
}

export class UnsupportedChangeTypeError extends SatelliteError {
  readonly code = 'UNSUPPORTED_CHANGE_TYPE';

  constructor(readonly changeType: string) {
    super(`Unsupported change type: ${changeType}`);
  }
}

export class IncompleteReportError extends SatelliteError {
  readonly code = 'INCOMPLETE_REPORT';

  constructor(readonly missing: string[]) {
    super(`Report is missing required fields: ${missing.join(', ')}`);
  }
}

export class AnalysisCancelledError extends SatelliteError {
  readonly code = 'ANALYSIS_CANCELLED';

  constructor(message = 'Analysis was cancelled') {
    super(message);
  }
}

export class UnknownRegionError extends SatelliteError {
  readonly code = 'UNKNOWN_REGION';

  constructor(readonly regionKey: string, available: string[]) {
    super(`Region '${regionKey}' not found. Available regions: ${available.join(', ')}`);
  }
}

export class VisionCallError extends SatelliteError {
  readonly code = 'VISION_CALL_FAILED';
}

/**
 * Filesystem errors raised by Node can come from another realm (Jest's
 * module sandbox), so `instanceof Error` is not reliable here.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}
