/**
 * Error types raised by the tuner core.
 *
 * "No pitch detected" is not an error: the estimator returns 0 for it.
 */

export type TunerErrorCode =
  | 'INVALID_PARAMETER'
  | 'ACQUISITION_UNAVAILABLE'
  | 'PLAYBACK_UNAVAILABLE';

export class TunerError extends Error {
  readonly code: TunerErrorCode;

  constructor(message: string, code: TunerErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TunerError';
    this.code = code;
  }
}

/** A non-positive sample rate, a too-short block, a non-positive frequency… */
export class InvalidParameterError extends TunerError {
  constructor(message: string) {
    super(message, 'INVALID_PARAMETER');
    this.name = 'InvalidParameterError';
  }
}

/** The audio input could not be opened (permission, busy device, closed stream). */
export class AcquisitionUnavailableError extends TunerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ACQUISITION_UNAVAILABLE', options);
    this.name = 'AcquisitionUnavailableError';
  }
}

export class PlaybackUnavailableError extends TunerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PLAYBACK_UNAVAILABLE', options);
    this.name = 'PlaybackUnavailableError';
  }
}

/** Normalises anything thrown into an Error instance. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
