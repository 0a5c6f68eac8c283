/**
 * Tuner configuration – defaults and validation.
 */

import { InvalidParameterError } from '../utils/errors';

export interface TunerConfig {
  /** Capture sample rate in Hz. */
  sampleRate: number;
  /** Samples per acquisition block. */
  blockSize: number;
  /** Listening stops by itself after this many ms. */
  autoStopMs: number;
  /** |cents| below this is in tune. */
  inTuneThresholdCents: number;
  /** Length of the reference tone in ms. */
  toneDurationMs: number;
}

export const DEFAULT_TUNER_CONFIG: Readonly<TunerConfig> = Object.freeze({
  sampleRate: 44100,
  blockSize: 4096,
  autoStopMs: 30_000,
  inTuneThresholdCents: 5,
  toneDurationMs: 2000,
});

function assertPositive(key: keyof TunerConfig, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(`${key} must be a positive number, got ${value}`);
  }
}

/** Fills unset fields from the defaults and validates the result. */
export function resolveTunerConfig(overrides: Partial<TunerConfig> = {}): TunerConfig {
  const config: TunerConfig = {
    sampleRate: overrides.sampleRate ?? DEFAULT_TUNER_CONFIG.sampleRate,
    blockSize: overrides.blockSize ?? DEFAULT_TUNER_CONFIG.blockSize,
    autoStopMs: overrides.autoStopMs ?? DEFAULT_TUNER_CONFIG.autoStopMs,
    inTuneThresholdCents: overrides.inTuneThresholdCents ?? DEFAULT_TUNER_CONFIG.inTuneThresholdCents,
    toneDurationMs: overrides.toneDurationMs ?? DEFAULT_TUNER_CONFIG.toneDurationMs,
  };

  assertPositive('sampleRate', config.sampleRate);
  assertPositive('blockSize', config.blockSize);
  assertPositive('autoStopMs', config.autoStopMs);
  assertPositive('inTuneThresholdCents', config.inTuneThresholdCents);
  assertPositive('toneDurationMs', config.toneDurationMs);

  if (!Number.isInteger(config.blockSize) || config.blockSize < 2) {
    throw new InvalidParameterError(`blockSize must be an integer of at least 2, got ${config.blockSize}`);
  }

  return config;
}
