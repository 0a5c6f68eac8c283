/**
 * Time-domain autocorrelation pitch detection.
 *
 * Scans candidate periods between an 800 Hz ceiling and an 80 Hz floor and
 * picks the lag whose raw (unnormalised) autocorrelation is largest. Covers
 * the violin range G3–E5 with headroom for mistuned strings.
 */

import type { PeriodWindow, SampleBlock } from '../types/tuning';
import { InvalidParameterError } from './errors';

/** Full-scale magnitude of signed 16-bit PCM. */
export const PCM_FULL_SCALE = 32768;

export const MIN_DETECTABLE_HZ = 80;
export const MAX_DETECTABLE_HZ = 800;

/** Returned when no periodic structure was found. */
export const UNDETECTED = 0;

function assertSampleRate(sampleRate: number): void {
  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw new InvalidParameterError(`Sample rate must be a positive number, got ${sampleRate}`);
  }
}

/**
 * Candidate period range, in samples, for a block of the given length.
 * `minPeriod > maxPeriod` means there is nothing to scan.
 */
export function periodSearchWindow(sampleRate: number, blockLength: number): PeriodWindow {
  assertSampleRate(sampleRate);
  return {
    minPeriod: Math.floor(sampleRate / MAX_DETECTABLE_HZ),
    maxPeriod: Math.min(Math.floor(sampleRate / MIN_DETECTABLE_HZ), Math.floor(blockLength / 2)),
  };
}

/** Scales PCM samples to [-1, 1]. */
export function normalizeSamples(block: SampleBlock): Float64Array {
  const normalized = new Float64Array(block.length);
  for (let i = 0; i < block.length; i++) {
    normalized[i] = block[i] / PCM_FULL_SCALE;
  }
  return normalized;
}

/**
 * Unnormalised autocorrelation at one lag: Σ x[i]·x[i + period].
 * Longer lags sum fewer products; the value is not divided by the overlap.
 */
export function correlationAt(normalized: Float64Array, period: number): number {
  let sum = 0;
  const upper = normalized.length - period;
  for (let i = 0; i < upper; i++) {
    sum += normalized[i] * normalized[i + period];
  }
  return sum;
}

/**
 * Estimates the fundamental frequency of a block of 16-bit samples.
 * @param block - mono PCM samples, at least 2
 * @param sampleRate - in Hz
 * @returns frequency in Hz, or 0 when nothing periodic was found
 */
export function detectPitch(block: SampleBlock, sampleRate: number): number {
  assertSampleRate(sampleRate);
  if (block.length < 2) {
    throw new InvalidParameterError(`Sample block must hold at least 2 samples, got ${block.length}`);
  }

  const normalized = normalizeSamples(block);
  const { minPeriod, maxPeriod } = periodSearchWindow(sampleRate, normalized.length);

  // Only a strictly greater value replaces the best, so ties keep the shorter
  // period and a block with no positive correlation stays undetected.
  let maxCorrelation = 0;
  let bestPeriod = 0;

  for (let period = minPeriod; period <= maxPeriod; period++) {
    const correlation = correlationAt(normalized, period);
    if (correlation > maxCorrelation) {
      maxCorrelation = correlation;
      bestPeriod = period;
    }
  }

  return bestPeriod > 0 ? sampleRate / bestPeriod : UNDETECTED;
}
