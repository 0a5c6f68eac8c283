/**
 * Music utilities for the violin tuner.
 * Handles cents deviation, tuning classification and display formatting.
 */

import type { TuningStatus } from '../types/tuning';
import { InvalidParameterError } from './errors';

/** |cents| strictly below this is in tune. */
export const IN_TUNE_THRESHOLD_CENTS = 5;

export const CENTS_PER_OCTAVE = 1200;

// Cents are rounded to 1e-9 so that an interval of exactly ±threshold lands on
// the boundary even when log2 comes out a hair inside.
const CENTS_RESOLUTION = 1e9;

function assertPositiveFrequency(label: string, freq: number): void {
  if (!Number.isFinite(freq) || freq <= 0) {
    throw new InvalidParameterError(`${label} frequency must be a positive number, got ${freq}`);
  }
}

/**
 * Signed deviation in cents between a detected frequency and a target.
 * Positive = sharp, negative = flat. Rounded to 1e-9 cents.
 */
export function centsDeviation(detectedFreq: number, referenceFreq: number): number {
  assertPositiveFrequency('Detected', detectedFreq);
  assertPositiveFrequency('Reference', referenceFreq);
  const cents = CENTS_PER_OCTAVE * Math.log2(detectedFreq / referenceFreq);
  return Math.round(cents * CENTS_RESOLUTION) / CENTS_RESOLUTION;
}

/**
 * In tune only while |cents| < threshold, so exactly +threshold is sharp
 * and exactly -threshold is flat.
 */
export function classifyTuning(
  cents: number,
  threshold: number = IN_TUNE_THRESHOLD_CENTS
): TuningStatus {
  if (Math.abs(cents) < threshold) return 'in-tune';
  return cents > 0 ? 'sharp' : 'flat';
}

/**
 * Signed Hz difference between a detected frequency and a target.
 */
export function hzDeviation(detectedFreq: number, referenceFreq: number): number {
  return detectedFreq - referenceFreq;
}

/**
 * Formats cents as a signed whole number, truncated toward zero (e.g. "+7", "-12", "0").
 */
export function formatCents(cents: number): string {
  const whole = Math.trunc(cents);
  if (whole === 0) return '0';
  return whole > 0 ? `+${whole}` : `${whole}`;
}

/** Status line shown under the frequency readout. */
export function formatTuningStatus(status: TuningStatus, cents: number): string {
  switch (status) {
    case 'in-tune':
      return 'IN TUNE ✓';
    case 'sharp':
      return `SHARP (${formatCents(cents)} cents)`;
    case 'flat':
      return `FLAT (${formatCents(cents)} cents)`;
  }
}
