/**
 * TypeScript interfaces for the violin tuner data model.
 */

export type StringName = 'G' | 'D' | 'A' | 'E';

/** One of the four fixed target pitches. */
export interface ReferenceString {
  readonly name: StringName;
  readonly frequency: number; // Hz
}

/**
 * One block of mono signed 16-bit PCM samples ([-32768, 32767]).
 * Any array-like of numbers is accepted by the estimator.
 */
export type SampleBlock = ArrayLike<number>;

export type TuningStatus = 'flat' | 'in-tune' | 'sharp';

export interface TuningResult {
  frequencyHz: number;
  centsDeviation: number; // positive = sharp, negative = flat
  status: TuningStatus;
}

export interface PeriodWindow {
  /** Shortest candidate period in samples (800 Hz ceiling). */
  minPeriod: number;
  /** Longest candidate period in samples (80 Hz floor, at most half the block). */
  maxPeriod: number;
}
