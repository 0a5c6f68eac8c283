/**
 * PitchDetector service – fundamental frequency identification.
 *
 * Binds the autocorrelation estimator to the capture sample rate so the
 * acquisition loop can hand it blocks directly.
 */

import { detectPitch, periodSearchWindow } from '../../utils/autocorrelation';
import { InvalidParameterError } from '../../utils/errors';
import type { PeriodWindow, SampleBlock } from '../../types/tuning';

export class PitchDetector {
  readonly sampleRate: number;

  constructor(sampleRate: number) {
    if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
      throw new InvalidParameterError(`Sample rate must be a positive number, got ${sampleRate}`);
    }
    this.sampleRate = sampleRate;
  }

  /**
   * Detect the fundamental frequency of one block.
   * @returns frequency in Hz, or 0 when no pitch was found
   */
  detect(block: SampleBlock): number {
    return detectPitch(block, this.sampleRate);
  }

  /** Periods that will be scanned for a block of this length. */
  searchWindow(blockLength: number): PeriodWindow {
    return periodSearchWindow(this.sampleRate, blockLength);
  }
}
