/**
 * TuningCalculator service – deviation relative to a selected reference string.
 *
 * Converts a raw frequency estimate into cents and a flat / in-tune / sharp
 * verdict. The reference is a parameter of every call; the calculator keeps
 * no per-string state.
 */

import { centsDeviation, classifyTuning, IN_TUNE_THRESHOLD_CENTS } from '../../utils/musicUtils';
import { UNDETECTED } from '../../utils/autocorrelation';
import { InvalidParameterError } from '../../utils/errors';
import type { TuningResult } from '../../types/tuning';

export class TuningCalculator {
  readonly inTuneThresholdCents: number;

  constructor(inTuneThresholdCents: number = IN_TUNE_THRESHOLD_CENTS) {
    if (!Number.isFinite(inTuneThresholdCents) || inTuneThresholdCents <= 0) {
      throw new InvalidParameterError(
        `In-tune threshold must be a positive number of cents, got ${inTuneThresholdCents}`
      );
    }
    this.inTuneThresholdCents = inTuneThresholdCents;
  }

  /**
   * Evaluate an estimate against a reference frequency.
   *
   * @param detectedFreq - Estimated frequency in Hz, 0 when undetected
   * @param referenceFreq - Target frequency in Hz
   * @returns the tuning result, or null for an undetected estimate
   */
  evaluate(detectedFreq: number, referenceFreq: number): TuningResult | null {
    if (!Number.isFinite(referenceFreq) || referenceFreq <= 0) {
      throw new InvalidParameterError(`Reference frequency must be a positive number, got ${referenceFreq}`);
    }
    if (detectedFreq === UNDETECTED) return null;

    const cents = centsDeviation(detectedFreq, referenceFreq);
    return {
      frequencyHz: detectedFreq,
      centsDeviation: cents,
      status: classifyTuning(cents, this.inTuneThresholdCents),
    };
  }
}
