/**
 * TuningPipeline – acquisition → pitch estimate → tuning verdict.
 *
 * Each block from the source is estimated inline on the capture loop; non-zero
 * estimates are evaluated against the reference returned by `reference()` at
 * that moment and pushed through a ResultChannel, so the consumer sees results
 * asynchronously and in block order. Undetected blocks produce nothing.
 */

import { AudioCapture } from './audioCapture';
import type { SampleSource } from './audioCapture';
import { PitchDetector } from './pitchDetector';
import { TuningCalculator } from './tuningCalculator';
import { ResultChannel } from './resultChannel';
import { UNDETECTED } from '../../utils/autocorrelation';
import type { ReferenceString, TuningResult } from '../../types/tuning';

export interface TuningPipelineHandlers {
  /** Currently selected string, read once per evaluated block. */
  reference: () => ReferenceString;
  onResult: (result: TuningResult) => void;
  onError?: (error: Error) => void;
  /** Listening ended without stop(): the source ran out or failed. */
  onEnd?: () => void;
}

export class TuningPipeline {
  private readonly capture: AudioCapture;
  private readonly detector: PitchDetector;
  private readonly calculator: TuningCalculator;
  private channel: ResultChannel<TuningResult> | null = null;

  constructor(source: SampleSource, calculator: TuningCalculator = new TuningCalculator()) {
    this.capture = new AudioCapture(source);
    this.detector = new PitchDetector(source.sampleRate);
    this.calculator = calculator;
  }

  get isListening(): boolean {
    return this.capture.isActive;
  }

  async start(handlers: TuningPipelineHandlers): Promise<void> {
    if (this.capture.isActive) return;

    const channel = new ResultChannel<TuningResult>(handlers.onResult, handlers.onError);
    this.channel = channel;

    try {
      await this.capture.start({
        onBlock: block => {
          const frequency = this.detector.detect(block);
          if (frequency === UNDETECTED) return;
          const result = this.calculator.evaluate(frequency, handlers.reference().frequency);
          if (result) channel.send(result);
        },
        onError: handlers.onError,
        onEnd: () => {
          // let the results already produced reach the consumer before it hears about the end
          channel
            .close()
            .then(() => handlers.onEnd?.())
            .catch((err: unknown) => console.error('[TuningPipeline] closing results failed:', err));
        },
      });
    } catch (err) {
      this.channel = null;
      await channel.close();
      throw err;
    }
  }

  /** Stop listening and deliver results still in flight. Idempotent. */
  async stop(): Promise<void> {
    await this.capture.stop();
    const channel = this.channel;
    this.channel = null;
    await channel?.close();
  }
}
