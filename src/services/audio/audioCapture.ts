/**
 * AudioCapture service – runs the acquisition loop over a SampleSource.
 *
 * Reads fixed-size blocks in arrival order and hands each one to a callback.
 * The next read starts only once the callback has returned, so blocks are
 * never reordered or merged. Stopping is idempotent and the capture can be
 * started again afterwards.
 */

import { toError } from '../../utils/errors';

/**
 * Anything that can deliver fixed-size blocks of signed 16-bit mono samples:
 * a microphone pipe, a file, a synthetic test signal.
 */
export interface SampleSource {
  readonly sampleRate: number;
  readonly blockSize: number;
  /** Acquire the input. Rejects with AcquisitionUnavailableError when it cannot be used. */
  open(): Promise<void>;
  /** Next block in arrival order, or null once the input is exhausted or closed. */
  read(): Promise<Int16Array | null>;
  /** Release the input. Idempotent; a pending read resolves null. */
  close(): Promise<void>;
}

export type SampleBlockCallback = (block: Int16Array, sampleRate: number) => void | Promise<void>;

export interface AudioCaptureHandlers {
  onBlock: SampleBlockCallback;
  /** Loop failure. Without a handler the failure is logged. */
  onError?: (error: Error) => void;
  /** The loop ended without stop() being called (exhausted input or failure). */
  onEnd?: () => void;
}

export class AudioCapture {
  private readonly source: SampleSource;
  private listening = false;
  private opening = false;
  private loop: Promise<void> | null = null;
  // Bumped by every stop() so a start() still waiting on open() can tell it was cancelled.
  private generation = 0;

  constructor(source: SampleSource) {
    this.source = source;
  }

  get isActive(): boolean {
    return this.listening;
  }

  get sampleRate(): number {
    return this.source.sampleRate;
  }

  /** Open the source and start the loop. No-op while already running. */
  async start(handlers: AudioCaptureHandlers): Promise<void> {
    if (this.listening || this.opening) return;

    const generation = this.generation;
    this.opening = true;
    try {
      await this.source.open();
    } finally {
      this.opening = false;
    }

    if (generation !== this.generation) {
      // stop() arrived while the source was opening
      await this.source.close();
      return;
    }

    this.listening = true;
    this.loop = this.run(handlers.onBlock)
      .catch((err: unknown) => this.reportFailure(toError(err), handlers.onError))
      .then(() => {
        if (generation === this.generation) handlers.onEnd?.();
      });
  }

  /** Stop at the next block boundary and release the source. Safe to call repeatedly. */
  async stop(): Promise<void> {
    this.generation++;
    if (!this.listening && this.loop === null) return;

    this.listening = false;
    await this.source.close();

    const loop = this.loop;
    this.loop = null;
    await loop;
  }

  private async run(onBlock: SampleBlockCallback): Promise<void> {
    try {
      while (this.listening) {
        const block = await this.source.read();
        if (block === null || !this.listening) break;
        if (block.length === 0) continue;
        await onBlock(block, this.source.sampleRate);
      }
    } finally {
      if (this.listening) {
        // ended on its own rather than through stop()
        this.listening = false;
        this.loop = null;
        // a failing close must not mask the error that ended the loop
        await this.source
          .close()
          .catch((err: unknown) => console.error('[AudioCapture] closing the source failed:', err));
      }
    }
  }

  private reportFailure(error: Error, onError?: (error: Error) => void): void {
    if (onError) {
      onError(error);
      return;
    }
    console.error('[AudioCapture] acquisition loop failed:', error);
  }
}
