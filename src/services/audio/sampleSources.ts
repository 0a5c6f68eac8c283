/**
 * Concrete SampleSource implementations.
 *
 * - SineWaveSource: synthetic test tone, phase-continuous across blocks
 * - PcmStreamSource: signed 16-bit little-endian mono PCM from a Node stream,
 *   e.g. `arecord -f S16_LE -c 1 -r 44100` piped into stdin. The stream may be
 *   reopened; each session starts from an empty buffer. A stream error while
 *   stopped is held and rejects the next open().
 */

import type { Readable } from 'node:stream';
import { setTimeout as delay } from 'node:timers/promises';
import type { SampleSource } from './audioCapture';
import { DEFAULT_TUNER_CONFIG } from '../../data/tunerConfig';
import { AcquisitionUnavailableError, InvalidParameterError } from '../../utils/errors';

const BYTES_PER_SAMPLE = 2;
const PCM_MAX = 32767;

function assertBlockFormat(sampleRate: number, blockSize: number): void {
  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw new InvalidParameterError(`Sample rate must be a positive number, got ${sampleRate}`);
  }
  if (!Number.isInteger(blockSize) || blockSize < 2) {
    throw new InvalidParameterError(`Block size must be an integer of at least 2, got ${blockSize}`);
  }
}

export interface SineWaveSourceOptions {
  sampleRate?: number;
  blockSize?: number;
  /** Peak amplitude 0–1 of full scale (default 0.5). */
  amplitude?: number;
  /** Wait one block duration between reads, like a live input (default false). */
  realtime?: boolean;
  /** Stop after this many blocks; unlimited when omitted. */
  maxBlocks?: number;
}

export class SineWaveSource implements SampleSource {
  readonly sampleRate: number;
  readonly blockSize: number;
  readonly frequency: number;
  private readonly amplitude: number;
  private readonly realtime: boolean;
  private readonly maxBlocks: number;
  private sampleIndex = 0;
  private blocksRead = 0;
  private closed = true;

  constructor(frequency: number, options: SineWaveSourceOptions = {}) {
    const {
      sampleRate = DEFAULT_TUNER_CONFIG.sampleRate,
      blockSize = DEFAULT_TUNER_CONFIG.blockSize,
      amplitude = 0.5,
      realtime = false,
      maxBlocks = Infinity,
    } = options;
    assertBlockFormat(sampleRate, blockSize);
    if (!Number.isFinite(frequency) || frequency < 0) {
      throw new InvalidParameterError(`Tone frequency must be a non-negative number, got ${frequency}`);
    }
    if (!(amplitude >= 0 && amplitude <= 1)) {
      throw new InvalidParameterError(`Amplitude must be within 0–1, got ${amplitude}`);
    }

    this.frequency = frequency;
    this.sampleRate = sampleRate;
    this.blockSize = blockSize;
    this.amplitude = amplitude;
    this.realtime = realtime;
    this.maxBlocks = maxBlocks;
  }

  async open(): Promise<void> {
    this.closed = false;
    this.sampleIndex = 0;
    this.blocksRead = 0;
  }

  async read(): Promise<Int16Array | null> {
    if (this.closed || this.blocksRead >= this.maxBlocks) return null;

    // Always yield to the event loop so timers (auto-stop, stop()) can run between blocks.
    await delay(this.realtime ? (this.blockSize / this.sampleRate) * 1000 : 0);
    if (this.closed) return null;

    const block = new Int16Array(this.blockSize);
    const angularFreq = (2 * Math.PI * this.frequency) / this.sampleRate;
    for (let i = 0; i < this.blockSize; i++) {
      block[i] = Math.round(this.amplitude * PCM_MAX * Math.sin(angularFreq * (this.sampleIndex + i)));
    }
    this.sampleIndex += this.blockSize;
    this.blocksRead++;
    return block;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export interface PcmStreamSourceOptions {
  sampleRate?: number;
  blockSize?: number;
}

export class PcmStreamSource implements SampleSource {
  readonly sampleRate: number;
  readonly blockSize: number;
  private readonly input: Readable;
  private readonly blockBytes: number;
  private pending: Buffer = Buffer.alloc(0);
  private wake: (() => void) | null = null;
  private ended = false;
  private closed = true;
  private failure: Error | null = null;

  constructor(input: Readable, options: PcmStreamSourceOptions = {}) {
    const {
      sampleRate = DEFAULT_TUNER_CONFIG.sampleRate,
      blockSize = DEFAULT_TUNER_CONFIG.blockSize,
    } = options;
    assertBlockFormat(sampleRate, blockSize);

    this.input = input;
    this.sampleRate = sampleRate;
    this.blockSize = blockSize;
    this.blockBytes = blockSize * BYTES_PER_SAMPLE;
    // stays attached while stopped; a failure in that gap is held for the next open()
    this.input.on('error', this.handleError);
  }

  async open(): Promise<void> {
    if (this.failure) {
      throw new AcquisitionUnavailableError(`PCM input failed: ${this.failure.message}`, {
        cause: this.failure,
      });
    }
    if (this.input.destroyed || this.input.readableEnded) {
      throw new AcquisitionUnavailableError('PCM input stream is already closed');
    }
    // bytes left over from a previous session never reach this one
    this.pending = Buffer.alloc(0);
    this.wake = null;
    this.closed = false;
    this.input.on('data', this.handleData);
    this.input.on('end', this.handleEnd);
  }

  async read(): Promise<Int16Array | null> {
    while (this.pending.length < this.blockBytes) {
      if (this.failure) {
        throw new AcquisitionUnavailableError(`PCM input failed: ${this.failure.message}`, {
          cause: this.failure,
        });
      }
      // A trailing partial block is dropped.
      if (this.ended || this.closed) return null;

      this.input.resume();
      await new Promise<void>(resolve => {
        this.wake = resolve;
      });
    }

    const bytes = this.pending.subarray(0, this.blockBytes);
    this.pending = this.pending.subarray(this.blockBytes);

    const block = new Int16Array(this.blockSize);
    for (let i = 0; i < this.blockSize; i++) {
      block[i] = bytes.readInt16LE(i * BYTES_PER_SAMPLE);
    }
    return block;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.input.off('data', this.handleData);
    this.input.off('end', this.handleEnd);
    this.input.pause();
    this.notify();
  }

  private readonly handleData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'binary') : chunk;
    this.pending = Buffer.concat([this.pending, bytes]);
    if (this.pending.length >= this.blockBytes) {
      // hold the stream until the loop asks for more
      this.input.pause();
    }
    this.notify();
  };

  private readonly handleEnd = (): void => {
    this.ended = true;
    this.notify();
  };

  private readonly handleError = (err: Error): void => {
    this.failure = err;
    this.notify();
  };

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
