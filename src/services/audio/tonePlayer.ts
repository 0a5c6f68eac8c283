/**
 * TonePlayer service – plays the reference pitch of a string.
 *
 * Fire-and-forget from the caller's point of view: a fresh sink is opened per
 * tone, the whole sine wave is written, and the sink is released once the
 * tone's duration has elapsed. Nothing here touches the pitch estimator.
 */

import type { Writable } from 'node:stream';
import { setTimeout as delay } from 'node:timers/promises';
import { DEFAULT_TUNER_CONFIG } from '../../data/tunerConfig';
import { InvalidParameterError, PlaybackUnavailableError } from '../../utils/errors';

const PCM_MAX = 32767;

/** An audio output that accepts signed 16-bit mono samples. */
export interface AudioSink {
  open(sampleRate: number): Promise<void>;
  write(samples: Int16Array): Promise<void>;
  close(): Promise<void>;
}

/**
 * Synthesises a full-scale sine wave as 16-bit samples.
 * @param frequency - Tone frequency in Hz
 * @param durationMs - Tone length in ms (default 2000)
 * @param sampleRate - Output sample rate in Hz (default 44100)
 */
export function synthesizeTone(
  frequency: number,
  durationMs: number = DEFAULT_TUNER_CONFIG.toneDurationMs,
  sampleRate: number = DEFAULT_TUNER_CONFIG.sampleRate
): Int16Array {
  if (!Number.isFinite(frequency) || frequency <= 0) {
    throw new InvalidParameterError(`Tone frequency must be a positive number, got ${frequency}`);
  }
  if (!Number.isFinite(durationMs) || durationMs < 0) {
    throw new InvalidParameterError(`Tone duration must be a non-negative number, got ${durationMs}`);
  }
  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw new InvalidParameterError(`Sample rate must be a positive number, got ${sampleRate}`);
  }

  const numSamples = Math.floor((durationMs * sampleRate) / 1000);
  const samples = new Int16Array(numSamples);
  for (let i = 0; i < numSamples; i++) {
    samples[i] = Math.trunc(Math.sin((2 * Math.PI * frequency * i) / sampleRate) * PCM_MAX);
  }
  return samples;
}

export class TonePlayer {
  private readonly createSink: () => AudioSink;
  readonly sampleRate: number;

  constructor(createSink: () => AudioSink, sampleRate: number = DEFAULT_TUNER_CONFIG.sampleRate) {
    this.createSink = createSink;
    this.sampleRate = sampleRate;
  }

  /** Resolves after the tone has played and its sink was released. */
  async play(frequency: number, durationMs: number = DEFAULT_TUNER_CONFIG.toneDurationMs): Promise<void> {
    const samples = synthesizeTone(frequency, durationMs, this.sampleRate);
    const sink = this.createSink();

    await sink.open(this.sampleRate);
    try {
      await sink.write(samples);
      await delay(durationMs);
    } finally {
      await sink.close();
    }
  }
}

/** Writes 16-bit little-endian PCM to a Node stream, e.g. stdin of `aplay`. */
export class PcmStreamSink implements AudioSink {
  private readonly output: Writable;

  constructor(output: Writable) {
    this.output = output;
  }

  async open(_sampleRate: number): Promise<void> {
    if (this.output.destroyed || this.output.writableEnded) {
      throw new PlaybackUnavailableError('PCM output stream is already closed');
    }
  }

  async write(samples: Int16Array): Promise<void> {
    const bytes = Buffer.alloc(samples.length * 2);
    for (let i = 0; i < samples.length; i++) {
      bytes.writeInt16LE(samples[i], i * 2);
    }
    await new Promise<void>((resolve, reject) => {
      this.output.write(bytes, err => {
        if (err) {
          reject(new PlaybackUnavailableError(`PCM output failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  // The stream belongs to the caller and stays open for the next tone.
  async close(): Promise<void> {}
}
