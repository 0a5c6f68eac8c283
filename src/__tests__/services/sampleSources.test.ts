/**
 * Unit tests for the concrete sample sources.
 */

import { once } from 'node:events';
import { PassThrough, Readable } from 'node:stream';
import { PcmStreamSource, SineWaveSource } from '../../services/audio/sampleSources';
import { detectPitch } from '../../utils/autocorrelation';
import { AcquisitionUnavailableError, InvalidParameterError } from '../../utils/errors';
import { toPcmBytes } from '../utils/testHelpers';

// ── SineWaveSource ───────────────────────────────────────────────────────────

describe('SineWaveSource', () => {
  it('produces blocks of the configured size', async () => {
    const source = new SineWaveSource(440, { blockSize: 1024 });
    await source.open();
    const block = await source.read();
    expect(block).toBeInstanceOf(Int16Array);
    expect(block?.length).toBe(1024);
    await source.close();
  });

  it('continues the waveform across blocks', async () => {
    // 11025 Hz at 44100 Hz repeats every 4 samples: 0, +peak, 0, −peak
    const source = new SineWaveSource(11025, { blockSize: 6, amplitude: 1 });
    await source.open();
    const first = await source.read();
    const second = await source.read();
    expect(Array.from(first ?? [])).toEqual([0, 32767, 0, -32767, 0, 32767]);
    expect(Array.from(second ?? [])).toEqual([0, -32767, 0, 32767, 0, -32767]);
  });

  it('ends after maxBlocks', async () => {
    const source = new SineWaveSource(440, { blockSize: 64, maxBlocks: 2 });
    await source.open();
    expect(await source.read()).not.toBeNull();
    expect(await source.read()).not.toBeNull();
    expect(await source.read()).toBeNull();
  });

  it('returns null once closed and restarts from phase zero when reopened', async () => {
    const source = new SineWaveSource(11025, { blockSize: 2, amplitude: 1 });
    await source.open();
    await source.read();
    await source.close();
    expect(await source.read()).toBeNull();

    await source.open();
    expect(Array.from((await source.read()) ?? [])).toEqual([0, 32767]);
  });

  it('yields a tone the estimator recognises', async () => {
    const source = new SineWaveSource(440, { blockSize: 4096 });
    await source.open();
    const block = await source.read();
    expect(block).not.toBeNull();
    if (block) expect(detectPitch(block, source.sampleRate)).toBe(441);
  });

  it('rejects invalid settings', () => {
    expect(() => new SineWaveSource(440, { sampleRate: 0 })).toThrow(InvalidParameterError);
    expect(() => new SineWaveSource(440, { blockSize: 1 })).toThrow(InvalidParameterError);
    expect(() => new SineWaveSource(440, { amplitude: 1.5 })).toThrow(InvalidParameterError);
    expect(() => new SineWaveSource(-1)).toThrow(InvalidParameterError);
  });
});

// ── PcmStreamSource ──────────────────────────────────────────────────────────

describe('PcmStreamSource', () => {
  it('decodes signed 16-bit little-endian samples', async () => {
    const input = Readable.from([Buffer.from([0x01, 0x00, 0xff, 0xff, 0x00, 0x80, 0xff, 0x7f])]);
    const source = new PcmStreamSource(input, { blockSize: 2 });
    await source.open();

    expect(Array.from((await source.read()) ?? [])).toEqual([1, -1]);
    expect(Array.from((await source.read()) ?? [])).toEqual([-32768, 32767]);
    expect(await source.read()).toBeNull();
  });

  it('reassembles blocks split across chunks and drops a trailing partial block', async () => {
    const bytes = toPcmBytes(Int16Array.of(10, 20, 30, 40, 50));
    // chunk edges fall mid-sample
    const input = Readable.from([bytes.subarray(0, 3), bytes.subarray(3, 7), bytes.subarray(7)]);
    const source = new PcmStreamSource(input, { blockSize: 2 });
    await source.open();

    expect(Array.from((await source.read()) ?? [])).toEqual([10, 20]);
    expect(Array.from((await source.read()) ?? [])).toEqual([30, 40]);
    expect(await source.read()).toBeNull();
  });

  it('resolves a pending read with null on close', async () => {
    const input = new PassThrough();
    const source = new PcmStreamSource(input, { blockSize: 4 });
    await source.open();

    const pending = source.read();
    await source.close();
    expect(await pending).toBeNull();
  });

  it('surfaces a stream error from read()', async () => {
    const input = new PassThrough();
    const source = new PcmStreamSource(input, { blockSize: 4 });
    await source.open();

    const pending = source.read();
    input.destroy(new Error('device lost'));
    await expect(pending).rejects.toThrow('PCM input failed: device lost');
  });

  it('starts a reopened session from an empty buffer', async () => {
    const input = new PassThrough();
    const source = new PcmStreamSource(input, { blockSize: 4 });
    await source.open();

    input.write(toPcmBytes(Int16Array.of(1, 1, 1, 1, 2, 2)));
    expect(Array.from((await source.read()) ?? [])).toEqual([1, 1, 1, 1]);
    await source.close();

    await source.open();
    input.write(toPcmBytes(Int16Array.of(3, 3, 3, 3)));
    expect(Array.from((await source.read()) ?? [])).toEqual([3, 3, 3, 3]);
    await source.close();
  });

  it('holds a stream error raised while stopped and rejects the next open()', async () => {
    const input = new PassThrough();
    const source = new PcmStreamSource(input, { blockSize: 4 });
    await source.open();
    await source.close();

    input.destroy(new Error('unplugged'));
    await once(input, 'error');

    await expect(source.open()).rejects.toThrow('PCM input failed: unplugged');
  });

  it('refuses to open a closed stream', async () => {
    const input = new PassThrough();
    input.destroy();
    const source = new PcmStreamSource(input);
    await expect(source.open()).rejects.toThrow(AcquisitionUnavailableError);
  });
});
