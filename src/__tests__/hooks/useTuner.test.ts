// @vitest-environment jsdom
/**
 * Tests for the useTuner hook: string selection, listening lifecycle,
 * auto-stop, tone playback and error reporting.
 *
 * Audio comes from the in-process ScriptedSource; nothing touches a device.
 */

import { renderHook, act, waitFor } from '@testing-library/react';
import { useTuner } from '../../hooks/useTuner';
import { TonePlayer } from '../../services/audio/tonePlayer';
import type { AudioSink } from '../../services/audio/tonePlayer';
import { AcquisitionUnavailableError } from '../../utils/errors';
import type { TunerConfig } from '../../data/tunerConfig';
import { ScriptedSource, generateSineBlock, silentBlock } from '../utils/testHelpers';

function a440Block(): Int16Array {
  return generateSineBlock(440, 44100, 4096, 0.5);
}

function setup(source: ScriptedSource, config: Partial<TunerConfig> = {}) {
  return renderHook(() => useTuner({ createSource: () => source, config }));
}

describe('useTuner – initial state', () => {
  it('starts idle on the A string', () => {
    const { result } = setup(new ScriptedSource([], { holdOpen: true }));

    expect(result.current.selectedString).toEqual({ name: 'A', frequency: 440 });
    expect(result.current.strings).toHaveLength(4);
    expect(result.current.isListening).toBe(false);
    expect(result.current.frequency).toBeNull();
    expect(result.current.result).toBeNull();
    expect(result.current.error).toBeNull();
  });

  it('honours initialString', () => {
    const source = new ScriptedSource([], { holdOpen: true });
    const { result } = renderHook(() => useTuner({ createSource: () => source, initialString: 'G' }));
    expect(result.current.selectedString.name).toBe('G');
  });
});

describe('useTuner – listening', () => {
  it('reports the detected pitch against the selected string', async () => {
    const source = new ScriptedSource([], { holdOpen: true });
    const { result } = setup(source);

    await act(() => result.current.startListening());
    expect(result.current.isListening).toBe(true);

    source.push(a440Block());
    await waitFor(() => expect(result.current.frequency).toBe(441));

    expect(result.current.result?.status).toBe('in-tune');
    expect(result.current.result?.centsDeviation).toBeCloseTo(3.93, 2);

    await act(() => result.current.stopListening());
  });

  it('re-evaluates the last reading when another string is selected', async () => {
    const source = new ScriptedSource([], { holdOpen: true });
    const { result } = setup(source);

    await act(() => result.current.startListening());
    source.push(a440Block());
    await waitFor(() => expect(result.current.frequency).toBe(441));

    act(() => result.current.selectString('E'));

    expect(result.current.selectedString.name).toBe('E');
    expect(result.current.result?.status).toBe('flat');
    expect(result.current.result?.frequencyHz).toBe(441);

    await act(() => result.current.stopListening());
  });

  it('keeps the last reading through silence', async () => {
    const source = new ScriptedSource([], { holdOpen: true });
    const { result } = setup(source);

    await act(() => result.current.startListening());
    source.push(a440Block());
    await waitFor(() => expect(result.current.frequency).toBe(441));

    source.push(silentBlock());
    await waitFor(() => expect(source.reads).toBe(3));

    expect(result.current.frequency).toBe(441);
    expect(result.current.result?.status).toBe('in-tune');

    await act(() => result.current.stopListening());
  });

  it('treats stopListening() as idempotent', async () => {
    const source = new ScriptedSource([], { holdOpen: true });
    const { result } = setup(source);

    await act(() => result.current.stopListening());
    await act(() => result.current.startListening());
    await act(() => result.current.stopListening());
    await act(() => result.current.stopListening());

    expect(result.current.isListening).toBe(false);
    expect(result.current.error).toBeNull();
    expect(source.closed).toBe(1);
  });

  it('stops by itself after autoStopMs', async () => {
    const source = new ScriptedSource([], { holdOpen: true });
    const { result } = setup(source, { autoStopMs: 50 });

    await act(() => result.current.startListening());
    expect(result.current.isListening).toBe(true);

    await waitFor(() => expect(result.current.isListening).toBe(false), { timeout: 1000 });
    expect(source.closed).toBe(1);
  });

  it('clears listening when the input runs out', async () => {
    const source = new ScriptedSource([a440Block()]);
    const { result } = setup(source);

    await act(() => result.current.startListening());

    await waitFor(() => expect(result.current.isListening).toBe(false));
    expect(result.current.frequency).toBe(441);
  });

  it('reports an unavailable input without entering the listening state', async () => {
    const source = new ScriptedSource([], {
      openError: new AcquisitionUnavailableError('Microphone permission denied'),
    });
    const { result } = setup(source);

    await act(() => result.current.startListening());

    expect(result.current.isListening).toBe(false);
    expect(result.current.error).toBe('Microphone permission denied');
    expect(result.current.result).toBeNull();
  });

  it('stops listening on unmount', async () => {
    const source = new ScriptedSource([], { holdOpen: true });
    const { result, unmount } = setup(source);

    await act(() => result.current.startListening());
    unmount();

    await waitFor(() => expect(source.closed).toBe(1));
  });
});

describe('useTuner – reference tone', () => {
  class CountingSink implements AudioSink {
    static lengths: number[] = [];
    async open(): Promise<void> {}
    async write(samples: Int16Array): Promise<void> {
      CountingSink.lengths.push(samples.length);
    }
    async close(): Promise<void> {}
  }

  beforeEach(() => {
    CountingSink.lengths = [];
  });

  it('plays the requested string for the configured duration', async () => {
    const tonePlayer = new TonePlayer(() => new CountingSink());
    const source = new ScriptedSource([], { holdOpen: true });
    const { result } = renderHook(() =>
      useTuner({ createSource: () => source, tonePlayer, config: { toneDurationMs: 10 } })
    );

    act(() => result.current.playTone('G'));

    await waitFor(() => expect(CountingSink.lengths).toEqual([441]));
  });

  it('surfaces playback failures as an error message', async () => {
    const tonePlayer = new TonePlayer(() => ({
      open: () => Promise.reject(new Error('No output device')),
      write: () => Promise.resolve(),
      close: () => Promise.resolve(),
    }));
    const source = new ScriptedSource([], { holdOpen: true });
    const { result } = renderHook(() => useTuner({ createSource: () => source, tonePlayer }));

    act(() => result.current.playTone());

    await waitFor(() => expect(result.current.error).toBe('No output device'));
  });
});
