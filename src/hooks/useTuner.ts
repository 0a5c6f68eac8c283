/**
 * useTuner hook – consumer-side state for the violin tuner.
 *
 * Owns the selected string, the listening flag, the last detected frequency
 * and the auto-stop timer, and drives a TuningPipeline over a SampleSource
 * supplied by the caller. The reading is re-evaluated whenever the selected
 * string changes; undetected blocks never clear it.
 */

import { useState, useRef, useCallback, useEffect, useMemo } from 'react';
import type { SampleSource } from '../services/audio/audioCapture';
import { TuningPipeline } from '../services/audio/tuningPipeline';
import { TuningCalculator } from '../services/audio/tuningCalculator';
import type { TonePlayer } from '../services/audio/tonePlayer';
import { VIOLIN_STRINGS, DEFAULT_STRING, getReferenceString } from '../data/violinStrings';
import { resolveTunerConfig } from '../data/tunerConfig';
import type { TunerConfig } from '../data/tunerConfig';
import type { ReferenceString, StringName } from '../types/tuning';
import type { TunerActions, TunerState } from '../types';

export interface UseTunerOptions {
  /** Called on every startListening() to obtain a fresh input. */
  createSource: () => SampleSource;
  tonePlayer?: TonePlayer;
  initialString?: StringName;
  config?: Partial<TunerConfig>;
}

function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error ? err.message : fallback;
}

export function useTuner(options: UseTunerOptions): TunerState & TunerActions {
  const { createSource, tonePlayer, initialString = DEFAULT_STRING, config: overrides } = options;

  const autoStopMs = overrides?.autoStopMs;
  const inTuneThresholdCents = overrides?.inTuneThresholdCents;
  const toneDurationMs = overrides?.toneDurationMs;

  // Sample rate and block size belong to the source, so only these three matter here.
  const config = useMemo(
    () => resolveTunerConfig({ autoStopMs, inTuneThresholdCents, toneDurationMs }),
    [autoStopMs, inTuneThresholdCents, toneDurationMs]
  );
  const calculator = useMemo(
    () => new TuningCalculator(config.inTuneThresholdCents),
    [config.inTuneThresholdCents]
  );

  const [selectedString, setSelectedString] = useState<ReferenceString>(() =>
    getReferenceString(initialString)
  );
  const [frequency, setFrequency] = useState<number | null>(null);
  const [isListening, setIsListening] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const pipelineRef = useRef<TuningPipeline | null>(null);
  // Read by the pipeline on every block, so a string change applies immediately.
  const selectedRef = useRef<ReferenceString>(selectedString);

  const result = useMemo(
    () => (frequency === null ? null : calculator.evaluate(frequency, selectedString.frequency)),
    [calculator, frequency, selectedString]
  );

  const selectString = useCallback((name: StringName) => {
    const next = getReferenceString(name);
    selectedRef.current = next;
    setSelectedString(next);
  }, []);

  const stopListening = useCallback(async () => {
    const pipeline = pipelineRef.current;
    pipelineRef.current = null;
    setIsListening(false);
    if (!pipeline) return;

    try {
      await pipeline.stop();
    } catch (err) {
      setError(errorMessage(err, 'Failed to stop listening'));
    }
  }, []);

  const startListening = useCallback(async () => {
    if (pipelineRef.current) return;
    setError(null);

    let pipeline: TuningPipeline;
    try {
      pipeline = new TuningPipeline(createSource(), calculator);
    } catch (err) {
      setError(errorMessage(err, 'Audio input unavailable'));
      return;
    }
    pipelineRef.current = pipeline;

    try {
      await pipeline.start({
        reference: () => selectedRef.current,
        onResult: r => setFrequency(r.frequencyHz),
        onError: err => setError(err.message),
        onEnd: () => {
          if (pipelineRef.current !== pipeline) return;
          pipelineRef.current = null;
          setIsListening(false);
        },
      });
      // stopListening() may have run while the source was opening
      if (pipelineRef.current === pipeline) setIsListening(true);
    } catch (err) {
      if (pipelineRef.current === pipeline) pipelineRef.current = null;
      setError(errorMessage(err, 'Microphone access denied'));
    }
  }, [createSource, calculator]);

  const playTone = useCallback(
    (name?: StringName) => {
      if (!tonePlayer) {
        console.warn('[useTuner] playTone() called without a tonePlayer');
        return;
      }
      const target = name ? getReferenceString(name) : selectedRef.current;
      tonePlayer
        .play(target.frequency, config.toneDurationMs)
        .catch((err: unknown) => setError(errorMessage(err, 'Tone playback failed')));
    },
    [tonePlayer, config.toneDurationMs]
  );

  // Auto-stop after a stretch of continuous listening; a manual stop clears the timer.
  useEffect(() => {
    if (!isListening) return;
    const timer = setTimeout(() => {
      void stopListening();
    }, config.autoStopMs);
    return () => clearTimeout(timer);
  }, [isListening, config.autoStopMs, stopListening]);

  // Clean up on unmount
  useEffect(() => () => {
    const pipeline = pipelineRef.current;
    pipelineRef.current = null;
    pipeline?.stop().catch((err: unknown) => console.error('[useTuner] stop on unmount failed:', err));
  }, []);

  return {
    strings: VIOLIN_STRINGS,
    selectedString,
    isListening,
    frequency,
    result,
    error,
    selectString,
    startListening,
    stopListening,
    playTone,
  };
}
