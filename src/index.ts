export {
  detectPitch,
  periodSearchWindow,
  correlationAt,
  normalizeSamples,
  PCM_FULL_SCALE,
  MIN_DETECTABLE_HZ,
  MAX_DETECTABLE_HZ,
  UNDETECTED,
} from './utils/autocorrelation';
export {
  centsDeviation,
  classifyTuning,
  hzDeviation,
  formatCents,
  formatTuningStatus,
  IN_TUNE_THRESHOLD_CENTS,
} from './utils/musicUtils';
export {
  TunerError,
  InvalidParameterError,
  AcquisitionUnavailableError,
  PlaybackUnavailableError,
} from './utils/errors';
export type { TunerErrorCode } from './utils/errors';
export { VIOLIN_STRINGS, DEFAULT_STRING, getReferenceString, isStringName } from './data/violinStrings';
export { DEFAULT_TUNER_CONFIG, resolveTunerConfig } from './data/tunerConfig';
export type { TunerConfig } from './data/tunerConfig';
export { PitchDetector } from './services/audio/pitchDetector';
export { TuningCalculator } from './services/audio/tuningCalculator';
export { AudioCapture } from './services/audio/audioCapture';
export type { SampleSource, AudioCaptureHandlers, SampleBlockCallback } from './services/audio/audioCapture';
export { SineWaveSource, PcmStreamSource } from './services/audio/sampleSources';
export type { SineWaveSourceOptions, PcmStreamSourceOptions } from './services/audio/sampleSources';
export { ResultChannel } from './services/audio/resultChannel';
export { TuningPipeline } from './services/audio/tuningPipeline';
export type { TuningPipelineHandlers } from './services/audio/tuningPipeline';
export { TonePlayer, PcmStreamSink, synthesizeTone } from './services/audio/tonePlayer';
export type { AudioSink } from './services/audio/tonePlayer';
export { useTuner } from './hooks/useTuner';
export type { UseTunerOptions } from './hooks/useTuner';
export type { TunerState, TunerActions } from './types';
export type {
  StringName,
  ReferenceString,
  SampleBlock,
  TuningStatus,
  TuningResult,
  PeriodWindow,
} from './types/tuning';
