/**
 * Types shared between the tuner hook and whatever renders it.
 */

import type { ReferenceString, StringName, TuningResult } from './types/tuning';

export interface TunerState {
  /** The four reference strings in G, D, A, E order. */
  strings: readonly ReferenceString[];
  selectedString: ReferenceString;
  isListening: boolean;
  /** Most recent detected frequency in Hz (null until something was heard) */
  frequency: number | null;
  /** `frequency` evaluated against `selectedString` (null until something was heard) */
  result: TuningResult | null;
  /** User-facing error message, e.g. when the microphone cannot be opened */
  error: string | null;
}

export interface TunerActions {
  selectString: (name: StringName) => void;
  startListening: () => Promise<void>;
  stopListening: () => Promise<void>;
  /** Plays the reference tone of `name`, or of the selected string. */
  playTone: (name?: StringName) => void;
}
