/**
 * Reference pitches for the four violin strings (A4 = 440 Hz).
 */

import type { ReferenceString, StringName } from '../types/tuning';
import { InvalidParameterError } from '../utils/errors';

const reference = (name: StringName, frequency: number): ReferenceString =>
  Object.freeze({ name, frequency });

export const VIOLIN_STRINGS: readonly ReferenceString[] = Object.freeze([
  reference('G', 196.0),
  reference('D', 293.66),
  reference('A', 440.0),
  reference('E', 659.25),
]);

export const DEFAULT_STRING: StringName = 'A';

export function isStringName(value: string): value is StringName {
  return VIOLIN_STRINGS.some(s => s.name === value);
}

export function getReferenceString(name: string): ReferenceString {
  const found = VIOLIN_STRINGS.find(s => s.name === name);
  if (!found) {
    throw new InvalidParameterError(`Unknown string "${name}" (expected one of G, D, A, E)`);
  }
  return found;
}
