/**
 * Pitch-Class Arithmetic
 *
 * Everything is modulo 12, normalized to the non-negative residue so that
 * negative intervals (inversion, downward transposition) land in 0..11.
 */

import * as Tonal from "tonal";
import type { PitchClass } from "@rowforms/contracts";

/**
 * Reduce any integer to its pitch class.
 * mod12(-1) === 11, mod12(14) === 2
 *
 * @throws RangeError for non-integers (including NaN and infinities)
 */
export function mod12(n: number): PitchClass {
  const residue = ((n % 12) + 12) % 12;
  if (!isPitchClass(residue)) {
    throw new RangeError(`Expected an integer, got ${n}`);
  }
  return residue;
}

export function isPitchClass(n: number): n is PitchClass {
  return Number.isInteger(n) && n >= 0 && n <= 11;
}

export function transposePitch(pc: PitchClass, interval: number): PitchClass {
  return mod12(pc + interval);
}

/** Mirror around C: 1 -> 11, 6 -> 6 */
export function invertPitch(pc: PitchClass): PitchClass {
  return mod12(-pc);
}

/** Ascending interval from `from` up to `to`, 0..11 */
export function intervalBetween(from: PitchClass, to: PitchClass): PitchClass {
  return mod12(to - from);
}

export interface PitchNameOptions {
  /** Spell black keys with sharps instead of flats @default false */
  sharps?: boolean;
}

/**
 * Note name for a pitch class, e.g. 1 -> "Db" (or "C#" with sharps).
 * Uses Tonal.js so spelling matches the rest of the toolchain.
 */
export function pitchClassName(pc: PitchClass, options: PitchNameOptions = {}): string {
  // Octave is irrelevant with pitchClass: true; 60 keeps the MIDI number mid-range
  return Tonal.Midi.midiToNoteName(60 + pc, {
    pitchClass: true,
    sharps: options.sharps ?? false,
  });
}
