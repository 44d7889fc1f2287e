/**
 * Row Enumeration
 *
 * Produces every tone row that starts on pitch class 0: 0 in position 0 and
 * the other eleven pitch classes in every order, lexicographically.
 *
 * Only one permutation is held at a time. Each yielded ToneRow gets its own
 * copy of the values, and calling the enumerator again starts over (or at
 * `from`, to resume an interrupted run).
 */

import type { PitchClass } from "@rowforms/contracts";
import { PITCH_CLASSES } from "@rowforms/contracts";
import { ToneRow } from "../rows/ToneRow";

/** 11! */
export const ROWS_STARTING_AT_ZERO = 39916800;

export function factorial(n: number): number {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`factorial is defined for non-negative integers, got ${n}`);
  }
  let result = 1;
  for (let i = 2; i <= n; i++) {
    result *= i;
  }
  return result;
}

/**
 * Advance `values[start..]` to the next lexicographic permutation in place.
 *
 * @returns false (leaving `values` untouched) when already at the last one
 */
export function nextPermutation<T extends number>(values: T[], start = 0): boolean {
  // Rightmost ascent
  let i = values.length - 2;
  while (i >= start && values[i] >= values[i + 1]) {
    i--;
  }
  if (i < start) {
    return false;
  }

  // Rightmost element greater than the pivot
  let j = values.length - 1;
  while (values[j] <= values[i]) {
    j--;
  }
  [values[i], values[j]] = [values[j], values[i]];

  // Tail is descending; reverse it to ascending
  for (let lo = i + 1, hi = values.length - 1; lo < hi; lo++, hi--) {
    [values[lo], values[hi]] = [values[hi], values[lo]];
  }
  return true;
}

/**
 * Every permutation of `values` in lexicographic order, starting from the
 * sorted order. Yields copies.
 */
export function* permutations<T extends number>(values: readonly T[]): Generator<T[], void, undefined> {
  const current = [...values].sort((a, b) => a - b);
  do {
    yield [...current];
  } while (nextPermutation(current));
}

export interface EnumerationOptions {
  /**
   * Stop after this many rows. 0 or undefined enumerates all 11! rows.
   */
  limit?: number;

  /**
   * Resume from this row (yielded first) instead of the chromatic row.
   * Must be a tone row beginning with 0.
   */
  from?: readonly number[];
}

/**
 * Lazily enumerate every tone row beginning with pitch class 0.
 *
 * First: 0 1 2 3 4 5 6 7 8 9 10 11
 * Second: 0 1 2 3 4 5 6 7 8 9 11 10
 * Last: 0 11 10 9 8 7 6 5 4 3 2 1
 */
export function* enumerateRowsStartingAtZero(
  options: EnumerationOptions = {}
): Generator<ToneRow, void, undefined> {
  const limit = options.limit ?? 0;
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
  }

  const current: PitchClass[] = options.from
    ? ToneRow.from(options.from).toArray()
    : [...PITCH_CLASSES];
  if (current[0] !== 0) {
    throw new RangeError(`Enumeration must start on pitch class 0, got ${current[0]}`);
  }
  let produced = 0;

  do {
    yield ToneRow.from(current);
    produced++;
    if (limit > 0 && produced >= limit) {
      return;
    }
  } while (nextPermutation(current, 1));
}
