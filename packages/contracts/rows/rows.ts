/**
 * Row and Matrix Types
 *
 * A tone row is an ordering of the aggregate. The matrix holds every
 * transposition of the prime row (rows) and of its inversion (columns).
 */

import type { PitchClass } from "../core/pitch";

/**
 * Ordered pitch classes of a single row form.
 * Accessors always hand out fresh copies, so callers may keep or sort them.
 */
export type RowValues = PitchClass[];

/** 12×12 table, indexed [row][column]. */
export type MatrixValues = PitchClass[][];

/**
 * Why a candidate sequence is not a tone row.
 * - length: not exactly twelve entries
 * - pitch-classes: a duplicate, missing, out-of-range or non-integer value
 */
export type InvalidRowReason = "length" | "pitch-classes";
