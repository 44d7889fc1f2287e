/**
 * Pitch-class primitives shared by every package.
 */

export type PitchClass = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11; // C=0..B=11

/** All twelve pitch classes in ascending order (the aggregate). */
export const PITCH_CLASSES = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11] as const;

/** Number of pitch classes in the aggregate and elements in a row. */
export const AGGREGATE_SIZE = 12;
