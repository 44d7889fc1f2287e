/**
 * Transformation Types
 *
 * The 48 standard row forms are named by an operation kind and a level.
 * Labels are rendered as "P6", "R11", "I0", "RI5" (no leading zeros).
 */

/**
 * Operation kinds.
 * - P: prime (matrix rows)
 * - R: retrograde (matrix rows, reversed)
 * - I: inversion (matrix columns)
 * - RI: retrograde-inversion (matrix columns, reversed)
 */
export type TransformationKind = "P" | "R" | "I" | "RI";

/** Scan order used by the detector. */
export const TRANSFORMATION_KINDS: readonly TransformationKind[] = ["P", "R", "I", "RI"];

export interface TransformationLabel {
  kind: TransformationKind;
  /** Semitones above the matching reference form, 0..11 */
  level: number;
}

/**
 * Segment sizes that divide the aggregate evenly.
 * - 6: hexachords (2 segments)
 * - 4: tetrachords (3 segments)
 * - 3: trichords (4 segments)
 */
export type SegmentSize = 6 | 4 | 3;

export const SEGMENT_SIZES: readonly SegmentSize[] = [6, 4, 3];
