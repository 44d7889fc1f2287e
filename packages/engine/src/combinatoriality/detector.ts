/**
 * Combinatoriality Detector
 *
 * Scans all 48 row forms (12 levels × P, R, I, RI) and reports the ones
 * combinatorial with P0 at a given segment size.
 *
 * ## Tests by segment size
 *
 * - **Hexachord (6)**: the candidate's first hexachord is disjoint from
 *   P0's first hexachord (complementary halves).
 * - **Tetrachord (4), trichord (3)**: the candidate's segments are the same
 *   collection of sets as P0's segments, in any order.
 *
 * ## Levels
 *
 * level = (candidate[0] - reference[0] + 12) mod 12, where the reference is
 * P0, R0, I0 or RI0 for the candidate's kind.
 *
 * ## Identity exclusion
 *
 * Level 0 is dropped for every kind at hexachord size, but only for P and R
 * at tetrachord and trichord sizes: I0 and RI0 are reported when they
 * match. Both the test and the exclusion set live in DETECTION_RULES.
 */

import type { SegmentSize, TransformationKind, TransformationLabel } from "@rowforms/contracts";
import { TRANSFORMATION_KINDS } from "@rowforms/contracts";
import { intervalBetween } from "../pitch/pitchClass";
import type { ToneRow } from "../rows/ToneRow";
import type { Segment } from "../partition/partition";
import { firstSegmentsDisjoint, matchesAsMultiset, partition } from "../partition/partition";
import { candidateForms, referenceForm } from "./forms";
import { formatLabel } from "./labels";

/**
 * How a candidate partition is compared with the reference partition.
 */
export type SegmentTest = (candidate: readonly Segment[], reference: readonly Segment[]) => boolean;

export interface DetectionRule {
  test: SegmentTest;
  /** Kinds whose level-0 form is never reported */
  excludeIdentity: ReadonlySet<TransformationKind>;
}

export const DETECTION_RULES: Record<SegmentSize, DetectionRule> = {
  6: {
    test: firstSegmentsDisjoint,
    excludeIdentity: new Set<TransformationKind>(["P", "R", "I", "RI"]),
  },
  4: {
    test: matchesAsMultiset,
    excludeIdentity: new Set<TransformationKind>(["P", "R"]),
  },
  3: {
    test: matchesAsMultiset,
    excludeIdentity: new Set<TransformationKind>(["P", "R"]),
  },
};

export type LabelsByKind = Record<TransformationKind, TransformationLabel[]>;

/**
 * Combinatorial forms of a single kind, in matrix order.
 */
export function detectKind(
  toneRow: ToneRow,
  segmentSize: SegmentSize,
  kind: TransformationKind
): TransformationLabel[] {
  const rule = DETECTION_RULES[segmentSize];
  const referenceSegments = partition(toneRow.prime(), segmentSize);
  const referenceStart = referenceForm(toneRow, kind)[0];

  const labels: TransformationLabel[] = [];
  for (const form of candidateForms(toneRow, kind)) {
    if (!rule.test(partition(form, segmentSize), referenceSegments)) {
      continue;
    }

    const level = intervalBetween(referenceStart, form[0]);
    if (level === 0 && rule.excludeIdentity.has(kind)) {
      continue;
    }

    labels.push({ kind, level });
  }
  return labels;
}

export function detectByKind(toneRow: ToneRow, segmentSize: SegmentSize): LabelsByKind {
  return {
    P: detectKind(toneRow, segmentSize, "P"),
    R: detectKind(toneRow, segmentSize, "R"),
    I: detectKind(toneRow, segmentSize, "I"),
    RI: detectKind(toneRow, segmentSize, "RI"),
  };
}

/**
 * All combinatorial forms at one segment size: P, then R, then I, then RI.
 */
export function detect(toneRow: ToneRow, segmentSize: SegmentSize): TransformationLabel[] {
  const byKind = detectByKind(toneRow, segmentSize);
  return TRANSFORMATION_KINDS.flatMap((kind) => byKind[kind]);
}

/** detect() rendered as label strings */
export function detectLabels(toneRow: ToneRow, segmentSize: SegmentSize): string[] {
  return detect(toneRow, segmentSize).map(formatLabel);
}

export function hexachordalCombinatorials(toneRow: ToneRow): string[] {
  return detectLabels(toneRow, 6);
}

export function tetrachordalCombinatorials(toneRow: ToneRow): string[] {
  return detectLabels(toneRow, 4);
}

export function trichordalCombinatorials(toneRow: ToneRow): string[] {
  return detectLabels(toneRow, 3);
}
