/**
 * Partition Engine
 *
 * Splits a row into consecutive, equal-size segments and compares two
 * partitions. Segment order is kept in the partition itself, but the
 * comparison treats the partitions as unordered collections of sets: two
 * partitions match when every segment of one has exactly one equal segment
 * in the other.
 */

import type { PitchClass, SegmentSize } from "@rowforms/contracts";
import { AGGREGATE_SIZE } from "@rowforms/contracts";

export type Segment = ReadonlySet<PitchClass>;

/**
 * Slice a 12-note row into consecutive sets of `segmentSize`.
 *
 * partition([0..11], 4) -> [{0,1,2,3}, {4,5,6,7}, {8,9,10,11}]
 *
 * @throws RangeError if the row is not 12 long or the size does not divide 12
 */
export function partition(row: readonly PitchClass[], segmentSize: SegmentSize): Segment[] {
  if (row.length !== AGGREGATE_SIZE) {
    throw new RangeError(`Cannot partition a row of length ${row.length}`);
  }
  if (!Number.isInteger(segmentSize) || segmentSize <= 0 || AGGREGATE_SIZE % segmentSize !== 0) {
    throw new RangeError(`Segment size ${segmentSize} does not divide ${AGGREGATE_SIZE}`);
  }

  const segments: Segment[] = [];
  for (let start = 0; start < AGGREGATE_SIZE; start += segmentSize) {
    segments.push(new Set(row.slice(start, start + segmentSize)));
  }
  return segments;
}

export function setsEqual(a: Segment, b: Segment): boolean {
  if (a.size !== b.size) return false;
  for (const pc of a) {
    if (!b.has(pc)) return false;
  }
  return true;
}

export function areDisjoint(a: Segment, b: Segment): boolean {
  for (const pc of a) {
    if (b.has(pc)) return false;
  }
  return true;
}

/**
 * True when `candidate` and `reference` are the same collection of sets,
 * ignoring segment order.
 *
 * Walks the reference in order, removing one equal candidate per reference
 * segment. Set equality splits candidates into equivalence classes, so the
 * first equal candidate is always as good as any other.
 */
export function matchesAsMultiset(
  candidate: readonly Segment[],
  reference: readonly Segment[]
): boolean {
  const remaining = [...candidate];

  for (const segment of reference) {
    const index = remaining.findIndex((c) => setsEqual(c, segment));
    if (index === -1) {
      return false;
    }
    remaining.splice(index, 1);
  }

  return remaining.length === 0;
}

/**
 * Hexachordal test: the candidate's first segment shares no pitch class
 * with the reference's first segment. For hexachords this makes the two
 * first halves complementary (together they form the aggregate).
 */
export function firstSegmentsDisjoint(
  candidate: readonly Segment[],
  reference: readonly Segment[]
): boolean {
  if (candidate.length === 0 || reference.length === 0) {
    return false;
  }
  return areDisjoint(candidate[0], reference[0]);
}
