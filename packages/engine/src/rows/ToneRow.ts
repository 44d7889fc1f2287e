/**
 * Tone Row
 *
 * An immutable ordering of the twelve pitch classes together with its
 * 12×12 matrix. The matrix is built once on construction; every accessor
 * returns a copy so the backing table can never be modified from outside.
 *
 * ## Matrix layout
 *
 * - Row 0 is the prime row (P0).
 * - Row i is P0 transposed so that it starts on the i-th note of I0.
 * - Column 0 is therefore the inversion (I0), and every column is an
 *   inversion form.
 *
 * ```
 *   P0  = 0 11 7 8 ...     row 0
 *   I0  = 0  1 5 4 ...     column 0
 * ```
 */

import type {
  PitchClass,
  RowValues,
  MatrixValues,
  InvalidRowReason,
} from "@rowforms/contracts";
import { AGGREGATE_SIZE } from "@rowforms/contracts";
import { InvalidRowError } from "../errors";
import { invertPitch, isPitchClass, mod12, transposePitch } from "../pitch/pitchClass";

const MAX_INTERVAL = 11;

// ============================================================================
// Validation
// ============================================================================

/**
 * Check a candidate sequence against the tone-row invariant.
 *
 * @returns null when valid, otherwise the first reason it fails
 */
export function validateToneRow(values: readonly number[]): InvalidRowReason | null {
  if (values.length !== AGGREGATE_SIZE) {
    return "length";
  }

  const seen = new Set<number>();
  for (const value of values) {
    if (!isPitchClass(value) || seen.has(value)) {
      return "pitch-classes";
    }
    seen.add(value);
  }

  return null;
}

export function isValidToneRow(values: readonly number[]): values is readonly PitchClass[] {
  return validateToneRow(values) === null;
}

function assertToneRow(values: readonly number[]): readonly PitchClass[] {
  if (isValidToneRow(values)) {
    return values;
  }

  if (validateToneRow(values) === "length") {
    throw new InvalidRowError(
      "length",
      `A tone row needs exactly ${AGGREGATE_SIZE} pitch classes, got ${values.length}`
    );
  }
  throw new InvalidRowError(
    "pitch-classes",
    `A tone row must contain each pitch class 0-11 exactly once: [${values.join(", ")}]`
  );
}

// ============================================================================
// Matrix
// ============================================================================

/**
 * Build the twelve-tone matrix for a prime row.
 * Pure; the caller is responsible for passing a valid row.
 */
export function buildMatrix(prime: readonly PitchClass[]): MatrixValues {
  const inversion = prime.map(invertPitch);
  const matrix: MatrixValues = [[...prime]];

  for (let i = 1; i < AGGREGATE_SIZE; i++) {
    const interval = mod12(inversion[i] - inversion[0]);
    matrix.push(prime.map((pc) => transposePitch(pc, interval)));
  }

  return matrix;
}

/**
 * Transpose a row by an interval in [-11, 11].
 *
 * @throws InvalidRowError if `values` is not a tone row (checked first)
 * @throws RangeError if the interval is outside [-11, 11]
 */
export function transposeRow(values: readonly number[], interval: number): ToneRow {
  const row = assertToneRow(values);

  if (!Number.isInteger(interval) || interval < -MAX_INTERVAL || interval > MAX_INTERVAL) {
    throw new RangeError(
      `Interval must be an integer between -${MAX_INTERVAL} and ${MAX_INTERVAL}, got ${interval}`
    );
  }

  const normalized = mod12(interval);
  return ToneRow.from(row.map((pc) => transposePitch(pc, normalized)));
}

// ============================================================================
// ToneRow
// ============================================================================

export class ToneRow {
  private readonly table: MatrixValues;

  private constructor(prime: readonly PitchClass[]) {
    this.table = buildMatrix(prime);
  }

  /**
   * Construct a tone row from twelve integers.
   *
   * @throws InvalidRowError with reason "length" or "pitch-classes"
   */
  static from(values: readonly number[]): ToneRow {
    return new ToneRow(assertToneRow(values));
  }

  /** P0: matrix row 0 */
  prime(): RowValues {
    return [...this.table[0]];
  }

  /** I0: matrix column 0 */
  inversion(): RowValues {
    return this.column(0);
  }

  /** R0: P0 backwards */
  retrograde(): RowValues {
    return this.prime().reverse();
  }

  /** RI0: I0 backwards */
  retrogradeInversion(): RowValues {
    return this.inversion().reverse();
  }

  /** Deep copy of the full matrix */
  matrix(): MatrixValues {
    return this.table.map((row) => [...row]);
  }

  row(index: number): RowValues {
    return [...this.table[checkIndex(index)]];
  }

  column(index: number): RowValues {
    const j = checkIndex(index);
    return this.table.map((row) => row[j]);
  }

  toArray(): RowValues {
    return this.prime();
  }

  equals(other: ToneRow): boolean {
    return this.table[0].every((pc, i) => other.table[0][i] === pc);
  }

  /** Space-separated prime row, e.g. "0 11 7 8 3 1 2 10 6 5 4 9" */
  toString(): string {
    return this.table[0].join(" ");
  }
}

function checkIndex(index: number): number {
  if (!Number.isInteger(index) || index < 0 || index >= AGGREGATE_SIZE) {
    throw new RangeError(`Matrix index must be 0-${AGGREGATE_SIZE - 1}, got ${index}`);
  }
  return index;
}
