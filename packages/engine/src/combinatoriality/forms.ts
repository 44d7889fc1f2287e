/**
 * Row forms by operation kind.
 *
 * Each kind has twelve candidate forms taken from the matrix and one
 * reference form (the level-0 member) that levels are measured against.
 */

import type { RowValues, TransformationKind } from "@rowforms/contracts";
import { AGGREGATE_SIZE } from "@rowforms/contracts";
import type { ToneRow } from "../rows/ToneRow";

/**
 * The twelve forms of one kind, in matrix order:
 * P = rows, R = reversed rows, I = columns, RI = reversed columns.
 */
export function candidateForms(toneRow: ToneRow, kind: TransformationKind): RowValues[] {
  const forms: RowValues[] = [];
  for (let i = 0; i < AGGREGATE_SIZE; i++) {
    switch (kind) {
      case "P":
        forms.push(toneRow.row(i));
        break;
      case "R":
        forms.push(toneRow.row(i).reverse());
        break;
      case "I":
        forms.push(toneRow.column(i));
        break;
      case "RI":
        forms.push(toneRow.column(i).reverse());
        break;
    }
  }
  return forms;
}

/** P0, R0, I0 or RI0 */
export function referenceForm(toneRow: ToneRow, kind: TransformationKind): RowValues {
  switch (kind) {
    case "P":
      return toneRow.prime();
    case "R":
      return toneRow.retrograde();
    case "I":
      return toneRow.inversion();
    case "RI":
      return toneRow.retrogradeInversion();
  }
}
