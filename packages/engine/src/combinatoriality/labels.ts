/**
 * Transformation labels: "P6", "R11", "I0", "RI5".
 */

import type { RowValues, TransformationKind, TransformationLabel } from "@rowforms/contracts";
import { InvalidLabelError } from "../errors";
import { transposePitch } from "../pitch/pitchClass";
import type { ToneRow } from "../rows/ToneRow";
import { referenceForm } from "./forms";

// RI must be tried before R and I; levels 0-11 without a leading zero
const LABEL_PATTERN = /^(RI|P|R|I)(0|[1-9]|1[01])$/;

export function formatLabel(label: TransformationLabel): string {
  return `${label.kind}${label.level}`;
}

/**
 * @throws InvalidLabelError for anything outside P|R|I|RI followed by 0-11
 */
export function parseLabel(text: string): TransformationLabel {
  const match = LABEL_PATTERN.exec(text);
  if (!match) {
    throw new InvalidLabelError(text);
  }
  return { kind: toKind(match[1], text), level: Number(match[2]) };
}

function toKind(prefix: string, text: string): TransformationKind {
  switch (prefix) {
    case "P":
    case "R":
    case "I":
    case "RI":
      return prefix;
    default:
      throw new InvalidLabelError(text);
  }
}

/**
 * The row form a label names, built from the reference form of its kind:
 * every note of P0/R0/I0/RI0 moved up by `level` semitones.
 *
 * applyTransformation(row, parseLabel("RI5")) starts 5 semitones above RI0.
 */
export function applyTransformation(toneRow: ToneRow, label: TransformationLabel): RowValues {
  return referenceForm(toneRow, label.kind).map((pc) => transposePitch(pc, label.level));
}
