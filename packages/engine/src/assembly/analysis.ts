/**
 * Result Assembly
 *
 * Runs the detector at every segment size and flattens the result into the
 * string record that sinks persist. Labels inside a record field are
 * sorted as plain strings ("I11" before "I3").
 */

import type { AnalysisRecord, RowAnalysis } from "@rowforms/contracts";
import { pitchClassName } from "../pitch/pitchClass";
import type { ToneRow } from "../rows/ToneRow";
import { detectLabels } from "../combinatoriality/detector";

export const CSV_HEADER =
  "prime_row,hexachordal_combinatorials,tetrachordal_combinatorials,trichordal_combinatorials";

export function analyzeRow(toneRow: ToneRow): RowAnalysis {
  return {
    prime: toneRow.prime(),
    hexachordal: detectLabels(toneRow, 6),
    tetrachordal: detectLabels(toneRow, 4),
    trichordal: detectLabels(toneRow, 3),
  };
}

function joinSorted(labels: readonly string[]): string {
  return [...labels].sort().join(" ");
}

export function toRecord(analysis: RowAnalysis): AnalysisRecord {
  return {
    primeRow: analysis.prime.join(" "),
    hexachordalCombinatorials: joinSorted(analysis.hexachordal),
    tetrachordalCombinatorials: joinSorted(analysis.tetrachordal),
    trichordalCombinatorials: joinSorted(analysis.trichordal),
  };
}

export function assembleRecord(toneRow: ToneRow): AnalysisRecord {
  return toRecord(analyzeRow(toneRow));
}

/** Every field double-quoted; fields never contain quotes or commas */
export function recordToCsvRow(record: AnalysisRecord): string {
  return [
    record.primeRow,
    record.hexachordalCombinatorials,
    record.tetrachordalCombinatorials,
    record.trichordalCombinatorials,
  ]
    .map((field) => `"${field}"`)
    .join(",");
}

export interface DescribeOptions {
  /** Add a line spelling the prime row with note names */
  noteNames?: boolean;
  /** Spell note names with sharps @default false */
  sharps?: boolean;
}

/**
 * Multi-line summary of a row's analysis, for logs and the console.
 */
export function describeRow(toneRow: ToneRow, options: DescribeOptions = {}): string {
  const record = assembleRecord(toneRow);
  const lines = ["Tone Row Analysis:", `Prime Row: ${record.primeRow}`];

  if (options.noteNames) {
    const names = toneRow.prime().map((pc) => pitchClassName(pc, { sharps: options.sharps }));
    lines.push(`Note Names: ${names.join(" ")}`);
  }

  lines.push(
    `Hexachordal Combinatorials: ${record.hexachordalCombinatorials}`,
    `Tetrachordal Combinatorials: ${record.tetrachordalCombinatorials}`,
    `Trichordal Combinatorials: ${record.trichordalCombinatorials}`
  );
  return lines.join("\n");
}
