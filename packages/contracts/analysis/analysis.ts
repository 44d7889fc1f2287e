/**
 * Analysis Types
 *
 * RowAnalysis is the structured result of running the detector at every
 * segment size. AnalysisRecord is the flattened, string-valued form handed
 * to sinks (one CSV line or table row per tone row).
 */

import type { RowValues } from "../rows/rows";

export interface RowAnalysis {
  prime: RowValues;
  /** Labels in detector order (P, R, I, RI) */
  hexachordal: string[];
  tetrachordal: string[];
  trichordal: string[];
}

export interface AnalysisRecord {
  /** e.g. "0 1 2 3 4 5 6 7 8 9 10 11" */
  primeRow: string;
  /** Lexically sorted, space-separated labels, e.g. "I11 P6 RI5" */
  hexachordalCombinatorials: string;
  tetrachordalCombinatorials: string;
  trichordalCombinatorials: string;
}
