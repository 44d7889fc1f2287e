/**
 * Sink Interfaces
 *
 * Destinations for assembled analysis records. Writes are staged and only
 * become durable on commit(), so a bulk run can discard a failed batch.
 */

import type { AnalysisRecord } from "../analysis/analysis";

export interface IAnalysisSink {
  /** Human-readable destination, used in log lines */
  readonly target: string;

  /** Whether the destination is reachable and writable right now */
  canWrite(): Promise<boolean>;

  /** Clear the destination before a fresh run */
  prepare(): Promise<void>;

  /** Stage a record for the next commit */
  write(record: AnalysisRecord): Promise<void>;

  /** Persist every staged record */
  commit(): Promise<void>;

  /** Discard every staged record */
  rollback(): Promise<void>;

  /** Release resources. Staged records not yet committed are dropped. */
  close(): Promise<void>;
}
