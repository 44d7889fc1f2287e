/**
 * In-memory analysis sink.
 *
 * Keeps committed records in an array. Useful for tests and for callers
 * that post-process results themselves.
 */

import type { AnalysisRecord, IAnalysisSink } from "@rowforms/contracts";

export class MemorySink implements IAnalysisSink {
  readonly target = "memory";

  private staged: AnalysisRecord[] = [];
  private committed: AnalysisRecord[] = [];
  private closed = false;

  async canWrite(): Promise<boolean> {
    return !this.closed;
  }

  async prepare(): Promise<void> {
    this.assertOpen();
    this.staged = [];
    this.committed = [];
  }

  async write(record: AnalysisRecord): Promise<void> {
    this.assertOpen();
    this.staged.push({ ...record });
  }

  async commit(): Promise<void> {
    this.assertOpen();
    this.committed.push(...this.staged);
    this.staged = [];
  }

  async rollback(): Promise<void> {
    this.staged = [];
  }

  async close(): Promise<void> {
    this.staged = [];
    this.closed = true;
  }

  /** Committed records, oldest first */
  get records(): readonly AnalysisRecord[] {
    return this.committed;
  }

  get pending(): number {
    return this.staged.length;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("MemorySink is closed");
    }
  }
}
