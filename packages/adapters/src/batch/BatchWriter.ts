/**
 * Batch Writer
 *
 * Drives a bulk analysis run:
 *
 *   enumerateRowsStartingAtZero → assembleRecord → sink.write → sink.commit
 *
 * Records are committed every `batchSize` rows. On any failure the staged
 * batch is rolled back and the original error is rethrown, even when the
 * rollback itself fails; batches committed before the failure stay in the
 * sink. The sink is always closed.
 */

import type { BatchConfig, IAnalysisSink } from "@rowforms/contracts";
import {
  assembleRecord,
  enumerateRowsStartingAtZero,
  ROWS_STARTING_AT_ZERO,
} from "@rowforms/engine";
import { DEFAULT_BATCH_SIZE } from "../config/BatchConfig";
import { CsvFileSink } from "../sinks/CsvFileSink";

export class SinkUnavailableError extends Error {
  constructor(target: string) {
    super(`Cannot write to ${target}`);
    this.name = "SinkUnavailableError";
  }
}

/**
 * Configuration for the BatchWriter.
 */
export interface BatchWriterConfig {
  /**
   * Records per commit.
   * @default 100
   */
  batchSize?: number;

  /**
   * Maximum rows to process. 0 processes all 11! rows.
   * @default 0
   */
  limit?: number;

  /**
   * Log a progress line every this many rows.
   * @default 10000
   */
  progressEvery?: number;

  /**
   * Where log lines go.
   * @default console.log
   */
  log?: (line: string) => void;
}

const DEFAULT_CONFIG: Required<BatchWriterConfig> = {
  batchSize: DEFAULT_BATCH_SIZE,
  limit: 0,
  progressEvery: 10000,
  log: (line) => console.log(line),
};

export interface BatchSummary {
  /** Rows analyzed and committed */
  processed: number;
  /** Commits issued */
  batches: number;
  /** Rows the run was asked to process */
  total: number;
}

export class BatchWriter {
  private readonly sink: IAnalysisSink;
  private readonly config: Required<BatchWriterConfig>;

  constructor(sink: IAnalysisSink, config: BatchWriterConfig = {}) {
    this.sink = sink;
    this.config = { ...DEFAULT_CONFIG, ...config };

    const { batchSize, limit, progressEvery } = this.config;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }
    if (!Number.isInteger(limit) || limit < 0) {
      throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
    }
    if (!Number.isInteger(progressEvery) || progressEvery < 1) {
      throw new RangeError(`progressEvery must be a positive integer, got ${progressEvery}`);
    }
  }

  /**
   * Analyze every enumerated row and write it to the sink.
   *
   * @throws SinkUnavailableError if the sink is not writable (nothing is written)
   */
  async run(): Promise<BatchSummary> {
    const { batchSize, limit, progressEvery, log } = this.config;
    const total = limit > 0 ? limit : ROWS_STARTING_AT_ZERO;

    if (!(await this.sink.canWrite())) {
      log(`[BatchWriter] Cannot write to ${this.sink.target}`);
      throw new SinkUnavailableError(this.sink.target);
    }

    let processed = 0;
    let batches = 0;
    let pending = 0;

    try {
      await this.sink.prepare();
      log(`[BatchWriter] Writing ${total} rows to ${this.sink.target}`);

      for (const row of enumerateRowsStartingAtZero({ limit })) {
        await this.sink.write(assembleRecord(row));
        pending++;

        if (pending >= batchSize) {
          await this.sink.commit();
          batches++;
          processed += pending;
          pending = 0;
        }

        if ((processed + pending) % progressEvery === 0) {
          log(`[BatchWriter] ${formatPercent(processed + pending, total)} complete (${processed + pending} rows processed)`);
        }
      }

      if (pending > 0) {
        await this.sink.commit();
        batches++;
        processed += pending;
        pending = 0;
      }

      log(`[BatchWriter] Done: ${processed} rows in ${batches} batches`);
      return { processed, batches, total };
    } catch (err) {
      log(`[BatchWriter] Failed after ${processed} committed rows: ${describeError(err)}`);
      try {
        await this.sink.rollback();
      } catch (rollbackErr) {
        log(`[BatchWriter] Rollback failed: ${describeError(rollbackErr)}`);
      }
      throw err;
    } finally {
      await this.sink.close();
    }
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatPercent(done: number, total: number): string {
  return `${((done / total) * 100).toFixed(1)}%`;
}

/**
 * Wire a loaded configuration to a CSV sink.
 */
export function createCsvBatchWriter(
  config: BatchConfig,
  options: Pick<BatchWriterConfig, "progressEvery" | "log"> = {}
): BatchWriter {
  return new BatchWriter(new CsvFileSink(config.outputPath), {
    ...options,
    batchSize: config.batchSize,
    limit: config.limit,
  });
}
