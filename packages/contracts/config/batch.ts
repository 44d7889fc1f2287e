/**
 * Bulk run configuration.
 *
 * Built once at process start (see loadBatchConfig in @rowforms/adapters)
 * and passed to whatever needs it.
 */
export interface BatchConfig {
  /** File the CSV sink writes to */
  outputPath: string;

  /** Records per commit */
  batchSize: number;

  /** Maximum rows to process; 0 processes the whole enumeration */
  limit: number;
}
