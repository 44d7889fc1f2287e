export { MemorySink, CsvFileSink } from "./sinks";
export {
  loadBatchConfig,
  describeBatchConfig,
  ConfigError,
  ENV_VARS,
  DEFAULT_BATCH_SIZE,
  type Env,
} from "./config/BatchConfig";
export {
  BatchWriter,
  SinkUnavailableError,
  createCsvBatchWriter,
  type BatchWriterConfig,
  type BatchSummary,
} from "./batch/BatchWriter";
