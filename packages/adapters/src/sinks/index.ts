export { MemorySink } from "./MemorySink";
export { CsvFileSink } from "./CsvFileSink";
