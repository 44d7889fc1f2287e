// Errors
export { InvalidRowError, InvalidLabelError } from "./errors";

// Pitch-class arithmetic
export * from "./pitch/pitchClass";

// Rows and matrix
export {
  ToneRow,
  buildMatrix,
  transposeRow,
  validateToneRow,
  isValidToneRow,
} from "./rows/ToneRow";

// Partition engine
export * from "./partition/partition";

// Combinatoriality
export * from "./combinatoriality/forms";
export * from "./combinatoriality/labels";
export * from "./combinatoriality/detector";

// Enumeration
export * from "./enumeration/permutations";

// Result assembly
export * from "./assembly/analysis";
