// Pitch-class primitives
export * from "./core/pitch";

export * from "./rows/rows";

export * from "./transformations/transformations";

export * from "./analysis/analysis";

export * from "./sinks/interfaces";

export * from "./config/batch";

export * from "./diagnostics/diagnostics";
