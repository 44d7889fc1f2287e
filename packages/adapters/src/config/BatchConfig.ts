/**
 * Batch Configuration
 *
 * Reads the bulk-run settings from an environment map once, validates all
 * of them, and returns a plain BatchConfig value. Nothing here is global:
 * callers pass `process.env` (or a test map) in and hand the result on.
 */

import type { BatchConfig, ValidationError } from "@rowforms/contracts";

export const ENV_VARS = {
  OUTPUT_PATH: "ROWFORMS_OUTPUT_PATH",
  BATCH_SIZE: "ROWFORMS_BATCH_SIZE",
  LIMIT: "ROWFORMS_LIMIT",
} as const;

export const DEFAULT_BATCH_SIZE = 100;

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    super(
      `Invalid batch configuration:\n${errors
        .map((e) => `  - ${e.field}: ${e.reason}${e.hint ? ` (${e.hint})` : ""}`)
        .join("\n")}`
    );
    this.name = "ConfigError";
    this.errors = errors;
  }
}

function readInteger(
  env: Env,
  field: string,
  fallback: number,
  min: number,
  errors: ValidationError[]
): number {
  const raw = env[field]?.trim();
  if (raw === undefined || raw === "") {
    return fallback;
  }

  const value = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(value) || value < min) {
    errors.push({
      field,
      reason: `expected an integer >= ${min}, got "${raw}"`,
      hint: `set ${field}=${fallback}`,
    });
    return fallback;
  }
  return value;
}

/**
 * Build a BatchConfig from environment variables.
 *
 * - ROWFORMS_OUTPUT_PATH (required): CSV file to write
 * - ROWFORMS_BATCH_SIZE: records per commit, default 100
 * - ROWFORMS_LIMIT: rows to process, default 0 (all 11! rows)
 *
 * @throws ConfigError listing every invalid or missing setting
 */
export function loadBatchConfig(env: Env): BatchConfig {
  const errors: ValidationError[] = [];

  const outputPath = env[ENV_VARS.OUTPUT_PATH]?.trim() ?? "";
  if (outputPath === "") {
    errors.push({
      field: ENV_VARS.OUTPUT_PATH,
      reason: "required variable is not set",
      hint: `add ${ENV_VARS.OUTPUT_PATH}=path/to/combinatorials.csv`,
    });
  }

  const batchSize = readInteger(env, ENV_VARS.BATCH_SIZE, DEFAULT_BATCH_SIZE, 1, errors);
  const limit = readInteger(env, ENV_VARS.LIMIT, 0, 0, errors);

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  return { outputPath, batchSize, limit };
}

/** Log-ready lines describing a configuration */
export function describeBatchConfig(config: BatchConfig): string[] {
  return [
    `[BatchConfig] output: ${config.outputPath}`,
    `[BatchConfig] batch size: ${config.batchSize}`,
    `[BatchConfig] limit: ${config.limit === 0 ? "none" : config.limit}`,
  ];
}
