import { LOG_LEVELS, StructuredLogger, type LogLevel } from "../logger.js";
import { readEnum, readOptionalInt, readOptionalString, type EnvSource } from "./env.js";

/** Resolved runtime configuration of the analysis engine. */
export interface AnalysisConfig {
  /** Minimum level emitted by the default logger. */
  readonly logLevel: LogLevel;
  /** Optional JSON-lines mirror of the log stream. */
  readonly logFile: string | null;
  /** Cap on the number of cycles recorded by detection; `null` means unlimited. */
  readonly maxCycles: number | null;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = Object.freeze({
  logLevel: "info",
  logFile: null,
  maxCycles: null,
});

/**
 * Resolves the configuration from environment variables. Unparseable values
 * fall back to {@link DEFAULT_ANALYSIS_CONFIG}.
 *
 * - `GRAPH_ANALYSIS_LOG_LEVEL`: `debug`, `info`, `warn` or `error`.
 * - `GRAPH_ANALYSIS_LOG_FILE`: path of the mirror file.
 * - `GRAPH_ANALYSIS_MAX_CYCLES`: positive integer.
 */
export function loadAnalysisConfig(env: EnvSource = process.env): AnalysisConfig {
  return {
    logLevel: readEnum(env, "GRAPH_ANALYSIS_LOG_LEVEL", LOG_LEVELS, DEFAULT_ANALYSIS_CONFIG.logLevel),
    logFile: readOptionalString(env, "GRAPH_ANALYSIS_LOG_FILE") ?? DEFAULT_ANALYSIS_CONFIG.logFile,
    maxCycles: readOptionalInt(env, "GRAPH_ANALYSIS_MAX_CYCLES", { min: 1 }) ?? DEFAULT_ANALYSIS_CONFIG.maxCycles,
  };
}

/** Builds the logger described by {@link config}. */
export function createLogger(config: AnalysisConfig): StructuredLogger {
  return new StructuredLogger({ level: config.logLevel, logFile: config.logFile });
}
