export * from "./graph/index.js";
export * from "./bindings.js";
export {
  GraphDecodeError,
  decodeGraph,
  decodeRelationships,
  parseGraph,
  parseRelationships,
  toWireGraph,
  type DecodeIssue,
  type DecodeOutcome,
  type WireGraph,
} from "./codec.js";
export { installDiagnostics, type DiagnosticsOptions, type DiagnosticsTarget } from "./diagnostics.js";
export { loadAnalysisConfig, createLogger, DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from "./config/analysisConfig.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { ERROR_CODES, type ErrorCode } from "./types.js";
