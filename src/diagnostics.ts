import { createLogger, loadAnalysisConfig } from "./config/analysisConfig.js";
import type { StructuredLogger } from "./logger.js";
import { describeError } from "./types.js";

/** Subset of {@link process} the hook needs; tests pass an `EventEmitter`. */
export interface DiagnosticsTarget {
  on(event: "uncaughtExceptionMonitor", listener: (error: unknown, origin: string) => void): unknown;
}

export interface DiagnosticsOptions {
  readonly logger?: StructuredLogger;
  readonly target?: DiagnosticsTarget;
}

let installed = false;

/**
 * Registers, once per process, a monitor that logs uncaught failures before
 * Node reports them. The monitor only observes: it neither handles the error
 * nor changes how the process exits, and analyses are unaffected.
 *
 * @returns `true` when this call installed the hook, `false` afterwards.
 */
export function installDiagnostics(options: DiagnosticsOptions = {}): boolean {
  if (installed) {
    return false;
  }
  installed = true;

  const logger = options.logger ?? createLogger(loadAnalysisConfig());
  const target = options.target ?? process;
  target.on("uncaughtExceptionMonitor", (error, origin) => {
    logger.error("uncaught_exception", {
      origin,
      name: error instanceof Error ? error.name : typeof error,
      message: describeError(error),
      stack: error instanceof Error ? error.stack ?? null : null,
    });
  });
  return true;
}

/** Clears the once-only guard so suites can install the hook again. */
export function __resetDiagnosticsForTests(): void {
  installed = false;
}
