import {
  decodeGraph,
  decodeRelationships,
  encodeCycleDetectionResult,
  encodeGraph,
  encodePathResult,
  encodeTopologicalSortResult,
  type GraphDecodeError,
} from "./codec.js";
import { createLogger, loadAnalysisConfig, type AnalysisConfig } from "./config/analysisConfig.js";
import { detectCyclesInGraph } from "./graph/cycles.js";
import { buildDagFromRelationships } from "./graph/dagBuilder.js";
import type { CycleDetectionResult, Graph, PathResult, TopologicalSortResult } from "./graph/model.js";
import { findPathBetweenNodes } from "./graph/pathFinding.js";
import { computeTopologicalSort } from "./graph/topologicalSort.js";
import type { StructuredLogger } from "./logger.js";

/**
 * String entry points. Each takes JSON text and returns JSON text; malformed
 * input never throws and yields the entry point's fallback payload instead.
 */

export const TOPOLOGICAL_SORT_FALLBACK: TopologicalSortResult = Object.freeze({ sorted: [], hasCycle: true });
export const CYCLE_DETECTION_FALLBACK: CycleDetectionResult = Object.freeze({ hasCycle: false, cycles: [] });
export const PATH_FALLBACK: PathResult = Object.freeze({ path: [], exists: false, distance: null });
export const GRAPH_FALLBACK: Graph = Object.freeze({ nodes: [], edges: [] });

/** Optional collaborators; both default to the environment driven ones. */
export interface BindingContext {
  readonly logger?: StructuredLogger;
  readonly config?: AnalysisConfig;
}

interface ResolvedContext {
  readonly logger: StructuredLogger;
  readonly config: AnalysisConfig;
}

/** Loggers built from a config, one per distinct level and mirror file. */
const configuredLoggers = new Map<string, StructuredLogger>();

function loggerFor(config: AnalysisConfig): StructuredLogger {
  const key = `${config.logLevel}\u0000${config.logFile ?? ""}`;
  let logger = configuredLoggers.get(key);
  if (!logger) {
    logger = createLogger(config);
    configuredLoggers.set(key, logger);
  }
  return logger;
}

function resolveContext(context: BindingContext): ResolvedContext {
  const config = context.config ?? loadAnalysisConfig();
  return { logger: context.logger ?? loggerFor(config), config };
}

/** Waits until the loggers created by the entry points have written every pending entry. */
export async function flushBindingLoggers(): Promise<void> {
  await Promise.all([...configuredLoggers.values()].map((logger) => logger.flush()));
}

function reportRejection(error: GraphDecodeError, entryPoint: string, logger: StructuredLogger): void {
  logger.warn("graph_payload_decode_failed", {
    entry_point: entryPoint,
    subject: error.subject,
    issues: error.issues,
  });
}

export function topologicalSort(graphJson: string, context: BindingContext = {}): string {
  const { logger } = resolveContext(context);
  const decoded = decodeGraph(graphJson);
  if (!decoded.ok) {
    reportRejection(decoded.error, "topologicalSort", logger);
    return encodeTopologicalSortResult(TOPOLOGICAL_SORT_FALLBACK);
  }
  const result = computeTopologicalSort(decoded.value);
  logger.debug("graph_analysis_completed", {
    entry_point: "topologicalSort",
    nodes: decoded.value.nodes.length,
    edges: decoded.value.edges.length,
    has_cycle: result.hasCycle,
  });
  return encodeTopologicalSortResult(result);
}

export function detectCycles(graphJson: string, context: BindingContext = {}): string {
  const { logger, config } = resolveContext(context);
  const decoded = decodeGraph(graphJson);
  if (!decoded.ok) {
    reportRejection(decoded.error, "detectCycles", logger);
    return encodeCycleDetectionResult(CYCLE_DETECTION_FALLBACK);
  }
  const result = detectCyclesInGraph(decoded.value, { limit: config.maxCycles });
  logger.debug("graph_analysis_completed", {
    entry_point: "detectCycles",
    nodes: decoded.value.nodes.length,
    edges: decoded.value.edges.length,
    cycles: result.cycles.length,
  });
  return encodeCycleDetectionResult(result);
}

/** {@link fromId} and {@link toId} are raw identities, not JSON. */
export function findPath(graphJson: string, fromId: string, toId: string, context: BindingContext = {}): string {
  const { logger } = resolveContext(context);
  const decoded = decodeGraph(graphJson);
  if (!decoded.ok) {
    reportRejection(decoded.error, "findPath", logger);
    return encodePathResult(PATH_FALLBACK);
  }
  const result = findPathBetweenNodes(decoded.value, fromId, toId);
  logger.debug("graph_analysis_completed", {
    entry_point: "findPath",
    nodes: decoded.value.nodes.length,
    edges: decoded.value.edges.length,
    exists: result.exists,
  });
  return encodePathResult(result);
}

export function buildDag(relationshipsJson: string, context: BindingContext = {}): string {
  const { logger } = resolveContext(context);
  const decoded = decodeRelationships(relationshipsJson);
  if (!decoded.ok) {
    reportRejection(decoded.error, "buildDag", logger);
    return encodeGraph(GRAPH_FALLBACK);
  }
  const graph = buildDagFromRelationships(decoded.value);
  logger.debug("graph_analysis_completed", {
    entry_point: "buildDag",
    relationships: decoded.value.length,
    nodes: graph.nodes.length,
  });
  return encodeGraph(graph);
}
