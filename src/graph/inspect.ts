import { ERROR_CODES, type ErrorCode } from "../types.js";
import type { Graph, NodeId } from "./model.js";

/** Structural inconsistency found by {@link inspectGraph}. */
export interface GraphIssue {
  /** Stable error code identifying the issue. */
  code: ErrorCode;
  /** Human readable explanation of the issue. */
  message: string;
  /** JSON pointer to the offending location inside the graph descriptor. */
  path: string;
  /** Optional actionable hint describing how to resolve the issue. */
  hint?: string;
  details?: Record<string, unknown>;
}

export type GraphInspectionReport =
  | { ok: true }
  | { ok: false; issues: GraphIssue[] };

/**
 * Reports the inconsistencies the analyses tolerate silently: node identities
 * declared more than once, and edges pointing at undeclared identities.
 *
 * The analyses still run on such graphs. Undeclared identities are reachable
 * through edges but are never used as traversal roots. Undeclared edge
 * targets are emitted by the topological sort and count toward the length
 * its cycle flag compares with the declared nodes, so they can mask a cycle.
 */
export function inspectGraph(graph: Graph): GraphInspectionReport {
  const issues: GraphIssue[] = [];
  const firstSeen = new Map<NodeId, number>();

  graph.nodes.forEach((node, index) => {
    const previous = firstSeen.get(node);
    if (previous !== undefined) {
      issues.push({
        code: ERROR_CODES.GRAPH_DUPLICATE_NODE,
        message: `node '${node}' is declared more than once`,
        path: `/nodes/${index}`,
        hint: "remove the repeated declaration",
        details: { node, firstIndex: previous },
      });
      return;
    }
    firstSeen.set(node, index);
  });

  graph.edges.forEach((edge, index) => {
    const missing = [edge.from, edge.to].filter((endpoint) => !firstSeen.has(endpoint));
    if (missing.length === 0) {
      return;
    }
    const unique = [...new Set(missing)];
    issues.push({
      code: ERROR_CODES.GRAPH_DANGLING_EDGE,
      message: `edge '${edge.from}' -> '${edge.to}' references undeclared node(s): ${unique.join(", ")}`,
      path: `/edges/${index}`,
      hint: "declare the missing identities in 'nodes'",
      details: { missing: unique },
    });
  });

  return issues.length === 0 ? { ok: true } : { ok: false, issues };
}
