import { buildAdjacency, neighborsOf, type AdjacencyLookup } from "./adjacency.js";
import type { CycleDetectionResult, Graph, NodeId } from "./model.js";

export interface CycleDetectionOptions {
  /**
   * Maximum number of cycles recorded before the remaining roots are skipped.
   * `null`/absent means unlimited; values below one are raised to one.
   */
  readonly limit?: number | null;
}

/** Pending work for one node of the active DFS path. */
interface DfsFrame {
  readonly node: NodeId;
  /** Index of the next outgoing neighbor to examine. */
  cursor: number;
}

/**
 * Detects directed cycles with a depth-first search started from every
 * declared node that has not been visited yet.
 *
 * The flag is exact. The list is not exhaustive: the search from a root stops
 * at its first back edge, so each root contributes at most one cycle. Each
 * cycle lists the active path from the back edge target down to the node that
 * closed it.
 */
export function detectCyclesInGraph(graph: Graph, options: CycleDetectionOptions = {}): CycleDetectionResult {
  const limit = resolveLimit(options.limit);
  const adjacency = buildAdjacency(graph);
  const visited = new Set<NodeId>();
  const cycles: NodeId[][] = [];

  for (const root of graph.nodes) {
    if (cycles.length >= limit) {
      break;
    }
    if (visited.has(root)) {
      continue;
    }
    const cycle = searchFromRoot(root, adjacency, visited);
    if (cycle) {
      cycles.push(cycle);
    }
  }

  return { hasCycle: cycles.length > 0, cycles };
}

function resolveLimit(limit: number | null | undefined): number {
  if (limit === null || limit === undefined) {
    return Number.POSITIVE_INFINITY;
  }
  return Math.max(1, Math.floor(limit));
}

/**
 * Runs one DFS with an explicit frame stack so the depth of the graph never
 * translates into native call depth. Returns the first cycle met, or `null`
 * once every node reachable from {@link root} is exhausted.
 */
function searchFromRoot(
  root: NodeId,
  adjacency: AdjacencyLookup<number | undefined>,
  visited: Set<NodeId>,
): NodeId[] | null {
  const onStack = new Set<NodeId>();
  const path: NodeId[] = [];
  const frames: DfsFrame[] = [];

  const enter = (node: NodeId): void => {
    visited.add(node);
    onStack.add(node);
    path.push(node);
    frames.push({ node, cursor: 0 });
  };

  enter(root);
  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    if (!frame) {
      break;
    }
    const next = neighborsOf(adjacency, frame.node)[frame.cursor];
    if (next === undefined) {
      frames.pop();
      onStack.delete(frame.node);
      path.pop();
      continue;
    }
    frame.cursor += 1;

    if (!visited.has(next.to)) {
      enter(next.to);
      continue;
    }
    if (onStack.has(next.to)) {
      return path.slice(path.indexOf(next.to));
    }
  }

  return null;
}
