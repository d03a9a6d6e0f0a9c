import { buildAdjacency, neighborsOf } from "./adjacency.js";
import type { Graph, NodeId, PathResult } from "./model.js";

/** Weight assumed for edges that do not carry one. */
export const DEFAULT_EDGE_WEIGHT = 1;

/**
 * Finds the path with the fewest edges from {@link from} to {@link to} using a
 * breadth-first search, and reports the sum of the weights along it.
 *
 * Weights never influence the route: on graphs where a longer route is
 * lighter, the reported distance exceeds the weighted optimum.
 */
export function findPathBetweenNodes(graph: Graph, from: NodeId, to: NodeId): PathResult {
  if (from === to) {
    return { path: [from], exists: true, distance: 0 };
  }

  const adjacency = buildAdjacency(graph, DEFAULT_EDGE_WEIGHT);
  // Each discovered node records the node it was reached from and the
  // accumulated weight, so memory stays linear in the graph size.
  const previous = new Map<NodeId, NodeId>();
  const distances = new Map<NodeId, number>([[from, 0]]);
  const queue: NodeId[] = [from];

  for (let head = 0; head < queue.length; head += 1) {
    const node = queue[head];
    if (node === undefined) {
      break;
    }
    if (node === to) {
      return { path: reconstructPath(previous, from, to), exists: true, distance: distances.get(to) ?? 0 };
    }

    const distance = distances.get(node) ?? 0;
    for (const neighbor of neighborsOf(adjacency, node)) {
      if (distances.has(neighbor.to)) {
        continue;
      }
      distances.set(neighbor.to, distance + neighbor.weight);
      previous.set(neighbor.to, node);
      queue.push(neighbor.to);
    }
  }

  return { path: [], exists: false, distance: null };
}

/** Walks the predecessor links back from {@link to} and returns the route in travel order. */
function reconstructPath(previous: ReadonlyMap<NodeId, NodeId>, from: NodeId, to: NodeId): NodeId[] {
  const path: NodeId[] = [to];
  let cursor = to;
  while (cursor !== from) {
    const parent = previous.get(cursor);
    if (parent === undefined) {
      break;
    }
    path.push(parent);
    cursor = parent;
  }
  return path.reverse();
}
