import { buildAdjacency, neighborsOf } from "./adjacency.js";
import type { Graph, NodeId, TopologicalSortResult } from "./model.js";

/**
 * Orders the graph with Kahn's algorithm.
 *
 * Nodes whose in-degree is zero are queued in first-seen order: declared nodes
 * in declaration order, then identities that only appear as edge targets. The
 * queue is FIFO, so for a given input the order is stable.
 *
 * `hasCycle` is set when fewer nodes were emitted than there are distinct
 * declared nodes; the nodes left behind sit on, or downstream of, a cycle.
 */
export function computeTopologicalSort(graph: Graph): TopologicalSortResult {
  const adjacency = buildAdjacency(graph);
  const inDegree = new Map<NodeId, number>();

  for (const node of graph.nodes) {
    inDegree.set(node, 0);
  }
  for (const edge of graph.edges) {
    inDegree.set(edge.to, (inDegree.get(edge.to) ?? 0) + 1);
  }

  const queue: NodeId[] = [];
  for (const [node, degree] of inDegree) {
    if (degree === 0) {
      queue.push(node);
    }
  }

  const sorted: NodeId[] = [];
  for (let head = 0; head < queue.length; head += 1) {
    const node = queue[head];
    if (node === undefined) {
      break;
    }
    sorted.push(node);

    for (const neighbor of neighborsOf(adjacency, node)) {
      const remaining = (inDegree.get(neighbor.to) ?? 0) - 1;
      inDegree.set(neighbor.to, remaining);
      if (remaining === 0) {
        queue.push(neighbor.to);
      }
    }
  }

  const declared = new Set(graph.nodes).size;
  return { sorted, hasCycle: sorted.length < declared };
}
