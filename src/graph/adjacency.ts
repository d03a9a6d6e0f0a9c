import type { Graph, NodeId } from "./model.js";

/** Outgoing connection recorded in an {@link AdjacencyLookup}. */
export interface Neighbor<W> {
  readonly to: NodeId;
  readonly weight: W;
}

/** Node → outgoing neighbors, in edge-list order. */
export type AdjacencyLookup<W> = ReadonlyMap<NodeId, readonly Neighbor<W>[]>;

/**
 * Builds the outgoing adjacency of {@link graph}. Every declared node gets an
 * entry (possibly empty); edge sources missing from the node list get one too.
 *
 * Without {@link defaultWeight} the edge weights are copied as-is, so
 * unweighted edges carry `undefined`. With it, unweighted edges carry the
 * default instead.
 */
export function buildAdjacency(graph: Graph): AdjacencyLookup<number | undefined>;
export function buildAdjacency(graph: Graph, defaultWeight: number): AdjacencyLookup<number>;
export function buildAdjacency(graph: Graph, defaultWeight?: number): AdjacencyLookup<number | undefined> {
  const adjacency = new Map<NodeId, Neighbor<number | undefined>[]>();

  for (const node of graph.nodes) {
    if (!adjacency.has(node)) {
      adjacency.set(node, []);
    }
  }
  for (const edge of graph.edges) {
    let outgoing = adjacency.get(edge.from);
    if (!outgoing) {
      outgoing = [];
      adjacency.set(edge.from, outgoing);
    }
    outgoing.push({ to: edge.to, weight: edge.weight ?? defaultWeight });
  }

  return adjacency;
}

/**
 * Returns the outgoing neighbors of {@link node}. Identities without an entry
 * resolve to an empty list instead of failing.
 */
export function neighborsOf<W>(adjacency: AdjacencyLookup<W>, node: NodeId): readonly Neighbor<W>[] {
  return adjacency.get(node) ?? [];
}
