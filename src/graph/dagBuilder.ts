import type { Graph, GraphEdge, NodeId, Relationship } from "./model.js";

/**
 * Assembles a graph from pairwise relationships. Nodes are the distinct
 * endpoints in first-seen order (`from` before `to` within a relationship).
 * Every relationship yields exactly one edge, duplicates included, whose
 * weight is the relationship confidence.
 *
 * The result is named after its intended use; nothing checks that it is
 * actually acyclic.
 */
export function buildDagFromRelationships(relationships: readonly Relationship[]): Graph {
  const nodes = new Set<NodeId>();
  const edges: GraphEdge[] = [];

  for (const relationship of relationships) {
    nodes.add(relationship.from);
    nodes.add(relationship.to);
    edges.push(
      relationship.confidence === undefined
        ? { from: relationship.from, to: relationship.to }
        : { from: relationship.from, to: relationship.to, weight: relationship.confidence },
    );
  }

  return { nodes: [...nodes], edges };
}
