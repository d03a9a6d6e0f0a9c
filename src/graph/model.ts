/**
 * Data contract shared by every analysis. Values are plain objects created per
 * call; none of the algorithms keeps state between invocations.
 */

/** Opaque node identity. */
export type NodeId = string;

export interface GraphEdge {
  readonly from: NodeId;
  readonly to: NodeId;
  /** Absent on unweighted edges. */
  readonly weight?: number;
}

/**
 * Ordered node identities plus the edges between them. Every edge endpoint is
 * expected to be declared in {@link nodes}, although nothing enforces it (see
 * {@link inspectGraph}).
 */
export interface Graph {
  readonly nodes: readonly NodeId[];
  readonly edges: readonly GraphEdge[];
}

/** Looser pairwise relation converted into a {@link GraphEdge} by the DAG builder. */
export interface Relationship {
  readonly from: NodeId;
  readonly to: NodeId;
  readonly confidence?: number;
}

export interface TopologicalSortResult {
  readonly sorted: NodeId[];
  readonly hasCycle: boolean;
}

export interface CycleDetectionResult {
  readonly hasCycle: boolean;
  /** Closed walks; the first node implicitly repeats after the last one. */
  readonly cycles: NodeId[][];
}

export interface PathResult {
  readonly path: NodeId[];
  readonly exists: boolean;
  readonly distance: number | null;
}
