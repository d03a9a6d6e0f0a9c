import type { z } from "zod";

import type { CycleDetectionResult, Graph, PathResult, Relationship, TopologicalSortResult } from "./graph/model.js";
import { GraphSchema, RelationshipListSchema } from "./graph/schemas.js";
import { ERROR_CODES, type ErrorCode } from "./types.js";

/** Problem found while decoding a payload. `path` is a JSON pointer. */
export interface DecodeIssue {
  readonly path: string;
  readonly message: string;
}

/** Raised when a payload is not valid JSON or does not match its schema. */
export class GraphDecodeError extends Error {
  public readonly code: ErrorCode = ERROR_CODES.GRAPH_DECODE_FAILED;

  constructor(
    readonly subject: string,
    readonly issues: readonly DecodeIssue[],
  ) {
    super(`${subject} payload rejected: ${issues.map((issue) => `${issue.path || "/"} ${issue.message}`).join("; ")}`);
    this.name = "GraphDecodeError";
  }
}

export type DecodeOutcome<T> = { ok: true; value: T } | { ok: false; error: GraphDecodeError };

function decodeJson<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, subject: string): DecodeOutcome<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new GraphDecodeError(subject, [{ path: "", message }]) };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.map((segment) => `/${segment}`).join(""),
      message: issue.message,
    }));
    return { ok: false, error: new GraphDecodeError(subject, issues) };
  }
  return { ok: true, value: parsed.data };
}

export function decodeGraph(text: string): DecodeOutcome<Graph> {
  return decodeJson(text, GraphSchema, "graph");
}

export function decodeRelationships(text: string): DecodeOutcome<Relationship[]> {
  return decodeJson(text, RelationshipListSchema, "relationships");
}

/** Strict variant of {@link decodeGraph}; throws {@link GraphDecodeError}. */
export function parseGraph(text: string): Graph {
  const outcome = decodeGraph(text);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}

/** Strict variant of {@link decodeRelationships}; throws {@link GraphDecodeError}. */
export function parseRelationships(text: string): Relationship[] {
  const outcome = decodeRelationships(text);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}

// Encoders spell out every field so the key order of the output is fixed and
// absent numbers are written as `null`.

export function encodeTopologicalSortResult(result: TopologicalSortResult): string {
  return JSON.stringify({ sorted: result.sorted, hasCycle: result.hasCycle });
}

export function encodeCycleDetectionResult(result: CycleDetectionResult): string {
  return JSON.stringify({ hasCycle: result.hasCycle, cycles: result.cycles });
}

export function encodePathResult(result: PathResult): string {
  return JSON.stringify({ path: result.path, exists: result.exists, distance: result.distance });
}

/** Wire form of a graph: every edge carries `weight`, `null` when absent. */
export interface WireGraph {
  readonly nodes: readonly string[];
  readonly edges: ReadonlyArray<{ readonly from: string; readonly to: string; readonly weight: number | null }>;
}

export function toWireGraph(graph: Graph): WireGraph {
  return {
    nodes: graph.nodes,
    edges: graph.edges.map((edge) => ({ from: edge.from, to: edge.to, weight: edge.weight ?? null })),
  };
}

export function encodeGraph(graph: Graph): string {
  return JSON.stringify(toWireGraph(graph));
}
