import { z } from "zod";

import type { Graph, GraphEdge, Relationship } from "./model.js";

/**
 * Wire schemas of the JSON payloads. Unknown fields are ignored; optional
 * numbers accept both an absent property and `null`, which decode to an
 * absent property.
 */
const OptionalNumberSchema = z.number().finite("must be a finite number").nullable().optional();

export const GraphEdgeSchema = z
  .object({
    from: z.string(),
    to: z.string(),
    weight: OptionalNumberSchema,
  })
  .transform(({ from, to, weight }): GraphEdge =>
    weight === null || weight === undefined ? { from, to } : { from, to, weight },
  );

export const GraphSchema = z
  .object({
    nodes: z.array(z.string()),
    edges: z.array(GraphEdgeSchema),
  })
  .transform(({ nodes, edges }): Graph => ({ nodes, edges }));

export const RelationshipSchema = z
  .object({
    from: z.string(),
    to: z.string(),
    confidence: OptionalNumberSchema,
  })
  .transform(({ from, to, confidence }): Relationship =>
    confidence === null || confidence === undefined ? { from, to } : { from, to, confidence },
  );

export const RelationshipListSchema = z.array(RelationshipSchema);
