export * from "./model.js";
export * from "./adjacency.js";
export * from "./cycles.js";
export * from "./topologicalSort.js";
export * from "./pathFinding.js";
export * from "./dagBuilder.js";
export * from "./inspect.js";
export { GraphEdgeSchema, GraphSchema, RelationshipSchema, RelationshipListSchema } from "./schemas.js";
