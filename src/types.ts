/**
 * Shared error helpers used across the analysis engine. Grouping the codes in
 * one catalogue keeps the CLI, the bindings and the inspector consistent.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    DECODE_FAILED: "E-GRAPH-DECODE-FAILED",
    DUPLICATE_NODE: "E-GRAPH-DUPLICATE-NODE",
    DANGLING_EDGE: "E-GRAPH-DANGLING-EDGE",
    UNEXPECTED: "E-GRAPH-UNEXPECTED",
  },
  CLI: {
    INVALID_ARGUMENT: "E-CLI-INVALID-ARGUMENT",
    UNKNOWN_ANALYSIS: "E-CLI-UNKNOWN-ANALYSIS",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `GRAPH_DECODE_FAILED`).
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const [familyKey, family] of Object.entries(catalog)) {
    for (const [codeKey, code] of Object.entries(family)) {
      flat[`${familyKey}_${codeKey}`] = code;
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.GRAPH_DANGLING_EDGE`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Maximum number of UTF-16 code units allowed for logged error messages. */
export const ERROR_TEXT_MAX_LENGTH = 120;

/**
 * Collapses whitespace, trims surrounding spaces and enforces the maximum length
 * for an error message. Empty input yields the fallback.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Extracts a printable message from any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return normaliseErrorMessage(error.message);
  }
  return normaliseErrorMessage(String(error));
}
