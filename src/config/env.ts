/**
 * Helpers dedicated to reading environment variables in a predictable manner.
 * Every reader takes the variable source explicitly so configuration can be
 * resolved from `process.env` at run time and from plain objects in tests.
 */

/** Variable bag consulted by the readers (usually {@link process.env}). */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Normalises a raw value: trims it and maps blank strings to `undefined`. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

/** Determines whether the provided value fits the numeric constraints. */
function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Returns an optional integer when {@link name} contains a valid base-10 literal. */
export function readOptionalInt(env: EnvSource, name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }

  if (!/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }

  const value = Number.parseInt(normalised, 10);
  // Literals beyond the safe integer range would be rounded silently.
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }

  return withinBounds(value, options) ? value : undefined;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(env: EnvSource, name: string): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like variable while validating that the literal belongs to the
 * allow-list. Mixed-case input is accepted; unknown literals yield `undefined`.
 */
export function readOptionalEnum<T extends string>(
  env: EnvSource,
  name: string,
  allowed: readonly T[],
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }

  const lookup = new Map<string, T>();
  for (const value of allowed) {
    lookup.set(value.toLowerCase(), value);
  }
  return lookup.get(normalised.toLowerCase());
}

/** Returns a canonical enum value, defaulting when unset or invalid. */
export function readEnum<T extends string>(
  env: EnvSource,
  name: string,
  allowed: readonly T[],
  defaultValue: T,
): T {
  return readOptionalEnum(env, name, allowed) ?? defaultValue;
}
