import process from "node:process";

/**
 * Readers interpreting environment variables with one set of coercion rules.
 * Every reader accepts an explicit source so configuration loading can be
 * exercised against a plain record instead of the live process environment.
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Trims the raw value, treating blank strings as unset. */
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

/**
 * Returns an optional base-10 integer. Literals outside the safe integer range
 * or the supplied bounds are treated as absent.
 */
export function readOptionalInt(
  name: string,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

/** Integer reader falling back to {@link defaultValue} on absent or invalid input. */
export function readInt(
  name: string,
  defaultValue: number,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

/** Returns the trimmed value when {@link name} is set to a non-empty string. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/** String reader falling back to {@link defaultValue}. */
export function readString(name: string, defaultValue: string, env: EnvSource = process.env): string {
  return readOptionalString(name, env) ?? defaultValue;
}

/**
 * Reads an enum-like variable, matching the allow-list case-insensitively and
 * returning the canonical spelling. Unknown literals fall back to the default.
 */
export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower) ?? defaultValue;
}
