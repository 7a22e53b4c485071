/**
 * Environment utilities for runtime detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function isProduction(): boolean {
  return getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test" || Boolean(process.env.JEST_WORKER_ID);
}

export interface GetEnvVarOptions<T> {
  defaultValue?: T;
  required?: boolean;
  parse: (raw: string) => T;
}

/**
 * Reads an environment variable with fallbacks and parsing.
 * - Empty strings count as unset.
 * - If not found, returns `defaultValue` when provided; otherwise throws when `required` is true.
 */
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T>
): T | undefined {
  const candidate = process.env[name];

  if (candidate != null && candidate !== "") {
    return options.parse(candidate);
  }

  if (options.defaultValue !== undefined) {
    return options.defaultValue;
  }

  if (options.required) {
    throw new Error(`Missing required env var: ${name}`);
  }

  return undefined;
}

export function getString(name: string, defaultValue = ""): string {
  return getEnvVar(name, { defaultValue, parse: (raw) => raw }) ?? defaultValue;
}

export function getNumber(name: string, defaultValue: number): number {
  const value = getEnvVar(name, {
    defaultValue,
    parse: (raw) => {
      const n = Number(raw);
      if (Number.isNaN(n))
        throw new Error(`Env var ${name} is not a number: ${raw}`);
      return n;
    },
  });
  return value ?? defaultValue;
}

export function getBoolean(name: string, defaultValue: boolean): boolean {
  const value = getEnvVar(name, {
    defaultValue,
    parse: (raw) => {
      const lowered = raw.toLowerCase();
      if (["1", "true", "yes", "y"].includes(lowered)) return true;
      if (["0", "false", "no", "n"].includes(lowered)) return false;
      throw new Error(`Env var ${name} is not a boolean: ${raw}`);
    },
  });
  return value ?? defaultValue;
}

export function getEnum<const T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T
): T {
  const value = getEnvVar(name, {
    defaultValue,
    parse: (raw) => {
      const match = allowed.find((option) => option === raw.toLowerCase());
      if (!match)
        throw new Error(
          `Env var ${name} must be one of ${allowed.join(", ")}: ${raw}`
        );
      return match;
    },
  });
  return value ?? defaultValue;
}
