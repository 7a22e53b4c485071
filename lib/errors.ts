export type DatasetErrorCode =
  | "FILE_NOT_FOUND"
  | "UNREADABLE"
  | "MALFORMED_CSV"
  | "MISSING_COLUMNS";

/** The articles file could not be turned into a dataset. */
export class DatasetLoadError extends Error {
  readonly code: DatasetErrorCode;

  constructor(code: DatasetErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DatasetLoadError";
    this.code = code;
  }
}

export class MissingColumnsError extends DatasetLoadError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(
      "MISSING_COLUMNS",
      `CSV is missing required column(s): ${missing.join(", ")}`
    );
    this.name = "MissingColumnsError";
    this.missing = missing;
  }
}

/** A table request named an unknown column or carried an unusable filter. */
export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}

// Errors may come from another realm (vm contexts, workers), so match on shape
function hasProperty<K extends string>(err: unknown, key: K): err is Record<K, unknown> {
  return typeof err === "object" && err !== null && key in err;
}

export function errorMessage(err: unknown): string {
  return hasProperty(err, "message") && typeof err.message === "string"
    ? err.message
    : String(err);
}

/** The `code` of a Node system error such as ENOENT, if it has one. */
export function errorCode(err: unknown): string | undefined {
  return hasProperty(err, "code") && typeof err.code === "string" ? err.code : undefined;
}
