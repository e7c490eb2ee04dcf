/**
 * Error taxonomy for catalog build, extraction and diff.
 * The CLI maps each class to a distinct exit status (see cli/commands.ts).
 */

/**
 * Missing or undiscoverable catalog locations, bad option values
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Schema creation, insert or query failure in a catalog file
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StorageError";
  }
}

/**
 * A service name was inserted twice into the same catalog
 */
export class UniqueConstraintError extends StorageError {
  constructor(
    message: string,
    public readonly serviceName: string,
    options?: { cause?: unknown }
  ) {
    super(message, "SQLITE_CONSTRAINT_UNIQUE", options);
    this.name = "UniqueConstraintError";
  }
}

/**
 * Service not present in the catalog being queried
 */
export class LookupError extends Error {
  constructor(
    message: string,
    public readonly serviceName: string,
    public readonly catalog: "project" | "baseline"
  ) {
    super(message);
    this.name = "LookupError";
  }
}

/**
 * Per-service or per-transaction extraction problem. Never escapes the
 * extractor: it is logged and turned into an empty or partial result.
 */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly serviceName: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
