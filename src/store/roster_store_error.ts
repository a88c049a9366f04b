export type RosterStoreErrorCode =
  | "not_configured"
  | "storage_failure"
  | "identity_resolution_failure"
  | "inconsistent_state";

export interface RosterStoreErrorDetails {
  code: RosterStoreErrorCode;
  // Store operation that failed, e.g. "upsert" or "jidmap.resolve"
  operation: string;
  message: string;
  cause?: unknown;
}

export class RosterStoreError extends Error {
  public readonly code: RosterStoreErrorCode;
  public readonly operation: string;

  constructor(details: RosterStoreErrorDetails) {
    super(details.message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "RosterStoreError";
    this.code = details.code;
    this.operation = details.operation;
  }

  toJSON() {
    return {
      error: this.code,
      operation: this.operation,
      message: this.message,
    };
  }
}

export const sqliteErrorCode = (error: unknown): string | undefined => {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
};

export const isUniqueViolation = (error: unknown) => {
  const code = sqliteErrorCode(error);
  return code === "SQLITE_CONSTRAINT_UNIQUE" || code === "SQLITE_CONSTRAINT_PRIMARYKEY";
};

/**
 * Re-throws store errors untouched and wraps anything else (SQLite, I/O) as a
 * storage failure tagged with the operation that raised it.
 */
export function asStoreError(operation: string, error: unknown): RosterStoreError {
  if (error instanceof RosterStoreError) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new RosterStoreError({
    code: "storage_failure",
    operation,
    message: `${operation} failed: ${detail}`,
    cause: error,
  });
}
