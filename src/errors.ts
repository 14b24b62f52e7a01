/**
 * Error conditions surfaced by the index core. Each carries a fixed `name`
 * so callers can branch on it after crossing an async boundary.
 */

/** The embedding model could not be loaded or produced unusable output. Fatal to the calling operation. */
export class ModelUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModelUnavailableError";
  }
}

/** The source graph could not be reached after the client's own retries. */
export class SourceUnreachableError extends Error {
  /** HTTP status of the last attempt, when one was received. */
  public readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.name = "SourceUnreachableError";
    this.status = options?.status;
  }
}

/** The source graph rejected the credentials. Not retried. */
export class SourceAuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SourceAuthError";
  }
}

/** A query or query input was rejected before or by the source graph. Not retried. */
export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}

/** A durable write failed; nothing of the affected sub-batch is visible. */
export class StoreWriteFailureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreWriteFailureError";
  }
}

/** Best-effort message extraction for logging and tool responses. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
