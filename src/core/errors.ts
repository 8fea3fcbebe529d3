/**
 * Domain error hierarchy. Use these instead of generic Error.
 * HTTP mapping lives in toHttpError; the sync core only inspects codes.
 */

export class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string = "INTERNAL_ERROR"
  ) {
    super(message);
    this.name = "DomainError";
  }
}

export class ValidationError extends DomainError {
  constructor(message: string, public readonly details: string[] = []) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class NotFoundError extends DomainError {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/** Run cannot start: inactive or deleted account, missing credentials. Not retried. */
export class PreconditionError extends DomainError {
  constructor(message: string, public readonly accountId?: string) {
    super(message, "PRECONDITION_FAILED");
    this.name = "PreconditionError";
  }
}

export type UpstreamErrorKind = "transport" | "auth" | "response";

/** Failure talking to the insights API. */
export class UpstreamError extends DomainError {
  constructor(
    message: string,
    public readonly kind: UpstreamErrorKind,
    public readonly status?: number
  ) {
    super(message, "UPSTREAM_ERROR");
    this.name = "UpstreamError";
  }
}

/** Listing set could not be fetched; the whole run fails. */
export class EnumerationError extends DomainError {
  constructor(message: string, public readonly accountId: string, public readonly cause?: unknown) {
    super(message, "ENUMERATION_FAILED");
    this.name = "EnumerationError";
  }
}

export class NormalizationError extends DomainError {
  constructor(message: string, public readonly queryKind: string) {
    super(message, "NORMALIZATION_FAILED");
    this.name = "NormalizationError";
  }
}

/** A metric batch was rejected; nothing from that batch was written. */
export class StoreError extends DomainError {
  constructor(message: string, public readonly kind: string) {
    super(message, "STORE_ERROR");
    this.name = "StoreError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Map domain error to HTTP status + JSON body. */
export function toHttpError(err: unknown): {
  status: number;
  body: { error: string; message: string; details?: string[] };
} {
  if (err instanceof ValidationError) {
    return {
      status: 422,
      body: { error: err.code, message: err.message, ...(err.details.length > 0 && { details: err.details }) },
    };
  }
  if (err instanceof NotFoundError) return { status: 404, body: { error: err.code, message: err.message } };
  if (err instanceof PreconditionError) return { status: 409, body: { error: err.code, message: err.message } };
  if (err instanceof UpstreamError || err instanceof EnumerationError) {
    return { status: 502, body: { error: err.code, message: err.message } };
  }
  if (err instanceof DomainError) return { status: 500, body: { error: err.code, message: err.message } };
  return { status: 500, body: { error: "INTERNAL_ERROR", message: errorMessage(err) } };
}
