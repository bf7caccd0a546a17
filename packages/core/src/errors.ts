/**
 * Error taxonomy shared by adapters, the request controller and the transport.
 */

/**
 * How a failed remote call should be handled.
 *
 * - `rate_limited`, `server_error`, `network`: transient, retried by the controller
 * - `payload_too_large`: bisected by the transport, never retried as is
 * - `permanent`: validation, permission, not found; propagated immediately
 * - `protocol`: unparseable responses or pagination anomalies; fatal for the operation
 */
export type FailureKind =
  | "rate_limited"
  | "server_error"
  | "network"
  | "payload_too_large"
  | "permanent"
  | "protocol";

const TRANSIENT_KINDS: ReadonlySet<FailureKind> = new Set<FailureKind>([
  "rate_limited",
  "server_error",
  "network",
]);

export function isTransient(kind: FailureKind): boolean {
  return TRANSIENT_KINDS.has(kind);
}

export interface RemoteErrorDetails {
  statusCode?: number;
  /** Remote error code, e.g. "REQUEST_TOO_LARGE" */
  code?: string;
  cause?: unknown;
}

/**
 * A classified failure reported by a remote table adapter.
 */
export class RemoteError extends Error {
  readonly kind: FailureKind;
  readonly statusCode?: number;
  readonly code?: string;

  constructor(kind: FailureKind, message: string, details: RemoteErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "RemoteError";
    this.kind = kind;
    this.statusCode = details.statusCode;
    this.code = details.code;
  }

  get retryable(): boolean {
    return isTransient(this.kind);
  }
}

/**
 * A write batch larger than the remote store accepts, rejected before any network call.
 */
export class BatchLimitError extends RemoteError {
  constructor(operation: string, size: number, limit: number) {
    super("permanent", `${operation} batch of ${size} exceeds the limit of ${limit} items per call`, {
      code: "BATCH_LIMIT",
    });
    this.name = "BatchLimitError";
  }
}

/**
 * The remote answered in a way that breaks the protocol (repeated page token, malformed body).
 */
export class ProtocolError extends RemoteError {
  constructor(message: string, cause?: unknown) {
    super("protocol", message, { cause });
    this.name = "ProtocolError";
  }
}

/**
 * A transient failure that outlived the retry strategy.
 */
export class RetryExhaustedError extends Error {
  readonly label: string;
  readonly attempts: number;
  readonly elapsedMs: number;
  readonly kind: FailureKind;

  constructor(label: string, attempts: number, elapsedMs: number, lastError: unknown) {
    super(
      `${label} failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${describeError(lastError)}`,
      { cause: lastError }
    );
    this.name = "RetryExhaustedError";
    this.label = label;
    this.attempts = attempts;
    this.elapsedMs = elapsedMs;
    this.kind = classifyFailure(lastError);
  }
}

/**
 * A single item that the remote still rejects as oversized. Bisection cannot go further.
 */
export class PayloadTooLargeError extends Error {
  readonly operation: string;
  /** Position of the item in the payload that was sent */
  readonly position: number;

  constructor(operation: string, position: number, cause: unknown) {
    super(`${operation} item at payload position ${position} is too large to send on its own`, {
      cause,
    });
    this.name = "PayloadTooLargeError";
    this.operation = operation;
    this.position = position;
  }
}

/**
 * Invalid job or policy configuration.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Classify any thrown value. Values that are not {@link RemoteError}s are treated
 * as permanent so that programming errors are never retried.
 */
export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof RemoteError) {
    return error.kind;
  }
  if (error instanceof RetryExhaustedError) {
    return error.kind;
  }
  if (error instanceof PayloadTooLargeError) {
    return "payload_too_large";
  }
  return "permanent";
}

/**
 * Reject a write batch that exceeds the remote's per-call limit.
 */
export function assertWithinLimit(operation: string, size: number, limit: number): void {
  if (size > limit) {
    throw new BatchLimitError(operation, size, limit);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
