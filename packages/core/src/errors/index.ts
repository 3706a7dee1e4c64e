import type { RestStatus } from '../http/status.js';

/**
 * Retry category derived from an HTTP status
 *
 * - "Validation": Bad request (400/422), don't retry
 * - "Auth": Credentials invalid (401/403), don't retry
 * - "RateLimit": Too many requests (429), retry with backoff
 * - "Transient": Server error (5xx), retry
 * - "Permanent": Anything else, don't retry
 */
export type ErrorCategory = "Validation" | "Auth" | "RateLimit" | "Transient" | "Permanent";

export function categorizeStatus(code: number): ErrorCategory {
  if (code === 400 || code === 422) return "Validation";
  if (code === 401 || code === 403) return "Auth";
  if (code === 429) return "RateLimit";
  if (code >= 500) return "Transient";
  return "Permanent";
}

function errorOptions(cause: unknown): ErrorOptions | undefined {
  return cause === undefined ? undefined : { cause };
}

/**
 * ValidationError
 * Thrown (or delivered to a listener) when a domain request fails local validation.
 * The transport is never contacted for such a request.
 */
export class ValidationError extends Error {
  readonly validationErrors: readonly string[];

  constructor(
    validationErrors: readonly string[],
    readonly details?: Record<string, unknown>
  ) {
    super(
      "Validation Failed: " +
        validationErrors.map((error, i) => `${i + 1}: ${error};`).join("")
    );
    Object.setPrototypeOf(this, ValidationError.prototype);
    this.name = "ValidationError";
    this.validationErrors = validationErrors;
  }

  /**
   * Append a message to an existing validation error, or start a new one
   */
  static add(message: string, existing?: ValidationError): ValidationError {
    return new ValidationError(
      [...(existing?.validationErrors ?? []), message],
      existing?.details
    );
  }
}

/**
 * ParsingError
 * Structural failure while decoding a response entity or document
 */
export class ParsingError extends Error {
  constructor(message: string, opts?: { cause?: unknown }) {
    super(message, errorOptions(opts?.cause));
    Object.setPrototypeOf(this, ParsingError.prototype);
    this.name = "ParsingError";
  }
}

/**
 * ResponseParseError
 * The server answered successfully but the body could not be converted.
 * Deliberately not a StatusError: there was no HTTP-level failure.
 */
export class ResponseParseError extends Error {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    Object.setPrototypeOf(this, ResponseParseError.prototype);
    this.name = "ResponseParseError";
  }
}

export interface RemoteErrorOptions {
  cause?: unknown;
  metadata?: Record<string, unknown>;
  headers?: Record<string, string[]>;
  stackTrace?: string;
}

export function remoteErrorMessage(type: string, reason?: string, stackTrace?: string): string {
  const trace = stackTrace === undefined ? "" : `, stack_trace=${stackTrace}`;
  return `Server exception [type=${type}, reason=${reason ?? "null"}${trace}]`;
}

/**
 * RemoteError
 * A failure reported by the server inside an error document (e.g. a `caused_by` entry)
 */
export class RemoteError extends Error {
  readonly type: string;
  readonly reason?: string;
  readonly metadata: Record<string, unknown>;
  readonly headers: Record<string, string[]>;

  constructor(type: string, reason: string | undefined, opts: RemoteErrorOptions = {}) {
    super(remoteErrorMessage(type, reason, opts.stackTrace), errorOptions(opts.cause));
    Object.setPrototypeOf(this, RemoteError.prototype);
    this.name = "RemoteError";
    this.type = type;
    this.reason = reason;
    this.metadata = opts.metadata ?? {};
    this.headers = opts.headers ?? {};
  }
}

export interface StatusErrorOptions extends RemoteErrorOptions {
  type?: string;
  reason?: string;
  rootCauses?: RemoteError[];
}

/**
 * StatusError
 * The single terminal error surfaced for HTTP-level failures.
 * Always carries a resolved status; lower-level errors survive only as
 * `cause` or in `suppressed`.
 */
export class StatusError extends Error {
  readonly status: RestStatus;

  /**
   * Remote error type (e.g. "index_not_found_exception") when parsed from a body
   */
  readonly type?: string;
  readonly reason?: string;
  readonly rootCauses: readonly RemoteError[];
  readonly metadata: Record<string, unknown>;
  readonly headers: Record<string, string[]>;

  private readonly suppressedErrors: unknown[] = [];

  constructor(message: string, status: RestStatus, opts: StatusErrorOptions = {}) {
    super(message, errorOptions(opts.cause));
    Object.setPrototypeOf(this, StatusError.prototype);
    this.name = "StatusError";
    this.status = status;
    this.type = opts.type;
    this.reason = opts.reason;
    this.rootCauses = opts.rootCauses ?? [];
    this.metadata = opts.metadata ?? {};
    this.headers = opts.headers ?? {};
  }

  get category(): ErrorCategory {
    return categorizeStatus(this.status.code);
  }

  /**
   * Secondary errors recorded while producing this one
   */
  get suppressed(): readonly unknown[] {
    return this.suppressedErrors;
  }

  addSuppressed(error: unknown): void {
    this.suppressedErrors.push(error);
  }

  isRetryable(): boolean {
    return this.category === "RateLimit" || this.category === "Transient";
  }
}
