/**
 * Error taxonomy
 *
 * Transport, storage and crypto failures share one class with a
 * discriminated `detail`; session validation and OAuth failures have
 * their own classes because callers branch on them separately.
 */

/** Delay applied to 5xx responses that carry no Retry-After */
const SERVER_ERROR_RETRY_DELAY_MS = 5000;

export type GistStorageErrorDetail =
  | { kind: "ClientNotInitialized" }
  | {
      kind: "ApiRequestFailed";
      operation: string;
      status: number;
      details: string | null;
    }
  | { kind: "EncryptionFailed"; reason: string }
  | { kind: "ConfigError"; field: string; reason: string }
  | { kind: "NetworkTimeout"; timeoutMs: number; operation: string }
  | { kind: "SerializationFailed"; reason: string }
  | { kind: "SessionValidationFailed"; reason: string }
  | { kind: "AuthenticationRequired"; reason: string }
  | { kind: "GistNotFound"; gistId: string }
  | { kind: "InvalidSessionData"; reason: string }
  | { kind: "RateLimitExceeded"; retryAfterSeconds: number };

export type GistStorageErrorKind = GistStorageErrorDetail["kind"];

const describe = (detail: GistStorageErrorDetail): string => {
  switch (detail.kind) {
    case "ClientNotInitialized":
      return "GitHub client not initialized - authenticate first";
    case "ApiRequestFailed":
      return `GitHub API request failed: ${detail.operation} - HTTP ${detail.status}${
        detail.details ? ` (${detail.details})` : ""
      }`;
    case "EncryptionFailed":
      return `Encryption operation failed: ${detail.reason}`;
    case "ConfigError":
      return `Configuration error in ${detail.field}: ${detail.reason}`;
    case "NetworkTimeout":
      return `Network timeout after ${detail.timeoutMs}ms during ${detail.operation}`;
    case "SerializationFailed":
      return `Serialization failed: ${detail.reason}`;
    case "SessionValidationFailed":
      return `Session validation failed: ${detail.reason}`;
    case "AuthenticationRequired":
      return `Authentication required: ${detail.reason}`;
    case "GistNotFound":
      return `Gist not found: ${detail.gistId}`;
    case "InvalidSessionData":
      return `Invalid session data: ${detail.reason}`;
    case "RateLimitExceeded":
      return `Rate limit exceeded: retry after ${detail.retryAfterSeconds}s`;
  }
};

/** Failure of the sync pipeline (storage, transport, crypto or config) */
export class GistStorageError extends Error {
  override name = "GistStorageError";

  constructor(
    public readonly detail: GistStorageErrorDetail,
    options?: { cause?: unknown }
  ) {
    super(describe(detail), options);
  }

  get kind(): GistStorageErrorKind {
    return this.detail.kind;
  }

  /**
   * Transient conditions only. Crypto, validation and CSRF failures are
   * never retried.
   */
  isRetryable(): boolean {
    switch (this.detail.kind) {
      case "NetworkTimeout":
      case "RateLimitExceeded":
        return true;
      case "ApiRequestFailed":
        return this.detail.status >= 500;
      default:
        return false;
    }
  }

  /** Suggested wait in milliseconds before retrying, if any */
  retryDelay(): number | null {
    switch (this.detail.kind) {
      case "RateLimitExceeded":
        return this.detail.retryAfterSeconds * 1000;
      case "ApiRequestFailed":
        return this.detail.status >= 500 ? SERVER_ERROR_RETRY_DELAY_MS : null;
      default:
        return null;
    }
  }

  /** Operation name for transport errors */
  operationContext(): string | null {
    switch (this.detail.kind) {
      case "ApiRequestFailed":
      case "NetworkTimeout":
        return this.detail.operation;
      default:
        return null;
    }
  }

  static apiRequestFailed(
    operation: string,
    status: number,
    details: string | null = null,
    cause?: unknown
  ) {
    return new GistStorageError(
      { kind: "ApiRequestFailed", operation, status, details },
      { cause }
    );
  }

  static encryptionFailed(reason: string, cause?: unknown) {
    return new GistStorageError({ kind: "EncryptionFailed", reason }, { cause });
  }

  static configError(field: string, reason: string, cause?: unknown) {
    return new GistStorageError({ kind: "ConfigError", field, reason }, { cause });
  }

  static networkTimeout(timeoutMs: number, operation: string, cause?: unknown) {
    return new GistStorageError(
      { kind: "NetworkTimeout", timeoutMs, operation },
      { cause }
    );
  }

  static serializationFailed(reason: string, cause?: unknown) {
    return new GistStorageError({ kind: "SerializationFailed", reason }, { cause });
  }

  static sessionValidationFailed(reason: string, cause?: unknown) {
    return new GistStorageError(
      { kind: "SessionValidationFailed", reason },
      { cause }
    );
  }

  static authenticationRequired(reason: string, cause?: unknown) {
    return new GistStorageError(
      { kind: "AuthenticationRequired", reason },
      { cause }
    );
  }

  static gistNotFound(gistId: string, cause?: unknown) {
    return new GistStorageError({ kind: "GistNotFound", gistId }, { cause });
  }

  static invalidSessionData(reason: string, cause?: unknown) {
    return new GistStorageError({ kind: "InvalidSessionData", reason }, { cause });
  }

  static rateLimitExceeded(retryAfterSeconds: number, cause?: unknown) {
    return new GistStorageError(
      { kind: "RateLimitExceeded", retryAfterSeconds },
      { cause }
    );
  }
}

/** Narrow an unknown error to a given storage error kind */
export const isGistStorageError = (
  error: unknown,
  ...kinds: GistStorageErrorKind[]
): error is GistStorageError =>
  error instanceof GistStorageError &&
  (kinds.length === 0 || kinds.includes(error.kind));

export type SessionValidationReason =
  | { kind: "Expired"; expiredAt: string; currentTime: string }
  | { kind: "TooOld"; createdAt: string; maxAgeDays: number }
  | { kind: "InvalidSessionId"; sessionId: string }
  | { kind: "InvalidDeviceId"; deviceId: string }
  | { kind: "UnsupportedVersion"; version: number; supportedVersion: number }
  | { kind: "ContentHashMismatch" };

const describeValidation = (reason: SessionValidationReason): string => {
  switch (reason.kind) {
    case "Expired":
      return `Session expired at ${reason.expiredAt}, current time: ${reason.currentTime}`;
    case "TooOld":
      return `Session too old: created at ${reason.createdAt}, maximum age: ${reason.maxAgeDays} days`;
    case "InvalidSessionId":
      return "Invalid session ID format";
    case "InvalidDeviceId":
      return "Invalid device ID format";
    case "UnsupportedVersion":
      return `Unsupported session version: ${reason.version}, supported: ${reason.supportedVersion}`;
    case "ContentHashMismatch":
      return "Content hash mismatch - possible tampering";
  }
};

/** A decrypted session failed freshness or integrity checks */
export class SessionValidationError extends Error {
  override name = "SessionValidationError";

  constructor(public readonly reason: SessionValidationReason) {
    super(describeValidation(reason));
  }

  get kind(): SessionValidationReason["kind"] {
    return this.reason.kind;
  }
}

export type OAuthErrorKind =
  | "no_port"
  | "timeout"
  | "denied"
  | "invalid_callback"
  | "token_exchange"
  | "csrf";

/** The OAuth authorization flow was aborted */
export class OAuthError extends Error {
  override name = "OAuthError";

  constructor(
    message: string,
    public readonly kind: OAuthErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** State parameter missing, malformed or not matching the one sent */
export class CsrfError extends OAuthError {
  override name = "CsrfError";

  constructor(message: string) {
    super(message, "csrf");
  }
}
