export type SyncErrorCode =
  | "Unauthenticated"
  | "AuthExpired"
  | "AuthDenied"
  | "AuthRefreshFailed"
  | "SourceUnavailable"
  | "ExportWriteFailed"
  | "SyncAlreadyRunning"
  | "SyncCancelled";

/**
 * auth — the user has to re-run the device flow.
 * transient — re-running the sync later is enough.
 * conflict — another run holds the engine.
 */
export type SyncErrorCategory = "auth" | "transient" | "conflict";

const ERROR_CATEGORY: Record<SyncErrorCode, SyncErrorCategory> = {
  Unauthenticated: "auth",
  AuthExpired: "auth",
  AuthDenied: "auth",
  AuthRefreshFailed: "auth",
  SourceUnavailable: "transient",
  ExportWriteFailed: "transient",
  SyncCancelled: "transient",
  SyncAlreadyRunning: "conflict",
};

const ERROR_HTTP_STATUS: Record<SyncErrorCode, number> = {
  Unauthenticated: 401,
  AuthExpired: 401,
  AuthDenied: 403,
  AuthRefreshFailed: 401,
  SourceUnavailable: 503,
  ExportWriteFailed: 500,
  SyncCancelled: 504,
  SyncAlreadyRunning: 409,
};

export interface SyncErrorDetails {
  status?: number;
  reason?: string;
  path?: string;
  attempts?: number;
  [key: string]: unknown;
}

/** Base class for every failure the sync core reports on purpose. */
export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly category: SyncErrorCategory;
  readonly details: SyncErrorDetails;
  readonly httpStatus: number;

  constructor(code: SyncErrorCode, message: string, details: SyncErrorDetails = {}, cause?: unknown) {
    super(message);
    this.name = "SyncError";
    this.code = code;
    this.category = ERROR_CATEGORY[code];
    this.details = details;
    this.httpStatus = ERROR_HTTP_STATUS[code];
    if (cause !== undefined) this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): { name: string; code: SyncErrorCode; category: SyncErrorCategory; message: string; details: SyncErrorDetails } {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}

export class UnauthenticatedError extends SyncError {
  constructor(message = "Not authenticated with Trakt — run the device login first", details?: SyncErrorDetails) {
    super("Unauthenticated", message, details);
    this.name = "UnauthenticatedError";
  }
}

export class AuthExpiredError extends SyncError {
  constructor(message = "Device code expired before it was authorized", details?: SyncErrorDetails) {
    super("AuthExpired", message, details);
    this.name = "AuthExpiredError";
  }
}

export class AuthDeniedError extends SyncError {
  constructor(message = "Device authorization was denied", details?: SyncErrorDetails) {
    super("AuthDenied", message, details);
    this.name = "AuthDeniedError";
  }
}

export class AuthRefreshFailedError extends SyncError {
  constructor(message = "Trakt rejected the refresh token", details?: SyncErrorDetails, cause?: unknown) {
    super("AuthRefreshFailed", message, details, cause);
    this.name = "AuthRefreshFailedError";
  }
}

export class SourceUnavailableError extends SyncError {
  constructor(message: string, details?: SyncErrorDetails, cause?: unknown) {
    super("SourceUnavailable", message, details, cause);
    this.name = "SourceUnavailableError";
  }
}

export class ExportWriteFailedError extends SyncError {
  constructor(message: string, details?: SyncErrorDetails, cause?: unknown) {
    super("ExportWriteFailed", message, details, cause);
    this.name = "ExportWriteFailedError";
  }
}

export class SyncAlreadyRunningError extends SyncError {
  constructor(details?: SyncErrorDetails) {
    super("SyncAlreadyRunning", "A sync run is already in progress", details);
    this.name = "SyncAlreadyRunningError";
  }
}

export class SyncCancelledError extends SyncError {
  constructor(message = "Sync run was cancelled", details?: SyncErrorDetails, cause?: unknown) {
    super("SyncCancelled", message, details, cause);
    this.name = "SyncCancelledError";
  }
}

/** A Trakt response that points at a bug on our side (bad path, bad params). */
export class TraktApiError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string, path: string) {
    super(`Trakt API error: ${status} ${statusText} (${path})`);
    this.name = "TraktApiError";
    this.status = status;
  }
}

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

export interface ErrorDescription {
  code: SyncErrorCode | "InternalError";
  category: SyncErrorCategory | "bug";
  message: string;
  httpStatus: number;
}

/** Flatten any thrown value into what the CLI and API routes report. */
export function describeError(error: unknown): ErrorDescription {
  if (isSyncError(error)) {
    return {
      code: error.code,
      category: error.category,
      message: error.message,
      httpStatus: error.httpStatus,
    };
  }
  return {
    code: "InternalError",
    category: "bug",
    message: error instanceof Error ? error.message : String(error),
    httpStatus: 500,
  };
}
