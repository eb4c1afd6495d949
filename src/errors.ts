export type LlamaParseErrorCode =
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "RATE_LIMITED"
  | "QUOTA_EXCEEDED"
  | "INVALID_REQUEST"
  | "SERVER_ERROR"
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "ABORTED"
  | "JOB_FAILED"
  | "BAD_RESPONSE"
  | "UNKNOWN";

/**
 * Error raised by {@link LlamaParseClient} for anything that goes wrong
 * while talking to the parsing service.
 */
export class LlamaParseError extends Error {
  public readonly code: LlamaParseErrorCode;
  public readonly status?: number;
  public readonly requestId?: string;
  public readonly jobId?: string;
  public readonly details?: unknown;

  constructor(args: {
    message: string;
    code: LlamaParseErrorCode;
    status?: number;
    requestId?: string;
    jobId?: string;
    details?: unknown;
  }) {
    super(args.message);
    this.name = "LlamaParseError";
    this.code = args.code;
    this.status = args.status;
    this.requestId = args.requestId;
    this.jobId = args.jobId;
    this.details = args.details;
  }
}

/* ---------------------------- Conversion errors --------------------------- */

export type ConversionErrorCode =
  | "CONFIGURATION"
  | "INVALID_ARGUMENT"
  | "NOT_FOUND"
  | "PERMISSION"
  | "EMPTY_RESULT"
  | "EXTERNAL_SERVICE";

export class ConversionError extends Error {
  public readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConversionError";
    this.code = code;
  }
}

/** The credential is missing from both `.env` and the environment. */
export class ConfigurationError extends ConversionError {
  constructor(message: string) {
    super("CONFIGURATION", message);
    this.name = "ConfigurationError";
  }
}

export class InvalidArgumentError extends ConversionError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

export class NotFoundError extends ConversionError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class PermissionError extends ConversionError {
  constructor(message: string) {
    super("PERMISSION", message);
    this.name = "PermissionError";
  }
}

/** The service answered, but with no documents. */
export class EmptyResultError extends ConversionError {
  constructor(message = "No content was extracted from the PDF") {
    super("EMPTY_RESULT", message);
    this.name = "EmptyResultError";
  }
}

export class ExternalServiceError extends ConversionError {
  declare readonly cause: LlamaParseError;

  constructor(cause: LlamaParseError) {
    super("EXTERNAL_SERVICE", `LlamaParse request failed: ${cause.message}`, {
      cause,
    });
    this.name = "ExternalServiceError";
  }
}
