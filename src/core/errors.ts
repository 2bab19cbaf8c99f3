/**
 * Error Classes for bucket
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_MISSING_API_KEY = "E1000",
  CONFIG_INVALID = "E1001",
  CONFIG_WRITE_FAILED = "E1002",

  // Remote store errors (2xxx)
  REMOTE_UNREACHABLE = "E2000",
  REMOTE_INVALID_RESPONSE = "E2001",

  // Editing surface errors (3xxx)
  EDIT_BUFFER_FAILED = "E3000",
  EDIT_LAUNCH_FAILED = "E3001",
  EDIT_EXIT_STATUS = "E3002",
  EDIT_INVALID_CONTENT = "E3003",

  // Validation errors (4xxx)
  VALIDATION_FAILED = "E4000",
  TAXONOMY_UNKNOWN_NODE = "E4001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
}

/**
 * Base error class for all bucket errors
 */
export class BucketError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "BucketError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Configuration could not be loaded or is incomplete
 */
export class ConfigurationError extends BucketError {
  public readonly configPath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown> & { configPath?: string }
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
    this.configPath = context?.configPath;
  }
}

/**
 * The remote server could not be reached or answered with something unreadable.
 * Non-2xx answers are not errors; they travel as status/body pairs.
 */
export class RemoteStoreError extends BucketError {
  public readonly url?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.REMOTE_UNREACHABLE,
    context?: Record<string, unknown> & { url?: string }
  ) {
    super(message, code, context);
    this.name = "RemoteStoreError";
    this.url = context?.url;
  }
}

/**
 * The external editor or its temporary buffer failed
 */
export class EditFailureError extends BucketError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.EDIT_BUFFER_FAILED,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "EditFailureError";
    this.filePath = context?.filePath;
  }
}

/**
 * Input that does not satisfy a domain rule
 */
export class ValidationError extends BucketError {
  public readonly issues: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
    context?: Record<string, unknown> & { issues?: string[] }
  ) {
    super(message, code, context);
    this.name = "ValidationError";
    this.issues = context?.issues ?? [];
  }
}

/**
 * Check if an error is a BucketError
 */
export function isBucketError(error: unknown): error is BucketError {
  return error instanceof BucketError;
}

/**
 * Wrap an unknown error in a BucketError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): BucketError {
  if (isBucketError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new BucketError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new BucketError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}
