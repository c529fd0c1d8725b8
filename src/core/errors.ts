/**
 * Error Classes for projconfig
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_SETTINGS_INVALID = "E1001",

  // Document errors (2xxx)
  PARSE_FAILED = "E2000",
  PARSE_SYNTAX_ERROR = "E2001",
  PARSE_NOT_A_MAPPING = "E2002",
  PARSE_INVALID_KEY = "E2003",

  // Import resolution errors (3xxx)
  IMPORT_ESCAPES_ROOT = "E3000",

  // Path errors (4xxx)
  PATH_INVALID = "E4000",

  // Persistence errors (5xxx)
  PERSISTENCE_READ_FAILED = "E5000",
  PERSISTENCE_WRITE_FAILED = "E5001",
  PERSISTENCE_PAYLOAD_INVALID = "E5002",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
}

/**
 * Base error class for all projconfig errors
 */
export class ProjectConfigError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ProjectConfigError";
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
 * Malformed configuration document. Aborts the current pass.
 */
export class ParseError extends ProjectConfigError {
  public readonly filePath?: string;
  public readonly line?: number;
  public readonly column?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_FAILED,
    context?: Record<string, unknown> & { filePath?: string; line?: number; column?: number }
  ) {
    super(message, code, context);
    this.name = "ParseError";
    this.filePath = context?.filePath;
    this.line = context?.line;
    this.column = context?.column;
  }

  toString(): string {
    let location = "";
    if (this.filePath) {
      location = ` at ${this.filePath}`;
      if (this.line !== undefined) {
        location += `:${this.line}`;
        if (this.column !== undefined) {
          location += `:${this.column}`;
        }
      }
    }
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * An import that resolves outside the configured root directory
 */
export class PathSafetyError extends ProjectConfigError {
  public readonly importPath: string;
  public readonly root: string;

  constructor(
    message: string,
    context: Record<string, unknown> & { importPath: string; root: string }
  ) {
    super(message, ErrorCode.IMPORT_ESCAPES_ROOT, context);
    this.name = "PathSafetyError";
    this.importPath = context.importPath;
    this.root = context.root;
  }
}

/**
 * Record store or file write failures
 */
export class PersistenceError extends ProjectConfigError {
  public readonly target?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PERSISTENCE_WRITE_FAILED,
    context?: Record<string, unknown> & { target?: string }
  ) {
    super(message, code, context);
    this.name = "PersistenceError";
    this.target = context?.target;
  }
}

/**
 * Invalid engine settings
 */
export class ConfigurationError extends ProjectConfigError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
  }
}

/**
 * A config path that cannot be addressed (empty, or with empty segments)
 */
export class InvalidPathError extends ProjectConfigError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Invalid config path "${path}": ${reason}`, ErrorCode.PATH_INVALID, { path });
    this.name = "InvalidPathError";
    this.path = path;
  }
}

/**
 * Check if an error is a ProjectConfigError
 */
export function isProjectConfigError(error: unknown): error is ProjectConfigError {
  return error instanceof ProjectConfigError;
}
