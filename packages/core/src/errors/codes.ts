/**
 * wdkeeper error management
 * Standardized error codes and the error class carried by failing operations
 */

/**
 * Error codes for wdkeeper
 */
export enum ErrorCode {
  // Server lifecycle errors (E_SERVER_*)
  E_SERVER_EXECUTABLE_NOT_FOUND = 'E_SERVER_EXECUTABLE_NOT_FOUND',
  E_SERVER_SPAWN_FAILED = 'E_SERVER_SPAWN_FAILED',
  E_SERVER_EXITED_EARLY = 'E_SERVER_EXITED_EARLY',
  E_SERVER_START_TIMEOUT = 'E_SERVER_START_TIMEOUT',
  E_SERVER_START_FAILED = 'E_SERVER_START_FAILED',
  E_SERVER_STOP_FAILED = 'E_SERVER_STOP_FAILED',

  // Health probe errors (E_PROBE_*)
  E_PROBE_FAILED = 'E_PROBE_FAILED',
  E_PROBE_TIMEOUT = 'E_PROBE_TIMEOUT',

  // Configuration errors (E_CONFIG_*)
  E_CONFIG_INVALID = 'E_CONFIG_INVALID',
  E_CONFIG_NOT_FOUND = 'E_CONFIG_NOT_FOUND',
  E_CONFIG_PARSE_ERROR = 'E_CONFIG_PARSE_ERROR',

  // System errors (E_SYSTEM_*)
  E_SYSTEM_UNKNOWN = 'E_SYSTEM_UNKNOWN'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  CRITICAL = 'critical', // Caller cannot continue
  ERROR = 'error', // Operation failed
  WARNING = 'warning', // Operation completed with issues
  INFO = 'info'
}

/**
 * Extended error information
 */
export interface ErrorContext {
  host?: string;
  port?: number;
  pid?: number;
  url?: string;
  command?: string;
  configPath?: string;
  [key: string]: unknown;
}

/**
 * wdkeeper error class
 */
export class WdkeeperError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly recoverable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      severity?: ErrorSeverity;
      context?: ErrorContext;
      cause?: unknown;
      recoverable?: boolean;
    }
  ) {
    super(message);
    this.name = 'WdkeeperError';
    this.code = code;
    this.severity = options?.severity ?? ErrorSeverity.ERROR;
    this.context = options?.context ?? {};
    this.timestamp = new Date();
    this.recoverable = options?.recoverable ?? false;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    code: ErrorCode;
    message: string;
    severity: ErrorSeverity;
    recoverable: boolean;
    context: ErrorContext;
  } {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Type guard for WdkeeperError
 */
export function isWdkeeperError(error: unknown): error is WdkeeperError {
  return error instanceof WdkeeperError;
}

/**
 * Wrap a native error into WdkeeperError
 */
export function createErrorFromUnknown(
  error: unknown,
  code: ErrorCode = ErrorCode.E_SYSTEM_UNKNOWN,
  context?: ErrorContext
): WdkeeperError {
  if (error instanceof WdkeeperError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  return new WdkeeperError(code, message, {
    context,
    cause: error
  });
}

/**
 * Read the `code` of a Node.js system error (ENOENT, ECONNREFUSED, ...)
 */
export function getSystemErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
