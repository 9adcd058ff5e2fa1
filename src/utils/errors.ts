export enum ErrorCode {
  // Transport Errors (1xxx)
  MODEM_CONNECTION_FAILED = 1001,
  MODEM_REQUEST_TIMEOUT = 1002,
  MODEM_HTTP_STATUS = 1003,
  POLL_CYCLE_TIMEOUT = 1004,

  // Configuration Errors (2xxx)
  CONFIG_INVALID = 2002,
  ENDPOINT_TABLE_INVALID = 2004,

  // Payload Errors (3xxx)
  PAYLOAD_PARSE_FAILED = 3001,
  PAYLOAD_SHAPE_UNEXPECTED = 3002,

  // General Errors (9xxx)
  UNKNOWN_ERROR = 9000,
  OPERATION_CANCELLED = 9003,
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
  timestamp: Date;
  recoverable: boolean;
}

interface MonitorErrorOptions {
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
}

export class MonitorError extends Error {
  readonly code: ErrorCode;
  override readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly timestamp: Date;
  readonly recoverable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    options?: MonitorErrorOptions & { recoverable?: boolean | undefined }
  ) {
    super(message);
    this.name = 'MonitorError';
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;
    this.timestamp = new Date();
    this.recoverable = options?.recoverable ?? false;

    Error.captureStackTrace?.(this, MonitorError);
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      cause: this.cause,
      context: this.context,
      timestamp: this.timestamp,
      recoverable: this.recoverable,
    };
  }

  static fromError(err: unknown, code: ErrorCode = ErrorCode.UNKNOWN_ERROR): MonitorError {
    if (err instanceof MonitorError) return err;
    if (err instanceof Error) return new MonitorError(code, err.message, { cause: err });
    return new MonitorError(code, String(err));
  }
}

/** Host unreachable, refused or reset. */
export class ConnectionError extends MonitorError {
  constructor(message: string, options?: MonitorErrorOptions) {
    super(ErrorCode.MODEM_CONNECTION_FAILED, message, { ...options, recoverable: true });
    this.name = 'ConnectionError';
  }
}

export class OperationTimeoutError extends MonitorError {
  readonly timeoutMs: number;

  constructor(
    operation: string,
    timeoutMs: number,
    options?: MonitorErrorOptions & { code?: ErrorCode | undefined }
  ) {
    super(
      options?.code ?? ErrorCode.MODEM_REQUEST_TIMEOUT,
      `Operation '${operation}' timed out after ${timeoutMs}ms`,
      { cause: options?.cause, context: options?.context, recoverable: true }
    );
    this.name = 'OperationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class HttpStatusError extends MonitorError {
  readonly status: number;

  constructor(path: string, status: number, options?: MonitorErrorOptions) {
    // 5xx from an embedded web server is usually a transient overload
    super(ErrorCode.MODEM_HTTP_STATUS, `GET ${path} returned HTTP ${status}`, {
      ...options,
      context: { path, status, ...options?.context },
      recoverable: status >= 500,
    });
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

export class ParseError extends MonitorError {
  constructor(
    message: string,
    options?: MonitorErrorOptions & { code?: ErrorCode | undefined }
  ) {
    super(options?.code ?? ErrorCode.PAYLOAD_PARSE_FAILED, message, {
      cause: options?.cause,
      context: options?.context,
      recoverable: false,
    });
    this.name = 'ParseError';
  }
}

export class ConfigurationError extends MonitorError {
  constructor(
    message: string,
    options?: MonitorErrorOptions & { code?: ErrorCode | undefined }
  ) {
    super(options?.code ?? ErrorCode.CONFIG_INVALID, message, {
      cause: options?.cause,
      context: options?.context,
      recoverable: false,
    });
    this.name = 'ConfigurationError';
  }
}

export class CancelledError extends MonitorError {
  constructor(message = 'Operation cancelled', options?: MonitorErrorOptions) {
    super(ErrorCode.OPERATION_CANCELLED, message, { ...options, recoverable: false });
    this.name = 'CancelledError';
  }
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof MonitorError) {
    return error.recoverable;
  }
  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    return (
      msg.includes('timeout') ||
      msg.includes('econnreset') ||
      msg.includes('econnrefused') ||
      msg.includes('etimedout')
    );
  }
  return false;
}

export function getErrorCode(error: unknown): ErrorCode {
  if (error instanceof MonitorError) {
    return error.code;
  }
  return ErrorCode.UNKNOWN_ERROR;
}
