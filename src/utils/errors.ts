// This module provides a typed application error that can be mapped into JSON-RPC and HTTP responses.

export type AppErrorCode =
  | 'unknown_tool'
  | 'missing_argument'
  | 'invalid_argument'
  | 'upstream_http_error'
  | 'upstream_unreachable'
  | 'upstream_timeout'
  | 'request_cancelled'
  | 'session_not_initialized'
  | 'transport_fault'
  | 'protocol_violation'
  | 'invalid_config'
  | 'internal_error';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: AppErrorCode;
  public readonly details?: Record<string, unknown>;

  public constructor(statusCode: number, code: AppErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// These codes end the session instead of producing a request-level error response.
const SESSION_FATAL_CODES: ReadonlySet<AppErrorCode> = new Set<AppErrorCode>([
  'transport_fault',
  'protocol_violation',
  'internal_error'
]);

export function isSessionFatal(error: AppError): boolean {
  return SESSION_FATAL_CODES.has(error.code);
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}
