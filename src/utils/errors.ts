// This module provides typed application errors that can be mapped into JSON-RPC and HTTP responses.

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export type TransportFailureKind = 'timeout' | 'unreachable' | 'malformed';

// This error marks a failed exchange with a remote endpoint; callers decide whether to retry.
export class TransportError extends AppError {
  public readonly kind: TransportFailureKind;
  public readonly retryable = true;

  public constructor(kind: TransportFailureKind, message: string, details?: unknown) {
    super(kind === 'timeout' ? 504 : 502, `transport_${kind}`, message, details);
    this.name = 'TransportError';
    this.kind = kind;
  }
}

// This error carries a JSON-RPC error envelope received from a remote server.
export class RemoteProtocolError extends AppError {
  public readonly rpcCode: number;
  public readonly reason: string;

  public constructor(rpcCode: number, reason: string, message: string, details?: unknown) {
    super(400, reason, message, details);
    this.name = 'RemoteProtocolError';
    this.rpcCode = rpcCode;
    this.reason = reason;
  }
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  // Framework errors (body limits, content types) carry their own 4xx status and code.
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : 'bad_request';
    return new AppError(error.statusCode, code, error.message);
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}
