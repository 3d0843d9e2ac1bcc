// This module maps protocol error reasons onto JSON-RPC error codes in both directions.

import type { JsonRpcError, JsonRpcFailure, JsonRpcId } from '../types/mcp.js';
import { AppError, RemoteProtocolError } from '../utils/errors.js';

export const PROTOCOL_ERRORS = {
  parse_error: { rpcCode: -32700, statusCode: 400 },
  invalid_request: { rpcCode: -32600, statusCode: 400 },
  method_not_found: { rpcCode: -32601, statusCode: 404 },
  invalid_arguments: { rpcCode: -32602, statusCode: 400 },
  internal_error: { rpcCode: -32603, statusCode: 500 },
  session_not_initialized: { rpcCode: -32003, statusCode: 409 },
  tool_not_found: { rpcCode: -32004, statusCode: 404 },
  session_closed: { rpcCode: -32005, statusCode: 410 },
  session_already_initialized: { rpcCode: -32009, statusCode: 409 },
  protocol_mismatch: { rpcCode: -32010, statusCode: 400 }
} as const;

export type ProtocolErrorReason = keyof typeof PROTOCOL_ERRORS;

function isProtocolErrorReason(code: string): code is ProtocolErrorReason {
  return Object.prototype.hasOwnProperty.call(PROTOCOL_ERRORS, code);
}

// This helper creates an AppError whose code belongs to the protocol error table.
export function protocolError(reason: ProtocolErrorReason, message: string, details?: unknown): AppError {
  return new AppError(PROTOCOL_ERRORS[reason].statusCode, reason, message, details);
}

// This helper maps internal application errors into JSON-RPC error code ranges.
export function toRpcError(error: AppError): JsonRpcError {
  if (isProtocolErrorReason(error.code)) {
    return error.details === undefined
      ? { code: PROTOCOL_ERRORS[error.code].rpcCode, message: error.message }
      : { code: PROTOCOL_ERRORS[error.code].rpcCode, message: error.message, data: error.details };
  }

  if (error.statusCode >= 500) {
    return { code: -32000, message: error.message };
  }

  return { code: -32002, message: error.message, data: error.details };
}

// This helper creates a canonical JSON-RPC error payload.
export function rpcError(id: JsonRpcId | null, error: AppError): JsonRpcFailure {
  return {
    jsonrpc: '2.0',
    id,
    error: toRpcError(error)
  };
}

// This helper resolves a received JSON-RPC code back to the reason it was raised for.
export function reasonForRpcCode(code: number): ProtocolErrorReason | 'server_error' {
  for (const [reason, entry] of Object.entries(PROTOCOL_ERRORS)) {
    if (entry.rpcCode === code && isProtocolErrorReason(reason)) {
      return reason;
    }
  }

  return 'server_error';
}

// This helper lifts a received error envelope into a throwable client-side error.
export function remoteProtocolError(error: JsonRpcError): RemoteProtocolError {
  return new RemoteProtocolError(error.code, reasonForRpcCode(error.code), error.message, error.data);
}
