// This module builds the InvocationResult payloads returned by tool executors.

import type { InvocationResult } from '../types/mcp.js';
import { normalizeError } from '../utils/errors.js';

export function textResult(text: string): InvocationResult {
  return {
    content: [{ type: 'text', text }]
  };
}

// This helper wraps structured objects in both text and structured fields for connector compatibility.
export function jsonResult(payload: Record<string, unknown>): InvocationResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    structuredContent: payload
  };
}

// This helper turns an executor failure into a tool-level failure carried as result data.
export function toolFailureResult(error: unknown): InvocationResult {
  const appError = normalizeError(error);
  const code = appError.code === 'internal_error' ? 'tool_execution_failed' : appError.code;

  return {
    content: [
      {
        type: 'error',
        error:
          appError.details === undefined
            ? { code, message: appError.message }
            : { code, message: appError.message, data: appError.details }
      }
    ],
    isError: true
  };
}
