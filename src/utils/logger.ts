// This module configures pino for the server and shapes protocol payloads before they reach a log line.

import { createHash } from 'node:crypto';
import pino, { type LoggerOptions } from 'pino';
import type { Envelope } from '../types/mcp.js';

export interface LogLimits {
  maxDepth: number;
  maxStringLength: number;
  maxArrayItems: number;
  maxObjectKeys: number;
}

export const DEFAULT_LOG_LIMITS: LogLimits = {
  maxDepth: 5,
  maxStringLength: 1024,
  maxArrayItems: 30,
  maxObjectKeys: 30
};

// Header paths are removed by pino itself; payload fields are handled by sanitizeForLog.
const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers.x-api-key',
  'headers.authorization',
  'headers.cookie',
  '*.authorization',
  '*.apiKey',
  '*.secret',
  '*.token',
  '*.password'
];

const SENSITIVE_KEY_PATTERN = /token|password|authorization|cookie|secret|api_?key/i;

// This shape is the subset of pino used by protocol components, so Fastify request loggers fit directly.
export interface StructuredLogger {
  debug(details: Record<string, unknown>, message: string): void;
  info(details: Record<string, unknown>, message: string): void;
  warn(details: Record<string, unknown>, message: string): void;
  error(details: Record<string, unknown>, message: string): void;
  child(bindings: Record<string, unknown>): StructuredLogger;
}

function redact(value: unknown): string {
  const serialized = typeof value === 'string' ? value : JSON.stringify(value ?? '');
  return `[redacted:${createHash('sha256').update(serialized).digest('hex').slice(0, 12)}]`;
}

function shapeString(value: string, limits: LogLimits): string {
  const overflow = value.length - limits.maxStringLength;
  return overflow > 0 ? `${value.slice(0, limits.maxStringLength)}...[truncated:${overflow}]` : value;
}

function shapeArray(value: unknown[], limits: LogLimits, depth: number): unknown[] {
  const shaped = value.slice(0, limits.maxArrayItems).map((item) => shape(item, limits, depth + 1));
  const overflow = value.length - limits.maxArrayItems;
  if (overflow > 0) {
    shaped.push(`[truncated-items:${overflow}]`);
  }
  return shaped;
}

function shapeObject(value: object, limits: LogLimits, depth: number): Record<string, unknown> {
  const entries = Object.entries(value);
  const shaped: Record<string, unknown> = {};

  for (const [key, entryValue] of entries.slice(0, limits.maxObjectKeys)) {
    shaped[key] = SENSITIVE_KEY_PATTERN.test(key) ? redact(entryValue) : shape(entryValue, limits, depth + 1);
  }

  const overflow = entries.length - limits.maxObjectKeys;
  if (overflow > 0) {
    shaped.__truncatedKeys = overflow;
  }
  return shaped;
}

function shape(value: unknown, limits: LogLimits, depth: number): unknown {
  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (depth > limits.maxDepth) {
    return '[depth-limited]';
  }
  if (typeof value === 'string') {
    return shapeString(value, limits);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return shapeArray(value, limits, depth);
  }
  if (typeof value === 'object') {
    return shapeObject(value, limits, depth);
  }
  return String(value);
}

// Tool arguments and error details pass through here; secret-looking keys keep only a short hash for correlation.
export function sanitizeForLog(value: unknown, limits: LogLimits = DEFAULT_LOG_LIMITS): unknown {
  return shape(value, limits, 0);
}

// This helper reduces an envelope to its routing fields so logs never carry full params or results.
export function summarizeEnvelope(envelope: Envelope): Record<string, unknown> {
  if ('method' in envelope) {
    return { kind: 'request', id: envelope.id, method: envelope.method, hasParams: envelope.params !== undefined };
  }
  if ('error' in envelope) {
    return { kind: 'error', id: envelope.id, rpcCode: envelope.error.code };
  }
  return { kind: 'result', id: envelope.id };
}

export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}

export function buildLoggerOptions(level: string, service = 'toolgate'): LoggerOptions {
  return {
    level,
    base: {
      service
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}
