// This module parses process environment variables into the validated server configuration.

import { z } from 'zod';
import { DEFAULT_SESSION_IDLE_MS } from '../mcp/session.js';
import { AppError } from '../utils/errors.js';

const envSchema = z.object({
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MCP_BODY_LIMIT_BYTES: z.coerce.number().int().min(1024).default(1024 * 1024),
  MCP_SESSION_IDLE_MS: z.coerce.number().int().min(0).default(DEFAULT_SESSION_IDLE_MS)
});

export interface ServerConfig {
  host: string;
  port: number;
  logLevel: string;
  bodyLimitBytes: number;
  // 0 disables idle expiry.
  sessionIdleMs: number;
}

// Empty strings count as unset so blank entries in env files fall back to defaults.
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    throw new AppError(500, 'invalid_config', 'Server configuration is invalid.', parsed.error.flatten().fieldErrors);
  }

  return {
    host: parsed.data.HOST,
    port: parsed.data.PORT,
    logLevel: parsed.data.LOG_LEVEL,
    bodyLimitBytes: parsed.data.MCP_BODY_LIMIT_BYTES,
    sessionIdleMs: parsed.data.MCP_SESSION_IDLE_MS
  };
}
