// This module wires the HTTP routes, request logging hooks, and protocol lifecycle resources.

import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import type { ServerConfig } from './config/env.js';
import { Dispatcher } from './mcp/dispatcher.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import { ToolRegistry } from './mcp/registry.js';
import { SessionStore } from './mcp/session.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION, SUPPORTED_PROTOCOL_VERSIONS } from './version.js';

export interface ServerResources {
  app: FastifyInstance;
  registry: ToolRegistry;
  sessions: SessionStore;
  dispatcher: Dispatcher;
}

export interface CreateServerOptions {
  config: Pick<ServerConfig, 'logLevel' | 'bodyLimitBytes'> & Partial<Pick<ServerConfig, 'sessionIdleMs'>>;
  registerTools?: (registry: ToolRegistry) => void;
  // Tests pass false to keep output quiet.
  logger?: boolean;
}

// This helper builds a safe header snapshot for request diagnostics without leaking secrets.
function buildRequestHeaderSnapshot(request: FastifyRequest): Record<string, unknown> {
  const { headers } = request;
  return {
    host: headers.host ?? null,
    'user-agent': headers['user-agent'] ?? null,
    accept: headers.accept ?? null,
    'content-type': headers['content-type'] ?? null,
    'content-length': headers['content-length'] ?? null,
    'mcp-session-id': headers['mcp-session-id'] ?? null
  };
}

// This function builds and configures the full HTTP application around one sealed tool registry.
export function createServer(options: CreateServerOptions): ServerResources {
  const app = Fastify({
    logger: options.logger === false ? false : buildLoggerOptions(options.config.logLevel, MCP_SERVER_NAME),
    bodyLimit: options.config.bodyLimitBytes
  });

  const registry = new ToolRegistry();
  options.registerTools?.(registry);
  registry.seal();

  const sessions = new SessionStore({
    supportedProtocolVersions: SUPPORTED_PROTOCOL_VERSIONS,
    serverInfo: { name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION },
    capabilities: { tools: { listChanged: false } },
    idleTimeoutMs: options.config.sessionIdleMs
  });
  const dispatcher = new Dispatcher({ registry, sessions });

  const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

  // This hook enriches request logs with consistent route and request-id metadata.
  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());

    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        headers: sanitizeForLog(buildRequestHeaderSnapshot(request))
      },
      'http_request_start'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  // This hook emits explicit timeout events to simplify debugging of stalled requests.
  app.addHook('onTimeout', async (request) => {
    request.log.warn(
      {
        event: 'http_request_timeout',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_request_timeout'
    );
  });

  // Shutting the transport down closes every open session.
  app.addHook('onClose', async () => {
    app.log.info({ event: 'mcp_sessions_closing', openSessions: sessions.size }, 'mcp_sessions_closing');
    sessions.closeAll();
  });

  // This endpoint exposes a lightweight liveness signal.
  app.get('/health', async () => {
    return {
      ok: true,
      status: 'alive',
      server: MCP_SERVER_NAME,
      ts: new Date().toISOString()
    };
  });

  app.get('/', async () => {
    return {
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      protocolVersion: MCP_PROTOCOL_VERSION,
      tools: registry.size,
      endpoints: {
        mcp: '/mcp',
        health: '/health'
      }
    };
  });

  registerMcpRoutes(app, { dispatcher, sessions });

  // This handler maps failures outside the MCP scope into structured JSON errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);

    request.log.error(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    reply.status(normalized.statusCode).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.message,
        details: normalized.details
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return { app, registry, sessions, dispatcher };
}
