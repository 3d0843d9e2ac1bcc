// This module implements the HTTP JSON-RPC endpoint for MCP tool discovery and execution.

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { JsonRpcRequest } from '../types/mcp.js';
import { normalizeError } from '../utils/errors.js';
import { sanitizeForLog, summarizeEnvelope } from '../utils/logger.js';
import { MCP_SERVER_NAME, MCP_SESSION_HEADER } from '../version.js';
import { decodeRequestValue, encodeEnvelope, parseWireText, peekEnvelopeId } from './codec.js';
import type { Dispatcher } from './dispatcher.js';
import { protocolError, rpcError } from './rpc-errors.js';
import type { SessionStore } from './session.js';

export interface McpRouteDeps {
  dispatcher: Dispatcher;
  sessions: SessionStore;
}

const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

// This helper reads the session id header, tolerating repeated headers by taking the first value.
function readSessionId(request: FastifyRequest): string | undefined {
  const raw = request.headers[MCP_SESSION_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// This function registers the MCP routes in their own scope so the raw-body parser stays local.
export function registerMcpRoutes(fastify: FastifyInstance, deps: McpRouteDeps): void {
  void fastify.register(async (scope) => {
    // Bodies reach the codec as text, so malformed JSON is answered with a JSON-RPC envelope.
    scope.removeContentTypeParser(['application/json', 'text/plain']);
    scope.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
      done(null, body);
    });

    // Errors Fastify raises before the handler runs (oversized or unreadable bodies) still answer with an envelope.
    scope.setErrorHandler((error, request, reply) => {
      const appError = normalizeError(error);
      const reason = appError.statusCode >= 500 ? 'internal_error' : 'invalid_request';

      request.log.warn(
        {
          event: 'mcp_post_invalid_envelope',
          code: appError.code,
          statusCode: appError.statusCode,
          details: sanitizeForLog(appError.details)
        },
        'mcp_post_invalid_envelope'
      );

      reply
        .code(appError.statusCode)
        .header('content-type', JSON_CONTENT_TYPE)
        .send(encodeEnvelope(rpcError(null, protocolError(reason, appError.message, { code: appError.code }))));
    });

    scope.get('/mcp', async (request, reply) => {
      request.log.info({ event: 'mcp_transport_discovery' }, 'mcp_transport_discovery');

      reply.send({
        name: MCP_SERVER_NAME,
        transport: 'http',
        endpoint: '/mcp',
        methods: ['initialize', 'ping', 'tools/list', 'tools/call'],
        sessionHeader: MCP_SESSION_HEADER
      });
    });

    scope.post('/mcp', async (request: FastifyRequest, reply: FastifyReply) => {
      const sessionId = readSessionId(request);
      const requestLogger = request.log.child({ component: 'mcp', sessionId: sessionId ?? null });
      const raw = typeof request.body === 'string' ? request.body : '';

      let payload: unknown = undefined;
      let envelope: JsonRpcRequest;
      try {
        payload = parseWireText(raw);
        envelope = decodeRequestValue(payload);
      } catch (error) {
        const appError = normalizeError(error);

        // A malformed envelope never reaches the dispatcher.
        requestLogger.warn(
          {
            event: 'mcp_post_invalid_envelope',
            code: appError.code,
            details: sanitizeForLog(appError.details)
          },
          'mcp_post_invalid_envelope'
        );

        reply
          .code(400)
          .header('content-type', JSON_CONTENT_TYPE)
          .send(encodeEnvelope(rpcError(peekEnvelopeId(payload), appError)));
        return;
      }

      requestLogger.debug({ event: 'mcp_post_decoded', envelope: summarizeEnvelope(envelope) }, 'mcp_post_decoded');

      const outcome = await deps.dispatcher.dispatch(envelope, { sessionId, logger: requestLogger });
      const responseSessionId = outcome.sessionId ?? sessionId;
      if (responseSessionId) {
        reply.header(MCP_SESSION_HEADER, responseSessionId);
      }

      reply.header('content-type', JSON_CONTENT_TYPE).send(encodeEnvelope(outcome.response));
    });

    // This route ends a session explicitly; the transition to closed is terminal.
    scope.delete('/mcp', async (request, reply) => {
      const sessionId = readSessionId(request);
      if (!sessionId) {
        reply
          .code(400)
          .header('content-type', JSON_CONTENT_TYPE)
          .send(encodeEnvelope(rpcError(null, protocolError('session_not_initialized', 'Missing session id.'))));
        return;
      }

      if (!deps.sessions.close(sessionId)) {
        reply
          .code(404)
          .header('content-type', JSON_CONTENT_TYPE)
          .send(encodeEnvelope(rpcError(null, protocolError('session_not_initialized', `Unknown session: ${sessionId}`))));
        return;
      }

      request.log.info({ event: 'mcp_session_closed', sessionId }, 'mcp_session_closed');
      reply.code(204).send();
    });
  });
}
