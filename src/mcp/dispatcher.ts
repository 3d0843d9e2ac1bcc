// This module routes decoded JSON-RPC requests to negotiation, tool discovery, and tool execution.

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { InvocationResult, JsonRpcRequest, JsonRpcResponse } from '../types/mcp.js';
import { normalizeError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog, type StructuredLogger } from '../utils/logger.js';
import type { ToolRegistry } from './registry.js';
import { toolFailureResult } from './results.js';
import { protocolError, rpcError } from './rpc-errors.js';
import { initializeParamsSchema, type Session, type SessionStore } from './session.js';

export interface DispatchContext {
  sessionId?: string;
  logger: StructuredLogger;
}

export interface DispatchOutcome {
  response: JsonRpcResponse;
  sessionId?: string;
}

export interface DispatcherDeps {
  registry: ToolRegistry;
  sessions: SessionStore;
}

const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional()
});

// This helper returns compact result metadata to keep tool completion logs concise.
function summarizeToolOutput(output: InvocationResult): Record<string, unknown> {
  return {
    contentItems: output.content.length,
    isError: output.isError === true,
    structuredKeys: output.structuredContent ? Object.keys(output.structuredContent) : undefined
  };
}

// This class is the server-side protocol core; it never throws and answers every request with one envelope.
export class Dispatcher {
  private readonly registry: ToolRegistry;
  private readonly sessions: SessionStore;

  public constructor(deps: DispatcherDeps) {
    this.registry = deps.registry;
    this.sessions = deps.sessions;
  }

  public async dispatch(request: JsonRpcRequest, context: DispatchContext): Promise<DispatchOutcome> {
    const startedAt = Date.now();
    const rpcTraceId = randomUUID();
    const logger = context.logger.child({ rpcTraceId, rpcRequestId: request.id, method: request.method });

    logger.info(
      {
        event: 'mcp_rpc_request_received',
        sessionId: context.sessionId ?? null
      },
      'mcp_rpc_request_received'
    );

    try {
      switch (request.method) {
        case 'initialize':
          return this.handleInitialize(request, context.sessionId, logger);

        case 'ping':
          return { response: { jsonrpc: '2.0', id: request.id, result: {} } };

        case 'tools/list': {
          this.resolveSession(context.sessionId);
          return {
            response: {
              jsonrpc: '2.0',
              id: request.id,
              result: {
                tools: this.registry.listTools()
              }
            }
          };
        }

        case 'tools/call': {
          const session = this.resolveSession(context.sessionId);
          const result = await this.handleToolCall(request, session, logger);
          return { response: { jsonrpc: '2.0', id: request.id, result } };
        }

        default:
          throw protocolError('method_not_found', `Unknown method: ${request.method}`);
      }
    } catch (error) {
      const appError = normalizeError(error);

      logger.warn(
        {
          event: 'mcp_rpc_request_failed',
          code: appError.code,
          statusCode: appError.statusCode,
          details: sanitizeForLog(appError.details),
          error: appError.statusCode >= 500 ? errorForLog(error) : undefined,
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_failed'
      );

      return { response: rpcError(request.id, appError) };
    } finally {
      logger.info(
        {
          event: 'mcp_rpc_request_completed',
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_completed'
      );
    }
  }

  // This helper creates a session for a fresh initialize or re-checks the one named by the transport.
  private handleInitialize(
    request: JsonRpcRequest,
    sessionId: string | undefined,
    logger: StructuredLogger
  ): DispatchOutcome {
    const params = initializeParamsSchema.safeParse(request.params ?? {});
    if (!params.success) {
      throw protocolError('invalid_arguments', 'initialize requires protocolVersion and clientInfo.', params.error.flatten());
    }

    if (sessionId !== undefined) {
      const existing = this.resolveExisting(sessionId);
      existing.initialize(params.data);
      return { response: { jsonrpc: '2.0', id: request.id, result: existing.capabilities }, sessionId };
    }

    const session = this.sessions.create();
    try {
      const result = session.initialize(params.data);

      logger.info(
        {
          event: 'mcp_session_initialized',
          sessionId: session.id,
          protocolVersion: result.protocolVersion,
          clientInfo: sanitizeForLog(params.data.clientInfo)
        },
        'mcp_session_initialized'
      );

      return { response: { jsonrpc: '2.0', id: request.id, result }, sessionId: session.id };
    } catch (error) {
      this.sessions.close(session.id);
      throw error;
    }
  }

  private resolveExisting(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      if (this.sessions.wasClosed(sessionId)) {
        throw protocolError('session_closed', `Session ${sessionId} is closed.`);
      }
      throw protocolError('session_not_initialized', `Unknown session: ${sessionId}`);
    }
    return session;
  }

  // This helper enforces that every non-initialize request runs on an initialized, open session.
  private resolveSession(sessionId: string | undefined): Session {
    if (sessionId === undefined) {
      throw protocolError('session_not_initialized', 'Missing session id. Call initialize first.');
    }

    const session = this.resolveExisting(sessionId);
    session.assertReady();
    return session;
  }

  // This helper validates the call against the registry before the executor may run.
  private async handleToolCall(
    request: JsonRpcRequest,
    session: Session,
    logger: StructuredLogger
  ): Promise<InvocationResult> {
    const params = toolCallParamsSchema.safeParse(request.params ?? {});
    if (!params.success) {
      throw protocolError('invalid_arguments', 'tools/call requires params.name as string.', params.error.flatten());
    }

    const { name } = params.data;
    const tool = this.registry.get(name);
    if (!tool) {
      logger.warn({ event: 'mcp_tool_not_found', toolName: name }, 'mcp_tool_not_found');
      throw protocolError('tool_not_found', `Unknown tool: ${name}`);
    }

    const check = tool.checkArguments(params.data.arguments ?? {});
    if (!check.ok) {
      throw protocolError('invalid_arguments', 'Tool input validation failed.', check.error.flatten());
    }

    const startedAt = Date.now();
    logger.info(
      {
        event: 'mcp_tool_execution_started',
        toolName: name,
        sessionId: session.id,
        arguments: sanitizeForLog(params.data.arguments ?? {})
      },
      'mcp_tool_execution_started'
    );

    let result: InvocationResult;
    try {
      result = await check.run({
        toolName: name,
        requestId: request.id,
        sessionId: session.id,
        logger: logger.child({ toolName: name })
      });
    } catch (error) {
      logger.error(
        {
          event: 'mcp_tool_execution_failed',
          toolName: name,
          durationMs: Date.now() - startedAt,
          error: errorForLog(error)
        },
        'mcp_tool_execution_failed'
      );

      result = toolFailureResult(error);
    }

    // A session closed while the executor ran no longer receives its result.
    if (session.currentState === 'closed') {
      logger.warn(
        {
          event: 'mcp_tool_result_discarded',
          toolName: name,
          sessionId: session.id,
          durationMs: Date.now() - startedAt
        },
        'mcp_tool_result_discarded'
      );
      throw protocolError('session_closed', `Session ${session.id} closed before ${name} completed.`);
    }

    logger.info(
      {
        event: 'mcp_tool_execution_completed',
        toolName: name,
        durationMs: Date.now() - startedAt,
        result: summarizeToolOutput(result)
      },
      'mcp_tool_execution_completed'
    );

    return result;
  }
}
