// This module implements the MCP client: session negotiation, tool discovery, and tool invocation.

import type { z } from 'zod';
import { initializeResultSchema, invocationResultSchema, toolListResultSchema } from '../mcp/codec.js';
import { protocolError, remoteProtocolError } from '../mcp/rpc-errors.js';
import type {
  ImplementationInfo,
  InitializeResult,
  InvocationResult,
  JsonRpcRequest,
  McpMethod,
  ToolDescriptor
} from '../types/mcp.js';
import { TransportError } from '../utils/errors.js';
import { errorForLog, type StructuredLogger } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import { ClientSession } from './session.js';
import type { TransportClient } from './transport.js';

export interface McpClientOptions {
  transport: TransportClient;
  clientInfo?: ImplementationInfo;
  protocolVersion?: string;
  logger?: StructuredLogger;
}

export interface CallOptions {
  timeoutMs?: number;
}

interface RawReply {
  result: unknown;
  sessionId?: string;
}

// This class drives one session against one server; every method maps to exactly one request envelope.
export class McpClient {
  private readonly transport: TransportClient;
  private readonly clientInfo: ImplementationInfo;
  private readonly protocolVersion: string;
  private readonly logger?: StructuredLogger;
  public readonly session = new ClientSession();

  public constructor(options: McpClientOptions) {
    this.transport = options.transport;
    this.clientInfo = options.clientInfo ?? { name: `${MCP_SERVER_NAME}-client`, version: MCP_SERVER_VERSION };
    this.protocolVersion = options.protocolVersion ?? MCP_PROTOCOL_VERSION;
    this.logger = options.logger?.child({ component: 'mcp_client', clientSessionId: this.session.id });
  }

  // This helper validates a result payload and reports a shape mismatch as a malformed response.
  private parseResult<T>(method: McpMethod, schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new TransportError('malformed', `Unexpected ${method} result shape.`, parsed.error.flatten());
    }
    return parsed.data;
  }

  // This helper sends one request and turns an error envelope into a thrown protocol error.
  private async request(
    method: McpMethod,
    params: Record<string, unknown> | undefined,
    options?: CallOptions
  ): Promise<RawReply> {
    const id = this.session.nextRequestId();
    const request: JsonRpcRequest = params === undefined ? { jsonrpc: '2.0', id, method } : { jsonrpc: '2.0', id, method, params };

    const reply = await this.transport.send(request, {
      sessionId: this.session.transportSessionId,
      protocolVersion: this.session.result?.protocolVersion,
      timeoutMs: options?.timeoutMs
    });
    this.session.reconcile(id, reply.response);

    if ('error' in reply.response) {
      const error = remoteProtocolError(reply.response.error);
      this.logger?.warn(
        {
          event: 'mcp_client_protocol_error',
          method,
          rpcRequestId: id,
          reason: error.reason,
          rpcCode: error.rpcCode
        },
        'mcp_client_protocol_error'
      );
      throw error;
    }

    return reply.sessionId === undefined ? { result: reply.response.result } : { result: reply.response.result, sessionId: reply.sessionId };
  }

  // This method negotiates the session; it must be the first call and may succeed only once.
  public async connect(options?: CallOptions): Promise<InitializeResult> {
    if (this.session.currentState === 'initialized') {
      throw protocolError('session_already_initialized', 'Client session is already initialized.');
    }

    const reply = await this.request(
      'initialize',
      {
        protocolVersion: this.protocolVersion,
        capabilities: {},
        clientInfo: this.clientInfo
      },
      options
    );

    const result = this.parseResult('initialize', initializeResultSchema, reply.result);
    this.session.establish(result, reply.sessionId);

    this.logger?.info(
      {
        event: 'mcp_client_connected',
        protocolVersion: result.protocolVersion,
        serverInfo: result.serverInfo,
        serverSessionId: reply.sessionId ?? null
      },
      'mcp_client_connected'
    );

    return result;
  }

  public async ping(options?: CallOptions): Promise<void> {
    await this.request('ping', undefined, options);
  }

  public async listTools(options?: CallOptions): Promise<ToolDescriptor[]> {
    this.session.assertReady();
    const reply = await this.request('tools/list', undefined, options);
    return this.parseResult('tools/list', toolListResultSchema, reply.result).tools;
  }

  // Tool-level failures are returned as results with isError set; only protocol and transport failures throw.
  public async callTool(name: string, args: Record<string, unknown> = {}, options?: CallOptions): Promise<InvocationResult> {
    this.session.assertReady();
    const reply = await this.request('tools/call', { name, arguments: args }, options);
    return this.parseResult('tools/call', invocationResultSchema, reply.result);
  }

  // This method ends the session on the server and locally; the local session is closed even when the server call fails.
  public async close(options?: CallOptions): Promise<void> {
    const serverSessionId = this.session.transportSessionId;
    const wasInitialized = this.session.currentState === 'initialized';
    this.session.close();

    if (!wasInitialized || serverSessionId === undefined) {
      return;
    }

    try {
      const closed = await this.transport.terminate(serverSessionId, options);
      this.logger?.info({ event: 'mcp_client_closed', serverSessionId, serverKnewSession: closed }, 'mcp_client_closed');
    } catch (error) {
      this.logger?.warn({ event: 'mcp_client_close_failed', serverSessionId, error: errorForLog(error) }, 'mcp_client_close_failed');
      throw error;
    }
  }
}
