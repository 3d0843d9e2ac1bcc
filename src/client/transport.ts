// This module sends encoded JSON-RPC requests over HTTP with a caller-supplied timeout and no retries.

import { decodeResponse, encodeEnvelope } from '../mcp/codec.js';
import type { JsonRpcRequest, JsonRpcResponse } from '../types/mcp.js';
import { AppError, TransportError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog, summarizeEnvelope, type StructuredLogger } from '../utils/logger.js';
import { MCP_PROTOCOL_HEADER, MCP_SESSION_HEADER } from '../version.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface TransportSendOptions {
  sessionId?: string;
  protocolVersion?: string;
  timeoutMs?: number;
}

export interface TransportReply {
  response: JsonRpcResponse;
  sessionId?: string;
}

// This contract is all the client needs from a transport; it carries no protocol semantics.
export interface TransportClient {
  send(request: JsonRpcRequest, options?: TransportSendOptions): Promise<TransportReply>;
  terminate(sessionId: string, options?: Pick<TransportSendOptions, 'timeoutMs'>): Promise<boolean>;
}

export interface HttpTransportOptions {
  endpoint: string | URL;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: StructuredLogger;
}

interface HttpExchange {
  status: number;
  sessionId?: string;
  text: string;
}

// setTimeout fires negative or NaN delays almost at once.
function checkTimeout(timeoutMs: number): number {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new AppError(400, 'invalid_config', 'timeoutMs must be a positive number.', { timeoutMs });
  }
  return timeoutMs;
}

// This class executes one HTTP exchange per protocol request against a single MCP endpoint.
export class HttpTransportClient implements TransportClient {
  private readonly endpoint: URL;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger?: StructuredLogger;

  public constructor(options: HttpTransportOptions) {
    this.endpoint = new URL(options.endpoint);
    this.timeoutMs = checkTimeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger?.child({
      component: 'mcp_transport_client'
    });
  }

  // This helper writes one structured client event only when a logger is available.
  private log(level: 'debug' | 'info' | 'warn', event: string, details: Record<string, unknown>): void {
    this.logger?.[level](
      {
        event,
        ...details
      },
      event
    );
  }

  // This helper performs the fetch and reads the full body; any failure here means the peer was not reached.
  private async perform(init: RequestInit, signal: AbortSignal): Promise<HttpExchange> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, { ...init, signal });
    } catch (error) {
      throw new TransportError('unreachable', `Could not reach ${this.endpoint.href}.`, { cause: errorForLog(error) });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new TransportError('unreachable', 'Connection failed while reading the response body.', {
        status: response.status,
        cause: errorForLog(error)
      });
    }

    return {
      status: response.status,
      sessionId: response.headers.get(MCP_SESSION_HEADER) ?? undefined,
      text
    };
  }

  // This helper races the exchange against the timeout; on expiry the call is abandoned, not cancelled remotely.
  private async exchange(init: RequestInit, timeoutMs: number): Promise<HttpExchange> {
    const abortController = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        abortController.abort();
        reject(new TransportError('timeout', `No response within ${timeoutMs} ms.`, { timeoutMs }));
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.perform(init, abortController.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private buildHeaders(options: TransportSendOptions | undefined, hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      accept: 'application/json'
    };

    if (hasBody) {
      headers['content-type'] = 'application/json';
    }

    if (options?.sessionId) {
      headers[MCP_SESSION_HEADER] = options.sessionId;
    }

    if (options?.protocolVersion) {
      headers[MCP_PROTOCOL_HEADER] = options.protocolVersion;
    }

    return headers;
  }

  public async send(request: JsonRpcRequest, options?: TransportSendOptions): Promise<TransportReply> {
    const timeoutMs = checkTimeout(options?.timeoutMs ?? this.timeoutMs);
    const startedAt = Date.now();

    this.log('debug', 'mcp_transport_request_started', {
      method: request.method,
      rpcRequestId: request.id,
      timeoutMs
    });

    let exchange: HttpExchange;
    try {
      exchange = await this.exchange(
        {
          method: 'POST',
          headers: this.buildHeaders(options, true),
          body: encodeEnvelope(request)
        },
        timeoutMs
      );
    } catch (error) {
      this.log('warn', 'mcp_transport_request_failed', {
        method: request.method,
        rpcRequestId: request.id,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      });
      throw error;
    }

    let response: JsonRpcResponse;
    try {
      response = decodeResponse(exchange.text);
    } catch (error) {
      this.log('warn', 'mcp_transport_response_malformed', {
        method: request.method,
        rpcRequestId: request.id,
        status: exchange.status,
        body: sanitizeForLog(exchange.text)
      });
      throw new TransportError('malformed', 'Response is not a JSON-RPC response envelope.', {
        status: exchange.status,
        cause: errorForLog(error)
      });
    }

    this.log('debug', 'mcp_transport_request_completed', {
      method: request.method,
      rpcRequestId: request.id,
      status: exchange.status,
      response: summarizeEnvelope(response),
      durationMs: Date.now() - startedAt
    });

    return exchange.sessionId === undefined ? { response } : { response, sessionId: exchange.sessionId };
  }

  // This method ends a server session; false means the server no longer knew it.
  public async terminate(sessionId: string, options?: Pick<TransportSendOptions, 'timeoutMs'>): Promise<boolean> {
    const exchange = await this.exchange(
      {
        method: 'DELETE',
        headers: this.buildHeaders({ sessionId }, false)
      },
      checkTimeout(options?.timeoutMs ?? this.timeoutMs)
    );

    if (exchange.status === 204 || exchange.status === 200) {
      return true;
    }

    if (exchange.status === 404) {
      return false;
    }

    throw new TransportError('malformed', `Unexpected status ${exchange.status} when closing the session.`, {
      status: exchange.status
    });
  }
}
