// This module tracks the client side of one negotiated MCP session.

import { randomUUID } from 'node:crypto';
import { SessionLifecycle } from '../mcp/session.js';
import type { InitializeResult, JsonRpcId, JsonRpcResponse } from '../types/mcp.js';
import { TransportError } from '../utils/errors.js';

export class ClientSession extends SessionLifecycle {
  private negotiated: InitializeResult | null = null;
  private serverSessionId: string | undefined;

  public constructor(id: string = randomUUID()) {
    super(id);
  }

  public get result(): InitializeResult | null {
    return this.negotiated;
  }

  // The id the server assigned in its session header, sent back on every later request.
  public get transportSessionId(): string | undefined {
    return this.serverSessionId;
  }

  public establish(result: InitializeResult, transportSessionId: string | undefined): void {
    this.markInitialized();
    this.negotiated = result;
    this.serverSessionId = transportSessionId;
  }

  // This method checks that a response belongs to the request it answers.
  public reconcile(requestId: JsonRpcId, response: JsonRpcResponse): void {
    if (response.id === requestId) {
      return;
    }

    // A server that could not read the request answers with a null id.
    if (response.id === null && 'error' in response) {
      return;
    }

    throw new TransportError('malformed', `Response id ${String(response.id)} does not match request id ${String(requestId)}.`, {
      requestId,
      responseId: response.id
    });
  }
}
