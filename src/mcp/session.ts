// This module implements per-connection session state, protocol negotiation, and the server session store.

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { ImplementationInfo, InitializeParams, InitializeResult, ServerCapabilities } from '../types/mcp.js';
import { protocolError } from './rpc-errors.js';

export type SessionState = 'uninitialized' | 'initialized' | 'closed';

export const initializeParamsSchema = z.object({
  protocolVersion: z.string().trim().min(1),
  capabilities: z.record(z.unknown()).optional(),
  clientInfo: z.object({
    name: z.string().trim().min(1),
    version: z.string().trim().min(1)
  })
});

// This base class owns the lifecycle state machine and request-id allocation shared by both ends.
export class SessionLifecycle {
  public readonly id: string;
  private state: SessionState = 'uninitialized';
  private lastRequestId = 0;

  public constructor(id: string) {
    this.id = id;
  }

  public get currentState(): SessionState {
    return this.state;
  }

  // The counter only moves forward; the event loop makes the increment atomic for concurrent callers.
  public nextRequestId(): number {
    this.assertOpen();
    this.lastRequestId += 1;
    return this.lastRequestId;
  }

  // This method rejects work on sessions that are not initialized or already closed.
  public assertReady(): void {
    this.assertOpen();
    if (this.state === 'uninitialized') {
      throw protocolError('session_not_initialized', 'Session is not initialized. Call initialize first.');
    }
  }

  // Closing is terminal; repeated calls are no-ops.
  public close(): void {
    this.state = 'closed';
  }

  protected assertOpen(): void {
    if (this.state === 'closed') {
      throw protocolError('session_closed', `Session ${this.id} is closed.`);
    }
  }

  protected markInitialized(): void {
    this.assertOpen();
    if (this.state === 'initialized') {
      throw protocolError('session_already_initialized', `Session ${this.id} is already initialized.`);
    }
    this.state = 'initialized';
  }
}

export interface SessionOptions {
  id: string;
  supportedProtocolVersions: readonly string[];
  serverInfo: ImplementationInfo;
  capabilities: ServerCapabilities;
}

// This class models one server-side session negotiated through initialize.
export class Session extends SessionLifecycle {
  private readonly options: SessionOptions;
  private negotiated: InitializeResult | null = null;
  private client: ImplementationInfo | null = null;

  public constructor(options: SessionOptions) {
    super(options.id);
    this.options = options;
  }

  public get clientInfo(): ImplementationInfo | null {
    return this.client;
  }

  public get capabilities(): InitializeResult | null {
    return this.negotiated;
  }

  // This method negotiates the protocol version and records the capabilities of the first successful call.
  public initialize(params: InitializeParams): InitializeResult {
    this.assertOpen();
    if (this.currentState === 'initialized') {
      throw protocolError('session_already_initialized', `Session ${this.id} is already initialized.`);
    }

    if (!this.options.supportedProtocolVersions.includes(params.protocolVersion)) {
      throw protocolError('protocol_mismatch', `Unsupported protocol version: ${params.protocolVersion}`, {
        requested: params.protocolVersion,
        supported: [...this.options.supportedProtocolVersions]
      });
    }

    const result: InitializeResult = {
      protocolVersion: params.protocolVersion,
      capabilities: this.options.capabilities,
      serverInfo: this.options.serverInfo
    };

    this.markInitialized();
    this.negotiated = result;
    this.client = params.clientInfo;
    return result;
  }
}

export interface SessionStoreOptions extends Omit<SessionOptions, 'id'> {
  // Plain HTTP has no disconnect signal, so idle sessions are closed after this long; 0 keeps them forever.
  idleTimeoutMs?: number;
}

export const DEFAULT_SESSION_IDLE_MS = 30 * 60 * 1000;

// Closed ids are remembered for a while so late requests learn the session ended instead of never existing.
const MAX_REMEMBERED_CLOSED_IDS = 1000;

interface StoredSession {
  session: Session;
  lastUsedAt: number;
}

// This class keeps the sessions of one server process keyed by their transport session id.
export class SessionStore {
  private readonly sessionOptions: Omit<SessionOptions, 'id'>;
  private readonly idleTimeoutMs: number;
  // Entries are re-inserted on use, so iteration order is least recently used first.
  private readonly sessions = new Map<string, StoredSession>();
  private readonly closedIds = new Set<string>();

  public constructor(options: SessionStoreOptions) {
    const { idleTimeoutMs = DEFAULT_SESSION_IDLE_MS, ...sessionOptions } = options;
    this.sessionOptions = sessionOptions;
    this.idleTimeoutMs = idleTimeoutMs;
  }

  public get size(): number {
    return this.sessions.size;
  }

  public create(): Session {
    const now = Date.now();
    this.expireIdle(now);

    const session = new Session({ ...this.sessionOptions, id: randomUUID() });
    this.sessions.set(session.id, { session, lastUsedAt: now });
    return session;
  }

  // Looking a session up counts as use and pushes back its idle deadline.
  public get(id: string): Session | undefined {
    const now = Date.now();
    this.expireIdle(now);

    const stored = this.sessions.get(id);
    if (!stored) {
      return undefined;
    }

    this.sessions.delete(id);
    this.sessions.set(id, { session: stored.session, lastUsedAt: now });
    return stored.session;
  }

  public wasClosed(id: string): boolean {
    return this.closedIds.has(id);
  }

  // This method closes sessions unused for longer than the idle timeout and returns their ids.
  public expireIdle(now = Date.now()): string[] {
    if (this.idleTimeoutMs <= 0) {
      return [];
    }

    const expired: string[] = [];
    for (const [id, stored] of this.sessions) {
      if (now - stored.lastUsedAt < this.idleTimeoutMs) {
        break;
      }
      expired.push(id);
    }

    for (const id of expired) {
      this.close(id);
    }
    return expired;
  }

  private rememberClosed(id: string): void {
    this.closedIds.add(id);
    if (this.closedIds.size > MAX_REMEMBERED_CLOSED_IDS) {
      const oldest = this.closedIds.values().next();
      if (!oldest.done) {
        this.closedIds.delete(oldest.value);
      }
    }
  }

  // This method closes and forgets one session; in-flight holders observe the closed state.
  public close(id: string): boolean {
    const stored = this.sessions.get(id);
    if (!stored) {
      return false;
    }

    stored.session.close();
    this.sessions.delete(id);
    this.rememberClosed(id);
    return true;
  }

  public closeAll(): void {
    for (const { session } of this.sessions.values()) {
      session.close();
      this.rememberClosed(session.id);
    }
    this.sessions.clear();
  }
}
