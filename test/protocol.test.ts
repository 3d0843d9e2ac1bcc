// This test suite verifies the HTTP endpoint: envelope decoding, session headers, and session shutdown.

import { afterEach, describe, expect, it } from 'vitest';
import { decodeResponse } from '../src/mcp/codec.js';
import { createServer, type ServerResources } from '../src/server.js';
import { registerBuiltinTools } from '../src/tools/index.js';

const JSON_HEADERS = { 'content-type': 'application/json' };

let resources: ServerResources | undefined;

function startServer(config: { bodyLimitBytes?: number; sessionIdleMs?: number } = {}): ServerResources {
  resources = createServer({
    config: { logLevel: 'silent', bodyLimitBytes: config.bodyLimitBytes ?? 1024 * 1024, sessionIdleMs: config.sessionIdleMs },
    registerTools: registerBuiltinTools,
    logger: false
  });
  return resources;
}

afterEach(async () => {
  await resources?.app.close();
  resources = undefined;
});

async function postEnvelope(server: ServerResources, body: string, sessionId?: string) {
  return server.app.inject({
    method: 'POST',
    url: '/mcp',
    headers: sessionId ? { ...JSON_HEADERS, 'mcp-session-id': sessionId } : JSON_HEADERS,
    payload: body
  });
}

async function initialize(server: ServerResources): Promise<string> {
  const response = await postEnvelope(
    server,
    JSON.stringify({
      jsonrpc: '2.0',
      id: 1,
      method: 'initialize',
      params: { protocolVersion: '2025-03-26', clientInfo: { name: 'test-client', version: '1.0.0' } }
    })
  );

  const sessionId = response.headers['mcp-session-id'];
  if (typeof sessionId !== 'string') {
    throw new Error('initialize did not return a session header');
  }
  return sessionId;
}

describe('mcp http endpoint', () => {
  it('answers malformed JSON with a parse error envelope and a null id', async () => {
    const server = startServer();
    const response = await postEnvelope(server, '{"jsonrpc":');

    expect(response.statusCode).toBe(400);
    expect(response.headers['content-type']).toContain('application/json');
    expect(decodeResponse(response.body)).toMatchObject({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32700, message: 'Request body is not valid JSON.' }
    });
  });

  it('echoes a readable id when the envelope is invalid', async () => {
    const server = startServer();
    const response = await postEnvelope(server, '{"jsonrpc":"2.0","id":7,"method":5}');

    expect(response.statusCode).toBe(400);
    expect(decodeResponse(response.body)).toMatchObject({ id: 7, error: { code: -32600, message: 'Invalid JSON-RPC request object.' } });
  });

  it('rejects batches and response envelopes sent to the server', async () => {
    const server = startServer();

    const batch = await postEnvelope(server, '[{"jsonrpc":"2.0","id":1,"method":"ping"}]');
    expect(batch.statusCode).toBe(400);
    expect(decodeResponse(batch.body)).toMatchObject({ id: null, error: { code: -32600, message: 'Batch requests are not supported.' } });

    const reply = await postEnvelope(server, '{"jsonrpc":"2.0","id":3,"result":{}}');
    expect(reply.statusCode).toBe(400);
    expect(decodeResponse(reply.body)).toMatchObject({ id: 3, error: { code: -32600 } });
  });

  it('answers an oversized body with an error envelope carrying the HTTP status', async () => {
    const server = startServer({ bodyLimitBytes: 1024 });
    const body = JSON.stringify({ jsonrpc: '2.0', id: 9, method: 'ping', params: { padding: 'x'.repeat(4096) } });

    const response = await postEnvelope(server, body);

    expect(response.statusCode).toBe(413);
    expect(response.headers['content-type']).toContain('application/json');
    expect(decodeResponse(response.body)).toMatchObject({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32600, data: { code: 'FST_ERR_CTP_BODY_TOO_LARGE' } }
    });
  });

  it('answers unknown routes with a structured not-found body', async () => {
    const server = startServer();
    const response = await server.app.inject({ method: 'GET', url: '/missing' });

    expect(response.statusCode).toBe(404);
    expect(response.json<unknown>()).toEqual({
      ok: false,
      error: { code: 'not_found', message: 'Route not found: GET /missing' }
    });
  });

  it('parses bodies sent as plain text', async () => {
    const server = startServer();
    const response = await server.app.inject({
      method: 'POST',
      url: '/mcp',
      headers: { 'content-type': 'text/plain' },
      payload: '{"jsonrpc":"2.0","id":"p","method":"ping"}'
    });

    expect(response.statusCode).toBe(200);
    expect(decodeResponse(response.body)).toEqual({ jsonrpc: '2.0', id: 'p', result: {} });
  });

  it('issues a session on initialize and serves discovery and calls on it', async () => {
    const server = startServer();
    const sessionId = await initialize(server);

    const listed = await postEnvelope(server, '{"jsonrpc":"2.0","id":2,"method":"tools/list"}', sessionId);
    expect(listed.statusCode).toBe(200);
    expect(listed.headers['mcp-session-id']).toBe(sessionId);
    const listResponse = decodeResponse(listed.body);
    expect('result' in listResponse ? JSON.stringify(listResponse.result) : '').toContain('"get_greeting"');

    const greeted = await postEnvelope(
      server,
      JSON.stringify({ jsonrpc: '2.0', id: 3, method: 'tools/call', params: { name: 'get_greeting', arguments: { name: 'Ada' } } }),
      sessionId
    );
    expect(decodeResponse(greeted.body)).toEqual({
      jsonrpc: '2.0',
      id: 3,
      result: { content: [{ type: 'text', text: 'Hello, Ada! Welcome to the toolgate server.' }] }
    });
  });

  it('answers protocol errors with HTTP 200 and an error envelope', async () => {
    const server = startServer();
    const response = await postEnvelope(server, '{"jsonrpc":"2.0","id":4,"method":"tools/list"}');

    expect(response.statusCode).toBe(200);
    expect(decodeResponse(response.body)).toMatchObject({ id: 4, error: { code: -32003 } });
  });

  it('keeps concurrent requests correlated by id', async () => {
    const server = startServer();
    const sessionId = await initialize(server);

    const responses = await Promise.all(
      [1, 2, 3, 4, 5].map((n) =>
        postEnvelope(
          server,
          JSON.stringify({ jsonrpc: '2.0', id: `call-${n}`, method: 'tools/call', params: { name: 'multiply', arguments: { a: n, b: 10 } } }),
          sessionId
        )
      )
    );

    expect(responses.map((response) => decodeResponse(response.body))).toEqual(
      [1, 2, 3, 4, 5].map((n) => ({
        jsonrpc: '2.0',
        id: `call-${n}`,
        result: { content: [{ type: 'text', text: String(n * 10) }] }
      }))
    );
  });

  it('closes a session through DELETE and rejects later requests on it', async () => {
    const server = startServer();
    const sessionId = await initialize(server);

    const missingHeader = await server.app.inject({ method: 'DELETE', url: '/mcp' });
    expect(missingHeader.statusCode).toBe(400);
    expect(decodeResponse(missingHeader.body)).toMatchObject({ id: null, error: { code: -32003, message: 'Missing session id.' } });

    const closed = await server.app.inject({ method: 'DELETE', url: '/mcp', headers: { 'mcp-session-id': sessionId } });
    expect(closed.statusCode).toBe(204);
    expect(server.sessions.size).toBe(0);

    const again = await server.app.inject({ method: 'DELETE', url: '/mcp', headers: { 'mcp-session-id': sessionId } });
    expect(again.statusCode).toBe(404);

    const later = await postEnvelope(server, '{"jsonrpc":"2.0","id":5,"method":"tools/list"}', sessionId);
    expect(decodeResponse(later.body)).toMatchObject({ id: 5, error: { code: -32005 } });
  });

  it('reports an idle-expired session as closed', async () => {
    const server = startServer({ sessionIdleMs: 1_000 });
    const sessionId = await initialize(server);

    expect(server.sessions.expireIdle(Date.now() + 5_000)).toEqual([sessionId]);

    const later = await postEnvelope(server, '{"jsonrpc":"2.0","id":6,"method":"tools/list"}', sessionId);
    expect(later.statusCode).toBe(200);
    expect(decodeResponse(later.body)).toMatchObject({ id: 6, error: { code: -32005 } });
  });

  it('closes every session when the server shuts down', async () => {
    const server = startServer();
    const sessionId = await initialize(server);
    const session = server.sessions.get(sessionId);

    await server.app.close();
    resources = undefined;

    expect(session?.currentState).toBe('closed');
    expect(server.sessions.size).toBe(0);
  });

  it('describes the transport and exposes health and server info', async () => {
    const server = startServer();

    const discovery = await server.app.inject({ method: 'GET', url: '/mcp' });
    expect(discovery.statusCode).toBe(200);
    expect(discovery.json<unknown>()).toEqual({
      name: 'toolgate',
      transport: 'http',
      endpoint: '/mcp',
      methods: ['initialize', 'ping', 'tools/list', 'tools/call'],
      sessionHeader: 'mcp-session-id'
    });

    const health = await server.app.inject({ method: 'GET', url: '/health' });
    expect(health.json<unknown>()).toMatchObject({ ok: true, status: 'alive', server: 'toolgate' });

    const info = await server.app.inject({ method: 'GET', url: '/' });
    expect(info.json<unknown>()).toMatchObject({ name: 'toolgate', protocolVersion: '2025-03-26', tools: 9 });
  });
});
