// This module provides in-process stand-ins shared by the protocol test suites.

import type { FastifyInstance } from 'fastify';
import type { FetchLike } from '../src/client/transport.js';
import type { StructuredLogger } from '../src/utils/logger.js';

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  details: Record<string, unknown>;
}

// This logger records entries (with inherited child bindings) so tests can assert on emitted events.
export function createCapturingLogger(
  entries: LogEntry[] = [],
  bindings: Record<string, unknown> = {}
): StructuredLogger & { entries: LogEntry[] } {
  const write = (level: LogEntry['level']) => (details: Record<string, unknown>, message: string) => {
    entries.push({ level, message, details: { ...bindings, ...details } });
  };

  return {
    entries,
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (childBindings) => createCapturingLogger(entries, { ...bindings, ...childBindings })
  };
}

// This helper resolves a promise from the outside so tests control when an executor finishes.
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((innerResolve) => {
    resolve = innerResolve;
  });
  return { promise, resolve };
}

function toInjectMethod(method: string | undefined): 'GET' | 'POST' | 'DELETE' {
  if (method === 'POST' || method === 'DELETE') {
    return method;
  }
  return 'GET';
}

// This fetch stand-in routes requests into Fastify inject, so client tests never open a socket.
export function injectFetch(app: FastifyInstance): FetchLike {
  return async (input, init) => {
    const url = new URL(String(input));
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });

    const response = await app.inject({
      method: toInjectMethod(init?.method),
      url: `${url.pathname}${url.search}`,
      headers,
      payload: typeof init?.body === 'string' ? init.body : undefined
    });

    const responseHeaders = new Headers();
    for (const [key, value] of Object.entries(response.headers)) {
      if (value !== undefined) {
        responseHeaders.set(key, Array.isArray(value) ? value.join(', ') : String(value));
      }
    }

    return new Response(response.statusCode === 204 ? null : response.body, {
      status: response.statusCode,
      headers: responseHeaders
    });
  };
}
