// This test suite verifies how discovered tools become local callables and how several servers merge into one catalog.

import { afterEach, describe, expect, it, vi } from 'vitest';
import { ToolAdapter, ToolCatalog, resultText, type ToolInvoker } from '../src/client/adapter.js';
import { McpClient } from '../src/client/client.js';
import { HttpTransportClient } from '../src/client/transport.js';
import { createServer, type ServerResources } from '../src/server.js';
import { registerBuiltinTools } from '../src/tools/index.js';
import type { InvocationResult, ToolDescriptor } from '../src/types/mcp.js';
import { AppError, TransportError } from '../src/utils/errors.js';
import { createCapturingLogger, injectFetch } from './helpers.js';

const echoDescriptor: ToolDescriptor = {
  name: 'echo',
  description: 'Echo a message',
  inputSchema: {
    type: 'object',
    properties: {
      message: { type: 'string', description: 'Text to echo' },
      loud: { type: 'boolean' }
    },
    required: ['message']
  }
};

function createInvoker(descriptors: ToolDescriptor[]) {
  const callTool = vi.fn<ToolInvoker['callTool']>(async (name, args) => ({
    content: [{ type: 'text', text: `${name}:${JSON.stringify(args)}` }]
  }));
  const listTools = vi.fn<ToolInvoker['listTools']>(async () => descriptors);
  const invoker: ToolInvoker = { listTools, callTool };
  return { invoker, callTool, listTools };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

describe('tool adapter', () => {
  it('exposes each descriptor with an explicit parameter list', async () => {
    const { invoker } = createInvoker([echoDescriptor]);
    const adapter = new ToolAdapter(invoker);

    const tools = await adapter.discover();

    expect(tools).toHaveLength(1);
    expect(tools[0]?.name).toBe('echo');
    expect(tools[0]?.description).toBe('Echo a message');
    expect(tools[0]?.parameters).toEqual([
      { name: 'message', type: 'string', required: true, description: 'Text to echo' },
      { name: 'loud', type: 'boolean', required: false }
    ]);
  });

  it('forwards valid arguments to the invoker', async () => {
    const { invoker, callTool } = createInvoker([echoDescriptor]);
    const adapter = new ToolAdapter(invoker);
    await adapter.discover();

    const result = await adapter.invoke('echo', { message: 'hi' }, { timeoutMs: 500 });

    expect(resultText(result)).toBe('echo:{"message":"hi"}');
    expect(callTool).toHaveBeenCalledWith('echo', { message: 'hi' }, { timeoutMs: 500 });
  });

  it('rejects arguments that violate the schema without sending them', async () => {
    const { invoker, callTool } = createInvoker([echoDescriptor]);
    const logger = createCapturingLogger();
    const adapter = new ToolAdapter(invoker, { logger });
    await adapter.discover();

    const missing = await captureError(adapter.invoke('echo', {}));
    const wrongType = await captureError(adapter.invoke('echo', { message: 'hi', loud: 'yes' }));

    expect(missing).toBeInstanceOf(AppError);
    expect(missing).toMatchObject({ code: 'invalid_arguments', message: 'Arguments for echo do not match its input schema.' });
    expect(wrongType).toMatchObject({ code: 'invalid_arguments' });
    expect(callTool).not.toHaveBeenCalled();
    expect(logger.entries.filter((entry) => entry.message === 'mcp_tool_arguments_rejected')).toHaveLength(2);
  });

  it('rejects names it has not discovered', async () => {
    const { invoker } = createInvoker([echoDescriptor]);
    const adapter = new ToolAdapter(invoker);
    await adapter.discover();

    expect(adapter.get('missing')).toBeUndefined();
    expect(await captureError(adapter.invoke('missing'))).toMatchObject({ code: 'tool_not_found', message: 'Unknown tool: missing' });
  });

  it('keeps the first descriptor when a server lists a name twice', async () => {
    const { invoker } = createInvoker([echoDescriptor, { ...echoDescriptor, description: 'shadow' }]);
    const adapter = new ToolAdapter(invoker);

    const tools = await adapter.discover();

    expect(tools.map((tool) => tool.description)).toEqual(['Echo a message']);
  });

  it('replaces the tool set on every discovery', async () => {
    const { invoker, listTools } = createInvoker([echoDescriptor]);
    const adapter = new ToolAdapter(invoker);
    await adapter.discover();

    listTools.mockResolvedValueOnce([]);
    await adapter.discover();

    expect(adapter.list()).toEqual([]);
  });
});

describe('tool adapter against a live server', () => {
  let resources: ServerResources | undefined;

  afterEach(async () => {
    await resources?.app.close();
    resources = undefined;
  });

  it('invokes discovered calculator tools end to end', async () => {
    resources = createServer({
      config: { logLevel: 'silent', bodyLimitBytes: 1024 * 1024 },
      registerTools: registerBuiltinTools,
      logger: false
    });
    const client = new McpClient({
      transport: new HttpTransportClient({ endpoint: 'http://toolgate.test/mcp', fetch: injectFetch(resources.app) })
    });
    await client.connect();

    const adapter = new ToolAdapter(client);
    await adapter.discover();

    expect(adapter.get('power')?.parameters.map((parameter) => parameter.name)).toEqual(['base', 'exponent']);
    expect(resultText(await adapter.invoke('power', { base: 2, exponent: 10 }))).toBe('1024');
    expect(resultText(await adapter.invoke('factorial', { n: 5 }))).toBe('120');
    expect(resultText(await adapter.invoke('sqrt', { number: -4 }))).toBe(
      'Error [negative_input]: Cannot calculate square root of negative number.'
    );
  });
});

describe('tool catalog', () => {
  const sumDescriptor: ToolDescriptor = {
    name: 'sum',
    description: 'Sum numbers',
    inputSchema: { type: 'object', properties: { values: { type: 'array', items: { type: 'number' } } }, required: ['values'] }
  };

  it('merges servers and routes calls to the server that owns each name', async () => {
    const first = createInvoker([echoDescriptor]);
    const second = createInvoker([{ ...echoDescriptor, description: 'second echo' }, sumDescriptor]);
    const catalog = new ToolCatalog({ logger: createCapturingLogger() });
    catalog.addServer('alpha', new ToolAdapter(first.invoker));
    catalog.addServer('beta', new ToolAdapter(second.invoker));

    const { tools, failures } = await catalog.refresh();

    expect(failures).toEqual([]);
    expect(tools.map((tool) => [tool.name, tool.server, tool.description])).toEqual([
      ['echo', 'alpha', 'Echo a message'],
      ['sum', 'beta', 'Sum numbers']
    ]);

    await catalog.invoke('echo', { message: 'hi' });
    await catalog.invoke('sum', { values: [1, 2] });

    expect(first.callTool).toHaveBeenCalledWith('echo', { message: 'hi' }, undefined);
    expect(second.callTool).toHaveBeenCalledWith('sum', { values: [1, 2] }, undefined);
    expect(second.callTool).toHaveBeenCalledTimes(1);
  });

  it('reports unreachable servers and keeps the rest', async () => {
    const healthy = createInvoker([sumDescriptor]);
    const broken = createInvoker([]);
    broken.listTools.mockRejectedValue(new TransportError('unreachable', 'Could not reach http://down.test/mcp.'));

    const catalog = new ToolCatalog();
    catalog.addServer('down', new ToolAdapter(broken.invoker));
    catalog.addServer('up', new ToolAdapter(healthy.invoker));

    const { tools, failures } = await catalog.refresh();

    expect(tools.map((tool) => tool.name)).toEqual(['sum']);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.server).toBe('down');
    expect(failures[0]?.error).toMatchObject({ code: 'transport_unreachable' });
  });

  it('refuses to register the same server name twice', () => {
    const catalog = new ToolCatalog();
    catalog.addServer('alpha', new ToolAdapter(createInvoker([]).invoker));

    expect(() => catalog.addServer('alpha', new ToolAdapter(createInvoker([]).invoker))).toThrow(
      'Server alpha is already part of the catalog.'
    );
  });

  it('renders mixed content as text lines', () => {
    const result: InvocationResult = {
      content: [
        { type: 'text', text: 'partial output' },
        { type: 'error', error: { code: 'tool_execution_failed', message: 'disk full' } }
      ],
      isError: true
    };

    expect(resultText(result)).toBe('partial output\nError [tool_execution_failed]: disk full');
  });
});
