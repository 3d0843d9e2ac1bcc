// This module exposes discovered remote tools as locally callable operations for an upstream caller.

import type { z } from 'zod';
import { protocolError } from '../mcp/rpc-errors.js';
import type { InvocationResult, ToolDescriptor, ToolInputSchema } from '../types/mcp.js';
import { AppError, normalizeError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog, type StructuredLogger } from '../utils/logger.js';
import type { CallOptions } from './client.js';
import { buildArgumentsValidator, describeParameters, type ToolParameter } from './json-schema.js';

// The subset of McpClient the adapter delegates to.
export interface ToolInvoker {
  listTools(options?: CallOptions): Promise<ToolDescriptor[]>;
  callTool(name: string, args: Record<string, unknown>, options?: CallOptions): Promise<InvocationResult>;
}

export interface AdaptedTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  parameters: ToolParameter[];
  invoke(args?: Record<string, unknown>, options?: CallOptions): Promise<InvocationResult>;
}

export interface ToolAdapterOptions {
  logger?: StructuredLogger;
}

// This helper renders a result as plain text, marking tool-level failures distinctly.
export function resultText(result: InvocationResult): string {
  return result.content
    .map((item) => (item.type === 'text' ? item.text : `Error [${item.error.code}]: ${item.error.message}`))
    .join('\n');
}

// This class turns tools/list descriptors into typed callables; it performs no tool selection itself.
export class ToolAdapter {
  private readonly invoker: ToolInvoker;
  private readonly logger?: StructuredLogger;
  private tools = new Map<string, AdaptedTool>();

  public constructor(invoker: ToolInvoker, options?: ToolAdapterOptions) {
    this.invoker = invoker;
    this.logger = options?.logger?.child({ component: 'mcp_tool_adapter' });
  }

  private adapt(descriptor: ToolDescriptor): AdaptedTool {
    const validator: z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown> = buildArgumentsValidator(descriptor.inputSchema);

    return {
      name: descriptor.name,
      description: descriptor.description,
      inputSchema: descriptor.inputSchema,
      parameters: describeParameters(descriptor.inputSchema),
      invoke: async (args = {}, options) => {
        const parsed = validator.safeParse(args);
        if (!parsed.success) {
          this.logger?.warn(
            {
              event: 'mcp_tool_arguments_rejected',
              toolName: descriptor.name,
              arguments: sanitizeForLog(args)
            },
            'mcp_tool_arguments_rejected'
          );
          throw protocolError('invalid_arguments', `Arguments for ${descriptor.name} do not match its input schema.`, parsed.error.flatten());
        }

        return this.invoker.callTool(descriptor.name, parsed.data, options);
      }
    };
  }

  // This method replaces the known tool set with the server's current listing.
  public async discover(options?: CallOptions): Promise<AdaptedTool[]> {
    const descriptors = await this.invoker.listTools(options);
    const next = new Map<string, AdaptedTool>();

    for (const descriptor of descriptors) {
      if (next.has(descriptor.name)) {
        this.logger?.warn({ event: 'mcp_tool_duplicate_skipped', toolName: descriptor.name }, 'mcp_tool_duplicate_skipped');
        continue;
      }
      next.set(descriptor.name, this.adapt(descriptor));
    }

    this.tools = next;
    this.logger?.info({ event: 'mcp_tools_discovered', count: next.size }, 'mcp_tools_discovered');
    return this.list();
  }

  public list(): AdaptedTool[] {
    return [...this.tools.values()];
  }

  public get(name: string): AdaptedTool | undefined {
    return this.tools.get(name);
  }

  public async invoke(name: string, args: Record<string, unknown> = {}, options?: CallOptions): Promise<InvocationResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw protocolError('tool_not_found', `Unknown tool: ${name}`);
    }
    return tool.invoke(args, options);
  }
}

export interface CatalogTool extends AdaptedTool {
  server: string;
}

export interface CatalogFailure {
  server: string;
  error: AppError;
}

export interface CatalogRefresh {
  tools: CatalogTool[];
  failures: CatalogFailure[];
}

// This class aggregates the adapters of several servers into one namespace; the first server to expose a name keeps it.
export class ToolCatalog {
  private readonly adapters = new Map<string, ToolAdapter>();
  private readonly logger?: StructuredLogger;
  private tools = new Map<string, CatalogTool>();

  public constructor(options?: ToolAdapterOptions) {
    this.logger = options?.logger?.child({ component: 'mcp_tool_catalog' });
  }

  public addServer(server: string, adapter: ToolAdapter): void {
    if (this.adapters.has(server)) {
      throw new AppError(409, 'catalog_duplicate_server', `Server ${server} is already part of the catalog.`);
    }
    this.adapters.set(server, adapter);
  }

  // Unreachable servers are reported in failures and leave the remaining servers usable.
  public async refresh(options?: CallOptions): Promise<CatalogRefresh> {
    const next = new Map<string, CatalogTool>();
    const failures: CatalogFailure[] = [];

    for (const [server, adapter] of this.adapters) {
      let tools: AdaptedTool[];
      try {
        tools = await adapter.discover(options);
      } catch (error) {
        this.logger?.warn({ event: 'mcp_catalog_server_failed', server, error: errorForLog(error) }, 'mcp_catalog_server_failed');
        failures.push({ server, error: normalizeError(error) });
        continue;
      }

      for (const tool of tools) {
        const owner = next.get(tool.name);
        if (owner) {
          this.logger?.warn(
            { event: 'mcp_catalog_tool_shadowed', toolName: tool.name, server, keptServer: owner.server },
            'mcp_catalog_tool_shadowed'
          );
          continue;
        }
        next.set(tool.name, { ...tool, server });
      }
    }

    this.tools = next;
    return { tools: this.list(), failures };
  }

  public list(): CatalogTool[] {
    return [...this.tools.values()];
  }

  public async invoke(name: string, args: Record<string, unknown> = {}, options?: CallOptions): Promise<InvocationResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw protocolError('tool_not_found', `Unknown tool: ${name}`);
    }
    return tool.invoke(args, options);
  }
}
