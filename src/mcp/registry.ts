// This module owns the tool registry: descriptors for discovery plus validated executor invocation.

import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { InvocationResult, JsonRpcId, ToolDescriptor } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import type { StructuredLogger } from '../utils/logger.js';
import { toolInputSchemaSchema } from './codec.js';

const TOOL_NAME_PATTERN = /^[A-Za-z0-9_.-]{1,128}$/;

export interface ToolExecutionContext {
  toolName: string;
  requestId: JsonRpcId;
  sessionId: string;
  logger: StructuredLogger;
}

export interface ToolDefinition<TArgs extends Record<string, unknown>> {
  name: string;
  description: string;
  inputSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  execute(args: TArgs, context: ToolExecutionContext): Promise<InvocationResult> | InvocationResult;
}

export type ArgumentCheck =
  | { ok: true; run(context: ToolExecutionContext): Promise<InvocationResult> }
  | { ok: false; error: z.ZodError };

export interface RegisteredTool {
  descriptor: ToolDescriptor;
  checkArguments(args: unknown): ArgumentCheck;
}

// This helper exports one zod input schema as the JSON Schema published through tools/list.
function describeInputSchema(name: string, schema: z.ZodTypeAny): ToolDescriptor['inputSchema'] {
  const parsed = toolInputSchemaSchema.safeParse(zodToJsonSchema(schema, { $refStrategy: 'none' }));
  if (!parsed.success) {
    throw new AppError(
      500,
      'registry_invalid_schema',
      `Tool ${name} has an input schema that is not a JSON object schema.`,
      parsed.error.flatten()
    );
  }
  return parsed.data;
}

// This class maps tool names to descriptors and executors; it is populated at startup and sealed before serving.
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private sealed = false;

  public get size(): number {
    return this.tools.size;
  }

  public get isSealed(): boolean {
    return this.sealed;
  }

  public register<TArgs extends Record<string, unknown>>(definition: ToolDefinition<TArgs>): ToolDescriptor {
    if (this.sealed) {
      throw new AppError(409, 'registry_sealed', `Cannot register ${definition.name}: the registry is sealed.`);
    }

    if (!TOOL_NAME_PATTERN.test(definition.name)) {
      throw new AppError(400, 'registry_invalid_name', `Invalid tool name: ${JSON.stringify(definition.name)}`);
    }

    if (this.tools.has(definition.name)) {
      throw new AppError(409, 'registry_duplicate_name', `Tool ${definition.name} is already registered.`);
    }

    const descriptor: ToolDescriptor = Object.freeze({
      name: definition.name,
      description: definition.description,
      inputSchema: describeInputSchema(definition.name, definition.inputSchema)
    });

    this.tools.set(definition.name, {
      descriptor,
      checkArguments: (args) => {
        const parsed = definition.inputSchema.safeParse(args);
        if (!parsed.success) {
          return { ok: false, error: parsed.error };
        }

        // The executor only ever sees arguments that passed the schema.
        return {
          ok: true,
          run: async (context) => definition.execute(parsed.data, context)
        };
      }
    });

    return descriptor;
  }

  // No further registrations are accepted once the server starts serving.
  public seal(): void {
    this.sealed = true;
  }

  public has(name: string): boolean {
    return this.tools.has(name);
  }

  public get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  // This method returns descriptors in registration order; executors are never part of the snapshot.
  public listTools(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => tool.descriptor);
  }
}
