// This module encodes and decodes JSON-RPC envelopes and validates MCP payload shapes on the wire.

import { z } from 'zod';
import type { Envelope, JsonRpcId, JsonRpcRequest, JsonRpcResponse, JsonSchemaProperty } from '../types/mcp.js';
import { protocolError } from './rpc-errors.js';

const idSchema = z.union([z.string(), z.number().finite()]);

const requestSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: idSchema,
    method: z.string().min(1),
    params: z.record(z.unknown()).optional()
  })
  .strict();

const successSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: idSchema,
    result: z.unknown()
  })
  .strict();

const failureSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: z.union([idSchema, z.null()]),
    error: z
      .object({
        code: z.number().int(),
        message: z.string(),
        data: z.unknown()
      })
      .strict()
  })
  .strict();

export const jsonSchemaPropertySchema: z.ZodType<JsonSchemaProperty> = z.lazy(() =>
  z
    .object({
      type: z.union([z.string(), z.array(z.string())]).optional(),
      description: z.string().optional(),
      enum: z.array(z.unknown()).optional(),
      items: jsonSchemaPropertySchema.optional(),
      properties: z.record(jsonSchemaPropertySchema).optional(),
      required: z.array(z.string()).optional()
    })
    .passthrough()
);

export const toolInputSchemaSchema = z
  .object({
    type: z.literal('object'),
    properties: z.record(jsonSchemaPropertySchema).optional(),
    required: z.array(z.string()).optional()
  })
  .passthrough();

export const toolDescriptorSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  inputSchema: toolInputSchemaSchema
});

export const toolListResultSchema = z.object({
  tools: z.array(toolDescriptorSchema)
});

const contentItemSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({
    type: z.literal('error'),
    error: z.object({ code: z.string(), message: z.string(), data: z.unknown() })
  })
]);

export const invocationResultSchema = z.object({
  content: z.array(contentItemSchema),
  isError: z.boolean().optional(),
  structuredContent: z.record(z.unknown()).optional()
});

export const initializeResultSchema = z.object({
  protocolVersion: z.string().min(1),
  capabilities: z.object({
    tools: z.object({ listChanged: z.boolean() })
  }),
  serverInfo: z.object({ name: z.string(), version: z.string() })
});

// This helper serializes one envelope into its JSON wire form.
export function encodeEnvelope(envelope: Envelope): string {
  return JSON.stringify(envelope);
}

// This helper parses raw wire text and reports malformed JSON as a protocol parse error.
export function parseWireText(raw: string | Buffer): unknown {
  const text = typeof raw === 'string' ? raw : raw.toString('utf8');

  try {
    return JSON.parse(text);
  } catch (error) {
    throw protocolError('parse_error', 'Request body is not valid JSON.', {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
  }
}

// This helper reads a correlation id from a payload that may fail envelope validation.
export function peekEnvelopeId(value: unknown): JsonRpcId | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || !('id' in value)) {
    return null;
  }

  const parsed = idSchema.safeParse(value.id);
  return parsed.success ? parsed.data : null;
}

// This function validates an already-parsed JSON value as exactly one request or response envelope.
export function decodeEnvelopeValue(value: unknown): Envelope {
  if (Array.isArray(value)) {
    throw protocolError('invalid_request', 'Batch requests are not supported.');
  }

  if (typeof value !== 'object' || value === null) {
    throw protocolError('invalid_request', 'Envelope must be a JSON object.');
  }

  if ('method' in value) {
    const parsed = requestSchema.safeParse(value);
    if (!parsed.success) {
      throw protocolError('invalid_request', 'Invalid JSON-RPC request object.', parsed.error.flatten());
    }

    const { jsonrpc, id, method, params } = parsed.data;
    return params === undefined ? { jsonrpc, id, method } : { jsonrpc, id, method, params };
  }

  if ('error' in value) {
    const parsed = failureSchema.safeParse(value);
    if (!parsed.success) {
      throw protocolError('invalid_request', 'Invalid JSON-RPC error response.', parsed.error.flatten());
    }

    const { code, message, data } = parsed.data.error;
    return {
      jsonrpc: parsed.data.jsonrpc,
      id: parsed.data.id,
      error: 'data' in parsed.data.error ? { code, message, data } : { code, message }
    };
  }

  if ('result' in value) {
    const parsed = successSchema.safeParse(value);
    if (!parsed.success) {
      throw protocolError('invalid_request', 'Invalid JSON-RPC result response.', parsed.error.flatten());
    }

    return { jsonrpc: parsed.data.jsonrpc, id: parsed.data.id, result: parsed.data.result };
  }

  throw protocolError('invalid_request', 'Envelope must carry a method, a result or an error.');
}

// This function decodes raw wire text into one envelope.
export function decodeEnvelope(raw: string | Buffer): Envelope {
  return decodeEnvelopeValue(parseWireText(raw));
}

export function isRequestEnvelope(envelope: Envelope): envelope is JsonRpcRequest {
  return 'method' in envelope;
}

// This helper validates a parsed value that must be a request, as the server receives it.
export function decodeRequestValue(value: unknown): JsonRpcRequest {
  const envelope = decodeEnvelopeValue(value);
  if (!isRequestEnvelope(envelope)) {
    throw protocolError('invalid_request', 'Expected a JSON-RPC request envelope.');
  }
  return envelope;
}

export function decodeRequest(raw: string | Buffer): JsonRpcRequest {
  return decodeRequestValue(parseWireText(raw));
}

// This helper decodes wire text that must be a response, as the client receives it.
export function decodeResponse(raw: string | Buffer): JsonRpcResponse {
  const envelope = decodeEnvelope(raw);
  if (isRequestEnvelope(envelope)) {
    throw protocolError('invalid_request', 'Expected a JSON-RPC response envelope.');
  }
  return envelope;
}
