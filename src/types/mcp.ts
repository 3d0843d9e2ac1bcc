// This file defines the JSON-RPC envelope and MCP tool payload types shared by server and client.

export type JsonRpcId = string | number;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccess {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  error: JsonRpcError;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export type Envelope = JsonRpcRequest | JsonRpcResponse;

export type McpMethod = 'initialize' | 'ping' | 'tools/list' | 'tools/call';

export interface JsonSchemaProperty {
  type?: string | string[];
  description?: string;
  enum?: unknown[];
  items?: JsonSchemaProperty;
  properties?: Record<string, JsonSchemaProperty>;
  required?: string[];
  [keyword: string]: unknown;
}

export interface ToolInputSchema {
  type: 'object';
  properties?: Record<string, JsonSchemaProperty>;
  required?: string[];
  [keyword: string]: unknown;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ErrorContent {
  type: 'error';
  error: {
    code: string;
    message: string;
    data?: unknown;
  };
}

export type ContentItem = TextContent | ErrorContent;

// A result with isError set is still a protocol success: the call ran and its operation failed.
export interface InvocationResult {
  content: ContentItem[];
  isError?: boolean;
  structuredContent?: Record<string, unknown>;
}

export interface ImplementationInfo {
  name: string;
  version: string;
}

export interface InitializeParams {
  protocolVersion: string;
  capabilities?: Record<string, unknown>;
  clientInfo: ImplementationInfo;
}

export interface ServerCapabilities {
  tools: {
    listChanged: boolean;
  };
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: ServerCapabilities;
  serverInfo: ImplementationInfo;
}
