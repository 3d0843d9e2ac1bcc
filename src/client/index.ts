// This module is the public entry for upstream callers that consume remote tools.

export { McpClient, type CallOptions, type McpClientOptions } from './client.js';
export { ClientSession } from './session.js';
export {
  DEFAULT_TIMEOUT_MS,
  HttpTransportClient,
  type FetchLike,
  type HttpTransportOptions,
  type TransportClient,
  type TransportReply,
  type TransportSendOptions
} from './transport.js';
export { buildArgumentsValidator, describeParameters, type ToolParameter } from './json-schema.js';
export {
  ToolAdapter,
  ToolCatalog,
  resultText,
  type AdaptedTool,
  type CatalogFailure,
  type CatalogRefresh,
  type CatalogTool,
  type ToolInvoker
} from './adapter.js';
export { AppError, RemoteProtocolError, TransportError } from '../utils/errors.js';
export type { InvocationResult, ToolDescriptor, ToolInputSchema } from '../types/mcp.js';
