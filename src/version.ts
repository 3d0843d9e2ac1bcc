// This module centralizes server identity values so protocol metadata and routes stay in sync.

export const MCP_SERVER_NAME = 'toolgate';
export const MCP_SERVER_VERSION = '0.3.0';
export const MCP_PROTOCOL_VERSION = '2025-03-26';

// Newest first; the first entry is what clients request by default.
export const SUPPORTED_PROTOCOL_VERSIONS: readonly string[] = [MCP_PROTOCOL_VERSION, '2024-11-05'];

export const MCP_SESSION_HEADER = 'mcp-session-id';
export const MCP_PROTOCOL_HEADER = 'mcp-protocol-version';
