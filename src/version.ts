// This module centralizes server identity values so protocol metadata and tools stay in sync.

export const MCP_SERVER_NAME = 'mcp-website-fetcher';
export const MCP_SERVER_VERSION = '0.1.0';
export const MCP_PROTOCOL_VERSION = '2025-03-26';

// This value identifies outbound fetches to the sites being read.
export const DEFAULT_USER_AGENT = `${MCP_SERVER_NAME}/${MCP_SERVER_VERSION}`;
