// This module centralizes server identity values so protocol metadata, discovery, and health output stay in sync.

export const MCP_SERVER_NAME = 'pet-adoption-mcp';
export const MCP_SERVER_VERSION = '2.0.0';
export const MCP_PROTOCOL_VERSION = '2025-06-18';
export const MCP_SERVER_DESCRIPTION = 'Pet adoption catalog with REST endpoints and MCP tool integration';
