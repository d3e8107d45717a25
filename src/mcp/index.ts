/**
 * MCP server exports.
 */

// Server
export { McpServer, startMcpServer, ErrorCodes, PROTOCOL_VERSION } from './server.js';
export type { McpServerConfig, McpResponse } from './server.js';

// Tools
export { ToolCatalog, createToolCatalog, createTools, toToolResult } from './tools.js';
export type { ToolDefinition, ToolResult, ToolStatus, ToolError } from './tools.js';
