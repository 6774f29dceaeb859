/**
 * MCP - remote tool servers over the Model Context Protocol
 */

export { McpServerClient, formatCallToolResult, type McpServerClientOptions } from './mcp-server-client.js';
export type { RemoteToolInfo, RemoteToolServer } from './remote-tool-server.js';
