import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { Logger } from '../logging/logger.js';
import { ConfigurationError } from '../agent/errors.js';
import type { RemoteToolInfo, RemoteToolServer } from './remote-tool-server.js';

export interface McpServerClientOptions {
  /** Origin id of the server's tools */
  name: string;
  command?: string;
  args?: string[];
  /** Use an existing transport instead of spawning `command` */
  transport?: Transport;
}

const CLIENT_INFO = { name: 'toolweave', version: '0.1.0' };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turns a tools/call result into the text handed back to the model: a JSON
 * array with `{type, text}` for text items and the serialized item otherwise.
 */
export function formatCallToolResult(result: unknown): string {
  const content: unknown = isRecord(result) ? result['content'] : undefined;
  if (!Array.isArray(content)) {
    return typeof result === 'string' ? result : JSON.stringify(result);
  }

  const items = content.map((item: unknown) => {
    if (isRecord(item) && typeof item['text'] === 'string') {
      return { type: item['type'], text: item['text'] };
    }
    return JSON.stringify(item);
  });
  return JSON.stringify(items);
}

async function listRemoteTools(client: Client): Promise<RemoteToolInfo[]> {
  const result = await client.listTools();
  return result.tools.map((tool) => ({
    name: tool.name,
    description: tool.description ?? '',
    parameters: { ...tool.inputSchema },
  }));
}

/**
 * McpServerClient - One Model Context Protocol server seen as a RemoteToolServer.
 *
 * `connect` spawns the configured command over stdio (or uses the given
 * transport), performs the handshake and caches the advertised tools.
 */
export class McpServerClient implements RemoteToolServer {
  readonly id: string;
  tools: RemoteToolInfo[] = [];
  private client: Client | null = null;
  private options: McpServerClientOptions;
  private logger: Logger;

  constructor(options: McpServerClientOptions, logger?: Logger) {
    this.id = options.name;
    this.options = options;
    this.logger = (logger ?? new Logger()).child({ component: 'mcp-client', server: options.name });
  }

  get connected(): boolean {
    return this.client !== null;
  }

  async connect(): Promise<void> {
    const transport = this.options.transport ?? this.createStdioTransport();
    const client = new Client(CLIENT_INFO);
    await client.connect(transport);

    let tools: RemoteToolInfo[];
    try {
      tools = await listRemoteTools(client);
    } catch (error) {
      await client.close();
      throw error;
    }
    this.client = client;
    this.tools = tools;
    await this.logger.info('Connected to MCP server', { tools: this.tools.map((tool) => tool.name) });
  }

  private createStdioTransport(): Transport {
    if (!this.options.command) {
      throw new ConfigurationError(`MCP server '${this.id}' has no command to launch`);
    }
    return new StdioClientTransport({ command: this.options.command, args: this.options.args ?? [] });
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new ConfigurationError(`MCP server '${this.id}' is not connected`);
    }
    return this.client;
  }

  async fetchTools(): Promise<RemoteToolInfo[]> {
    this.tools = await listRemoteTools(this.requireClient());
    return this.tools;
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<string> {
    const result = await this.requireClient().callTool({ name, arguments: args });
    return formatCallToolResult(result);
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.tools = [];
    if (client) {
      await client.close();
      await this.logger.info('Disconnected from MCP server');
    }
  }
}
