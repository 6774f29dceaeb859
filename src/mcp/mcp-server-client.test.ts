import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { McpServerClient, formatCallToolResult } from './mcp-server-client.js';
import { ConfigurationError } from '../agent/errors.js';
import { createTestLogger } from '../../test/support/test-logger.js';

function createFakeServer(): Server {
  const server = new Server({ name: 'fake-files', version: '1.0.0' }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'read_note',
        description: 'Read a note by title',
        inputSchema: { type: 'object', properties: { title: { type: 'string' } }, required: ['title'] },
      },
      {
        name: 'list_notes',
        inputSchema: { type: 'object', properties: {} },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    if (request.params.name === 'read_note') {
      const title = request.params.arguments?.['title'];
      return { content: [{ type: 'text', text: `Contents of ${String(title)}` }] };
    }
    return { content: [{ type: 'text', text: 'shopping' }, { type: 'text', text: 'ideas' }] };
  });

  return server;
}

describe('McpServerClient', () => {
  let server: Server;
  let client: McpServerClient;

  beforeEach(async () => {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    server = createFakeServer();
    await server.connect(serverTransport);
    client = new McpServerClient({ name: 'notes', transport: clientTransport }, createTestLogger());
    await client.connect();
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it('should cache the advertised tools on connect', () => {
    expect(client.connected).toBe(true);
    expect(client.id).toBe('notes');
    expect(client.tools).toEqual([
      {
        name: 'read_note',
        description: 'Read a note by title',
        parameters: { type: 'object', properties: { title: { type: 'string' } }, required: ['title'] },
      },
      {
        name: 'list_notes',
        description: '',
        parameters: { type: 'object', properties: {} },
      },
    ]);
  });

  it('should return text content as a JSON list', async () => {
    const result = await client.callTool('read_note', { title: 'groceries' });

    expect(JSON.parse(result)).toEqual([{ type: 'text', text: 'Contents of groceries' }]);
  });

  it('should keep every content item in order', async () => {
    const result = await client.callTool('list_notes', {});

    expect(result).toBe('[{"type":"text","text":"shopping"},{"type":"text","text":"ideas"}]');
  });

  it('should forget its tools after close', async () => {
    await client.close();

    expect(client.connected).toBe(false);
    expect(client.tools).toEqual([]);
    await expect(client.callTool('list_notes', {})).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('McpServerClient without a command', () => {
  it('should refuse to connect', async () => {
    const client = new McpServerClient({ name: 'broken' }, createTestLogger());

    await expect(client.connect()).rejects.toThrow("MCP server 'broken' has no command to launch");
  });
});

describe('McpServerClient against a server without tools', () => {
  it('should close the connection when the tool listing fails', async () => {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const server = new Server({ name: 'no-tools', version: '1.0.0' }, { capabilities: {} });
    let serverClosed = false;
    server.onclose = () => {
      serverClosed = true;
    };
    await server.connect(serverTransport);
    const client = new McpServerClient({ name: 'empty', transport: clientTransport }, createTestLogger());

    await expect(client.connect()).rejects.toThrow();

    expect(client.connected).toBe(false);
    expect(client.tools).toEqual([]);
    expect(serverClosed).toBe(true);
  });
});

describe('formatCallToolResult', () => {
  it('should serialize non-text items', () => {
    const result = formatCallToolResult({
      content: [{ type: 'image', data: 'aGk=', mimeType: 'image/png' }],
    });

    expect(JSON.parse(result)).toEqual(['{"type":"image","data":"aGk=","mimeType":"image/png"}']);
  });

  it('should serialize a result without content', () => {
    expect(formatCallToolResult({ toolResult: 7 })).toBe('{"toolResult":7}');
  });
});
