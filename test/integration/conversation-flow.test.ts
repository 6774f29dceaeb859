/**
 * Integration tests for a whole conversation: configuration file, session,
 * lazy tool discovery, local tools and MCP servers over in-memory transports
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { ConfigManager, type McpServerConfig, type ToolweaveConfig } from '../../src/config/config-manager.js';
import { ChatSession } from '../../src/session/chat-session.js';
import { McpServerClient } from '../../src/mcp/mcp-server-client.js';
import type { Logger } from '../../src/logging/logger.js';
import type { CompletionRequest } from '../../src/llm/completion-client.js';
import { ScriptedCompletionClient, call, textResponse, toolCallResponse } from '../support/fakes.js';
import { createTestLogger } from '../support/test-logger.js';

/**
 * Word-lookup MCP server; `spell` fails on purpose
 */
function createWordServer(name: string, toolNames: string[]): Server {
  const server = new Server({ name, version: '1.0.0' }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toolNames.map((toolName) => ({
      name: toolName,
      description: `${toolName} a word`,
      inputSchema: { type: 'object', properties: { word: { type: 'string' } }, required: ['word'] },
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    if (request.params.name === 'spell') {
      throw new Error('speller offline');
    }
    const word = String(request.params.arguments?.['word']);
    return { content: [{ type: 'text', text: `${name}: ${word}` }] };
  });

  return server;
}

describe('Conversation flow', () => {
  let tempDir: string;
  let logger: Logger;
  let config: ToolweaveConfig;
  let mcpServers: Server[];
  let mcpClients: McpServerClient[];

  const advertised: Record<string, string[]> = {
    dictionary: ['define', 'spell'],
    thesaurus: ['define'],
  };

  const connectServer = async (server: McpServerConfig, serverLogger: Logger): Promise<McpServerClient> => {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const mcpServer = createWordServer(server.name, advertised[server.name] ?? []);
    await mcpServer.connect(serverTransport);
    mcpServers.push(mcpServer);

    const client = new McpServerClient({ name: server.name, transport: clientTransport }, serverLogger);
    await client.connect();
    mcpClients.push(client);
    return client;
  };

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'toolweave-integration-test-'));
    const configPath = join(tempDir, 'config.json');
    await writeFile(
      configPath,
      JSON.stringify({
        agent: { model: 'test-model', maxIterations: 6 },
        mcpServers: [
          { name: 'dictionary', command: 'dictionary-server' },
          { name: 'thesaurus', command: 'thesaurus-server' },
        ],
        logging: { level: 'debug', path: join(tempDir, 'toolweave.log') },
      })
    );

    const configManager = new ConfigManager(configPath);
    const result = await configManager.load();
    expect(result.success).toBe(true);
    config = configManager.config;

    logger = createTestLogger();
    mcpServers = [];
    mcpClients = [];
  });

  afterEach(async () => {
    await Promise.all(mcpServers.map((server) => server.close()));
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should discover a tool, use it, route an ambiguous remote call and finish', async () => {
    const completions = new ScriptedCompletionClient([
      toolCallResponse(call('c1', 'search_tools', { query: 'greet someone' })),
      toolCallResponse(call('c2', 'greeting', { name: 'Ada' })),
      toolCallResponse(call('c3', 'define', { word: 'tool' })),
      textResponse('Finished'),
    ]);
    const session = await ChatSession.create(config, { completionClient: completions, connectServer, logger });
    const resolverCalls: Array<[string, string[]]> = [];
    const toolCalls: string[] = [];

    const result = await session.send('Greet Ada, then define "tool"', {
      events: { onToolCall: (toolCall) => toolCalls.push(toolCall.name) },
      resolver: (toolName, origins) => {
        resolverCalls.push([toolName, origins]);
        return 'thesaurus';
      },
    });

    expect(result).toMatchObject({ status: 'final', content: 'Finished', iterations: 4 });
    expect(toolCalls).toEqual(['search_tools', 'greeting', 'define']);
    expect(resolverCalls).toEqual([['define', ['dictionary', 'thesaurus']]]);

    expect(completions.toolNamesOfRequest(0)).toEqual(['search_tools', 'define', 'spell', 'define']);
    expect(completions.toolNamesOfRequest(1)).toEqual(['search_tools', 'greeting', 'define', 'spell', 'define']);
    expect(completions.requests.every((request: CompletionRequest) => request.model === 'test-model')).toBe(true);

    const toolMessages = session.agent.getMessages().filter((message) => message.role === 'tool');
    expect(toolMessages.map((message) => (message.role === 'tool' ? message.content : ''))).toEqual([
      JSON.stringify(
        [{ name: 'greeting', description: 'Greet someone by name.', category: 'general', score: 1.5 }],
        null,
        2
      ),
      'Hello, Ada',
      '[{"type":"text","text":"thesaurus: tool"}]',
    ]);

    await session.close();
  });

  it('should take the first server offering a tool when no resolver is given', async () => {
    const completions = new ScriptedCompletionClient([
      toolCallResponse(call('c1', 'define', { word: 'lamp' })),
      textResponse('Defined'),
    ]);
    const session = await ChatSession.create(config, { completionClient: completions, connectServer, logger });
    const origins: Array<string | null> = [];

    await session.send('Define lamp', { events: { onToolResult: (_call, _result, origin) => origins.push(origin) } });

    expect(origins).toEqual(['dictionary']);
    await session.close();
  });

  it('should keep going after a failing remote tool and an unknown tool', async () => {
    const completions = new ScriptedCompletionClient([
      toolCallResponse(call('c1', 'spell', { word: 'recieve' }), call('c2', 'translate', { word: 'lamp' })),
      textResponse('Could not check the spelling'),
    ]);
    const session = await ChatSession.create(config, { completionClient: completions, connectServer, logger });

    const result = await session.send('Spell recieve');

    expect(result.status).toBe('final');
    const [spellResult, missingResult] = session.agent
      .getMessages()
      .flatMap((message) => (message.role === 'tool' ? [message.content] : []));
    expect(spellResult).toMatch(/^Error: Tool 'spell' failed: /);
    expect(missingResult).toBe("Error: Tool 'translate' not found in available tools.");
    await session.close();
  });

  it('should disconnect every MCP server when the session closes', async () => {
    const session = await ChatSession.create(config, {
      completionClient: new ScriptedCompletionClient([]),
      connectServer,
      logger,
    });
    expect(session.connectedServers).toEqual(['dictionary', 'thesaurus']);

    await session.close();

    expect(mcpClients.map((client) => client.connected)).toEqual([false, false]);
    expect(session.connectedServers).toEqual([]);
  });
});
