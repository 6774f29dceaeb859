import { describe, it, expect, beforeEach } from 'vitest';
import { ChatSession } from './chat-session.js';
import { ToolweaveConfigSchema, type McpServerConfig, type ToolweaveConfig } from '../config/config-manager.js';
import { ConfigurationError } from '../agent/errors.js';
import type { Logger } from '../logging/logger.js';
import {
  FakeRemoteServer,
  ScriptedCompletionClient,
  call,
  textResponse,
  toolCallResponse,
} from '../../test/support/fakes.js';
import { createTestLogger } from '../../test/support/test-logger.js';

describe('ChatSession', () => {
  let logger: Logger;
  let config: ToolweaveConfig;
  let servers: Map<string, FakeRemoteServer>;
  let connectOrder: string[];

  const connectServer = async (server: McpServerConfig): Promise<FakeRemoteServer> => {
    connectOrder.push(server.name);
    if (server.name === 'broken') {
      throw new Error('spawn fake-server ENOENT');
    }
    const remote = new FakeRemoteServer(server.name, ['read_file']);
    servers.set(server.name, remote);
    return remote;
  };

  beforeEach(() => {
    logger = createTestLogger();
    servers = new Map();
    connectOrder = [];
    config = ToolweaveConfigSchema.parse({
      agent: { maxIterations: 5 },
      mcpServers: [
        { name: 'files', command: 'fake-server' },
        { name: 'archive', command: 'fake-server', enabled: false },
        { name: 'broken', command: 'fake-server' },
        { name: 'notes', command: 'fake-server' },
      ],
    });
  });

  it('should register the search meta-tool as the only loaded tool', async () => {
    const session = await ChatSession.create(config, {
      completionClient: new ScriptedCompletionClient([]),
      connectServer,
      logger,
    });

    expect(session.toolManager.getActiveTools().map((tool) => tool.name)).toEqual(['search_tools']);
    expect(session.toolManager.listRegistrations().map((registration) => registration.definition.name)).toEqual([
      'greeting',
      'current_time',
      'search_tools',
    ]);
    expect(session.toolManager.getActiveTools()[0]?.parameters.properties?.['category']?.enum).toEqual(['general']);
    await session.close();
  });

  it('should connect enabled servers in order and report failures', async () => {
    const session = await ChatSession.create(config, {
      completionClient: new ScriptedCompletionClient([]),
      connectServer,
      logger,
    });

    expect(connectOrder).toEqual(['files', 'broken', 'notes']);
    expect(session.connectedServers).toEqual(['files', 'notes']);
    expect(session.failedServers).toEqual([{ name: 'broken', error: 'spawn fake-server ENOENT' }]);
    await session.close();
  });

  it('should require an API key when no completion client is given', async () => {
    const attempt = ChatSession.create(config, { connectServer, logger, env: {} });

    await expect(attempt).rejects.toBeInstanceOf(ConfigurationError);
    await expect(ChatSession.create(config, { connectServer, logger, env: {} })).rejects.toThrow(
      'Environment variable OPENAI_API_KEY is not set'
    );
  });

  it('should discover and run a built-in tool within one turn', async () => {
    const client = new ScriptedCompletionClient([
      toolCallResponse(call('s1', 'search_tools', { query: 'say hello' })),
      toolCallResponse(call('g1', 'greeting', { name: 'Ada' })),
      textResponse('Greeted Ada.'),
    ]);
    const session = await ChatSession.create(config, { completionClient: client, connectServer, logger });

    const result = await session.send('Say hello to Ada');

    expect(result).toMatchObject({ status: 'final', content: 'Greeted Ada.', iterations: 3 });
    expect(client.toolNamesOfRequest(1)).toEqual(['search_tools', 'greeting', 'read_file', 'read_file']);
    expect(client.requests[2]?.messages.at(-1)).toEqual({ role: 'tool', toolCallId: 'g1', content: 'Hello, Ada' });
    await session.close();
  });

  it('should run remote calls through its executor', async () => {
    const client = new ScriptedCompletionClient([toolCallResponse(call('r1', 'read_file')), textResponse('read')]);
    const session = await ChatSession.create(config, { completionClient: client, connectServer, logger });

    await session.send('Read a file');

    expect(servers.get('files')?.calls).toEqual([{ name: 'read_file', args: {} }]);
    expect(servers.get('notes')?.calls).toEqual([]);
    await session.close();
  });

  it('should close a server whose id is already taken', async () => {
    const connected: FakeRemoteServer[] = [];
    const duplicated = ToolweaveConfigSchema.parse({ mcpServers: [{ name: 'files', command: 'fake-server' }] });
    duplicated.mcpServers.push({ name: 'files', command: 'other-server', args: [], enabled: true });

    const session = await ChatSession.create(duplicated, {
      completionClient: new ScriptedCompletionClient([]),
      connectServer: async (server) => {
        const remote = new FakeRemoteServer(server.name, ['read_file']);
        connected.push(remote);
        return remote;
      },
      logger,
    });

    expect(session.connectedServers).toEqual(['files']);
    expect(session.failedServers).toEqual([{ name: 'files', error: "Remote server 'files' is already registered" }]);
    expect(connected.map((remote) => remote.closed)).toEqual([false, true]);
    await session.close();
  });

  it('should unload searched tools and forget the conversation on reset', async () => {
    const client = new ScriptedCompletionClient([textResponse('hi')]);
    const session = await ChatSession.create(config, { completionClient: client, connectServer, logger });
    session.toolManager.loadTools(['greeting']);
    await session.send('Hello');

    await session.reset();

    expect(session.agent.getMessages()).toEqual([]);
    expect(session.toolManager.getActiveTools().map((tool) => tool.name)).toEqual(['search_tools']);
    await session.close();
  });

  it('should close its servers and refuse further turns', async () => {
    const session = await ChatSession.create(config, {
      completionClient: new ScriptedCompletionClient([]),
      connectServer,
      logger,
    });

    await session.close();

    expect(servers.get('files')?.closed).toBe(true);
    expect(servers.get('notes')?.closed).toBe(true);
    expect(session.isClosed).toBe(true);
    expect(session.executor.isClosed).toBe(true);
    await expect(session.send('Hello')).rejects.toThrow('Session has been closed');
  });
});
