import { randomUUID } from 'node:crypto';
import { Logger } from '../logging/logger.js';
import { expandHome, type McpServerConfig, type ToolweaveConfig } from '../config/config-manager.js';
import { ChatAgent, type AgentRunOptions, type AgentRunResult } from '../agent/agent.js';
import { SerialExecutor } from '../agent/executor.js';
import { ConfigurationError, describeError } from '../agent/errors.js';
import { ToolManager } from '../tools/tool-manager.js';
import { SEARCH_TOOLS_NAME, createSearchToolDefinition, createSearchToolFunction } from '../tools/search-tool.js';
import { registerBuiltinTools, type BuiltinToolsOptions } from '../tools/builtin-tools.js';
import type { CompletionClient } from '../llm/completion-client.js';
import { OpenAICompletionClient } from '../llm/openai-client.js';
import { OpenAIEmbeddingProvider, type EmbeddingProvider } from '../embedding/embedding-provider.js';
import { McpServerClient } from '../mcp/mcp-server-client.js';
import type { RemoteToolServer } from '../mcp/remote-tool-server.js';

/**
 * Collaborators a session would otherwise build from configuration
 */
export interface ChatSessionDeps {
  completionClient?: CompletionClient;
  /** `null` disables semantic search even when an embedding model is configured */
  embeddingProvider?: EmbeddingProvider | null;
  connectServer?: (config: McpServerConfig, logger: Logger) => Promise<RemoteToolServer>;
  builtinTools?: BuiltinToolsOptions;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export interface ServerConnectionFailure {
  name: string;
  error: string;
}

async function connectMcpServer(config: McpServerConfig, logger: Logger): Promise<RemoteToolServer> {
  const client = new McpServerClient({ name: config.name, command: config.command, args: config.args }, logger);
  await client.connect();
  return client;
}

/**
 * Builds a logger from the `logging` section
 */
export function createLogger(config: ToolweaveConfig): Logger {
  return new Logger({
    level: config.logging.level,
    path: expandHome(config.logging.path),
    maxSize: config.logging.maxSize,
    maxFiles: config.logging.maxFiles,
  });
}

/**
 * ChatSession - One conversation with everything it owns: the tool manager,
 * the agent, its remote servers and the executor that runs remote calls.
 *
 * Nothing here is process-wide; `close` tears all of it down.
 */
export class ChatSession {
  readonly id: string;
  readonly agent: ChatAgent;
  readonly toolManager: ToolManager;
  readonly executor: SerialExecutor;
  private failures: ServerConnectionFailure[] = [];
  private logger: Logger;
  private closed = false;

  private constructor(agent: ChatAgent, toolManager: ToolManager, executor: SerialExecutor, logger: Logger) {
    this.id = randomUUID();
    this.agent = agent;
    this.toolManager = toolManager;
    this.executor = executor;
    this.logger = logger.child({ component: 'session', sessionId: this.id });
  }

  /**
   * Registers the search meta-tool (always loaded) and the built-in tools,
   * then connects every enabled MCP server in configured order. A server that
   * fails to connect is logged and reported through {@link failedServers}.
   */
  static async create(config: ToolweaveConfig, deps: ChatSessionDeps = {}): Promise<ChatSession> {
    const logger = deps.logger ?? createLogger(config);
    const env = deps.env ?? process.env;
    const apiKey = env[config.agent.apiKeyEnv];

    let completionClient = deps.completionClient;
    if (!completionClient) {
      if (!apiKey) {
        throw new ConfigurationError(`Environment variable ${config.agent.apiKeyEnv} is not set`);
      }
      completionClient = new OpenAICompletionClient({ apiKey, baseUrl: config.agent.baseUrl });
    }

    let embeddingProvider = deps.embeddingProvider;
    if (embeddingProvider === undefined) {
      embeddingProvider =
        config.toolSearch.embeddingModel && apiKey
          ? new OpenAIEmbeddingProvider({
              model: config.toolSearch.embeddingModel,
              apiKey,
              baseUrl: config.agent.baseUrl,
            })
          : null;
    }

    const toolManager = new ToolManager(
      {
        search: {
          similarityFloor: config.toolSearch.similarityFloor,
          semanticActivationThreshold: config.toolSearch.semanticActivationThreshold,
          keywordActivationThreshold: config.toolSearch.keywordActivationThreshold,
          topK: config.toolSearch.topK,
        },
        ...(embeddingProvider ? { embeddingProvider } : {}),
      },
      logger
    );
    const executor = new SerialExecutor({ timeoutMs: config.executor.timeoutMs }, logger);
    const agent = new ChatAgent(
      { completionClient, toolManager, executor, logger },
      {
        model: config.agent.model,
        maxIterations: config.agent.maxIterations,
        toolErrorPolicy: config.agent.toolErrorPolicy,
        ...(config.agent.systemPrompt ? { systemPrompt: config.agent.systemPrompt } : {}),
      }
    );

    await registerBuiltinTools(toolManager, agent, deps.builtinTools);
    await toolManager.registerTool(SEARCH_TOOLS_NAME, createSearchToolDefinition(toolManager.categories()), {
      category: 'meta',
      alwaysLoad: true,
    });
    agent.addLocalFunction(SEARCH_TOOLS_NAME, createSearchToolFunction(toolManager));

    const session = new ChatSession(agent, toolManager, executor, logger);
    const connect = deps.connectServer ?? connectMcpServer;
    for (const server of config.mcpServers) {
      if (!server.enabled) continue;
      let remote: RemoteToolServer | null = null;
      try {
        remote = await connect(server, logger);
        agent.addRemoteServer(remote);
      } catch (error) {
        session.failures.push({ name: server.name, error: describeError(error) });
        await session.logger.error(`Failed to connect MCP server '${server.name}'`, error);
        if (remote) {
          await remote
            .close()
            .catch((closeError: unknown) =>
              session.logger.error(`Failed to close MCP server '${server.name}'`, closeError)
            );
        }
      }
    }

    await session.logger.info('Session ready', {
      tools: toolManager.getStats().totalRegistered,
      servers: session.connectedServers,
    });
    return session;
  }

  get connectedServers(): string[] {
    return this.agent.remoteServers.map((server) => server.id);
  }

  get failedServers(): ServerConnectionFailure[] {
    return [...this.failures];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Runs one turn; remote calls go through the session's executor
   */
  async send(input: string, options: Omit<AgentRunOptions, 'executor'> = {}): Promise<AgentRunResult> {
    if (this.closed) {
      throw new ConfigurationError('Session has been closed');
    }
    return this.agent.run(input, { ...options, executor: this.executor });
  }

  /**
   * Forgets the conversation and every tool loaded by search
   */
  async reset(): Promise<void> {
    await this.agent.reset({ unloadTools: true });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.executor.close();
    await this.agent.close();
    await this.logger.info('Session closed');
  }
}
