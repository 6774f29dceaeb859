import { Logger } from '../logging/logger.js';
import type { ToolManager } from '../tools/tool-manager.js';
import type { ToolSchema } from '../tools/tool-catalog.js';
import type { RemoteToolServer } from '../mcp/remote-tool-server.js';
import type {
  ChatMessage,
  CompletionClient,
  CompletionUsage,
  ToolCallRequest,
} from '../llm/completion-client.js';
import type { AgentEventSink } from './events.js';
import type { ToolExecutor } from './executor.js';
import { RunLock } from './run-lock.js';
import { ToolRouter, notFoundMessage, type LocalToolFunction, type OriginResolver, type RouteTable } from './tool-router.js';
import { ConfigurationError, ProtocolError, ToolRoutingError, describeError } from './errors.js';

/**
 * What a per-call execution failure does to the turn: `isolate` reports it
 * to the model as that call's result, `abort` ends the turn.
 */
export type ToolErrorPolicy = 'isolate' | 'abort';

export interface ChatAgentConfig {
  model: string;
  maxIterations: number;
  systemPrompt?: string;
  toolErrorPolicy: ToolErrorPolicy;
}

export const DEFAULT_CHAT_AGENT_CONFIG: ChatAgentConfig = {
  model: 'gpt-4o-mini',
  maxIterations: 10,
  toolErrorPolicy: 'isolate',
};

export const MAX_ITERATIONS_MESSAGE = 'Maximum iterations reached without completion.';
export const EMPTY_RESPONSE_MESSAGE = 'Model returned an empty response.';
export const EMPTY_CONTENT_MESSAGE = 'Agent did not return a response content.';

export interface ChatAgentDeps {
  completionClient: CompletionClient;
  toolManager: ToolManager;
  /** Default executor for remote calls; a run may pass its own */
  executor?: ToolExecutor;
  logger?: Logger;
}

export interface AgentRunOptions {
  executor?: ToolExecutor;
  resolver?: OriginResolver;
  events?: AgentEventSink;
}

export type AgentRunStatus = 'final' | 'max_iterations' | 'error';

export interface AgentRunResult {
  status: AgentRunStatus;
  content: string;
  iterations: number;
  usage: CompletionUsage;
}

const RUN_LOCK_KEY = 'conversation';

function emptyUsage(): CompletionUsage {
  return { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}

/**
 * ChatAgent - The bounded completion/tool-call loop.
 *
 * Each iteration sends the whole history plus the currently visible tool
 * schemas; tool calls are dispatched one by one in the order the model
 * issued them and their results appended before the next request.
 * Concurrent runs on one agent are serialized.
 */
export class ChatAgent {
  private config: ChatAgentConfig;
  private completionClient: CompletionClient;
  private toolManager: ToolManager;
  private defaultExecutor: ToolExecutor | undefined;
  private router: ToolRouter;
  private runLock = new RunLock();
  private messages: ChatMessage[] = [];
  private logger: Logger;

  constructor(deps: ChatAgentDeps, config: Partial<ChatAgentConfig> = {}) {
    this.config = { ...DEFAULT_CHAT_AGENT_CONFIG, ...config };
    this.completionClient = deps.completionClient;
    this.toolManager = deps.toolManager;
    this.defaultExecutor = deps.executor;
    this.logger = (deps.logger ?? new Logger()).child({ component: 'agent' });
    this.router = new ToolRouter(deps.logger);
    this.resetMessages();
  }

  getConfig(): ChatAgentConfig {
    return { ...this.config };
  }

  get manager(): ToolManager {
    return this.toolManager;
  }

  addLocalFunction(name: string, fn: LocalToolFunction): void {
    this.router.addLocalFunction(name, fn);
  }

  /**
   * Adds a remote server whose tools become visible from the next iteration
   */
  addRemoteServer(server: RemoteToolServer): void {
    this.router.addRemoteServer(server);
  }

  get remoteServers(): RemoteToolServer[] {
    return this.router.servers;
  }

  /**
   * Every tool schema offered on the next request, local pool first
   */
  aggregateTools(): ToolSchema[] {
    return this.buildRouteTable().schemas;
  }

  private buildRouteTable(): RouteTable {
    return this.router.aggregate(this.toolManager.getActiveTools());
  }

  getMessages(): ChatMessage[] {
    return this.messages.map((message) => ({ ...message }));
  }

  /**
   * Clears the conversation once any running turn has finished; the system
   * prompt, if any, is kept. `unloadTools` also drops tools loaded by search.
   */
  async reset(options: { unloadTools?: boolean } = {}): Promise<void> {
    const release = await this.runLock.acquire(RUN_LOCK_KEY);
    try {
      this.resetMessages();
      if (options.unloadTools) {
        this.toolManager.clearLoadedTools();
      }
    } finally {
      release();
    }
  }

  private resetMessages(): void {
    this.messages = this.config.systemPrompt ? [{ role: 'system', content: this.config.systemPrompt }] : [];
  }

  /**
   * Runs one user turn and returns the reply text, the max-iterations notice
   * or `An error occurred: ...`
   */
  async processMessage(input: string, options: AgentRunOptions = {}): Promise<string> {
    const result = await this.run(input, options);
    return result.content;
  }

  /**
   * Runs one user turn. Never rejects for failures inside the loop; those
   * come back with status `error`.
   */
  async run(input: string, options: AgentRunOptions = {}): Promise<AgentRunResult> {
    const release = await this.runLock.acquire(RUN_LOCK_KEY);
    const usage = emptyUsage();
    let iterations = 0;

    try {
      this.messages.push({ role: 'user', content: input });

      while (iterations < this.config.maxIterations) {
        iterations++;
        const table = this.buildRouteTable();
        await this.logger.debug('Starting iteration', { iteration: iterations, tools: table.size });

        const response = await this.completionClient.complete({
          model: this.config.model,
          messages: [...this.messages],
          tools: table.wireSchemas(),
        });
        if (response.usage) {
          usage.promptTokens += response.usage.promptTokens;
          usage.completionTokens += response.usage.completionTokens;
          usage.totalTokens += response.usage.totalTokens;
        }

        const choice = response.choices[0];
        if (!choice) {
          throw new ProtocolError(EMPTY_RESPONSE_MESSAGE);
        }

        const toolCalls = choice.message.toolCalls ?? [];
        if (toolCalls.length === 0) {
          const content = choice.message.content;
          if (!content) {
            throw new ProtocolError(EMPTY_CONTENT_MESSAGE);
          }
          this.messages.push({ role: 'assistant', content });
          return { status: 'final', content, iterations, usage };
        }

        this.messages.push({
          role: 'assistant',
          content: choice.message.content,
          toolCalls: toolCalls.map((call) => ({ ...call })),
        });

        for (const call of toolCalls) {
          const result = await this.dispatch(call, table, options);
          this.messages.push({ role: 'tool', toolCallId: call.id, content: result });
        }
      }

      await this.logger.warn('Maximum iterations reached', { maxIterations: this.config.maxIterations });
      return { status: 'max_iterations', content: MAX_ITERATIONS_MESSAGE, iterations, usage };
    } catch (error) {
      await this.logger.error('Conversation turn failed', error, { iteration: iterations });
      return { status: 'error', content: `An error occurred: ${describeError(error)}`, iterations, usage };
    } finally {
      release();
    }
  }

  private async dispatch(call: ToolCallRequest, table: RouteTable, options: AgentRunOptions): Promise<string> {
    this.notify(options.events, 'onToolCall', () => options.events?.onToolCall?.(call));

    const origin = await this.router.resolveOrigin(call.name, table.originsFor(call.name), options.resolver);
    if (origin === null) {
      await this.logger.warn('Tool not found', { toolName: call.name });
      const result = notFoundMessage(call.name);
      this.notify(options.events, 'onToolResult', () => options.events?.onToolResult?.(call, result, null));
      return result;
    }

    await this.logger.debug('Dispatching tool call', { toolName: call.name, origin, callId: call.id });
    const route = this.router.route(call.name, origin, table);

    let result: string;
    try {
      result = await this.router.execute(route, call.name, call.arguments, options.executor ?? this.defaultExecutor);
    } catch (error) {
      if (
        this.config.toolErrorPolicy === 'abort' ||
        error instanceof ConfigurationError ||
        error instanceof ToolRoutingError
      ) {
        throw error;
      }
      await this.logger.warn('Tool call failed', { toolName: call.name, origin, error: describeError(error) });
      result = `Error: Tool '${call.name}' failed: ${describeError(error)}`;
    }

    this.notify(options.events, 'onToolResult', () => options.events?.onToolResult?.(call, result, origin));
    return result;
  }

  private notify(events: AgentEventSink | undefined, handler: keyof AgentEventSink, invoke: () => void): void {
    if (!events) return;
    try {
      invoke();
    } catch (error) {
      this.logger.warn('Event handler failed', { handler, error: describeError(error) }).catch(() => {});
    }
  }

  /**
   * Disconnects every remote server. Failures are logged; the rest still close.
   */
  async close(): Promise<void> {
    for (const server of this.router.servers) {
      try {
        await server.close();
      } catch (error) {
        await this.logger.error(`Failed to close remote server '${server.id}'`, error);
      }
      this.router.removeRemoteServer(server.id);
    }
  }
}
