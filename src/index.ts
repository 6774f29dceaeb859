/**
 * toolweave - Conversational agent with lazy tool discovery
 */

export {
  ConfigManager,
  ToolweaveConfigSchema,
  McpServerConfigSchema,
  DEFAULT_CONFIG,
  type ToolweaveConfig,
  type PartialToolweaveConfig,
  type McpServerConfig,
  type ConfigValidationResult,
} from './config/index.js';

export {
  ToolManager,
  ToolCatalog,
  DEFAULT_TOOL_SEARCH_CONFIG,
  LOCAL_ORIGIN,
  SEARCH_TOOLS_NAME,
  createSearchToolDefinition,
  createSearchToolFunction,
  registerBuiltinTools,
  type ToolDefinition,
  type ToolSchema,
  type WireToolSchema,
  type OriginId,
  type JSONSchema,
  type JSONSchemaProperty,
  type ToolSearchConfig,
  type RegisterToolOptions,
  type ToolMatch,
  type ToolManagerStats,
} from './tools/index.js';

export {
  OpenAIEmbeddingProvider,
  cosineSimilarity,
  type EmbeddingProvider,
} from './embedding/index.js';

export {
  OpenAICompletionClient,
  type CompletionClient,
  type CompletionRequest,
  type CompletionResponse,
  type ChatMessage,
  type ToolCallRequest,
} from './llm/index.js';

export { McpServerClient, type RemoteToolServer, type RemoteToolInfo } from './mcp/index.js';

export {
  ChatAgent,
  ToolRouter,
  SerialExecutor,
  RunLock,
  DEFAULT_CHAT_AGENT_CONFIG,
  AgentError,
  ProtocolError,
  ToolRoutingError,
  ConfigurationError,
  ToolExecutionError,
  EmbeddingError,
  ToolTimeoutError,
  type ChatAgentConfig,
  type AgentRunOptions,
  type AgentRunResult,
  type AgentEventSink,
  type LocalToolFunction,
  type OriginResolver,
  type ToolExecutor,
  type ToolErrorPolicy,
} from './agent/index.js';

export { ChatSession, type ChatSessionDeps } from './session/index.js';

export {
  GatewayServer,
  DEFAULT_GATEWAY_CONFIG,
  type GatewayConfig,
  type SessionFactory,
  type ClientMessage,
  type ServerMessage,
} from './gateway/index.js';

export {
  Logger,
  LOG_LEVELS,
  type LogLevel,
  type LoggerConfig,
  type LogEntry,
} from './logging/index.js';
