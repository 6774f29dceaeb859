/**
 * Agent - the conversation loop and tool routing
 */

export {
  ChatAgent,
  DEFAULT_CHAT_AGENT_CONFIG,
  MAX_ITERATIONS_MESSAGE,
  EMPTY_RESPONSE_MESSAGE,
  EMPTY_CONTENT_MESSAGE,
  type ChatAgentConfig,
  type ChatAgentDeps,
  type AgentRunOptions,
  type AgentRunResult,
  type AgentRunStatus,
  type ToolErrorPolicy,
} from './agent.js';

export {
  ToolRouter,
  RouteTable,
  notFoundMessage,
  type LocalToolFunction,
  type OriginResolver,
  type ToolRoute,
} from './tool-router.js';

export { SerialExecutor, type ToolExecutor, type SerialExecutorOptions } from './executor.js';
export { RunLock } from './run-lock.js';
export type { AgentEventSink } from './events.js';

export {
  AgentError,
  ProtocolError,
  ToolRoutingError,
  ConfigurationError,
  ToolExecutionError,
  EmbeddingError,
  ToolTimeoutError,
  describeError,
  type AgentErrorCode,
} from './errors.js';
