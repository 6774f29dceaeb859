/**
 * Error codes raised inside the conversation loop and the tool layer
 */
export type AgentErrorCode =
  | 'protocol'
  | 'routing'
  | 'configuration'
  | 'execution'
  | 'embedding'
  | 'timeout';

/**
 * Base class for every error the agent core raises
 */
export class AgentError extends Error {
  readonly code: AgentErrorCode;

  constructor(code: AgentErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The completion endpoint answered with something the loop cannot use
 * (no choices, or a final message without content). Fatal for the turn.
 */
export class ProtocolError extends AgentError {
  constructor(message: string) {
    super('protocol', message);
  }
}

/**
 * A tool call could not be bound to a single origin.
 */
export class ToolRoutingError extends AgentError {
  readonly toolName: string;

  constructor(toolName: string, message: string) {
    super('routing', message);
    this.toolName = toolName;
  }
}

/**
 * The agent was wired incorrectly (missing executor, unbound local function, ...).
 * Always aborts the turn.
 */
export class ConfigurationError extends AgentError {
  constructor(message: string) {
    super('configuration', message);
  }
}

/**
 * A local function or a remote server failed while running a tool.
 */
export class ToolExecutionError extends AgentError {
  readonly toolName: string;

  constructor(toolName: string, message: string, cause?: unknown) {
    super('execution', message, { cause });
    this.toolName = toolName;
  }
}

/**
 * The embedding provider could not embed a text. Never fatal.
 */
export class EmbeddingError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super('embedding', message, { cause });
  }
}

export class ToolTimeoutError extends AgentError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('timeout', `Tool execution timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
