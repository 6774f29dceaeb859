import type { WireToolSchema } from '../tools/tool-catalog.js';

/**
 * A function call requested by the model. `arguments` is the raw JSON text
 * the model produced.
 */
export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: string;
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string | null;
  toolCalls?: ToolCallRequest[];
}

/**
 * Result of one tool call; follows the assistant message that requested it
 */
export interface ToolMessage {
  role: 'tool';
  toolCallId: string;
  content: string;
}

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  tools?: WireToolSchema[];
}

export interface CompletionMessage {
  content: string | null;
  toolCalls?: ToolCallRequest[];
}

export interface CompletionChoice {
  message: CompletionMessage;
}

export interface CompletionUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResponse {
  choices: CompletionChoice[];
  usage?: CompletionUsage;
}

/**
 * The LLM boundary: ordered messages plus tool schemas in, one assistant
 * message (possibly carrying tool calls) out.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
