/**
 * LLM - the completion boundary and its OpenAI adapter
 */

export type {
  ChatMessage,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolMessage,
  ToolCallRequest,
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  CompletionChoice,
  CompletionMessage,
  CompletionUsage,
} from './completion-client.js';

export {
  OpenAICompletionClient,
  toOpenAIMessages,
  fromOpenAICompletion,
  type OpenAICompletionConfig,
  type OpenAICompletionLike,
} from './openai-client.js';
