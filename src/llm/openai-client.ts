import OpenAI from 'openai';
import type {
  ChatMessage,
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
} from './completion-client.js';

export interface OpenAICompletionConfig {
  apiKey?: string;
  /** Any OpenAI-compatible endpoint, including the /v1 prefix */
  baseUrl?: string;
}

/**
 * The parts of a chat completion the adapter reads
 */
export interface OpenAICompletionLike {
  choices: Array<{
    message: {
      content: string | null;
      tool_calls?: Array<{ id: string; function: { name: string; arguments: string } }>;
    };
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}

export function toOpenAIMessages(messages: ChatMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.Chat.ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant':
        if (message.toolCalls && message.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: message.content,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: call.arguments },
            })),
          };
        }
        return { role: 'assistant', content: message.content };
      case 'tool':
        return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
    }
  });
}

export function fromOpenAICompletion(completion: OpenAICompletionLike): CompletionResponse {
  const response: CompletionResponse = {
    choices: completion.choices.map((choice) => {
      const toolCalls = choice.message.tool_calls?.map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      }));
      return {
        message: {
          content: choice.message.content,
          ...(toolCalls && toolCalls.length > 0 ? { toolCalls } : {}),
        },
      };
    }),
  };

  if (completion.usage) {
    response.usage = {
      promptTokens: completion.usage.prompt_tokens,
      completionTokens: completion.usage.completion_tokens,
      totalTokens: completion.usage.total_tokens,
    };
  }

  return response;
}

/**
 * CompletionClient over the OpenAI chat-completions API
 */
export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(config: OpenAICompletionConfig = {}, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const tools = request.tools?.map(
      (tool): OpenAI.Chat.ChatCompletionTool => ({ type: 'function', function: tool.function })
    );

    const completion = await this.client.chat.completions.create({
      model: request.model,
      messages: toOpenAIMessages(request.messages),
      ...(tools && tools.length > 0 ? { tools } : {}),
    });

    return fromOpenAICompletion(completion);
  }
}
