import type { ToolCallRequest } from '../llm/completion-client.js';
import type { OriginId } from '../tools/tool-catalog.js';

/**
 * Observer of tool activity during a run. `onToolCall` fires before origin
 * resolution, `onToolResult` after execution (or after a routing miss, with
 * a `null` origin). Whatever a handler throws is logged and ignored.
 */
export interface AgentEventSink {
  onToolCall?(call: ToolCallRequest): void;
  onToolResult?(call: ToolCallRequest, result: string, origin: OriginId | null): void;
}
