/**
 * Plain-text formatting for tool activity and tool listings
 */

import type { ToolCallRequest } from '../../llm/completion-client.js';
import type { ToolMatch, ToolRegistration } from '../../tools/tool-manager.js';
import type { ToolSchema } from '../../tools/tool-catalog.js';

export const RESULT_PREVIEW_LENGTH = 200;

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 3))}...`;
}

export function formatToolCall(call: ToolCallRequest): string {
  const args = call.arguments.trim() === '' ? '{}' : call.arguments;
  return `[tool] ${call.name} ${args}`;
}

/**
 * One line per result; newlines are collapsed so multi-line results stay on one row
 */
export function formatToolResult(call: ToolCallRequest, result: string, origin: string | null): string {
  const preview = truncate(result.replace(/\s*\n\s*/g, ' '), RESULT_PREVIEW_LENGTH);
  return `[result ${call.name}@${origin ?? 'unresolved'}] ${preview}`;
}

export interface ToolListEntry {
  registration: ToolRegistration;
  active: boolean;
  alwaysLoaded: boolean;
}

/**
 * Registered tools first (`*` marks active ones), then remote tools grouped by origin
 */
export function formatToolList(local: ToolListEntry[], remote: ToolSchema[]): string[] {
  const lines: string[] = ['Registered tools:'];
  if (local.length === 0) lines.push('  (none)');
  for (const { registration, active, alwaysLoaded } of local) {
    const marker = active ? '*' : ' ';
    const flags = alwaysLoaded ? ' (always loaded)' : '';
    lines.push(`  ${marker} ${registration.definition.name} [${registration.category}]${flags}`);
  }

  lines.push('', 'Remote tools:');
  if (remote.length === 0) lines.push('  (none)');
  for (const schema of remote) {
    lines.push(`    ${schema.function.name} (${schema.origin})`);
  }
  return lines;
}

export function formatSearchResults(matches: ToolMatch[]): string[] {
  if (matches.length === 0) return ['No matching tools'];
  return matches.map(
    (match) => `${match.score.toFixed(2)}  ${match.name} [${match.category}] ${truncate(match.description, 80)}`
  );
}

/**
 * Parses a `config set` value: numbers, booleans and JSON arrays/objects are
 * converted, anything else stays a string
 */
export function parseConfigValue(value: string): unknown {
  const trimmed = value.trim();

  const numValue = Number(trimmed);
  if (!isNaN(numValue) && trimmed !== '') {
    return numValue;
  }
  if (trimmed.toLowerCase() === 'true') return true;
  if (trimmed.toLowerCase() === 'false') return false;
  if (trimmed.startsWith('[') || trimmed.startsWith('{')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      return parsed;
    } catch {
      return value;
    }
  }
  return value;
}
