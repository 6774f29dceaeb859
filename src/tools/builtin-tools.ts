import { z } from 'zod';
import type { ToolDefinition } from './tool-catalog.js';
import type { RegisterToolOptions, ToolManager } from './tool-manager.js';
import type { LocalToolFunction } from '../agent/tool-router.js';

/**
 * Anything local functions can be bound to (normally a ChatAgent)
 */
export interface LocalFunctionBinder {
  addLocalFunction(name: string, fn: LocalToolFunction): void;
}

export const GREETING_TOOL: ToolDefinition = {
  name: 'greeting',
  description: 'Greet someone by name.',
  parameters: {
    type: 'object',
    properties: {
      name: { type: 'string', description: 'Name of the person to greet' },
    },
    required: ['name'],
    additionalProperties: false,
  },
  strict: true,
};

export const CURRENT_TIME_TOOL: ToolDefinition = {
  name: 'current_time',
  description: 'Tell the current date and time in a timezone.',
  parameters: {
    type: 'object',
    properties: {
      timezone: { type: 'string', description: "IANA timezone such as 'Europe/Paris'; defaults to UTC" },
    },
    additionalProperties: false,
  },
  strict: false,
};

const GreetingArgsSchema = z.object({ name: z.string() });
const CurrentTimeArgsSchema = z.object({ timezone: z.string().min(1).optional() });

/**
 * `YYYY-MM-DD HH:mm:ss` wall-clock time in `timeZone`; unknown zones throw a RangeError
 */
export function formatWallClock(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '00';

  return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')}`;
}

export interface BuiltinToolsOptions {
  now?: () => Date;
}

interface BuiltinTool {
  definition: ToolDefinition;
  options: RegisterToolOptions;
  fn: LocalToolFunction;
}

export function createBuiltinTools(options: BuiltinToolsOptions = {}): BuiltinTool[] {
  const now = options.now ?? (() => new Date());

  return [
    {
      definition: GREETING_TOOL,
      options: { category: 'general', keywords: ['greet', 'hello', 'welcome'] },
      fn: (args) => `Hello, ${GreetingArgsSchema.parse(args).name}`,
    },
    {
      definition: CURRENT_TIME_TOOL,
      options: { category: 'general', keywords: ['time', 'date', 'clock', 'timezone'] },
      fn: (args) => {
        const timezone = CurrentTimeArgsSchema.parse(args).timezone ?? 'UTC';
        return `Current time in ${timezone}: ${formatWallClock(now(), timezone)}`;
      },
    },
  ];
}

/**
 * Declares the built-in tools to the manager (discoverable, not loaded) and
 * binds their implementations on the agent.
 */
export async function registerBuiltinTools(
  manager: ToolManager,
  binder: LocalFunctionBinder,
  options: BuiltinToolsOptions = {}
): Promise<string[]> {
  const names: string[] = [];
  for (const tool of createBuiltinTools(options)) {
    await manager.registerTool(tool.definition.name, tool.definition, tool.options);
    binder.addLocalFunction(tool.definition.name, tool.fn);
    names.push(tool.definition.name);
  }
  return names;
}
