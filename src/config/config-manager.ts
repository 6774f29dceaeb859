import { z } from 'zod';
import { readFile, writeFile, rename, unlink, mkdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, dirname } from 'node:path';
import { randomUUID } from 'node:crypto';

/**
 * One remote tool server launched over stdio
 */
export const McpServerConfigSchema = z.object({
  name: z
    .string()
    .min(1)
    .refine((name) => name !== 'local', { message: "'local' is reserved for locally bound tools" }),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  enabled: z.boolean().default(true),
});

export const ToolweaveConfigSchema = z.object({
  agent: z.object({
    model: z.string().min(1).default('gpt-4o-mini'),
    baseUrl: z.string().url().optional(),
    apiKeyEnv: z.string().min(1).default('OPENAI_API_KEY'),
    maxIterations: z.number().int().min(1).max(100).default(10),
    systemPrompt: z.string().optional(),
    toolErrorPolicy: z.enum(['isolate', 'abort']).default('isolate'),
  }).default({}),

  toolSearch: z.object({
    similarityFloor: z.number().min(-1).max(1).default(0.3),
    semanticActivationThreshold: z.number().min(-1).max(1).default(0.4),
    keywordActivationThreshold: z.number().positive().default(1.0),
    topK: z.number().int().min(1).max(50).default(3),
    embeddingModel: z.string().min(1).optional(),
  }).default({}),

  executor: z.object({
    timeoutMs: z.number().int().min(0).default(60_000),
  }).default({}),

  mcpServers: z
    .array(McpServerConfigSchema)
    .superRefine((servers, ctx) => {
      const seen = new Set<string>();
      servers.forEach((server, index) => {
        if (seen.has(server.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'name'],
            message: `Duplicate MCP server name '${server.name}'`,
          });
        }
        seen.add(server.name);
      });
    })
    .default([]),

  gateway: z.object({
    port: z.number().int().min(1).max(65535).default(18790),
    host: z.string().min(1).default('127.0.0.1'),
  }).default({}),

  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    path: z.string().min(1).default('~/.toolweave/logs/toolweave.log'),
    maxSize: z.number().int().min(1024).default(10 * 1024 * 1024), // 10MB
    maxFiles: z.number().int().min(1).max(100).default(5),
  }).default({}),
});

export type McpServerConfig = z.infer<typeof McpServerConfigSchema>;

export type ToolweaveConfig = z.infer<typeof ToolweaveConfigSchema>;

/**
 * User-supplied configuration before defaults are applied
 */
export type PartialToolweaveConfig = z.input<typeof ToolweaveConfigSchema>;

export const DEFAULT_CONFIG: ToolweaveConfig = ToolweaveConfigSchema.parse({});

export const DEFAULT_CONFIG_PATH = join(homedir(), '.toolweave', 'config.json');

/**
 * Expands a leading `~` to the user's home directory
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

const ENV_PREFIX = 'TOOLWEAVE_';

type EnvValueKind = 'string' | 'integer' | 'float';

const ENV_MAPPINGS: Record<string, { path: string[]; kind: EnvValueKind }> = {
  [`${ENV_PREFIX}AGENT_MODEL`]: { path: ['agent', 'model'], kind: 'string' },
  [`${ENV_PREFIX}AGENT_BASE_URL`]: { path: ['agent', 'baseUrl'], kind: 'string' },
  [`${ENV_PREFIX}AGENT_API_KEY_ENV`]: { path: ['agent', 'apiKeyEnv'], kind: 'string' },
  [`${ENV_PREFIX}AGENT_MAX_ITERATIONS`]: { path: ['agent', 'maxIterations'], kind: 'integer' },
  [`${ENV_PREFIX}AGENT_TOOL_ERROR_POLICY`]: { path: ['agent', 'toolErrorPolicy'], kind: 'string' },
  [`${ENV_PREFIX}TOOL_SEARCH_SIMILARITY_FLOOR`]: { path: ['toolSearch', 'similarityFloor'], kind: 'float' },
  [`${ENV_PREFIX}TOOL_SEARCH_TOP_K`]: { path: ['toolSearch', 'topK'], kind: 'integer' },
  [`${ENV_PREFIX}TOOL_SEARCH_EMBEDDING_MODEL`]: { path: ['toolSearch', 'embeddingModel'], kind: 'string' },
  [`${ENV_PREFIX}EXECUTOR_TIMEOUT_MS`]: { path: ['executor', 'timeoutMs'], kind: 'integer' },
  [`${ENV_PREFIX}GATEWAY_PORT`]: { path: ['gateway', 'port'], kind: 'integer' },
  [`${ENV_PREFIX}GATEWAY_HOST`]: { path: ['gateway', 'host'], kind: 'string' },
  [`${ENV_PREFIX}LOGGING_LEVEL`]: { path: ['logging', 'level'], kind: 'string' },
  [`${ENV_PREFIX}LOGGING_PATH`]: { path: ['logging', 'path'], kind: 'string' },
};

export interface ConfigValidationResult {
  success: boolean;
  config?: ToolweaveConfig;
  errors?: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * ConfigManager - Loads, validates and persists configuration.
 *
 * Precedence: defaults → JSON file → `TOOLWEAVE_*` environment variables.
 */
export class ConfigManager {
  private configPath: string;
  private currentConfig: ToolweaveConfig;

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    this.currentConfig = DEFAULT_CONFIG;
  }

  get config(): ToolweaveConfig {
    return this.currentConfig;
  }

  get path(): string {
    return this.configPath;
  }

  async load(): Promise<ConfigValidationResult> {
    let fileConfig: Record<string, unknown> = {};

    try {
      const content = await readFile(this.configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (!isRecord(parsed)) {
        return { success: false, errors: ['Configuration file must contain a JSON object'] };
      }
      fileConfig = parsed;
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        return {
          success: false,
          errors: [`Failed to read config file: ${error instanceof Error ? error.message : String(error)}`],
        };
      }
    }

    let envOverrides: Record<string, unknown>;
    try {
      envOverrides = this.getEnvironmentOverrides();
    } catch (error) {
      return { success: false, errors: [error instanceof Error ? error.message : String(error)] };
    }

    return this.validate(this.deepMerge(fileConfig, envOverrides));
  }

  /**
   * Validates a partial configuration; on success it becomes the current one
   */
  validate(partialConfig: unknown): ConfigValidationResult {
    const result = ToolweaveConfigSchema.safeParse(partialConfig);

    if (result.success) {
      this.currentConfig = result.data;
      return { success: true, config: result.data };
    }

    const errors = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `Configuration error at '${path}': ${issue.message}`;
    });

    return { success: false, errors };
  }

  async save(config?: PartialToolweaveConfig): Promise<void> {
    const configToSave = config ?? this.currentConfig;

    const validation = this.validate(configToSave);
    if (!validation.success) {
      throw new Error(`Invalid configuration: ${validation.errors?.join(', ')}`);
    }

    await mkdir(dirname(this.configPath), { recursive: true, mode: 0o700 });
    await this.atomicWrite(this.configPath, JSON.stringify(configToSave, null, 2));
  }

  /**
   * Writes through a temp file and a rename so readers never see a partial file
   */
  async atomicWrite(filePath: string, content: string): Promise<void> {
    const tempPath = join(dirname(filePath), `.config-${randomUUID()}.tmp`);

    try {
      await writeFile(tempPath, content, { mode: 0o600 });
      await rename(tempPath, filePath);
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: NodeJS.ErrnoException) => {
        if (cleanupError.code !== 'ENOENT') throw cleanupError;
      });
      throw error;
    }
  }

  private getEnvironmentOverrides(): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};

    for (const [envVar, mapping] of Object.entries(ENV_MAPPINGS)) {
      const value = process.env[envVar];
      if (value !== undefined) {
        this.setNestedValue(overrides, mapping.path, this.parseEnvValue(value, mapping.path, mapping.kind));
      }
    }

    return overrides;
  }

  private parseEnvValue(value: string, path: string[], kind: EnvValueKind): unknown {
    if (kind === 'string') return value;

    const num = kind === 'integer' ? parseInt(value, 10) : parseFloat(value);
    if (isNaN(num)) {
      throw new Error(`Invalid numeric value for ${path.join('.')}: ${value}`);
    }
    return num;
  }

  private setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
    let current = obj;
    for (const key of path.slice(0, -1)) {
      const next = current[key];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[key] = created;
        current = created;
      }
    }
    const lastKey = path[path.length - 1];
    if (lastKey !== undefined) {
      current[lastKey] = value;
    }
  }

  /**
   * Later values win; nested objects merge, arrays are replaced
   */
  private deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = { ...base };

    for (const [key, value] of Object.entries(overrides)) {
      const existing = result[key];
      result[key] = isRecord(value) && isRecord(existing) ? this.deepMerge(existing, value) : value;
    }

    return result;
  }

  /**
   * Reads a value by dotted path, e.g. `toolSearch.topK`
   */
  get(path: string): unknown {
    let current: unknown = this.currentConfig;

    for (const part of path.split('.')) {
      if (!isRecord(current)) {
        return undefined;
      }
      current = current[part];
    }

    return current;
  }

  /**
   * Sets a value by dotted path and re-validates the whole configuration
   */
  set(path: string, value: unknown): ConfigValidationResult {
    const draft: unknown = JSON.parse(JSON.stringify(this.currentConfig));
    const newConfig = isRecord(draft) ? draft : {};
    this.setNestedValue(newConfig, path.split('.'), value);
    return this.validate(newConfig);
  }
}
