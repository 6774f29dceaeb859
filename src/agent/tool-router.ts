import { Logger } from '../logging/logger.js';
import {
  LOCAL_ORIGIN,
  stripOrigin,
  toToolSchema,
  validateArguments,
  type OriginId,
  type ToolDefinition,
  type ToolSchema,
  type WireToolSchema,
} from '../tools/tool-catalog.js';
import type { RemoteToolServer } from '../mcp/remote-tool-server.js';
import type { ToolExecutor } from './executor.js';
import { ConfigurationError, ToolExecutionError, ToolRoutingError } from './errors.js';

/**
 * In-process implementation of a tool; receives the decoded call arguments
 */
export type LocalToolFunction = (args: Record<string, unknown>) => unknown;

/**
 * Chooses among the origins offering the same tool name. May ask a human,
 * hence the promise.
 */
export type OriginResolver = (toolName: string, origins: OriginId[]) => OriginId | Promise<OriginId>;

export type ToolRoute =
  | { kind: 'local'; origin: typeof LOCAL_ORIGIN; fn: LocalToolFunction; definition?: ToolDefinition }
  | { kind: 'remote'; origin: OriginId; server: RemoteToolServer };

export function notFoundMessage(toolName: string): string {
  return `Error: Tool '${toolName}' not found in available tools.`;
}

/**
 * Tool schemas offered to the model for one iteration, each tagged with its
 * origin. Local tools come first, then each remote server in connection order.
 */
export class RouteTable {
  readonly schemas: ToolSchema[];
  private localDefinitions: Map<string, ToolDefinition>;

  constructor(schemas: ToolSchema[], localDefinitions: ToolDefinition[] = []) {
    this.schemas = schemas;
    this.localDefinitions = new Map(localDefinitions.map((definition) => [definition.name, definition]));
  }

  /**
   * Distinct origins advertising `toolName`, in table order
   */
  originsFor(toolName: string): OriginId[] {
    const origins: OriginId[] = [];
    for (const schema of this.schemas) {
      if (schema.function.name === toolName && !origins.includes(schema.origin)) {
        origins.push(schema.origin);
      }
    }
    return origins;
  }

  localDefinition(toolName: string): ToolDefinition | undefined {
    return this.localDefinitions.get(toolName);
  }

  /**
   * Schemas with the origin annotation removed, ready for the completion endpoint
   */
  wireSchemas(): WireToolSchema[] {
    return this.schemas.map(stripOrigin);
  }

  get size(): number {
    return this.schemas.length;
  }
}

function decodeArguments(toolName: string, text: string): Record<string, unknown> {
  if (text.trim() === '') {
    return {};
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    throw new ToolExecutionError(toolName, `Invalid JSON arguments for tool '${toolName}'`, error);
  }

  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) {
    throw new ToolExecutionError(toolName, `Arguments for tool '${toolName}' must be a JSON object`);
  }
  return Object.fromEntries(Object.entries(decoded));
}

function stringifyResult(result: unknown): string {
  if (typeof result === 'string') return result;
  if (result === undefined || result === null) return String(result);
  if (typeof result === 'object') return JSON.stringify(result);
  return String(result);
}

/**
 * ToolRouter - Binds tool calls to the origin that executes them.
 *
 * Local functions are keyed by tool name; remote servers by origin id. The
 * router never decides which tools are visible; that is the ToolManager's job.
 */
export class ToolRouter {
  private localFunctions: Map<string, LocalToolFunction> = new Map();
  private remoteServers: Map<OriginId, RemoteToolServer> = new Map();
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = (logger ?? new Logger()).child({ component: 'tool-router' });
  }

  addLocalFunction(name: string, fn: LocalToolFunction): void {
    this.localFunctions.set(name, fn);
  }

  hasLocalFunction(name: string): boolean {
    return this.localFunctions.has(name);
  }

  addRemoteServer(server: RemoteToolServer): void {
    if (server.id.trim() === '' || server.id === LOCAL_ORIGIN) {
      throw new ConfigurationError(`Invalid remote server id '${server.id}'`);
    }
    if (this.remoteServers.has(server.id)) {
      throw new ConfigurationError(`Remote server '${server.id}' is already registered`);
    }
    this.remoteServers.set(server.id, server);
  }

  removeRemoteServer(id: OriginId): RemoteToolServer | undefined {
    const server = this.remoteServers.get(id);
    this.remoteServers.delete(id);
    return server;
  }

  get servers(): RemoteToolServer[] {
    return Array.from(this.remoteServers.values());
  }

  /**
   * Builds this iteration's table from the active local definitions and every
   * connected server's advertised tools
   */
  aggregate(localDefinitions: ToolDefinition[]): RouteTable {
    const schemas: ToolSchema[] = localDefinitions.map((definition) => toToolSchema(definition, LOCAL_ORIGIN));
    for (const server of this.remoteServers.values()) {
      for (const tool of server.tools) {
        schemas.push(toToolSchema(tool, server.id));
      }
    }
    return new RouteTable(schemas, localDefinitions);
  }

  /**
   * Picks the origin for a call. `null` means no origin advertises the name.
   * With several origins the resolver decides, or the first one wins.
   */
  async resolveOrigin(toolName: string, origins: OriginId[], resolver?: OriginResolver): Promise<OriginId | null> {
    const [first] = origins;
    if (first === undefined) {
      return null;
    }
    if (origins.length === 1 || !resolver) {
      return first;
    }

    const chosen = await resolver(toolName, [...origins]);
    if (!origins.includes(chosen)) {
      throw new ToolRoutingError(
        toolName,
        `Origin '${chosen}' is not one of the origins offering '${toolName}': ${origins.join(', ')}`
      );
    }

    await this.logger.debug('Resolved ambiguous tool origin', { toolName, origins, chosen });
    return chosen;
  }

  route(toolName: string, origin: OriginId, table: RouteTable): ToolRoute {
    if (origin === LOCAL_ORIGIN) {
      const fn = this.localFunctions.get(toolName);
      if (!fn) {
        throw new ConfigurationError(`No local function is bound for tool '${toolName}'`);
      }
      const definition = table.localDefinition(toolName);
      return { kind: 'local', origin: LOCAL_ORIGIN, fn, ...(definition ? { definition } : {}) };
    }

    const server = this.remoteServers.get(origin);
    if (!server) {
      throw new ToolRoutingError(toolName, `Remote server '${origin}' is not connected`);
    }
    return { kind: 'remote', origin, server };
  }

  /**
   * Runs a routed call and returns the text handed back to the model.
   * Remote calls go through `executor`, which must be present.
   */
  async execute(route: ToolRoute, toolName: string, argumentText: string, executor?: ToolExecutor): Promise<string> {
    const args = decodeArguments(toolName, argumentText);

    if (route.kind === 'local') {
      if (route.definition) {
        const validation = validateArguments(route.definition.parameters, args);
        if (!validation.valid) {
          throw new ToolExecutionError(
            toolName,
            `Invalid arguments for tool '${toolName}': ${(validation.errors ?? []).join('; ')}`
          );
        }
      }
      return stringifyResult(await route.fn(args));
    }

    if (!executor) {
      throw new ConfigurationError('A tool executor is required for remote tool calls');
    }
    const server = route.server;
    return executor.submit(() => server.callTool(toolName, args));
  }
}
