/**
 * JSON Schema subset used to describe tool parameters
 */
export type JSONSchemaType = 'object' | 'string' | 'number' | 'integer' | 'boolean' | 'array';

export type JSONSchemaProperty = {
  type: JSONSchemaType;
  description?: string;
  enum?: string[];
  default?: unknown;
  items?: JSONSchemaProperty;
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
};

export type JSONSchema = {
  type: 'object';
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
  additionalProperties?: boolean;
};

/**
 * A tool as the model sees it, independent of which backend runs it
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: JSONSchema;
  strict: boolean;
}

/**
 * `"local"` for functions bound in-process, otherwise a remote server id
 */
export type OriginId = string;

export const LOCAL_ORIGIN = 'local';

/**
 * Function-calling schema sent to the completion endpoint
 */
export interface WireToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

/**
 * Wire schema annotated with the origin that advertised it. The annotation
 * must be removed with {@link stripOrigin} before transmission.
 */
export interface ToolSchema extends WireToolSchema {
  origin: OriginId;
}

export function toToolSchema(
  tool: { name: string; description: string; parameters: Record<string, unknown> },
  origin: OriginId
): ToolSchema {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
    origin,
  };
}

export function stripOrigin(schema: ToolSchema): WireToolSchema {
  return { type: schema.type, function: schema.function };
}

export interface ArgumentValidation {
  valid: boolean;
  errors?: string[];
}

function typeOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function checkType(key: string, value: unknown, schema: JSONSchemaProperty): string | null {
  const actualType = typeOf(value);
  const matches =
    schema.type === 'integer'
      ? typeof value === 'number' && Number.isInteger(value)
      : schema.type === actualType;

  if (!matches) {
    return `Parameter '${key}' must be of type '${schema.type}', got '${actualType}'`;
  }

  if (schema.enum && typeof value === 'string' && !schema.enum.includes(value)) {
    return `Parameter '${key}' must be one of: ${schema.enum.join(', ')}`;
  }

  if (schema.type === 'array' && Array.isArray(value) && schema.items) {
    for (let i = 0; i < value.length; i++) {
      const itemError = checkType(`${key}[${i}]`, value[i], schema.items);
      if (itemError) {
        return itemError;
      }
    }
  }

  return null;
}

/**
 * Checks decoded call arguments against a tool's parameter schema:
 * required keys, declared types, enums and, when the schema closes it,
 * unknown keys.
 */
export function validateArguments(schema: JSONSchema, args: Record<string, unknown>): ArgumentValidation {
  const errors: string[] = [];

  for (const required of schema.required ?? []) {
    if (!(required in args)) {
      errors.push(`Missing required parameter: '${required}'`);
    }
  }

  const properties = schema.properties ?? {};
  for (const [key, value] of Object.entries(args)) {
    const propSchema = properties[key];
    if (!propSchema) {
      if (schema.additionalProperties === false) {
        errors.push(`Unknown parameter: '${key}'`);
      }
      continue;
    }

    const typeError = checkType(key, value, propSchema);
    if (typeError) {
      errors.push(typeError);
    }
  }

  return errors.length > 0 ? { valid: false, errors } : { valid: true };
}

/**
 * ToolCatalog - Tool definitions keyed by name.
 *
 * Re-registering a name replaces its definition but keeps its position in
 * listing order.
 */
export class ToolCatalog {
  private definitions: Map<string, ToolDefinition> = new Map();

  set(name: string, definition: ToolDefinition): void {
    this.definitions.set(name, definition);
  }

  get(name: string): ToolDefinition | undefined {
    return this.definitions.get(name);
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  names(): string[] {
    return Array.from(this.definitions.keys());
  }

  list(): ToolDefinition[] {
    return Array.from(this.definitions.values());
  }

  get size(): number {
    return this.definitions.size;
  }
}
