/**
 * Tools - definitions, the discovery registry and the search meta-tool
 */

export {
  ToolCatalog,
  LOCAL_ORIGIN,
  toToolSchema,
  stripOrigin,
  validateArguments,
  type ToolDefinition,
  type ToolSchema,
  type WireToolSchema,
  type OriginId,
  type JSONSchema,
  type JSONSchemaProperty,
  type JSONSchemaType,
  type ArgumentValidation,
} from './tool-catalog.js';

export {
  ToolManager,
  DEFAULT_TOOL_SEARCH_CONFIG,
  DEFAULT_CATEGORY,
  type ToolSearchConfig,
  type RegisterToolOptions,
  type ToolRegistration,
  type ToolMatch,
  type ToolSearchMode,
  type ToolSearchOptions,
  type ToolManagerStats,
} from './tool-manager.js';

export { SEARCH_TOOLS_NAME, createSearchToolDefinition, createSearchToolFunction } from './search-tool.js';

export {
  GREETING_TOOL,
  CURRENT_TIME_TOOL,
  createBuiltinTools,
  registerBuiltinTools,
  formatWallClock,
  type BuiltinToolsOptions,
  type LocalFunctionBinder,
} from './builtin-tools.js';
