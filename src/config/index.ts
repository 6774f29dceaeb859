/**
 * Configuration - zod-validated settings from file and environment
 */

export {
  ConfigManager,
  ToolweaveConfigSchema,
  McpServerConfigSchema,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
  expandHome,
  type ToolweaveConfig,
  type PartialToolweaveConfig,
  type McpServerConfig,
  type ConfigValidationResult,
} from './config-manager.js';
