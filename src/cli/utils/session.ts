/**
 * Configuration and session bootstrap shared by the CLI commands
 */

import type { Command } from 'commander';
import { ConfigManager, type ToolweaveConfig } from '../../config/config-manager.js';
import { ChatSession, createLogger } from '../../session/chat-session.js';
import { describeError } from '../../agent/errors.js';

/**
 * Value of the global `--config` option, if given
 */
export function configPathOf(command: Command): string | undefined {
  const value: unknown = command.optsWithGlobals()['config'];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Loads configuration or exits with the validation errors
 */
export async function loadConfigOrExit(configPath?: string): Promise<ToolweaveConfig> {
  const configManager = new ConfigManager(configPath);
  const result = await configManager.load();

  if (!result.success || !result.config) {
    console.error('Configuration error:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  return result.config;
}

/**
 * Opens a session and reports servers that failed to connect; exits when
 * the session cannot be created at all
 */
export async function openSessionOrExit(config: ToolweaveConfig): Promise<ChatSession> {
  const logger = createLogger(config);

  try {
    const session = await ChatSession.create(config, { logger });
    for (const failure of session.failedServers) {
      console.warn(`Warning: MCP server '${failure.name}' is unavailable: ${failure.error}`);
    }
    return session;
  } catch (error) {
    console.error('Failed to start session:', describeError(error));
    process.exit(1);
  }
}
