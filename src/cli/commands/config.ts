/**
 * Config command - View, edit and validate configuration
 */

import { Command } from 'commander';
import { ConfigManager, DEFAULT_CONFIG } from '../../config/config-manager.js';
import { describeError } from '../../agent/errors.js';
import { parseConfigValue } from '../utils/format.js';
import { configPathOf } from '../utils/session.js';

/**
 * Creates the config command with subcommands
 */
export function configCommand(): Command {
  const cmd = new Command('config');

  cmd.description('View and edit configuration');

  cmd
    .command('show')
    .description('Show current configuration')
    .action(async (_options: object, command: Command) => {
      await showConfig(configPathOf(command));
    });

  cmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., agent.model gpt-4o)')
    .action(async (key: string, value: string, _options: object, command: Command) => {
      await setConfig(key, value, configPathOf(command));
    });

  cmd
    .command('get <key>')
    .description('Get a specific configuration value')
    .action(async (key: string, _options: object, command: Command) => {
      await getConfig(key, configPathOf(command));
    });

  cmd
    .command('validate')
    .description('Check the configuration file and environment overrides')
    .action(async (_options: object, command: Command) => {
      await validateConfig(configPathOf(command));
    });

  cmd.action(async (_options: object, command: Command) => {
    await showConfig(configPathOf(command));
  });

  return cmd;
}

async function showConfig(configPath?: string): Promise<void> {
  const configManager = new ConfigManager(configPath);

  const result = await configManager.load();
  const config = result.config ?? DEFAULT_CONFIG;

  console.log(`Configuration (${configManager.path}):\n`);
  console.log(JSON.stringify(config, null, 2));

  if (!result.success && result.errors) {
    console.log('\nWarnings:');
    for (const error of result.errors) {
      console.log(`  - ${error}`);
    }
  }
}

async function setConfig(key: string, value: string, configPath?: string): Promise<void> {
  const configManager = new ConfigManager(configPath);
  await configManager.load();

  const parsedValue = parseConfigValue(value);
  const result = configManager.set(key, parsedValue);

  if (!result.success) {
    console.error('Invalid configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  try {
    await configManager.save();
    console.log(`Set ${key} = ${JSON.stringify(parsedValue)}`);
  } catch (error) {
    console.error('Failed to save configuration:', describeError(error));
    process.exit(1);
  }
}

async function getConfig(key: string, configPath?: string): Promise<void> {
  const configManager = new ConfigManager(configPath);
  await configManager.load();

  const value = configManager.get(key);

  if (value === undefined) {
    console.error(`Configuration key not found: ${key}`);
    process.exit(1);
  }

  if (typeof value === 'object') {
    console.log(JSON.stringify(value, null, 2));
  } else {
    console.log(String(value));
  }
}

async function validateConfig(configPath?: string): Promise<void> {
  const configManager = new ConfigManager(configPath);
  const result = await configManager.load();

  if (!result.success) {
    console.error(`Configuration at ${configManager.path} is invalid:`);
    for (const error of result.errors ?? []) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  const servers = configManager.config.mcpServers;
  const enabled = servers.filter((server) => server.enabled).length;
  console.log(`Configuration is valid (${enabled} of ${servers.length} MCP servers enabled)`);
}
