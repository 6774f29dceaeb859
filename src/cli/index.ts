#!/usr/bin/env node
/**
 * toolweave CLI - chat with the agent, inspect tools, run the gateway
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

import { chatCommand } from './commands/chat.js';
import { toolsCommand } from './commands/tools.js';
import { serveCommand } from './commands/serve.js';
import { configCommand } from './commands/config.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// src/cli when run from sources, dist/src/cli when built
function readVersion(): string {
  for (const candidate of ['../../package.json', '../../../package.json']) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(join(__dirname, candidate), 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch {
      continue;
    }
  }
  return '0.1.0';
}

/**
 * Creates and configures the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('toolweave')
    .description('Conversational agent with lazy tool discovery and MCP tool servers')
    .version(readVersion(), '-v, --version', 'Display version number')
    .option('-c, --config <path>', 'Configuration file (default: ~/.toolweave/config.json)');

  program.addCommand(chatCommand());
  program.addCommand(toolsCommand());
  program.addCommand(serveCommand());
  program.addCommand(configCommand());

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
