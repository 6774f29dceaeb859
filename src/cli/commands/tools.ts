/**
 * Tools command - Inspect registered tools and try the search
 */

import { Command } from 'commander';
import { LOCAL_ORIGIN } from '../../tools/tool-catalog.js';
import { formatSearchResults, formatToolList } from '../utils/format.js';
import { configPathOf, loadConfigOrExit, openSessionOrExit } from '../utils/session.js';

interface ToolsOptions {
  search?: string;
  category?: string;
}

/**
 * Creates the tools command
 */
export function toolsCommand(): Command {
  const cmd = new Command('tools');

  cmd
    .description('List registered tools, or search them with --search')
    .option('-s, --search <query>', 'Search tools as the model would')
    .option('--category <name>', 'Restrict the search to one category')
    .action(async (options: ToolsOptions, command: Command) => {
      await runTools(options, configPathOf(command));
    });

  return cmd;
}

async function runTools(options: ToolsOptions, configPath?: string): Promise<void> {
  const config = await loadConfigOrExit(configPath);
  const session = await openSessionOrExit(config);
  const manager = session.toolManager;

  try {
    if (options.search !== undefined) {
      const matches = await manager.search(options.search, options.category ? { category: options.category } : {});
      for (const line of formatSearchResults(matches)) console.log(line);

      const loaded = matches.filter((match) => manager.isActive(match.name)).map((match) => match.name);
      if (loaded.length > 0) {
        console.log(`\nLoaded: ${loaded.join(', ')}`);
      }
      return;
    }

    const local = manager.listRegistrations().map((registration) => ({
      registration,
      active: manager.isActive(registration.definition.name),
      alwaysLoaded: manager.isAlwaysLoaded(registration.definition.name),
    }));
    const remote = session.agent.aggregateTools().filter((schema) => schema.origin !== LOCAL_ORIGIN);
    for (const line of formatToolList(local, remote)) console.log(line);

    const stats = manager.getStats();
    console.log(
      `\n${stats.totalRegistered} registered, ${stats.currentlyLoaded} active, ` +
        `semantic search ${stats.semanticSearchEnabled ? 'on' : 'off'}`
    );
  } finally {
    await session.close();
  }
}
