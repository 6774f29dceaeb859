/**
 * Serve command - Runs the WebSocket gateway in the foreground
 */

import { Command, InvalidArgumentError } from 'commander';
import { ChatSession, createLogger } from '../../session/chat-session.js';
import { GatewayServer } from '../../gateway/gateway-server.js';
import { describeError } from '../../agent/errors.js';
import { configPathOf, loadConfigOrExit } from '../utils/session.js';

interface ServeOptions {
  port?: number;
  host?: string;
}

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError(`Invalid port: ${value}`);
  }
  return port;
}

/**
 * Creates the serve command
 */
export function serveCommand(): Command {
  const cmd = new Command('serve');

  cmd
    .description('Start the WebSocket gateway')
    .option('-p, --port <port>', 'Port to listen on', parsePort)
    .option('--host <host>', 'Interface to bind')
    .action(async (options: ServeOptions, command: Command) => {
      await runServe(options, configPathOf(command));
    });

  return cmd;
}

async function runServe(options: ServeOptions, configPath?: string): Promise<void> {
  const config = await loadConfigOrExit(configPath);

  if (!process.env[config.agent.apiKeyEnv]) {
    console.error(`Environment variable ${config.agent.apiKeyEnv} is not set`);
    process.exit(1);
  }

  const logger = createLogger(config);
  const gateway = new GatewayServer(
    {
      port: options.port ?? config.gateway.port,
      host: options.host ?? config.gateway.host,
    },
    () => ChatSession.create(config, { logger }),
    logger
  );

  const shutdown = async (): Promise<void> => {
    console.log('\nShutting down...');
    await gateway.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown().catch((error: unknown) => {
      console.error('Shutdown failed:', describeError(error));
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown().catch((error: unknown) => {
      console.error('Shutdown failed:', describeError(error));
      process.exit(1);
    });
  });

  try {
    await gateway.start();
    const { host } = gateway.getConfig();
    console.log(`Gateway listening on ws://${host}:${gateway.port}`);
    console.log('\nPress Ctrl+C to stop');
  } catch (error) {
    console.error('Failed to start gateway:', describeError(error));
    process.exit(1);
  }
}
