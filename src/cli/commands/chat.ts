/**
 * Chat command - Talk to the agent from the terminal
 */

import { Command } from 'commander';
import { createInterface } from 'node:readline';
import type { ChatSession } from '../../session/chat-session.js';
import type { AgentEventSink } from '../../agent/events.js';
import type { OriginResolver } from '../../agent/tool-router.js';
import { describeError } from '../../agent/errors.js';
import { formatToolCall, formatToolResult } from '../utils/format.js';
import { LineReader, parseOriginChoice } from '../utils/prompts.js';
import { configPathOf, loadConfigOrExit, openSessionOrExit } from '../utils/session.js';

interface ChatOptions {
  message?: string;
  quiet?: boolean;
}

const HELP_TEXT = [
  'Commands:',
  '  /tools   list active tools',
  '  /reset   forget the conversation and loaded tools',
  '  /exit    leave the chat',
].join('\n');

/**
 * Creates the chat command
 */
export function chatCommand(): Command {
  const cmd = new Command('chat');

  cmd
    .description('Chat with the agent (interactive unless --message is given)')
    .option('-m, --message <text>', 'Send a single message and exit')
    .option('-q, --quiet', 'Do not print tool calls and results')
    .action(async (options: ChatOptions, command: Command) => {
      await runChat(options, configPathOf(command));
    });

  return cmd;
}

function consoleEvents(quiet: boolean): AgentEventSink {
  if (quiet) return {};
  return {
    onToolCall: (call) => console.log(formatToolCall(call)),
    onToolResult: (call, result, origin) => console.log(formatToolResult(call, result, origin)),
  };
}

async function runChat(options: ChatOptions, configPath?: string): Promise<void> {
  const config = await loadConfigOrExit(configPath);
  const session = await openSessionOrExit(config);
  const events = consoleEvents(options.quiet ?? false);

  try {
    if (options.message !== undefined) {
      await sendAndPrint(session, options.message, { events });
    } else {
      await runInteractive(session, events);
    }
  } finally {
    await session.close();
  }
}

async function sendAndPrint(
  session: ChatSession,
  input: string,
  options: { events: AgentEventSink; resolver?: OriginResolver }
): Promise<void> {
  try {
    const result = await session.send(input, options);
    if (result.status === 'error') {
      console.error(result.content);
      process.exitCode = 1;
    } else {
      console.log(result.content);
    }
  } catch (error) {
    console.error('Error:', describeError(error));
    process.exitCode = 1;
  }
}

async function runInteractive(session: ChatSession, events: AgentEventSink): Promise<void> {
  const lines = new LineReader(createInterface({ input: process.stdin, output: process.stdout }));
  const resolver: OriginResolver = async (toolName, origins) => {
    console.log(`Tool '${toolName}' is offered by several servers:`);
    origins.forEach((origin, index) => console.log(`  ${index + 1}) ${origin}`));
    const answer = await lines.prompt(`Choose [1-${origins.length}] (default 1): `);
    return parseOriginChoice(answer, origins);
  };

  console.log(`Connected servers: ${session.connectedServers.join(', ') || '(none)'}`);
  console.log('Type /help for commands.\n');

  try {
    for (;;) {
      const line = await lines.prompt('> ');
      if (line === null) break;

      const input = line.trim();
      if (input === '') continue;
      if (input === '/exit' || input === '/quit') break;
      if (input === '/help') {
        console.log(HELP_TEXT);
        continue;
      }
      if (input === '/reset') {
        await session.reset();
        console.log('Conversation reset.');
        continue;
      }
      if (input === '/tools') {
        const active = session.toolManager.getActiveTools().map((tool) => tool.name);
        console.log(`Active tools: ${active.join(', ')}`);
        continue;
      }

      await sendAndPrint(session, input, { events, resolver });
    }
  } finally {
    lines.close();
  }
}
