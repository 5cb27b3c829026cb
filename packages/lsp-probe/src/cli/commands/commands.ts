/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { z } from 'zod';

import { CommandError, getErrorMessage } from '../../errors.js';
import { resolveProbeContext, type ProbeContext } from '../options.js';
import { runProbe } from '../probe.js';
import { exitCli, formatJson } from '../utils.js';

export const KNOWN_COMMANDS: Readonly<Record<string, string>> = {
  'bkmr.createSnippet': 'Create a new snippet in the database',
  'bkmr.updateSnippet': 'Update an existing snippet',
  'bkmr.deleteSnippet': 'Delete a snippet from the database',
  'bkmr.getSnippet': 'Retrieve a specific snippet by ID',
  'bkmr.listSnippets': 'List snippets with optional language filtering',
  'bkmr.searchSnippets': 'Search snippets by query',
  'bkmr.insertFilepathComment': 'Insert a comment with the current file path',
};

export function formatCommandList(commands: readonly string[]): string[] {
  if (commands.length === 0) {
    return ['No commands reported by server'];
  }
  const lines = commands.map((command, index) => {
    const description = KNOWN_COMMANDS[command];
    return description === undefined
      ? `${index + 1}. ${command}`
      : `${index + 1}. ${command}: ${description}`;
  });
  lines.push(`Total: ${commands.length} commands available`);
  return lines;
}

interface CommandsArgs {
  testCommand?: string;
  json: boolean;
}

export async function handleCommands(
  args: CommandsArgs,
  context: ProbeContext,
): Promise<void> {
  try {
    const outcome = await runProbe(context, async (session) => {
      const commands = session.executeCommands();
      if (args.testCommand === undefined) {
        return { commands, tested: undefined };
      }
      try {
        const result = await session.executeCommand(args.testCommand, [{}]);
        return { commands, tested: { ok: true as const, result } };
      } catch (error) {
        if (error instanceof CommandError) {
          return { commands, tested: { ok: false as const, error } };
        }
        throw error;
      }
    });

    if (args.json) {
      console.log(formatJson({ availableCommands: outcome.commands }));
    } else {
      console.log(formatCommandList(outcome.commands).join('\n'));
    }

    const tested = outcome.tested;
    if (tested === undefined) {
      return;
    }
    if (tested.ok) {
      console.log(
        `${args.testCommand} returned: ${JSON.stringify(tested.result ?? null)}`,
      );
      return;
    }
    console.error(tested.error.message);
    exitCli(1);
  } catch (error) {
    console.error(getErrorMessage(error));
    exitCli(1);
  }
}

const commandsArgsSchema = z.object({
  testCommand: z.string().min(1).optional(),
  json: z.boolean().default(false),
});

export const commandsCommand: CommandModule = {
  command: 'commands',
  describe: 'Lists the commands the server accepts through executeCommand.',
  builder: (yargs) =>
    yargs
      .option('test-command', {
        type: 'string',
        describe: 'Run this command once with [{}] as its arguments.',
      })
      .option('json', {
        alias: 'j',
        type: 'boolean',
        default: false,
        describe: 'Print the command list as JSON.',
      }),
  handler: async (argv) => {
    try {
      const args = commandsArgsSchema.parse(argv);
      await handleCommands(args, resolveProbeContext(argv));
    } catch (error) {
      console.error(getErrorMessage(error));
      exitCli(1);
      return;
    }
    exitCli();
  },
};
