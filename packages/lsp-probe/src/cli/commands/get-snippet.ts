/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { z } from 'zod';

import { getErrorMessage } from '../../errors.js';
import { resolveProbeContext, type ProbeContext } from '../options.js';
import { runProbe } from '../probe.js';
import { exitCli, formatJson } from '../utils.js';

export const snippetSchema = z
  .object({
    id: z.number().int(),
    title: z.string().optional(),
    url: z.string().optional(),
    content: z.string().optional(),
    description: z.string().optional(),
    tags: z.array(z.string()).default([]),
  })
  .passthrough();

export type Snippet = z.infer<typeof snippetSchema>;

export function snippetBody(snippet: Snippet): string {
  return snippet.url ?? snippet.content ?? '';
}

/** Tags starting with `_` are system tags. */
export function splitTags(tags: readonly string[]): {
  user: string[];
  system: string[];
} {
  return {
    user: tags.filter((tag) => !tag.startsWith('_')),
    system: tags.filter((tag) => tag.startsWith('_')),
  };
}

export function formatSnippetDetails(snippet: Snippet): string[] {
  const { user, system } = splitTags(snippet.tags);
  const lines = [`Title: ${snippet.title ?? 'Untitled'}`, `ID: ${snippet.id}`];
  if (user.length > 0) {
    lines.push(`Tags: ${user.join(', ')}`);
  }
  if (system.length > 0) {
    lines.push(`System Tags: ${system.join(', ')}`);
  }
  if (snippet.description) {
    lines.push(`Description: ${snippet.description}`);
  }
  lines.push('Content:', snippetBody(snippet));
  return lines;
}

interface GetSnippetArgs {
  id: number;
  json: boolean;
}

export async function handleGetSnippet(
  args: GetSnippetArgs,
  context: ProbeContext,
): Promise<void> {
  try {
    const result = await runProbe(context, (session) =>
      session.executeCommand('bkmr.getSnippet', [{ id: args.id }]),
    );
    const parsed = snippetSchema.safeParse(result);
    if (!parsed.success) {
      console.error(`Invalid snippet data received for ID ${args.id}`);
      exitCli(1);
      return;
    }

    if (args.json) {
      console.log(formatJson(parsed.data));
      return;
    }
    console.log(formatSnippetDetails(parsed.data).join('\n'));
  } catch (error) {
    console.error(getErrorMessage(error));
    exitCli(1);
  }
}

const getSnippetArgsSchema = z.object({
  id: z.number().int(),
  json: z.boolean().default(false),
});

export const getSnippetCommand: CommandModule = {
  command: 'get-snippet <id>',
  describe: 'Fetches one snippet through bkmr.getSnippet.',
  builder: (yargs) =>
    yargs
      .positional('id', {
        describe: 'Snippet ID.',
        type: 'number',
      })
      .option('json', {
        alias: 'j',
        type: 'boolean',
        default: false,
        describe: 'Print the raw snippet as JSON.',
      }),
  handler: async (argv) => {
    try {
      const args = getSnippetArgsSchema.parse(argv);
      await handleGetSnippet(args, resolveProbeContext(argv));
    } catch (error) {
      console.error(getErrorMessage(error));
      exitCli(1);
      return;
    }
    exitCli();
  },
};
