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
import { exitCli, fitColumn, formatJson } from '../utils.js';
import {
  formatSnippetDetails,
  snippetBody,
  snippetSchema,
  splitTags,
  type Snippet,
} from './get-snippet.js';

export const DEFAULT_PREVIEW_LENGTH = 50;

const snippetListSchema = z.object({
  snippets: z.array(snippetSchema).default([]),
});

export function formatSnippetTable(
  snippets: readonly Snippet[],
  previewLength = DEFAULT_PREVIEW_LENGTH,
): string[] {
  const lines = [
    `${fitColumn('ID', 5)} ${fitColumn('Title', 25)} ${fitColumn('Preview', previewLength)} Tags`,
  ];
  for (const snippet of snippets) {
    const preview = (snippetBody(snippet).split('\n')[0] ?? '').trim();
    const { user } = splitTags(snippet.tags);
    const tags = user.slice(0, 3).join(', ') + (user.length > 3 ? '...' : '');
    lines.push(
      [
        fitColumn(String(snippet.id), 5),
        fitColumn(snippet.title ?? 'Untitled', 25),
        fitColumn(preview, previewLength),
        tags,
      ]
        .join(' ')
        .trimEnd(),
    );
  }
  lines.push(`Total: ${snippets.length} snippets`);
  return lines;
}

interface ListSnippetsArgs {
  language?: string;
  json: boolean;
  preview: number;
  detailId?: number;
}

export async function handleListSnippets(
  args: ListSnippetsArgs,
  context: ProbeContext,
): Promise<void> {
  try {
    const filter = args.language ? { language: args.language } : {};
    const result = await runProbe(context, (session) =>
      session.executeCommand('bkmr.listSnippets', [filter]),
    );
    const parsed = snippetListSchema.safeParse(result);
    if (!parsed.success) {
      console.error('Invalid snippet list received');
      exitCli(1);
      return;
    }

    const { snippets } = parsed.data;
    if (args.detailId !== undefined) {
      const snippet = snippets.find((entry) => entry.id === args.detailId);
      if (snippet === undefined) {
        console.error(`Snippet with ID ${args.detailId} not found`);
        exitCli(1);
        return;
      }
      console.log(
        args.json
          ? formatJson(snippet)
          : formatSnippetDetails(snippet).join('\n'),
      );
      return;
    }
    if (args.json) {
      console.log(formatJson(snippets));
      return;
    }
    if (snippets.length === 0) {
      console.log(
        args.language
          ? `No ${args.language} snippets found`
          : 'No snippets found',
      );
      return;
    }
    console.log(formatSnippetTable(snippets, args.preview).join('\n'));
  } catch (error) {
    console.error(getErrorMessage(error));
    exitCli(1);
  }
}

const listSnippetsArgsSchema = z.object({
  language: z.string().min(1).optional(),
  json: z.boolean().default(false),
  preview: z.number().int().positive().default(DEFAULT_PREVIEW_LENGTH),
  detailId: z.number().int().optional(),
});

export const listSnippetsCommand: CommandModule = {
  command: 'list-snippets',
  describe: 'Lists snippets through bkmr.listSnippets.',
  builder: (yargs) =>
    yargs
      .option('language', {
        alias: 'l',
        type: 'string',
        describe: 'Only snippets for this language.',
      })
      .option('json', {
        alias: 'j',
        type: 'boolean',
        default: false,
        describe: 'Print the snippets as JSON.',
      })
      .option('preview', {
        type: 'number',
        default: DEFAULT_PREVIEW_LENGTH,
        describe: 'Width of the content preview column.',
      })
      .option('detail-id', {
        type: 'number',
        describe: 'Show the full details of the listed snippet with this ID.',
      }),
  handler: async (argv) => {
    try {
      const args = listSnippetsArgsSchema.parse(argv);
      await handleListSnippets(args, resolveProbeContext(argv));
    } catch (error) {
      console.error(getErrorMessage(error));
      exitCli(1);
      return;
    }
    exitCli();
  },
};
