/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { z } from 'zod';

import { getErrorMessage } from '../../errors.js';
import { isResponseError, type ResponseMessage } from '../../protocol/messages.js';
import { resolveProbeContext, type ProbeContext } from '../options.js';
import { runProbe } from '../probe.js';
import { exitCli } from '../utils.js';

export const DEFAULT_DOCUMENT_URI = 'file:///tmp/lsp-probe-document';

const completionItemSchema = z
  .object({
    label: z.string(),
    kind: z.number().optional(),
    detail: z.string().optional(),
    data: z.unknown().optional(),
  })
  .passthrough();

export type CompletionItem = z.infer<typeof completionItemSchema>;

const completionResultSchema = z.union([
  z.array(completionItemSchema),
  z.object({ items: z.array(completionItemSchema) }).passthrough(),
  z.null(),
]);

/**
 * Reads the items out of a completion response; accepts both a bare item
 * array and a CompletionList. Throws on an error response.
 */
export function completionItems(response: ResponseMessage): CompletionItem[] {
  if (isResponseError(response)) {
    throw new Error(
      `Completion failed (${response.error.code}): ${response.error.message}`,
    );
  }
  const parsed = completionResultSchema.safeParse(response.result);
  if (!parsed.success) {
    throw new Error('Invalid completion result received');
  }
  if (parsed.data === null) {
    return [];
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.items;
}

interface CompleteArgs {
  language: string;
  text: string;
  line: number;
  character: number;
  uri: string;
}

export async function handleComplete(
  args: CompleteArgs,
  context: ProbeContext,
): Promise<void> {
  try {
    const items = await runProbe(context, async (session) => {
      await session.didOpen(args.uri, args.language, args.text);
      const response = await session.completion(args.uri, {
        line: args.line,
        character: args.character,
      });
      return completionItems(response);
    });

    if (items.length === 0) {
      console.log('No completion items');
      return;
    }
    for (const item of items) {
      console.log(item.label);
    }
  } catch (error) {
    console.error(getErrorMessage(error));
    exitCli(1);
  }
}

const completeArgsSchema = z.object({
  language: z.string().min(1),
  text: z.string(),
  line: z.number().int().nonnegative().default(0),
  character: z.number().int().nonnegative().default(0),
  uri: z.string().min(1).default(DEFAULT_DOCUMENT_URI),
});

export const completeCommand: CommandModule = {
  command: 'complete',
  describe: 'Opens a document and prints the completion labels at a position.',
  builder: (yargs) =>
    yargs
      .option('language', {
        type: 'string',
        demandOption: true,
        describe: 'Language ID of the document.',
      })
      .option('text', {
        type: 'string',
        demandOption: true,
        describe: 'Document contents.',
      })
      .option('line', {
        type: 'number',
        default: 0,
        describe: 'Zero-based line of the completion position.',
      })
      .option('character', {
        type: 'number',
        default: 0,
        describe: 'Zero-based character of the completion position.',
      })
      .option('uri', {
        type: 'string',
        default: DEFAULT_DOCUMENT_URI,
        describe: 'URI (or path) the document is opened under.',
      }),
  handler: async (argv) => {
    try {
      const args = completeArgsSchema.parse(argv);
      await handleComplete(args, resolveProbeContext(argv));
    } catch (error) {
      console.error(getErrorMessage(error));
      exitCli(1);
      return;
    }
    exitCli();
  },
};
