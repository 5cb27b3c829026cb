/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { z } from 'zod';

import { getErrorMessage, TimeoutError } from '../../errors.js';
import { isResponseError } from '../../protocol/messages.js';
import type { CompletionPosition } from '../../service/session.js';
import { resolveProbeContext, type ProbeContext } from '../options.js';
import { runProbe } from '../probe.js';
import { exitCli } from '../utils.js';
import { completionItems } from './complete.js';

export const DEFAULT_FILTERING_URI = 'file:///tmp/test-filtering.rs';

export interface FilteringCase {
  description: string;
  text: string;
}

/** Document contents typed one after another; each is completed at its end. */
export const FILTERING_CASES: readonly FilteringCase[] = [
  { description: 'Empty document', text: '' },
  { description: 'After comment start', text: '// ' },
  { description: 'After word', text: '// test' },
  { description: 'Inside function', text: 'fn main() {\n    ' },
];

// Server log lines mentioning these usually belong to a snippet lookup.
const QUERY_LOG_KEYWORDS = ['search', 'query', 'filter', 'snippet', 'SELECT'];

export type FilteringVerdict =
  | 'server-side'
  | 'client-side'
  | 'inconclusive'
  | 'no-responses';

export function endPosition(text: string): CompletionPosition {
  const lines = text.split('\n');
  return {
    line: lines.length - 1,
    character: lines[lines.length - 1]?.length ?? 0,
  };
}

/**
 * A server that filters by the text before the cursor answers the cases
 * with different item counts. Identical non-zero counts suggest the client
 * is expected to filter.
 */
export function classifyFiltering(
  counts: ReadonlyArray<number | null>,
): FilteringVerdict {
  const received = counts.filter((count): count is number => count !== null);
  if (received.length === 0) {
    return 'no-responses';
  }
  if (new Set(received).size > 1) {
    return 'server-side';
  }
  if (received.every((count) => count > 0)) {
    return 'client-side';
  }
  return 'inconclusive';
}

export function isQueryLogLine(text: string): boolean {
  return QUERY_LOG_KEYWORDS.some((keyword) => text.includes(keyword));
}

function describeVerdict(
  verdict: FilteringVerdict,
  counts: ReadonlyArray<number | null>,
): string {
  const summary = `item counts: ${counts.map((count) => (count === null ? '-' : String(count))).join(', ')}`;
  switch (verdict) {
    case 'server-side':
      return `PASS server-side filtering detected (${summary})`;
    case 'client-side':
      return `FAIL possible client-side filtering: every case returned items (${summary})`;
    case 'inconclusive':
      return `FAIL inconclusive: item counts do not change (${summary})`;
    case 'no-responses':
      return 'FAIL no completion responses received';
  }
}

interface FilteringArgs {
  uri: string;
  language: string;
}

/**
 * Types each case into one document and counts the completion items the
 * server offers at the end of it. Exits with 1 unless the counts show the
 * server filtering on its side.
 */
export async function handleFiltering(
  args: FilteringArgs,
  context: ProbeContext,
): Promise<void> {
  let verdict: FilteringVerdict;
  try {
    verdict = await runProbe(context, async (session) => {
      const counts: Array<number | null> = [];
      console.log(`Filtering analysis for ${args.uri} (${args.language})`);

      for (const [index, testCase] of FILTERING_CASES.entries()) {
        if (index === 0) {
          await session.didOpen(args.uri, args.language, testCase.text);
        } else {
          await session.didChange(args.uri, testCase.text);
        }

        try {
          const response = await session.completion(
            args.uri,
            endPosition(testCase.text),
          );
          if (isResponseError(response)) {
            counts.push(null);
            console.log(
              `${testCase.description}: FAIL ${response.error.message} (${response.error.code})`,
            );
            continue;
          }
          const count = completionItems(response).length;
          counts.push(count);
          console.log(`${testCase.description}: ${count} items`);
        } catch (error) {
          if (!(error instanceof TimeoutError)) {
            throw error;
          }
          counts.push(null);
          console.log(`${testCase.description}: FAIL ${error.message}`);
        }
      }

      const queryLines = session
        .stderrLines()
        .filter((line) => isQueryLogLine(line.text)).length;
      console.log(`Query-related server log lines: ${queryLines}`);

      const result = classifyFiltering(counts);
      console.log(describeVerdict(result, counts));
      return result;
    });
  } catch (error) {
    console.error(getErrorMessage(error));
    exitCli(1);
    return;
  }

  if (verdict !== 'server-side') {
    exitCli(1);
  }
}

const filteringArgsSchema = z.object({
  uri: z.string().min(1).default(DEFAULT_FILTERING_URI),
  language: z.string().min(1).default('rust'),
});

export const filteringCommand: CommandModule = {
  command: 'filtering',
  describe:
    'Checks whether the server filters completions by the text before the cursor.',
  builder: (yargs) =>
    yargs
      .option('uri', {
        type: 'string',
        default: DEFAULT_FILTERING_URI,
        describe: 'URI of the document the cases are typed into.',
      })
      .option('language', {
        type: 'string',
        default: 'rust',
        describe: 'Language ID of that document.',
      }),
  handler: async (argv) => {
    try {
      const args = filteringArgsSchema.parse(argv);
      await handleFiltering(args, resolveProbeContext(argv));
    } catch (error) {
      console.error(getErrorMessage(error));
      exitCli(1);
      return;
    }
    exitCli();
  },
};
