/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { z } from 'zod';

import { getErrorMessage, TimeoutError } from '../../errors.js';
import { isResponseError } from '../../protocol/messages.js';
import { resolveProbeContext, type ProbeContext } from '../options.js';
import { runProbe } from '../probe.js';
import { exitCli } from '../utils.js';
import { completionItems, type CompletionItem } from './complete.js';

export interface LanguageSample {
  language: string;
  uri: string;
  text: string;
}

export const LANGUAGE_SAMPLES: readonly LanguageSample[] = [
  {
    language: 'rust',
    uri: 'file:///test/example.rs',
    text: 'fn main() {\n    println!("Hello");\n}',
  },
  {
    language: 'python',
    uri: 'file:///test/example.py',
    text: "#!/usr/bin/env python3\nprint('Hello')",
  },
  {
    language: 'javascript',
    uri: 'file:///test/example.js',
    text: "console.log('Hello');",
  },
  {
    language: 'go',
    uri: 'file:///test/example.go',
    text: 'package main\n\nfunc main() {\n    println("Hello")\n}',
  },
  {
    language: 'c',
    uri: 'file:///test/example.c',
    text: '#include <stdio.h>\n\nint main() {\n    printf("Hello");\n}',
  },
  {
    language: 'typescript',
    uri: 'file:///test/example.ts',
    text: "const greeting: string = 'Hello';",
  },
];

const SAMPLE_LABEL_COUNT = 3;

const itemDataSchema = z.object({ tags: z.array(z.string()).default([]) });

export interface LanguageBreakdown {
  total: number;
  languageSpecific: number;
  universal: number;
  other: number;
  sampleLabels: string[];
}

/**
 * Sorts completion items by the tags the server puts in `data.tags`: tagged
 * with the language (or `_<language>_`), universal (tagged `universal`, or
 * untagged), or other.
 */
export function analyzeCompletions(
  language: string,
  items: readonly CompletionItem[],
): LanguageBreakdown {
  const breakdown: LanguageBreakdown = {
    total: items.length,
    languageSpecific: 0,
    universal: 0,
    other: 0,
    sampleLabels: items.slice(0, SAMPLE_LABEL_COUNT).map((item) => item.label),
  };

  for (const item of items) {
    const parsed = itemDataSchema.safeParse(item.data);
    const tags = parsed.success ? parsed.data.tags : [];
    if (tags.includes(language) || tags.includes(`_${language}_`)) {
      breakdown.languageSpecific += 1;
    } else if (tags.length === 0 || tags.includes('universal')) {
      breakdown.universal += 1;
    } else {
      breakdown.other += 1;
    }
  }
  return breakdown;
}

export function formatBreakdown(
  language: string,
  breakdown: LanguageBreakdown,
): string {
  const counts = `language-specific ${breakdown.languageSpecific}, universal ${breakdown.universal}, other ${breakdown.other}`;
  const samples =
    breakdown.sampleLabels.length > 0
      ? `: ${breakdown.sampleLabels.join(', ')}`
      : '';
  return `${breakdown.total > 0 ? 'PASS' : 'FAIL'} ${language}: ${breakdown.total} items (${counts})${samples}`;
}

interface LanguagesArgs {
  language?: string[];
}

/**
 * Opens one sample document per language, requests completions at its start
 * and reports how the offered items split by language tags. A language
 * passes when the server offers anything for it.
 */
export async function handleLanguages(
  args: LanguagesArgs,
  context: ProbeContext,
): Promise<void> {
  const wanted = args.language;
  const samples =
    wanted === undefined || wanted.length === 0
      ? LANGUAGE_SAMPLES
      : LANGUAGE_SAMPLES.filter((sample) => wanted.includes(sample.language));
  if (samples.length === 0) {
    console.error(
      `No sample document for ${wanted?.join(', ')}; known languages: ${LANGUAGE_SAMPLES.map((sample) => sample.language).join(', ')}`,
    );
    exitCli(1);
    return;
  }

  let passed: number;
  try {
    passed = await runProbe(context, async (session) => {
      let succeeded = 0;
      for (const sample of samples) {
        await session.didOpen(sample.uri, sample.language, sample.text);
        try {
          const response = await session.completion(sample.uri, {
            line: 0,
            character: 0,
          });
          if (isResponseError(response)) {
            console.log(
              `FAIL ${sample.language}: ${response.error.message} (${response.error.code})`,
            );
          } else {
            const breakdown = analyzeCompletions(
              sample.language,
              completionItems(response),
            );
            console.log(formatBreakdown(sample.language, breakdown));
            if (breakdown.total > 0) {
              succeeded += 1;
            }
          }
        } catch (error) {
          if (!(error instanceof TimeoutError)) {
            throw error;
          }
          console.log(`FAIL ${sample.language}: ${error.message}`);
        }
        await session.didClose(sample.uri);
      }
      return succeeded;
    });
  } catch (error) {
    console.error(getErrorMessage(error));
    exitCli(1);
    return;
  }

  console.log(
    `Overall: ${passed}/${samples.length} languages returned completions`,
  );
  if (passed < samples.length) {
    exitCli(1);
  }
}

const languagesArgsSchema = z.object({
  language: z.array(z.string().min(1)).optional(),
});

export const languagesCommand: CommandModule = {
  command: 'languages',
  describe:
    'Requests completions in sample documents of several languages and sorts the items by language tags.',
  builder: (yargs) =>
    yargs.option('language', {
      alias: 'l',
      type: 'string',
      array: true,
      describe: `Only these languages (${LANGUAGE_SAMPLES.map((sample) => sample.language).join(', ')}).`,
    }),
  handler: async (argv) => {
    try {
      const args = languagesArgsSchema.parse(argv);
      await handleLanguages(args, resolveProbeContext(argv));
    } catch (error) {
      console.error(getErrorMessage(error));
      exitCli(1);
      return;
    }
    exitCli();
  },
};
