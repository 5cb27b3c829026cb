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
import { CLIENT_CAPABILITIES, CLIENT_INFO, openSession } from '../probe.js';
import { exitCli } from '../utils.js';
import { completionItems } from './complete.js';

export const SMOKE_POSITIONS: ReadonlyArray<{ line: number; character: number }> =
  [
    { line: 0, character: 0 },
    { line: 0, character: 12 },
    { line: 1, character: 0 },
  ];

interface SmokeArgs {
  uri: string;
  language: string;
  text: string;
}

/**
 * Walks the whole protocol lifecycle once, one output line per step.
 * Failed or timed-out completions are reported and the walk continues;
 * anything else aborts the remaining steps.
 */
export async function handleSmoke(
  args: SmokeArgs,
  context: ProbeContext,
): Promise<void> {
  let failures = 0;
  try {
    await openSession(context, async (session) => {
      const result = await session.initialize(CLIENT_INFO, CLIENT_CAPABILITIES);
      const capabilityNames = Object.keys(result.capabilities);
      console.log(
        `PASS initialize: ${result.serverInfo?.name ?? 'server'} (${capabilityNames.length} capabilities${capabilityNames.length > 0 ? `: ${capabilityNames.join(', ')}` : ''})`,
      );

      await session.initialized();
      console.log('PASS initialized');

      await session.didOpen(args.uri, args.language, args.text);
      console.log(`PASS didOpen ${args.uri}`);

      for (const position of SMOKE_POSITIONS) {
        const where = `${position.line}:${position.character}`;
        try {
          const response = await session.completion(args.uri, position);
          if (isResponseError(response)) {
            failures += 1;
            console.log(
              `FAIL completion ${where}: ${response.error.message} (${response.error.code})`,
            );
            continue;
          }
          console.log(
            `PASS completion ${where}: ${completionItems(response).length} items`,
          );
        } catch (error) {
          if (!(error instanceof TimeoutError)) {
            throw error;
          }
          failures += 1;
          console.log(`FAIL completion ${where}: ${error.message}`);
        }
      }

      const acknowledged = await session.shutdown();
      console.log(
        acknowledged ? 'PASS shutdown' : 'WARN shutdown not acknowledged',
      );
      console.log('PASS exit');
    });
  } catch (error) {
    console.log(`FAIL ${getErrorMessage(error)}`);
    exitCli(1);
    return;
  }

  if (failures > 0) {
    exitCli(1);
  }
}

const smokeArgsSchema = z.object({
  uri: z.string().min(1),
  language: z.string().min(1),
  text: z.string(),
});

export const smokeCommand: CommandModule = {
  command: 'smoke',
  describe: 'Runs initialize, completion and shutdown against the server.',
  builder: (yargs) =>
    yargs
      .option('uri', {
        type: 'string',
        default: 'file:///tmp/test.rs',
        describe: 'URI of the document opened during the run.',
      })
      .option('language', {
        type: 'string',
        default: 'rust',
        describe: 'Language ID of that document.',
      })
      .option('text', {
        type: 'string',
        default: '// Test file\n',
        describe: 'Contents of that document.',
      }),
  handler: async (argv) => {
    try {
      const args = smokeArgsSchema.parse(argv);
      await handleSmoke(args, resolveProbeContext(argv));
    } catch (error) {
      console.error(getErrorMessage(error));
      exitCli(1);
      return;
    }
    exitCli();
  },
};
