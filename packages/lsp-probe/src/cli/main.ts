/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';

import { commandsCommand } from './commands/commands.js';
import { completeCommand } from './commands/complete.js';
import { filteringCommand } from './commands/filtering.js';
import { getSnippetCommand } from './commands/get-snippet.js';
import { languagesCommand } from './commands/languages.js';
import { listSnippetsCommand } from './commands/list-snippets.js';
import { smokeCommand } from './commands/smoke.js';
import { withGlobalOptions } from './options.js';

export function buildParser(argv: readonly string[]) {
  return withGlobalOptions(
    yargs([...argv])
      .locale('en')
      .scriptName('lsp-probe')
      .usage('$0 <command> [options]'),
  )
    .command(smokeCommand)
    .command(commandsCommand)
    .command(getSnippetCommand)
    .command(listSnippetsCommand)
    .command(completeCommand)
    .command(filteringCommand)
    .command(languagesCommand)
    .demandCommand(1, 'Choose a command to run.')
    .help()
    .alias('h', 'help')
    .strict();
}

export async function main(argv: readonly string[] = hideBin(process.argv)) {
  await buildParser(argv).parseAsync();
}
