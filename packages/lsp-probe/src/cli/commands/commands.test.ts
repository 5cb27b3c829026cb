/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  vi,
  type MockInstance,
} from 'vitest';

import { stubContext } from '../../../test/helpers.js';
import { formatCommandList, handleCommands } from './commands.js';

const STUB_COMMANDS = [
  'x.test',
  'bkmr.getSnippet',
  'bkmr.listSnippets',
  'fail.command',
];

describe('formatCommandList', () => {
  it('numbers commands and describes the known ones', () => {
    expect(formatCommandList(STUB_COMMANDS)).toEqual([
      '1. x.test',
      '2. bkmr.getSnippet: Retrieve a specific snippet by ID',
      '3. bkmr.listSnippets: List snippets with optional language filtering',
      '4. fail.command',
      'Total: 4 commands available',
    ]);
  });

  it('says so when the server reports none', () => {
    expect(formatCommandList([])).toEqual(['No commands reported by server']);
  });
});

describe('handleCommands', () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;
  let processSpy: MockInstance;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    processSpy = vi
      .spyOn(process, 'exit')
      .mockImplementation(() => undefined as never);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists the commands the server advertises', async () => {
    await handleCommands({ json: false }, stubContext());

    expect(consoleLogSpy).toHaveBeenCalledWith(
      formatCommandList(STUB_COMMANDS).join('\n'),
    );
    expect(processSpy).not.toHaveBeenCalled();
  });

  it('prints JSON and the result of a test command', async () => {
    await handleCommands({ json: true, testCommand: 'x.test' }, stubContext());

    expect(consoleLogSpy).toHaveBeenNthCalledWith(
      1,
      JSON.stringify({ availableCommands: STUB_COMMANDS }, null, 2),
    );
    expect(consoleLogSpy).toHaveBeenNthCalledWith(
      2,
      'x.test returned: {"ok":true}',
    );
    expect(processSpy).not.toHaveBeenCalled();
  });

  it('reports a failing test command and exits with 1', async () => {
    await handleCommands(
      { json: false, testCommand: 'fail.command' },
      stubContext(),
    );

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      "Command 'fail.command' failed (-32000): command failed",
    );
    expect(processSpy).toHaveBeenCalledWith(1);
  });

  it('reports an empty command list', async () => {
    await handleCommands(
      { json: false },
      stubContext(['--empty-capabilities']),
    );

    expect(consoleLogSpy).toHaveBeenCalledWith('No commands reported by server');
  });
});
