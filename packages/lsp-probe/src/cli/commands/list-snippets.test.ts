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
import { snippetSchema } from './get-snippet.js';
import { formatSnippetTable, handleListSnippets } from './list-snippets.js';

describe('formatSnippetTable', () => {
  it('prints a header, one row per snippet and a total', () => {
    const snippets = [
      snippetSchema.parse({
        id: 12,
        title: 'deploy',
        content: 'kubectl apply -f deploy.yaml\nkubectl rollout status',
        tags: ['k8s', 'ops', '_snip_'],
      }),
      snippetSchema.parse({ id: 3, url: '  ls -la' }),
    ];

    expect(formatSnippetTable(snippets, 10)).toEqual([
      `${'ID'.padEnd(5)} ${'Title'.padEnd(25)} ${'Preview'.padEnd(10)} Tags`,
      `${'12'.padEnd(5)} ${'deploy'.padEnd(25)} kubectl... k8s, ops`,
      `${'3'.padEnd(5)} ${'Untitled'.padEnd(25)} ls -la`,
      'Total: 2 snippets',
    ]);
  });

  it('shows at most three tags', () => {
    const [, row] = formatSnippetTable(
      [snippetSchema.parse({ id: 1, title: 't', tags: ['a', 'b', 'c', 'd'] })],
      4,
    );

    expect(row).toBe(`${'1'.padEnd(5)} ${'t'.padEnd(25)} ${''.padEnd(4)} a, b, c...`);
  });
});

describe('handleListSnippets', () => {
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

  it('prints a table of every snippet', async () => {
    await handleListSnippets({ json: false, preview: 20 }, stubContext());

    expect(consoleLogSpy).toHaveBeenCalledWith(
      [
        `${'ID'.padEnd(5)} ${'Title'.padEnd(25)} ${'Preview'.padEnd(20)} Tags`,
        `${'1'.padEnd(5)} ${'hello-shell'.padEnd(25)} echo "hello"`,
        `${'2'.padEnd(5)} ${'list-files'.padEnd(25)} ls -la`,
        `${'3'.padEnd(5)} ${'py-main'.padEnd(25)} def main(): ...`,
        'Total: 3 snippets',
      ].join('\n'),
    );
    expect(processSpy).not.toHaveBeenCalled();
  });

  it('filters by language and prints JSON', async () => {
    await handleListSnippets(
      { language: 'sh', json: true, preview: 50 },
      stubContext(),
    );

    const printed: unknown = JSON.parse(
      String(consoleLogSpy.mock.calls[0]?.[0]),
    );
    expect(printed).toEqual([
      { id: 1, title: 'hello-shell', language: 'sh', content: 'echo "hello"', tags: [] },
      { id: 2, title: 'list-files', language: 'sh', content: 'ls -la', tags: [] },
    ]);
  });

  it('says so when a language has no snippets', async () => {
    await handleListSnippets(
      { language: 'rust', json: false, preview: 50 },
      stubContext(),
    );

    expect(consoleLogSpy).toHaveBeenCalledWith('No rust snippets found');
    expect(processSpy).not.toHaveBeenCalled();
  });

  it('shows the details of one listed snippet', async () => {
    await handleListSnippets(
      { json: false, preview: 50, detailId: 2 },
      stubContext(),
    );

    expect(consoleLogSpy).toHaveBeenCalledWith(
      ['Title: list-files', 'ID: 2', 'Content:', 'ls -la'].join('\n'),
    );
    expect(processSpy).not.toHaveBeenCalled();
  });

  it('fails when the detail ID is not among the listed snippets', async () => {
    await handleListSnippets(
      { language: 'sh', json: false, preview: 50, detailId: 3 },
      stubContext(),
    );

    expect(consoleErrorSpy).toHaveBeenCalledWith('Snippet with ID 3 not found');
    expect(processSpy).toHaveBeenCalledWith(1);
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });
});
