/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { fileURLToPath } from 'node:url';
import { quote } from 'shell-quote';

import type { ProbeContext } from '../src/cli/options.js';
import { loadProbeConfig, type ProbeConfigInput } from '../src/config.js';

export const STUB_SERVER = fileURLToPath(
  new URL('./fixtures/stub-lsp-server.ts', import.meta.url),
);

/** Command line that runs the stub language server with the given flags. */
export function stubCommand(...flags: string[]): string {
  return quote([process.execPath, '--import', 'tsx', STUB_SERVER, ...flags]);
}

/** Command line that runs an inline Node.js script. */
export function nodeCommand(script: string): string {
  return quote([process.execPath, '-e', script]);
}

/** CLI context whose server is the stub, with short grace periods. */
export function stubContext(
  flags: string[] = [],
  overrides: ProbeConfigInput = {},
): ProbeContext {
  return {
    config: loadProbeConfig(
      {},
      {
        serverCommand: stubCommand(...flags),
        startupGraceMs: 100,
        terminateGraceMs: 500,
        ...overrides,
      },
    ),
    echoServerStderr: false,
  };
}
