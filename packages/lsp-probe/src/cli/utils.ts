/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../utils/logger.js';

const logger = DebugLogger.getLogger('lsp-probe:cli');

export function exitCli(exitCode = 0): void {
  logger.debug(() => `exiting with code ${exitCode}`);
  process.exit(exitCode);
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/** Pads or truncates to exactly `width` characters, marking cuts with `...`. */
export function fitColumn(text: string, width: number): string {
  if (text.length > width) {
    return `${text.slice(0, Math.max(0, width - 3))}...`;
  }
  return text.padEnd(width);
}
