/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { DebugLogger, enableLogging } from '../src/utils/logger.js';

describe('DebugLogger', () => {
  afterEach(() => {
    createDebug.disable();
    DebugLogger.resetForTesting();
  });

  it('returns one instance per namespace', () => {
    const first = DebugLogger.getLogger('lsp-probe-test:one');

    expect(DebugLogger.getLogger('lsp-probe-test:one')).toBe(first);
    expect(DebugLogger.getLogger('lsp-probe-test:two')).not.toBe(first);
    expect(first.namespace).toBe('lsp-probe-test:one');
  });

  it('does not evaluate lazy messages while disabled', () => {
    const logger = DebugLogger.getLogger('lsp-probe-test:lazy');
    const message = vi.fn(() => 'expensive');

    logger.debug(message);

    expect(logger.enabled).toBe(false);
    expect(message).not.toHaveBeenCalled();
  });

  it('enables namespaces on request', () => {
    const logger = DebugLogger.getLogger('lsp-probe-test:on');
    enableLogging('lsp-probe-test:*');

    expect(logger.enabled).toBe(true);
  });

  it('ignores an empty namespace list', () => {
    enableLogging(undefined);

    expect(DebugLogger.getLogger('lsp-probe-test:off').enabled).toBe(false);
  });
});
