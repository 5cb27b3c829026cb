/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  sessionOptionsFromConfig,
  withSession,
  type ClientInfo,
  type LspSession,
} from '../service/session.js';
import type { NotificationMessage } from '../protocol/messages.js';
import type { DiagnosticLine } from '../transport/stderr-monitor.js';
import { DebugLogger } from '../utils/logger.js';
import type { ProbeContext } from './options.js';

const logger = DebugLogger.getLogger('lsp-probe:cli');

export const CLIENT_INFO: ClientInfo = { name: 'lsp-probe', version: '0.1.0' };

export const CLIENT_CAPABILITIES: Record<string, unknown> = {
  textDocument: {
    completion: {
      completionItem: { snippetSupport: true },
    },
  },
  workspace: {
    executeCommand: { dynamicRegistration: true },
  },
};

function echoStderr(line: DiagnosticLine): void {
  console.error(`[SERVER] ${line.text}`);
}

function logNotification(notification: NotificationMessage): void {
  logger.debug(
    () =>
      `notification ${notification.method}: ${JSON.stringify(notification.params ?? null)}`,
  );
}

/** Starts a session for `context` without performing the handshake. */
export async function openSession<T>(
  context: ProbeContext,
  body: (session: LspSession) => Promise<T>,
): Promise<T> {
  return await withSession(
    sessionOptionsFromConfig(context.config, {
      onNotification: logNotification,
      onStderrLine: context.echoServerStderr ? echoStderr : undefined,
    }),
    body,
  );
}

/**
 * Runs `body` between a completed handshake and a shutdown. The session is
 * closed on every path.
 */
export async function runProbe<T>(
  context: ProbeContext,
  body: (session: LspSession) => Promise<T>,
): Promise<T> {
  return await openSession(context, async (session) => {
    await session.initialize(CLIENT_INFO, CLIENT_CAPABILITIES);
    await session.initialized();
    const result = await body(session);
    const acknowledged = await session.shutdown();
    logger.debug(() => `shutdown acknowledged: ${acknowledged}`);
    return result;
  });
}
