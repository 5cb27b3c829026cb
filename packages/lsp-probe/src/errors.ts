/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Error taxonomy for the probe engine. Every error raised by the framer,
 * transport, correlator or session is an `LspProbeError` subclass, so callers
 * can branch on `instanceof` without string matching.
 */

export interface LspProbeErrorOptions {
  cause?: unknown;
}

export class LspProbeError extends Error {
  constructor(message: string, options?: LspProbeErrorOptions) {
    super(message, options);
    this.name = 'LspProbeError';
  }
}

export class StartupError extends LspProbeError {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderrTail: readonly string[];

  constructor(
    message: string,
    details: {
      exitCode?: number | null;
      signal?: NodeJS.Signals | null;
      stderrTail?: readonly string[];
      cause?: unknown;
    } = {},
  ) {
    super(message, { cause: details.cause });
    this.name = 'StartupError';
    this.exitCode = details.exitCode ?? null;
    this.signal = details.signal ?? null;
    this.stderrTail = details.stderrTail ?? [];
  }
}

export class TransportError extends LspProbeError {
  constructor(message: string, options?: LspProbeErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class ProtocolError extends LspProbeError {
  constructor(message: string, options?: LspProbeErrorOptions) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

export class TimeoutError extends LspProbeError {
  readonly method: string;
  readonly requestId: number;
  readonly timeoutMs: number;

  constructor(method: string, requestId: number, timeoutMs: number) {
    super(
      `Request '${method}' (id ${requestId}) timed out after ${timeoutMs}ms`,
    );
    this.name = 'TimeoutError';
    this.method = method;
    this.requestId = requestId;
    this.timeoutMs = timeoutMs;
  }
}

export class ServerDiedError extends LspProbeError {
  readonly method: string;
  readonly requestId: number;

  constructor(method: string, requestId: number) {
    super(
      `Server output closed while awaiting '${method}' (id ${requestId})`,
    );
    this.name = 'ServerDiedError';
    this.method = method;
    this.requestId = requestId;
  }
}

export class HandshakeError extends LspProbeError {
  constructor(message: string, options?: LspProbeErrorOptions) {
    super(message, options);
    this.name = 'HandshakeError';
  }
}

export class InvalidStateError extends LspProbeError {
  readonly operation: string;
  readonly state: string;

  constructor(operation: string, state: string, detail?: string) {
    super(
      detail ??
        `Cannot call '${operation}' while the session is in state '${state}'`,
    );
    this.name = 'InvalidStateError';
    this.operation = operation;
    this.state = state;
  }
}

/**
 * Raised when `workspace/executeCommand` answers with a JSON-RPC error
 * object instead of a result.
 */
export class CommandError extends LspProbeError {
  readonly command: string;
  readonly code: number;
  readonly data: unknown;

  constructor(command: string, code: number, message: string, data?: unknown) {
    super(`Command '${command}' failed (${code}): ${message}`);
    this.name = 'CommandError';
    this.command = command;
    this.code = code;
    this.data = data;
  }
}

export class ConfigError extends LspProbeError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid lsp-probe configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}
