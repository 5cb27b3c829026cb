/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';

export type LogLevel = 'debug' | 'log' | 'warn' | 'error';

type LogMessage = string | (() => string);

/**
 * Namespaced logger on top of `debug`. One instance per namespace; output is
 * controlled by the `DEBUG` environment variable or {@link enableLogging}.
 */
export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly debugInstance: Debugger;
  private readonly _namespace: string;

  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  static resetForTesting(): void {
    DebugLogger.instances.clear();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this.debugInstance.enabled;
  }

  debug(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  log(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('log', messageOrFn, args);
  }

  warn(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  private write(level: LogLevel, messageOrFn: LogMessage, args: unknown[]) {
    // Skip evaluating lazy messages when the namespace is off.
    if (!this.debugInstance.enabled) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    const prefix = level === 'log' ? '' : `[${level.toUpperCase()}] `;
    this.debugInstance(`${prefix}${message}`, ...args);
  }
}

/**
 * Turns on the given comma-separated namespace patterns, keeping whatever
 * `DEBUG` already enabled.
 */
export function enableLogging(namespaces: string | undefined): void {
  if (!namespaces) {
    return;
  }
  const current = createDebug.disable();
  createDebug.enable(current ? `${current},${namespaces}` : namespaces);
}
