/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createInterface, type Interface } from 'node:readline';
import type { Readable } from 'node:stream';

import { getErrorMessage } from '../errors.js';
import { DebugLogger } from '../utils/logger.js';

const logger = DebugLogger.getLogger('lsp-probe:stderr');

export type DiagnosticSeverity =
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'notable'
  | 'other';

export interface DiagnosticLine {
  severity: DiagnosticSeverity;
  text: string;
  timestamp: number;
}

export interface ClassificationRule {
  severity: DiagnosticSeverity;
  pattern: RegExp;
}

/**
 * First match wins. Level markers come from env_logger/tracing output
 * (`ERROR`, `WARN`, ...); the `notable` markers are progress lines the
 * snippet server prints while serving requests.
 */
export const DEFAULT_CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { severity: 'error', pattern: /\bERROR\b|\bpanicked\b/ },
  { severity: 'warn', pattern: /\bWARN(ING)?\b/ },
  { severity: 'notable', pattern: /Successfully|Executing|snippets found/ },
  { severity: 'info', pattern: /\bINFO\b/ },
  { severity: 'debug', pattern: /\bDEBUG\b/ },
  { severity: 'trace', pattern: /\bTRACE\b/ },
];

export const DEFAULT_STDERR_HISTORY = 50;

export function classifyLine(
  text: string,
  rules: readonly ClassificationRule[] = DEFAULT_CLASSIFICATION_RULES,
): DiagnosticSeverity {
  for (const rule of rules) {
    if (rule.pattern.test(text)) {
      return rule.severity;
    }
  }
  return 'other';
}

export interface StderrMonitorOptions {
  onLine?: (line: DiagnosticLine) => void;
  rules?: readonly ClassificationRule[];
  historySize?: number;
}

/**
 * Drains a child's error stream line by line on its own listener, so the
 * child never stalls on a full pipe and protocol reads never wait on it.
 * Advisory only: nothing here throws to the caller.
 */
export class StderrMonitor {
  private readonly rules: readonly ClassificationRule[];
  private readonly historySize: number;
  private readonly history: DiagnosticLine[] = [];
  private lineReader: Interface | null = null;
  private stopped = false;

  constructor(private readonly options: StderrMonitorOptions = {}) {
    this.rules = options.rules ?? DEFAULT_CLASSIFICATION_RULES;
    this.historySize = Math.max(0, options.historySize ?? DEFAULT_STDERR_HISTORY);
  }

  attach(stream: Readable): void {
    if (this.lineReader !== null) {
      return;
    }

    // Swallowed: a failing error pipe must not take the session down.
    stream.on('error', (error: Error) => {
      logger.debug(() => `stderr stream error: ${error.message}`);
    });

    const lineReader = createInterface({ input: stream, crlfDelay: Infinity });
    this.lineReader = lineReader;
    lineReader.on('line', (text) => this.handleLine(text));
    lineReader.on('error', (error: Error) => {
      logger.debug(() => `stderr line reader error: ${error.message}`);
    });
    lineReader.on('close', () => {
      this.stopped = true;
    });
    // A destroyed stream never emits 'end', so readline would stay open.
    stream.once('close', () => this.stop());
  }

  get isRunning(): boolean {
    return this.lineReader !== null && !this.stopped;
  }

  /** Most recent lines, oldest first. */
  recent(): readonly DiagnosticLine[] {
    return [...this.history];
  }

  recentText(): string[] {
    return this.history.map((line) => line.text);
  }

  stop(): void {
    if (this.lineReader !== null && !this.stopped) {
      this.stopped = true;
      this.lineReader.close();
    }
  }

  private handleLine(raw: string): void {
    const text = raw.trimEnd();
    if (text.length === 0) {
      return;
    }

    let line: DiagnosticLine;
    try {
      line = {
        severity: classifyLine(text, this.rules),
        text,
        timestamp: Date.now(),
      };
    } catch (error) {
      logger.debug(() => `classification failed: ${getErrorMessage(error)}`);
      return;
    }

    if (this.historySize > 0) {
      this.history.push(line);
      if (this.history.length > this.historySize) {
        this.history.shift();
      }
    }

    logger.log(() => `[${line.severity}] ${text}`);

    try {
      this.options.onLine?.(line);
    } catch (error) {
      logger.debug(() => `stderr sink threw: ${getErrorMessage(error)}`);
    }
  }
}
