/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { once } from 'node:events';
import { parse } from 'shell-quote';

import {
  DEFAULT_STARTUP_GRACE_MS,
  DEFAULT_TERMINATE_GRACE_MS,
} from '../config.js';
import { getErrorMessage, StartupError, TransportError } from '../errors.js';
import {
  MessageReader,
  MessageWriter,
  type ReadResult,
} from '../protocol/framing.js';
import type { JsonRpcMessage } from '../protocol/messages.js';
import { DebugLogger } from '../utils/logger.js';
import { StderrMonitor, type StderrMonitorOptions } from './stderr-monitor.js';

const logger = DebugLogger.getLogger('lsp-probe:transport');

const STARTUP_STDERR_FLUSH_MS = 100;

export interface TransportStartOptions {
  /** Command line, split with POSIX shell quoting rules. */
  command: string;
  args?: readonly string[];
  /** Overlay on top of the inherited environment; never written back. */
  environment?: Readonly<Record<string, string>>;
  inheritEnvironment?: boolean;
  cwd?: string;
  startupGraceMs?: number;
  stderr?: StderrMonitorOptions;
}

export interface ProcessExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Splits a command line into program and arguments. Shell operators and
 * globs are rejected; the program is spawned directly, not through a shell.
 */
export function parseCommandLine(
  command: string,
  extraArgs: readonly string[] = [],
): string[] {
  const words: string[] = [];
  for (const entry of parse(command)) {
    if (typeof entry !== 'string') {
      throw new StartupError(
        `Unsupported shell syntax in server command: ${command}`,
      );
    }
    words.push(entry);
  }
  if (words.length === 0) {
    throw new StartupError('Server command is empty');
  }
  return [...words, ...extraArgs];
}

export function buildEnvironment(
  overlay: Readonly<Record<string, string>> = {},
  inherit = true,
): NodeJS.ProcessEnv {
  return inherit ? { ...process.env, ...overlay } : { ...overlay };
}

/**
 * Owns one server child process and its three pipes. `send` and `receive`
 * frame messages over stdin/stdout; stderr is drained by a StderrMonitor
 * for the whole lifetime of the process.
 */
export class StdioTransport {
  private readonly reader: MessageReader;
  private readonly writer: MessageWriter;
  private readonly exited: Promise<ProcessExit>;
  private exitInfo: ProcessExit | null = null;

  private constructor(
    private readonly child: ChildProcessWithoutNullStreams,
    readonly stderrMonitor: StderrMonitor,
    readonly commandLine: readonly string[],
  ) {
    this.reader = new MessageReader(child.stdout);
    this.writer = new MessageWriter(child.stdin);
    child.on('error', (error: Error) => {
      logger.debug(() => `server process error: ${error.message}`);
    });
    this.exited = new Promise<ProcessExit>((resolve) => {
      child.once('exit', (exitCode, signal) => {
        this.exitInfo = { exitCode, signal };
        logger.debug(
          () =>
            `server exited (code=${String(exitCode)}, signal=${String(signal)})`,
        );
        resolve(this.exitInfo);
      });
    });
    stderrMonitor.attach(child.stderr);
  }

  /**
   * Spawns the server and waits out the startup grace period. Fails with
   * StartupError when spawning fails or the process exits within it.
   */
  static async start(options: TransportStartOptions): Promise<StdioTransport> {
    const [program, ...args] = parseCommandLine(options.command, options.args);
    if (program === undefined) {
      throw new StartupError('Server command is empty');
    }
    const graceMs = options.startupGraceMs ?? DEFAULT_STARTUP_GRACE_MS;
    logger.debug(() => `spawning ${[program, ...args].join(' ')}`);

    const child = spawn(program, args, {
      cwd: options.cwd,
      env: buildEnvironment(
        options.environment,
        options.inheritEnvironment ?? true,
      ),
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    const spawnFailure = new Promise<Error>((resolve) => {
      child.once('error', resolve);
    });
    const transport = new StdioTransport(
      child,
      new StderrMonitor(options.stderr),
      [program, ...args],
    );

    let graceTimer: ReturnType<typeof setTimeout> | undefined;
    const graceElapsed = new Promise<'ready'>((resolve) => {
      graceTimer = setTimeout(() => resolve('ready'), graceMs);
    });

    const outcome = await Promise.race([
      graceElapsed,
      transport.exited,
      spawnFailure,
    ]);
    clearTimeout(graceTimer);

    if (outcome instanceof Error) {
      transport.releasePipes();
      throw new StartupError(
        `Failed to launch '${program}': ${outcome.message}`,
        { cause: outcome },
      );
    }

    if (outcome !== 'ready') {
      // Let the stderr pipe drain so the tail carries the exit reason.
      await Promise.race([
        once(child, 'close').then(
          () => undefined,
          () => undefined,
        ),
        new Promise<void>((resolve) =>
          setTimeout(resolve, STARTUP_STDERR_FLUSH_MS),
        ),
      ]);
      const stderrTail = transport.stderrMonitor.recentText();
      transport.releasePipes();
      throw new StartupError(
        `Server '${program}' exited during startup (code=${String(outcome.exitCode)}, signal=${String(outcome.signal)})`,
        {
          exitCode: outcome.exitCode,
          signal: outcome.signal,
          stderrTail,
        },
      );
    }

    logger.debug(() => `server started (pid=${String(child.pid)})`);
    return transport;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exitCode(): number | null {
    return this.exitInfo?.exitCode ?? null;
  }

  get signalCode(): NodeJS.Signals | null {
    return this.exitInfo?.signal ?? null;
  }

  isAlive(): boolean {
    return this.exitInfo === null;
  }

  async send(message: JsonRpcMessage, signal?: AbortSignal): Promise<void> {
    if (!this.isAlive()) {
      throw new TransportError(
        `Cannot send to exited server (code=${String(this.exitCode)}): broken pipe`,
      );
    }
    await this.writer.write(message, signal);
  }

  receive(signal?: AbortSignal): Promise<ReadResult> {
    return this.reader.read(signal);
  }

  /**
   * Closes stdin and asks the process to stop; escalates to SIGKILL after
   * `graceMs`. Resolves only once the process has exited.
   */
  async terminate(graceMs = DEFAULT_TERMINATE_GRACE_MS): Promise<ProcessExit> {
    if (this.exitInfo !== null) {
      this.releasePipes();
      return this.exitInfo;
    }

    this.child.stdin.end();
    this.signal('SIGTERM');

    const killTimer = setTimeout(() => {
      if (this.exitInfo === null) {
        logger.warn(
          `server did not exit within ${graceMs}ms of SIGTERM; sending SIGKILL`,
        );
        this.signal('SIGKILL');
      }
    }, graceMs);

    const exit = await this.exited;
    clearTimeout(killTimer);
    this.releasePipes();
    return exit;
  }

  private signal(name: NodeJS.Signals): void {
    try {
      this.child.kill(name);
    } catch (error) {
      logger.debug(() => `kill(${name}) failed: ${getErrorMessage(error)}`);
    }
  }

  private releasePipes(): void {
    this.stderrMonitor.stop();
    this.child.stdin.destroy();
    this.child.stdout.destroy();
    this.child.stderr.destroy();
  }
}
