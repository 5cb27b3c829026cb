/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { pathToFileURL } from 'node:url';
import { z } from 'zod';

import {
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_TERMINATE_GRACE_MS,
  type ProbeConfig,
} from '../config.js';
import {
  CommandError,
  getErrorMessage,
  HandshakeError,
  InvalidStateError,
  LspProbeError,
  ServerDiedError,
  TimeoutError,
  TransportError,
} from '../errors.js';
import {
  isResponseError,
  type ResponseMessage,
} from '../protocol/messages.js';
import type {
  ClassificationRule,
  DiagnosticLine,
} from '../transport/stderr-monitor.js';
import { StdioTransport, type ProcessExit } from '../transport/stdio-transport.js';
import { DebugLogger } from '../utils/logger.js';
import {
  Correlator,
  type NotificationSink,
  type ServerRequestHandler,
} from './correlator.js';

const logger = DebugLogger.getLogger('lsp-probe:session');

export const SessionState = {
  Unstarted: 'unstarted',
  Started: 'started',
  Initialized: 'initialized',
  ShuttingDown: 'shutting-down',
  Closed: 'closed',
} as const;

export type SessionState = (typeof SessionState)[keyof typeof SessionState];

export interface SessionOptions {
  command: string;
  args?: readonly string[];
  /** Variables added to the server's environment only. */
  environment?: Readonly<Record<string, string>>;
  inheritEnvironment?: boolean;
  cwd?: string;
  startupGraceMs?: number;
  requestTimeoutMs?: number;
  terminateGraceMs?: number;
  onNotification?: NotificationSink;
  onServerRequest?: ServerRequestHandler;
  onStderrLine?: (line: DiagnosticLine) => void;
  stderrRules?: readonly ClassificationRule[];
  stderrHistorySize?: number;
}

export interface ClientInfo {
  name: string;
  version?: string;
}

export interface InitializeExtras {
  rootUri?: string | null;
  workspaceFolders?: Array<{ uri: string; name: string }> | null;
  initializationOptions?: unknown;
}

const initializeResultSchema = z
  .object({
    capabilities: z.record(z.unknown()),
    serverInfo: z
      .object({ name: z.string(), version: z.string().optional() })
      .optional(),
  })
  .passthrough();

export type InitializeResult = z.infer<typeof initializeResultSchema>;

const executeCommandProviderSchema = z.object({
  executeCommandProvider: z.object({ commands: z.array(z.string()) }),
});

export interface CompletionPosition {
  line: number;
  character: number;
}

/** Maps a filesystem path to a `file://` URI; URIs pass through unchanged. */
export function toDocumentUri(pathOrUri: string): string {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(pathOrUri)
    ? pathOrUri
    : pathToFileURL(pathOrUri).toString();
}

export function sessionOptionsFromConfig(
  config: ProbeConfig,
  extra: Partial<SessionOptions> = {},
): SessionOptions {
  return {
    command: config.serverCommand,
    args: config.serverArgs,
    environment: config.environment,
    cwd: config.cwd,
    startupGraceMs: config.startupGraceMs,
    requestTimeoutMs: config.requestTimeoutMs,
    terminateGraceMs: config.terminateGraceMs,
    ...extra,
  };
}

/**
 * One conversation with one language server process.
 *
 *   unstarted -> started -> initialized -> shutting-down -> closed
 *
 * Any state may go straight to closed. A TransportError or ServerDiedError
 * from any operation closes the session before it reaches the caller.
 */
export class LspSession {
  private currentState: SessionState = SessionState.Unstarted;
  private transport: StdioTransport | null = null;
  private correlator: Correlator | null = null;
  private closing: Promise<void> | null = null;
  private initializedSent = false;
  private capabilities: Record<string, unknown> = {};
  private serverInfo: InitializeResult['serverInfo'];
  private readonly documentVersions = new Map<string, number>();

  constructor(private readonly options: SessionOptions) {}

  /** Spawns the server and returns a session in the `started` state. */
  static async start(options: SessionOptions): Promise<LspSession> {
    const session = new LspSession(options);
    await session.launch();
    return session;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get serverCapabilities(): Readonly<Record<string, unknown>> {
    return this.capabilities;
  }

  get serverName(): string | undefined {
    return this.serverInfo?.name;
  }

  get pid(): number | undefined {
    return this.transport?.pid;
  }

  /** Exit status once the server process is gone, otherwise null. */
  get exit(): ProcessExit | null {
    if (this.transport === null || this.transport.isAlive()) {
      return null;
    }
    return {
      exitCode: this.transport.exitCode,
      signal: this.transport.signalCode,
    };
  }

  isAlive(): boolean {
    return this.transport?.isAlive() ?? false;
  }

  stderrLines(): readonly DiagnosticLine[] {
    return this.transport?.stderrMonitor.recent() ?? [];
  }

  /** `executeCommandProvider.commands` from the server capabilities. */
  executeCommands(): string[] {
    const parsed = executeCommandProviderSchema.safeParse(this.capabilities);
    return parsed.success ? parsed.data.executeCommandProvider.commands : [];
  }

  async launch(): Promise<void> {
    if (this.currentState !== SessionState.Unstarted) {
      throw new InvalidStateError('start', this.currentState);
    }
    const transport = await StdioTransport.start({
      command: this.options.command,
      args: this.options.args,
      environment: this.options.environment,
      inheritEnvironment: this.options.inheritEnvironment,
      cwd: this.options.cwd,
      startupGraceMs: this.options.startupGraceMs,
      stderr: {
        onLine: this.options.onStderrLine,
        rules: this.options.stderrRules,
        historySize: this.options.stderrHistorySize,
      },
    });
    if (this.currentState !== SessionState.Unstarted) {
      // close() ran while the server was starting.
      await transport.terminate(this.terminateGraceMs);
      throw new InvalidStateError('start', this.currentState);
    }
    this.transport = transport;
    this.correlator = new Correlator(transport, {
      onNotification: this.options.onNotification,
      onServerRequest: this.options.onServerRequest,
      defaultTimeoutMs: this.requestTimeoutMs,
    });
    this.currentState = SessionState.Started;
    logger.debug(() => `session started (pid=${String(transport.pid)})`);
  }

  /**
   * Performs the `initialize` request. A response carrying `error`, an
   * unreadable result, or no response in time fails with HandshakeError and
   * closes the session.
   */
  async initialize(
    clientInfo: ClientInfo,
    capabilities: Record<string, unknown> = {},
    extras: InitializeExtras = {},
  ): Promise<InitializeResult> {
    const correlator = this.requireState('initialize', SessionState.Started);
    const params = {
      processId: process.pid,
      clientInfo,
      capabilities,
      rootUri: extras.rootUri ?? null,
      workspaceFolders: extras.workspaceFolders ?? null,
      ...(extras.initializationOptions === undefined
        ? {}
        : { initializationOptions: extras.initializationOptions }),
    };

    let response: ResponseMessage;
    try {
      response = await this.guard(() =>
        correlator.sendRequest('initialize', params),
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        await this.close();
        throw new HandshakeError(
          `Server did not answer 'initialize' within ${error.timeoutMs}ms`,
          { cause: error },
        );
      }
      if (error instanceof ServerDiedError || error instanceof TransportError) {
        await this.close();
        throw new HandshakeError(
          `Server went away during 'initialize': ${error.message}`,
          { cause: error },
        );
      }
      throw error;
    }

    if (isResponseError(response)) {
      await this.close();
      throw new HandshakeError(
        `Server rejected 'initialize' (${response.error.code}): ${response.error.message}`,
      );
    }

    const parsed = initializeResultSchema.safeParse(response.result);
    if (!parsed.success) {
      await this.close();
      throw new HandshakeError(
        `Server returned an invalid 'initialize' result: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`,
      );
    }

    this.capabilities = parsed.data.capabilities;
    this.serverInfo = parsed.data.serverInfo;
    this.currentState = SessionState.Initialized;
    logger.debug(
      () =>
        `initialized ${this.serverInfo?.name ?? 'server'} with ${Object.keys(this.capabilities).length} capabilities`,
    );
    return parsed.data;
  }

  async initialized(): Promise<void> {
    const correlator = this.requireState(
      'initialized',
      SessionState.Initialized,
    );
    if (this.initializedSent) {
      throw new InvalidStateError(
        'initialized',
        this.currentState,
        "The 'initialized' notification was already sent",
      );
    }
    await this.guard(() => correlator.sendNotification('initialized', {}));
    this.initializedSent = true;
  }

  async notify(method: string, params?: unknown): Promise<void> {
    const correlator = this.requireState('notify', SessionState.Initialized);
    await this.guard(() => correlator.sendNotification(method, params));
  }

  /** Sends a request; a response carrying `error` is returned, not thrown. */
  async request(
    method: string,
    params?: unknown,
    timeoutMs?: number,
  ): Promise<ResponseMessage> {
    const correlator = this.requireState('request', SessionState.Initialized);
    return await this.guard(() =>
      correlator.sendRequest(method, params, timeoutMs),
    );
  }

  /**
   * Routes whatever the server sends during `durationMs` (diagnostics,
   * log messages) to the notification sink.
   */
  async waitForNotifications(durationMs: number): Promise<number> {
    const correlator = this.requireState(
      'waitForNotifications',
      SessionState.Initialized,
    );
    return await this.guard(() => correlator.drain(durationMs));
  }

  /** Opens a document at version 1 and returns that version. */
  async didOpen(uri: string, languageId: string, text: string): Promise<number> {
    const documentUri = toDocumentUri(uri);
    if (this.documentVersions.has(documentUri)) {
      throw new InvalidStateError(
        'didOpen',
        this.currentState,
        `Document ${documentUri} is already open`,
      );
    }
    await this.notify('textDocument/didOpen', {
      textDocument: { uri: documentUri, languageId, version: 1, text },
    });
    this.documentVersions.set(documentUri, 1);
    return 1;
  }

  /** Replaces the whole text of an open document; returns the new version. */
  async didChange(uri: string, text: string): Promise<number> {
    const documentUri = toDocumentUri(uri);
    const version = this.openVersion('didChange', documentUri) + 1;
    await this.notify('textDocument/didChange', {
      textDocument: { uri: documentUri, version },
      contentChanges: [{ text }],
    });
    this.documentVersions.set(documentUri, version);
    return version;
  }

  async didClose(uri: string): Promise<void> {
    const documentUri = toDocumentUri(uri);
    this.openVersion('didClose', documentUri);
    await this.notify('textDocument/didClose', {
      textDocument: { uri: documentUri },
    });
    this.documentVersions.delete(documentUri);
  }

  documentVersion(uri: string): number | undefined {
    return this.documentVersions.get(toDocumentUri(uri));
  }

  /** `textDocument/completion` as an explicit user invocation. */
  async completion(
    uri: string,
    position: CompletionPosition,
    timeoutMs?: number,
  ): Promise<ResponseMessage> {
    return await this.request(
      'textDocument/completion',
      {
        textDocument: { uri: toDocumentUri(uri) },
        position,
        context: { triggerKind: 1 },
      },
      timeoutMs,
    );
  }

  /**
   * Runs `workspace/executeCommand` and returns the raw result. A response
   * carrying `error` fails with CommandError.
   */
  async executeCommand(
    command: string,
    args: readonly unknown[] = [],
    timeoutMs?: number,
  ): Promise<unknown> {
    const response = await this.request(
      'workspace/executeCommand',
      { command, arguments: args },
      timeoutMs,
    );
    if (isResponseError(response)) {
      throw new CommandError(
        command,
        response.error.code,
        response.error.message,
        response.error.data,
      );
    }
    return response.result;
  }

  /**
   * Sends `shutdown` and then `exit`, whatever the shutdown outcome.
   * Returns whether the server acknowledged the shutdown. The process is
   * left for {@link close} to reap.
   */
  async shutdown(timeoutMs?: number): Promise<boolean> {
    const correlator = this.requireState(
      'shutdown',
      SessionState.Started,
      SessionState.Initialized,
    );
    this.currentState = SessionState.ShuttingDown;

    let acknowledged = false;
    try {
      const response = await correlator.sendRequest(
        'shutdown',
        undefined,
        timeoutMs,
      );
      acknowledged = !isResponseError(response);
      if (isResponseError(response)) {
        logger.warn(`server refused shutdown: ${response.error.message}`);
      }
    } catch (error) {
      if (!(error instanceof LspProbeError)) {
        throw error;
      }
      logger.warn(`shutdown request failed: ${getErrorMessage(error)}`);
    }

    try {
      await correlator.sendNotification('exit');
    } catch (error) {
      if (!(error instanceof LspProbeError)) {
        throw error;
      }
      logger.debug(() => `exit notification not sent: ${getErrorMessage(error)}`);
    }
    return acknowledged;
  }

  /**
   * Terminates the server process and closes its pipes. Valid in every
   * state; later calls wait for the first one.
   */
  close(): Promise<void> {
    if (this.closing === null) {
      this.closing = this.teardown();
    }
    return this.closing;
  }

  private async teardown(): Promise<void> {
    const previous = this.currentState;
    this.currentState = SessionState.Closed;
    this.documentVersions.clear();
    const transport = this.transport;
    if (transport === null) {
      return;
    }
    const exit = await transport.terminate(this.terminateGraceMs);
    logger.debug(
      () =>
        `session closed from '${previous}' (code=${String(exit.exitCode)}, signal=${String(exit.signal)})`,
    );
  }

  private get requestTimeoutMs(): number {
    return this.options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  private get terminateGraceMs(): number {
    return this.options.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS;
  }

  private requireState(
    operation: string,
    ...allowed: SessionState[]
  ): Correlator {
    if (!allowed.includes(this.currentState)) {
      throw new InvalidStateError(operation, this.currentState);
    }
    if (this.correlator === null) {
      throw new InvalidStateError(operation, this.currentState);
    }
    return this.correlator;
  }

  private openVersion(operation: string, documentUri: string): number {
    const version = this.documentVersions.get(documentUri);
    if (version === undefined) {
      throw new InvalidStateError(
        operation,
        this.currentState,
        `Document ${documentUri} is not open`,
      );
    }
    return version;
  }

  private async guard<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof TransportError || error instanceof ServerDiedError) {
        logger.warn(`closing session: ${error.message}`);
        await this.close();
      }
      throw error;
    }
  }
}

/** Starts a session, runs `body`, and closes the session on every path. */
export async function withSession<T>(
  options: SessionOptions,
  body: (session: LspSession) => Promise<T>,
): Promise<T> {
  const session = await LspSession.start(options);
  try {
    return await body(session);
  } finally {
    await session.close();
  }
}
