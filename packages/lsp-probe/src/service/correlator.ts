/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DEFAULT_REQUEST_TIMEOUT_MS } from '../config.js';
import {
  getErrorMessage,
  InvalidStateError,
  ServerDiedError,
  TimeoutError,
} from '../errors.js';
import type { ReadResult } from '../protocol/framing.js';
import {
  describeMessage,
  ErrorCodes,
  type JsonRpcId,
  type JsonRpcMessage,
  type NotificationMessage,
  type RequestMessage,
  type ResponseMessage,
} from '../protocol/messages.js';
import { DebugLogger } from '../utils/logger.js';

const logger = DebugLogger.getLogger('lsp-probe:correlator');

/** The two operations the correlator needs from a transport. */
export interface MessageChannel {
  send(message: JsonRpcMessage, signal?: AbortSignal): Promise<void>;
  receive(signal?: AbortSignal): Promise<ReadResult>;
}

export type NotificationSink = (notification: NotificationMessage) => void;

/**
 * Answers a request the server sends to the client. The return value is sent
 * back as the result; a thrown error becomes an InternalError response.
 */
export type ServerRequestHandler = (
  request: RequestMessage,
) => unknown | Promise<unknown>;

export interface CorrelatorOptions {
  onNotification?: NotificationSink;
  onServerRequest?: ServerRequestHandler;
  defaultTimeoutMs?: number;
  /** How many timed-out request ids are remembered to quiet late replies. */
  abandonedLimit?: number;
}

export const DEFAULT_ABANDONED_LIMIT = 100;

export interface PendingRequest {
  id: number;
  method: string;
  submittedAt: number;
}

/**
 * Matches responses to requests by id over a single channel.
 *
 * Only one `sendRequest` (or `drain`) runs at a time: its read loop is the
 * only reader of the channel, and a second loop would consume the first
 * one's response. Everything read that is not the awaited response is
 * routed: notifications to the sink, server requests to the handler, stray
 * responses are dropped.
 */
export class Correlator {
  private lastId = 0;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly abandoned = new Set<JsonRpcId>();
  private busy: string | null = null;
  private readonly defaultTimeoutMs: number;
  private readonly abandonedLimit: number;

  constructor(
    private readonly channel: MessageChannel,
    private readonly options: CorrelatorOptions = {},
  ) {
    this.defaultTimeoutMs =
      options.defaultTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.abandonedLimit = options.abandonedLimit ?? DEFAULT_ABANDONED_LIMIT;
  }

  nextId(): number {
    this.lastId += 1;
    return this.lastId;
  }

  pendingRequests(): PendingRequest[] {
    return [...this.pending.values()];
  }

  /** Ids of timed-out requests whose late response has not arrived yet. */
  abandonedRequests(): JsonRpcId[] {
    return [...this.abandoned];
  }

  /**
   * Sends a request and reads until its response arrives. Fails with
   * TimeoutError when `timeoutMs` elapses first, and with ServerDiedError
   * when the server's output ends. The deadline covers writing the request
   * and answering server requests as well as reading. A response carrying
   * `error` is returned, not thrown.
   */
  async sendRequest(
    method: string,
    params?: unknown,
    timeoutMs: number = this.defaultTimeoutMs,
  ): Promise<ResponseMessage> {
    this.acquire(method);
    const id = this.nextId();
    const entry: PendingRequest = { id, method, submittedAt: Date.now() };
    this.pending.set(id, entry);

    const deadline = entry.submittedAt + timeoutMs;
    const controller = new AbortController();
    const timer = new DeadlineTimer(deadline, () => {
      controller.abort(new TimeoutError(method, id, timeoutMs));
    });

    try {
      logger.debug(() => `>> ${method} (id ${id})`);
      const signal = controller.signal;
      await this.channel.send({ kind: 'request', id, method, params }, signal);

      while (true) {
        const result = await this.channel.receive(signal);
        if (result.done) {
          throw new ServerDiedError(method, id);
        }

        const message = result.message;
        if (message.kind === 'response' && message.id === id) {
          logger.debug(
            () =>
              `<< ${describeMessage(message)} after ${Date.now() - entry.submittedAt}ms`,
          );
          return message;
        }
        await this.route(message, signal);
      }
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.abandon(id);
        logger.warn(error.message);
      }
      throw error;
    } finally {
      timer.cancel();
      this.pending.delete(id);
      this.busy = null;
    }
  }

  async sendNotification(method: string, params?: unknown): Promise<void> {
    logger.debug(() => `>> ${method} (notification)`);
    await this.channel.send({ kind: 'notification', method, params });
  }

  /**
   * Reads and routes incoming messages for `durationMs`, so notifications
   * sent between requests reach the sink. Returns how many messages were
   * routed; stops early when the server output ends.
   */
  async drain(durationMs: number): Promise<number> {
    this.acquire('drain');
    const controller = new AbortController();
    const timer = new DeadlineTimer(Date.now() + durationMs, () => {
      controller.abort(new Error('drain window elapsed'));
    });
    const signal = controller.signal;
    let routed = 0;

    try {
      while (!signal.aborted) {
        const result = await this.channel.receive(signal);
        if (result.done) {
          break;
        }
        await this.route(result.message, signal);
        routed += 1;
      }
    } catch (error) {
      if (!signal.aborted) {
        throw error;
      }
    } finally {
      timer.cancel();
      this.busy = null;
    }
    return routed;
  }

  private acquire(operation: string): void {
    if (this.busy !== null) {
      throw new InvalidStateError(
        operation,
        'awaiting-response',
        `Cannot start '${operation}' while '${this.busy}' is still reading; requests must be serialized`,
      );
    }
    this.busy = operation;
  }

  private abandon(id: number): void {
    this.abandoned.add(id);
    for (const oldest of this.abandoned) {
      if (this.abandoned.size <= this.abandonedLimit) {
        break;
      }
      this.abandoned.delete(oldest);
    }
  }

  private async route(
    message: JsonRpcMessage,
    signal: AbortSignal,
  ): Promise<void> {
    switch (message.kind) {
      case 'notification':
        this.deliverNotification(message);
        return;
      case 'request':
        await this.answerServerRequest(message, signal);
        return;
      case 'response':
        this.dropStrayResponse(message);
        return;
      default:
        return;
    }
  }

  private deliverNotification(notification: NotificationMessage): void {
    logger.debug(() => `<< ${describeMessage(notification)}`);
    try {
      this.options.onNotification?.(notification);
    } catch (error) {
      logger.error(
        `notification sink failed on '${notification.method}': ${getErrorMessage(error)}`,
      );
    }
  }

  private dropStrayResponse(response: ResponseMessage): void {
    if (response.id !== null && this.abandoned.delete(response.id)) {
      logger.debug(
        () => `dropping late response for abandoned request ${response.id}`,
      );
      return;
    }
    logger.warn(
      `dropping ${describeMessage(response)}: no pending request has that id`,
    );
  }

  private async answerServerRequest(
    request: RequestMessage,
    signal: AbortSignal,
  ): Promise<void> {
    logger.debug(() => `<< ${describeMessage(request)}`);
    const handler = this.options.onServerRequest;
    let reply: ResponseMessage;

    if (handler === undefined) {
      reply = {
        kind: 'response',
        id: request.id,
        error: {
          code: ErrorCodes.MethodNotFound,
          message: `Unhandled method ${request.method}`,
        },
      };
    } else {
      try {
        const result = await untilAborted(
          Promise.resolve().then(() => handler(request)),
          signal,
        );
        reply = {
          kind: 'response',
          id: request.id,
          result: result === undefined ? null : result,
        };
      } catch (error) {
        if (signal.aborted && error === signal.reason) {
          throw error;
        }
        reply = {
          kind: 'response',
          id: request.id,
          error: {
            code: ErrorCodes.InternalError,
            message: getErrorMessage(error),
          },
        };
      }
    }

    await this.channel.send(reply, signal);
  }
}

/** Settles with `work`, or rejects with the signal's reason once it aborts. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * setTimeout may fire a little before the requested delay; this re-arms
 * until the wall-clock deadline has really passed.
 */
class DeadlineTimer {
  private handle: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly deadline: number,
    private readonly onExpired: () => void,
  ) {
    this.arm();
  }

  cancel(): void {
    if (this.handle !== null) {
      clearTimeout(this.handle);
      this.handle = null;
    }
  }

  private arm(): void {
    const remaining = this.deadline - Date.now();
    if (remaining <= 0) {
      this.handle = null;
      this.onExpired();
      return;
    }
    this.handle = setTimeout(() => this.arm(), remaining);
  }
}
