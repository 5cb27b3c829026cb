/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Content-Length framing for LSP over a byte stream.
 *
 *   Content-Length: <n>\r\n
 *   [other headers]\r\n
 *   \r\n
 *   <n bytes of UTF-8 JSON>
 */

import type { Readable, Writable } from 'node:stream';

import { getErrorMessage, ProtocolError, TransportError } from '../errors.js';
import { DebugLogger } from '../utils/logger.js';
import {
  decodeMessage,
  toWireObject,
  type JsonRpcMessage,
} from './messages.js';

const logger = DebugLogger.getLogger('lsp-probe:framing');

const CONTENT_LENGTH_HEADER = 'content-length:';
const LINE_FEED = 0x0a;

// ─── Encoding ────────────────────────────────────────────────────────────────

export function encodeMessage(message: JsonRpcMessage): Buffer {
  const body = Buffer.from(JSON.stringify(toWireObject(message)), 'utf8');
  const header = Buffer.from(`Content-Length: ${body.length}\r\n\r\n`, 'ascii');
  return Buffer.concat([header, body]);
}

// ─── Decoding ────────────────────────────────────────────────────────────────

export type DecodedFrame =
  | { ok: true; message: JsonRpcMessage }
  | { ok: false; error: ProtocolError };

type DecoderPhase = 'seek' | 'headers' | 'body';

/**
 * Incremental decoder. Bytes go in through {@link feed}; every complete frame
 * comes out exactly once, either as a decoded message or as the
 * ProtocolError that frame produced. Decoding resumes at the next header
 * after an error.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private phase: DecoderPhase = 'seek';
  private contentLength = 0;

  feed(chunk: Buffer): DecodedFrame[] {
    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: DecodedFrame[] = [];

    while (true) {
      if (this.phase === 'body') {
        if (this.buffer.length < this.contentLength) {
          break;
        }
        const body = this.buffer.subarray(0, this.contentLength);
        this.buffer = this.buffer.subarray(this.contentLength);
        this.phase = 'seek';
        frames.push(this.decodeBody(body));
        continue;
      }

      if (this.phase === 'seek') {
        if (!this.seekHeader(frames)) {
          break;
        }
        continue;
      }

      const line = this.takeLine();
      if (line === null) {
        break;
      }

      if (line.length === 0) {
        this.phase = 'body';
      } else {
        logger.debug(() => `skipping header line '${line}'`);
      }
    }

    return frames;
  }

  /**
   * True when the stream stopped inside a frame: after a Content-Length line,
   * or with unread non-blank bytes.
   */
  hasPartialFrame(): boolean {
    if (this.phase !== 'seek') {
      return true;
    }
    return this.buffer.toString('utf8').trim().length > 0;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.phase = 'seek';
    this.contentLength = 0;
  }

  /**
   * Looks for the next Content-Length header at any offset, so a frame that
   * follows garbage or a rejected header is still found. Returns false when
   * more bytes are needed.
   */
  private seekHeader(frames: DecodedFrame[]): boolean {
    const text = this.buffer.toString('latin1').toLowerCase();
    const start = text.indexOf(CONTENT_LENGTH_HEADER);
    if (start < 0) {
      this.keepPossibleHeaderPrefix(text);
      return false;
    }
    if (start > 0) {
      const skipped = this.buffer.subarray(0, start).toString('utf8');
      if (skipped.trim().length > 0) {
        logger.debug(
          () => `skipping bytes before Content-Length: '${skipped.trim()}'`,
        );
      }
      this.buffer = this.buffer.subarray(start);
    }

    const line = this.takeLine();
    if (line === null) {
      return false;
    }

    const value = line.slice(CONTENT_LENGTH_HEADER.length).trim();
    if (!/^\d+$/.test(value)) {
      frames.push({
        ok: false,
        error: new ProtocolError(
          value.length === 0
            ? 'Missing Content-Length value'
            : `Invalid Content-Length value '${value}'`,
        ),
      });
      return true;
    }

    this.contentLength = Number.parseInt(value, 10);
    this.phase = 'headers';
    return true;
  }

  /** Drops everything except a tail that may grow into a header. */
  private keepPossibleHeaderPrefix(text: string): void {
    const longest = Math.min(text.length, CONTENT_LENGTH_HEADER.length - 1);
    for (let size = longest; size > 0; size--) {
      if (CONTENT_LENGTH_HEADER.startsWith(text.slice(text.length - size))) {
        this.buffer = this.buffer.subarray(this.buffer.length - size);
        return;
      }
    }
    if (text.trim().length > 0) {
      logger.debug(
        () => `skipping bytes before Content-Length: '${text.trim()}'`,
      );
    }
    this.buffer = Buffer.alloc(0);
  }

  private takeLine(): string | null {
    const newline = this.buffer.indexOf(LINE_FEED);
    if (newline < 0) {
      return null;
    }
    const end =
      newline > 0 && this.buffer[newline - 1] === 0x0d ? newline - 1 : newline;
    const line = this.buffer.subarray(0, end).toString('ascii');
    this.buffer = this.buffer.subarray(newline + 1);
    return line;
  }

  private decodeBody(body: Buffer): DecodedFrame {
    let payload: unknown;
    try {
      payload = JSON.parse(body.toString('utf8'));
    } catch (error) {
      return {
        ok: false,
        error: new ProtocolError(
          `Malformed JSON payload (${body.length} bytes): ${getErrorMessage(error)}`,
          { cause: error },
        ),
      };
    }

    try {
      return { ok: true, message: decodeMessage(payload) };
    } catch (error) {
      if (error instanceof ProtocolError) {
        return { ok: false, error };
      }
      throw error;
    }
  }
}

// ─── Reader ──────────────────────────────────────────────────────────────────

export type ReadResult =
  | { done: false; message: JsonRpcMessage }
  | { done: true };

type QueuedItem = DecodedFrame | { ok: false; error: TransportError };

interface ReadWaiter {
  resolve: (result: ReadResult) => void;
  reject: (error: Error) => void;
  detach: () => void;
}

/**
 * Pull-style reader over a Readable. `read()` suspends until a whole message
 * is framed or the stream ends; it never yields a partial message. Pending
 * reads can be cancelled with an AbortSignal, and a cancelled read never
 * takes a message off the queue.
 */
export class MessageReader {
  private readonly decoder = new FrameDecoder();
  private readonly queue: QueuedItem[] = [];
  private readonly waiters: ReadWaiter[] = [];
  private ended = false;

  constructor(stream: Readable) {
    stream.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      for (const frame of this.decoder.feed(bytes)) {
        this.queue.push(frame);
      }
      this.deliver();
    });
    stream.on('end', () => this.finish());
    stream.on('close', () => this.finish());
    stream.on('error', (error: Error) => {
      this.queue.push({
        ok: false,
        error: new TransportError(`Read failed: ${error.message}`, {
          cause: error,
        }),
      });
      this.finish();
    });
  }

  get isEnded(): boolean {
    return this.ended;
  }

  read(signal?: AbortSignal): Promise<ReadResult> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    return new Promise<ReadResult>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(abortReason(signal));
      };
      const waiter: ReadWaiter = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
      this.deliver();
    });
  }

  private finish(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    if (this.decoder.hasPartialFrame()) {
      this.queue.push({
        ok: false,
        error: new ProtocolError('Stream closed in the middle of a message'),
      });
      this.decoder.reset();
    }
    this.deliver();
  }

  private deliver(): void {
    while (this.waiters.length > 0) {
      const item = this.queue.shift();
      if (item === undefined && !this.ended) {
        return;
      }
      const waiter = this.waiters.shift();
      if (waiter === undefined) {
        return;
      }
      waiter.detach();
      if (item === undefined) {
        waiter.resolve({ done: true });
      } else if (item.ok) {
        waiter.resolve({ done: false, message: item.message });
      } else {
        waiter.reject(item.error);
      }
    }
  }
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error('Operation aborted');
}

// ─── Writer ──────────────────────────────────────────────────────────────────

export class MessageWriter {
  private failure: Error | null = null;

  constructor(private readonly stream: Writable) {
    // Without a listener an EPIPE would surface as an uncaught 'error' event.
    stream.on('error', (error: Error) => {
      this.failure = error;
      logger.debug(() => `write stream error: ${error.message}`);
    });
  }

  /**
   * Resolves once the frame is flushed to the stream. An aborted signal
   * rejects with its reason, even while the peer is not reading.
   */
  write(message: JsonRpcMessage, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    if (
      this.failure !== null ||
      this.stream.destroyed ||
      this.stream.writableEnded
    ) {
      return Promise.reject(
        new TransportError('Cannot write message: broken pipe', {
          cause: this.failure ?? undefined,
        }),
      );
    }

    const frame = encodeMessage(message);
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => reject(abortReason(signal));
      signal?.addEventListener('abort', onAbort, { once: true });
      this.stream.write(frame, (error?: Error | null) => {
        signal?.removeEventListener('abort', onAbort);
        if (error) {
          reject(
            new TransportError(`Cannot write message: ${error.message}`, {
              cause: error,
            }),
          );
          return;
        }
        resolve();
      });
    });
  }
}
