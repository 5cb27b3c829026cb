/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

import { ProtocolError } from '../errors.js';

export type JsonRpcId = number | string;

export interface ResponseErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface RequestMessage {
  kind: 'request';
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface NotificationMessage {
  kind: 'notification';
  method: string;
  params?: unknown;
}

/**
 * A response carries exactly one of `result` and `error`; `id` is null only
 * when the server could not read the id of the request it answers.
 */
export type ResponseMessage =
  | { kind: 'response'; id: JsonRpcId | null; result: unknown }
  | { kind: 'response'; id: JsonRpcId | null; error: ResponseErrorObject };

export type JsonRpcMessage =
  | RequestMessage
  | NotificationMessage
  | ResponseMessage;

export const ErrorCodes = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  ServerNotInitialized: -32002,
} as const;

const responseErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const envelopeSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: z.union([z.number().int(), z.string()]).nullable().optional(),
    method: z.string().optional(),
    params: z.unknown().optional(),
    result: z.unknown().optional(),
    error: responseErrorSchema.optional(),
  })
  .passthrough();

function hasKey(value: unknown, key: string): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.prototype.hasOwnProperty.call(value, key)
  );
}

/**
 * Classifies a parsed JSON payload into one of the three JSON-RPC shapes.
 * Throws ProtocolError for anything else.
 */
export function decodeMessage(payload: unknown): JsonRpcMessage {
  const parsed = envelopeSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '';
    throw new ProtocolError(
      `Invalid JSON-RPC message${where ? ` at '${where}'` : ''}: ${issue?.message ?? 'unknown shape'}`,
    );
  }

  const raw = parsed.data;

  if (raw.method !== undefined) {
    if (hasKey(payload, 'result') || hasKey(payload, 'error')) {
      throw new ProtocolError(
        `Message '${raw.method}' carries both a method and a result or error`,
      );
    }
    if (raw.id !== undefined && raw.id !== null) {
      return {
        kind: 'request',
        id: raw.id,
        method: raw.method,
        params: raw.params,
      };
    }
    return { kind: 'notification', method: raw.method, params: raw.params };
  }

  if (!hasKey(payload, 'id')) {
    throw new ProtocolError('JSON-RPC message has neither a method nor an id');
  }

  const id = raw.id ?? null;
  const hasResult = hasKey(payload, 'result');
  if (hasResult === (raw.error !== undefined)) {
    throw new ProtocolError(
      `Response ${String(id)} must carry exactly one of 'result' and 'error'`,
    );
  }
  if (raw.error !== undefined) {
    return { kind: 'response', id, error: raw.error };
  }
  return { kind: 'response', id, result: raw.result };
}

/**
 * Produces the object that goes on the wire: the `kind` tag is dropped,
 * `jsonrpc` is added, and an absent `params` is left out.
 */
export function toWireObject(message: JsonRpcMessage): Record<string, unknown> {
  switch (message.kind) {
    case 'request':
      return withParams(
        { jsonrpc: '2.0', id: message.id, method: message.method },
        message.params,
      );
    case 'notification':
      return withParams(
        { jsonrpc: '2.0', method: message.method },
        message.params,
      );
    case 'response':
      if ('error' in message) {
        return { jsonrpc: '2.0', id: message.id, error: message.error };
      }
      return { jsonrpc: '2.0', id: message.id, result: message.result };
    default: {
      const unreachable: never = message;
      throw new ProtocolError(`Unknown message ${JSON.stringify(unreachable)}`);
    }
  }
}

function withParams(
  base: Record<string, unknown>,
  params: unknown,
): Record<string, unknown> {
  return params === undefined ? base : { ...base, params };
}

export function isResponseError(
  message: ResponseMessage,
): message is Extract<ResponseMessage, { error: ResponseErrorObject }> {
  return 'error' in message;
}

export function describeMessage(message: JsonRpcMessage): string {
  switch (message.kind) {
    case 'request':
      return `request '${message.method}' (id ${String(message.id)})`;
    case 'notification':
      return `notification '${message.method}'`;
    case 'response':
      return isResponseError(message)
        ? `error response (id ${String(message.id)}): ${message.error.message}`
        : `response (id ${String(message.id)})`;
    default:
      return 'unknown message';
  }
}
