/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './errors.js';
export * from './config.js';
export * from './protocol/messages.js';
export * from './protocol/framing.js';
export * from './transport/stderr-monitor.js';
export * from './transport/stdio-transport.js';
export * from './service/correlator.js';
export * from './service/session.js';
export { DebugLogger, enableLogging } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
