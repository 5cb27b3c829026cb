/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

import { ConfigError } from './errors.js';

export const DEFAULT_SERVER_COMMAND = 'bkmr lsp';
export const DEFAULT_STARTUP_GRACE_MS = 500;
export const DEFAULT_REQUEST_TIMEOUT_MS = 5_000;
export const DEFAULT_TERMINATE_GRACE_MS = 2_000;

/** Environment variables read by {@link loadProbeConfig}. */
export const ConfigEnv = {
  serverCommand: 'LSP_PROBE_SERVER',
  startupGraceMs: 'LSP_PROBE_STARTUP_GRACE_MS',
  requestTimeoutMs: 'LSP_PROBE_TIMEOUT_MS',
  terminateGraceMs: 'LSP_PROBE_TERMINATE_GRACE_MS',
  logNamespaces: 'LSP_PROBE_DEBUG',
} as const;

const durationSchema = z.coerce.number().int().nonnegative();

export const probeConfigSchema = z.object({
  serverCommand: z.string().trim().min(1).default(DEFAULT_SERVER_COMMAND),
  serverArgs: z.array(z.string()).default([]),
  cwd: z.string().min(1).optional(),
  startupGraceMs: durationSchema.default(DEFAULT_STARTUP_GRACE_MS),
  requestTimeoutMs: durationSchema.positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  terminateGraceMs: durationSchema.default(DEFAULT_TERMINATE_GRACE_MS),
  logNamespaces: z.string().optional(),
  environment: z.record(z.string()).default({}),
});

export type ProbeConfig = z.infer<typeof probeConfigSchema>;
export type ProbeConfigInput = z.input<typeof probeConfigSchema>;

function definedEntries(
  input: Record<string, unknown>,
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined),
  );
}

/**
 * Resolves configuration from environment variables, with explicit
 * overrides taking precedence. Empty environment values count as unset.
 */
export function loadProbeConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ProbeConfigInput = {},
): ProbeConfig {
  const read = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value.trim() === '' ? undefined : value;
  };

  const fromEnv = definedEntries({
    serverCommand: read(ConfigEnv.serverCommand),
    startupGraceMs: read(ConfigEnv.startupGraceMs),
    requestTimeoutMs: read(ConfigEnv.requestTimeoutMs),
    terminateGraceMs: read(ConfigEnv.terminateGraceMs),
    logNamespaces: read(ConfigEnv.logNamespaces),
  });

  const result = probeConfigSchema.safeParse({
    ...fromEnv,
    ...definedEntries({ ...overrides }),
  });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}
