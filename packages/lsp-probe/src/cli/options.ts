/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Argv } from 'yargs';
import { z } from 'zod';

import { loadProbeConfig, type ProbeConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { enableLogging } from '../utils/logger.js';

/** Server variables the CLI fills in; the engine passes them through as-is. */
export const SERVER_LOG_LEVEL_VAR = 'RUST_LOG';
export const SERVER_DATABASE_VAR = 'BKMR_DB_URL';
export const QUIET_SERVER_LOG_LEVEL = 'error';

export function withGlobalOptions<T>(yargs: Argv<T>) {
  return yargs
    .option('server', {
      type: 'string',
      description: 'Command line that starts the language server.',
    })
    .option('server-arg', {
      type: 'string',
      array: true,
      description: 'Extra argument for the server (repeatable).',
    })
    .option('db-path', {
      type: 'string',
      description: `Database for the server (sets ${SERVER_DATABASE_VAR}).`,
    })
    .option('debug', {
      alias: 'd',
      type: 'boolean',
      description: `Debug output from the probe and the server (${SERVER_LOG_LEVEL_VAR}=debug).`,
    })
    .option('verbose', {
      type: 'boolean',
      description: `Informational server logging (${SERVER_LOG_LEVEL_VAR}=info).`,
    })
    .option('interpolation', {
      type: 'boolean',
      default: true,
      description:
        'Template interpolation in the server; --no-interpolation turns it off.',
    })
    .option('timeout', {
      type: 'number',
      description: 'Per-request timeout in milliseconds.',
    });
}

const globalArgsSchema = z.object({
  server: z.string().optional(),
  serverArg: z.array(z.string()).optional(),
  dbPath: z.string().optional(),
  debug: z.boolean().optional(),
  verbose: z.boolean().optional(),
  interpolation: z.boolean().optional(),
  timeout: z.number().optional(),
});

export type GlobalArgs = z.infer<typeof globalArgsSchema>;

export interface ProbeContext {
  config: ProbeConfig;
  /** Print every server stderr line as it arrives. */
  echoServerStderr: boolean;
}

/**
 * Environment overlay for the server. `--debug` and `--verbose` win over an
 * inherited log level; without either the inherited value is kept, and
 * without that the server runs quiet.
 */
export function buildServerEnvironment(
  args: GlobalArgs,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const overlay: Record<string, string> = {};
  if (args.dbPath) {
    overlay[SERVER_DATABASE_VAR] = args.dbPath;
  }
  if (args.debug) {
    overlay[SERVER_LOG_LEVEL_VAR] = 'debug';
  } else if (args.verbose) {
    overlay[SERVER_LOG_LEVEL_VAR] = 'info';
  } else if (env[SERVER_LOG_LEVEL_VAR] === undefined) {
    overlay[SERVER_LOG_LEVEL_VAR] = QUIET_SERVER_LOG_LEVEL;
  }
  return overlay;
}

export function buildServerArgs(args: GlobalArgs): string[] {
  const serverArgs = [...(args.serverArg ?? [])];
  if (args.interpolation === false) {
    serverArgs.push('--no-interpolation');
  }
  return serverArgs;
}

/**
 * Turns parsed global options into a validated configuration and switches
 * on the requested log namespaces.
 */
export function resolveProbeContext(
  argv: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): ProbeContext {
  const parsed = globalArgsSchema.safeParse(argv);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }
  const args = parsed.data;

  const config = loadProbeConfig(env, {
    serverCommand: args.server,
    serverArgs: buildServerArgs(args),
    requestTimeoutMs: args.timeout,
    environment: buildServerEnvironment(args, env),
    logNamespaces: args.debug ? 'lsp-probe:*' : undefined,
  });
  enableLogging(config.logNamespaces);

  return { config, echoServerStderr: args.debug === true };
}
