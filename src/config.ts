/**
 * Configuration
 *
 * Options may come from an object, from FTPWIRE_* environment variables, or
 * both; explicit options win over the environment.
 */

import { z } from 'zod';
import { ConfigurationError } from './core/errors.js';
import { ConnectionMode, TransferMode } from './protocols/ftp/modes.js';
import {
  LOG_LEVELS,
  consoleLogger,
  createLevelLogger,
  setDefaultLogger,
  type Logger,
  type LogLevel,
} from './types/logger.js';
import { DEFAULT_TEXT_EXTENSIONS } from './utils/file-type.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'none']);

export const ftpwireConfigSchema = z.object({
  logLevel: logLevelSchema,
  connectionMode: z.enum([ConnectionMode.ACTIVE, ConnectionMode.PASSIVE]).default(ConnectionMode.PASSIVE),
  transferMode: z.enum([TransferMode.ASCII, TransferMode.BINARY, 'auto']).default('auto'),
  textExtensions: z
    .array(z.string().regex(/^\.[^./\\]+$/, 'extensions start with a dot'))
    .default([...DEFAULT_TEXT_EXTENSIONS])
    .transform((extensions) => extensions.map((ext) => ext.toLowerCase())),
});

export type FtpwireConfig = z.infer<typeof ftpwireConfigSchema>;
export type FtpwireConfigInput = Partial<z.input<typeof ftpwireConfigSchema>>;

type Env = Record<string, string | undefined>;

/**
 * Log level implied by the environment
 *
 * FTPWIRE_LOG_LEVEL wins; otherwise DEBUG=ftpwire (or `*`) turns on debug
 * output, and the fallback is `warn`.
 */
export function detectLogLevel(env: Env = process.env): LogLevel {
  const explicit = env.FTPWIRE_LOG_LEVEL?.toLowerCase();
  if (explicit && LOG_LEVELS.some((level) => level === explicit)) {
    return logLevelSchema.parse(explicit);
  }

  const debug = env.DEBUG || '';
  if (debug === '*' || debug.split(',').some((scope) => scope.trim() === 'ftpwire' || scope.trim() === 'ftpwire:*')) {
    return 'debug';
  }

  return 'warn';
}

/**
 * Validate options and fill in defaults
 *
 * @throws ConfigurationError naming the first offending key
 */
export function resolveConfig(input: FtpwireConfigInput = {}, env: Env = process.env): FtpwireConfig {
  const candidate = {
    logLevel: input.logLevel ?? detectLogLevel(env),
    connectionMode: input.connectionMode ?? env.FTPWIRE_CONNECTION_MODE?.toUpperCase(),
    transferMode: input.transferMode ?? normalizeTransferMode(env.FTPWIRE_TRANSFER_MODE),
    textExtensions: input.textExtensions,
  };

  const result = ftpwireConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issue = result.error.issues[0];
    const configKey = issue.path.join('.');
    throw new ConfigurationError(`Invalid configuration for "${configKey}": ${issue.message}`, { configKey });
  }

  return result.data;
}

function normalizeTransferMode(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'auto' ? 'auto' : value.toUpperCase();
}

/**
 * Resolve configuration and install the matching process-wide logger
 */
export function configure(
  input: FtpwireConfigInput = {},
  options: { logger?: Logger; env?: Env } = {}
): FtpwireConfig {
  const config = resolveConfig(input, options.env);
  setDefaultLogger(createLevelLogger(options.logger ?? consoleLogger, config.logLevel));
  return config;
}
