import { z } from 'zod';
import type { Logger } from 'pino';
import { ConfigurationError } from './errors.js';
import { MAX_PAGE_SIZE } from './query/paginator.js';
import type { QueryTransport } from './types.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_PAGE_SIZE = MAX_PAGE_SIZE;
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

const settingsSchema = z.object({
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL),
});

export type Settings = z.infer<typeof settingsSchema>;

export interface ClientConfig {
  transport: QueryTransport;
  /** A pino logger to log through. Built from `logLevel` when omitted. */
  logger?: Logger;
  pageSize?: number;
  logLevel?: LogLevel;
}

export interface ResolvedConfig {
  transport: QueryTransport;
  logger: Logger | null;
  pageSize: number;
  logLevel: LogLevel;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/** Validates the tunable settings and fills in defaults. */
export function parseSettings(input: { pageSize?: unknown; logLevel?: unknown }): Settings {
  const parsed = settingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid client settings: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function resolveConfig(config: ClientConfig): ResolvedConfig {
  const settings = parseSettings({ pageSize: config.pageSize, logLevel: config.logLevel });
  return {
    transport: config.transport,
    logger: config.logger ?? null,
    pageSize: settings.pageSize,
    logLevel: settings.logLevel,
  };
}

/**
 * Reads settings from `SUITEQL_PAGE_SIZE` and `SUITEQL_LOG_LEVEL`. Unset or
 * empty variables fall back to the defaults.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Settings {
  const read = (key: string): string | undefined => {
    const value = env[key];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };
  return parseSettings({
    pageSize: read('SUITEQL_PAGE_SIZE'),
    logLevel: read('SUITEQL_LOG_LEVEL'),
  });
}
