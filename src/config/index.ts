import { join } from 'path';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../utils/logger.js';

export const TRANSPORTS = ['stdio', 'http'] as const;
export type Transport = (typeof TRANSPORTS)[number];

export interface KnowledgeBaseConfig {
  databasePath: string;
  transport: Transport;
  http: {
    host: string;
    port: number;
  };
  logging: {
    level: LogLevel;
    logDir?: string;
  };
}

export const EnvironmentSchema = z.object({
  KB_DATABASE_PATH: z.string().min(1).optional(),
  KB_TRANSPORT: z.enum(TRANSPORTS).default('stdio'),
  KB_HTTP_HOST: z.string().min(1).default('127.0.0.1'),
  KB_HTTP_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  KB_LOG_DIR: z.string().min(1).optional(),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function defaultDatabasePath(cwd: string = process.cwd()): string {
  return join(cwd, 'var', 'db', 'knowledge_base.db');
}

/**
 * Reads configuration from environment variables. Empty values count as unset;
 * LOG_LEVEL is case-insensitive.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): KnowledgeBaseConfig {
  const raw = {
    KB_DATABASE_PATH: blankToUndefined(env.KB_DATABASE_PATH),
    KB_TRANSPORT: blankToUndefined(env.KB_TRANSPORT)?.toLowerCase(),
    KB_HTTP_HOST: blankToUndefined(env.KB_HTTP_HOST),
    KB_HTTP_PORT: blankToUndefined(env.KB_HTTP_PORT),
    LOG_LEVEL: blankToUndefined(env.LOG_LEVEL)?.toLowerCase(),
    KB_LOG_DIR: blankToUndefined(env.KB_LOG_DIR),
  };

  const parsed = EnvironmentSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  return {
    databasePath: values.KB_DATABASE_PATH ?? defaultDatabasePath(),
    transport: values.KB_TRANSPORT,
    http: {
      host: values.KB_HTTP_HOST,
      port: values.KB_HTTP_PORT,
    },
    logging: {
      level: values.LOG_LEVEL,
      logDir: values.KB_LOG_DIR,
    },
  };
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
