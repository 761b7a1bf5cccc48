// Process configuration from environment variables

import { z } from 'zod';
import { validateWithSchema } from '@enginehost/protocol';
import { ValidationError, type LogLevel } from '@enginehost/runtime';

const envSchema = z.object({
  /** Postgres connection string; without it the host runs on in-memory repositories */
  DATABASE_URL: z.preprocess((value) => (value === '' ? undefined : value), z.string().url().optional()),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  /** Base directory for file mirrors */
  MIRROR_ROOT: z.string().min(1).default('./mirrors'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type HostConfig = {
  databaseUrl?: string;
  databaseMaxConnections: number;
  mirrorRoot: string;
  logLevel: LogLevel | 'silent';
};

/**
 * @throws ValidationError naming the offending variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): HostConfig {
  const result = validateWithSchema(envSchema, env);
  if (!result.valid) {
    const first = result.errors[0];
    throw new ValidationError(`Invalid configuration ${first.path}: ${first.message}`, {
      field: first.path,
      details: { errors: result.errors },
    });
  }

  const parsed = result.value;
  return {
    databaseUrl: parsed.DATABASE_URL,
    databaseMaxConnections: parsed.DATABASE_MAX_CONNECTIONS,
    mirrorRoot: parsed.MIRROR_ROOT,
    logLevel: parsed.LOG_LEVEL,
  };
}
