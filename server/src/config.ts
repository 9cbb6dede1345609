import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { zodErrorToFieldErrors } from '../../src/domain/validation.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  DATABASE_PATH: z.string().min(1).default(path.join(__dirname, '../data/ledger.db')),
  DB_BUSY_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),
  DB_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(6),
  DB_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(80),
});

export interface Config {
  port: number;
  databasePath: string;
  busyTimeoutMs: number;
  retry: { attempts: number; baseDelayMs: number };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = Object.entries(zodErrorToFieldErrors(result.error))
      .map(([key, messages]) => `${key}: ${messages.join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  const e = result.data;
  return {
    port: e.PORT,
    databasePath: e.DATABASE_PATH,
    busyTimeoutMs: e.DB_BUSY_TIMEOUT_MS,
    retry: { attempts: e.DB_RETRY_ATTEMPTS, baseDelayMs: e.DB_RETRY_BASE_MS },
  };
}
