import { z } from 'zod';
import type { ClientConfig } from 'pg';

const envSchema = z
  .object({
    DATABASE_URL: z.string().min(1).optional(),
    DB_HOST: z.string().min(1).default('localhost'),
    DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
    DB_USER: z.string().min(1).optional(),
    DB_PASS: z.string().optional(),
    DB_NAME: z.string().min(1).optional(),
    DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),
  })
  .refine((env) => env.DATABASE_URL !== undefined || env.DB_NAME !== undefined, {
    message: 'Set DATABASE_URL or DB_NAME (with DB_HOST, DB_PORT, DB_USER, DB_PASS)',
    path: ['DB_NAME'],
  });

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Connection parameters from the environment. Call dotenv.config() first
 * to pick up a .env file.
 */
export function loadDbConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  if (parsed.DATABASE_URL) {
    return {
      connectionString: parsed.DATABASE_URL,
      connectionTimeoutMillis: parsed.DB_CONNECT_TIMEOUT_MS,
    };
  }

  return {
    host: parsed.DB_HOST,
    port: parsed.DB_PORT,
    user: parsed.DB_USER,
    password: parsed.DB_PASS,
    database: parsed.DB_NAME,
    connectionTimeoutMillis: parsed.DB_CONNECT_TIMEOUT_MS,
  };
}
