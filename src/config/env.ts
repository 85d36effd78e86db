import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigError } from '../core/errors.js';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  FANOUT_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  FANOUT_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  FANOUT_PROBE_CONCURRENCY: z.coerce.number().int().min(1, 'FANOUT_PROBE_CONCURRENCY must be at least 1').default(5),
  FANOUT_POOL_MIN: z.coerce.number().int().min(0).default(1),
  FANOUT_POOL_MAX: z.coerce.number().int().min(1).default(5),
  FANOUT_SSL_MODE: z.enum(['disable', 'prefer', 'require']).default('prefer')
}).refine((value) => value.FANOUT_POOL_MIN <= value.FANOUT_POOL_MAX, {
  message: 'FANOUT_POOL_MIN cannot exceed FANOUT_POOL_MAX',
  path: ['FANOUT_POOL_MIN']
});

export type Env = z.infer<typeof envSchema>;

export type SslMode = Env['FANOUT_SSL_MODE'];

/**
 * Driver-level limits applied to every endpoint connection.
 */
export interface ConnectionSettings {
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  poolMin: number;
  poolMax: number;
  sslMode: SslMode;
}

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid environment variables',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')
    );
  }
  return parsed.data;
}

let cached: Env | null = null;

export function getEnv(): Env {
  if (!cached) {
    cached = parseEnv(process.env);
  }
  return cached;
}

export function toConnectionSettings(env: Env): ConnectionSettings {
  return {
    connectTimeoutMs: env.FANOUT_CONNECT_TIMEOUT_MS,
    commandTimeoutMs: env.FANOUT_COMMAND_TIMEOUT_MS,
    poolMin: env.FANOUT_POOL_MIN,
    poolMax: env.FANOUT_POOL_MAX,
    sslMode: env.FANOUT_SSL_MODE
  };
}
