import { z } from 'zod';
import { ConfigurationError } from './errors';

export const MIN_DAYS = 1;
export const MAX_DAYS = 30;
export const DEFAULT_DAYS = 7;
export const DEFAULT_CACHE_TTL_SECONDS = 60;

const cacheTtlSchema = z.coerce.number().positive();

/** CACHE_TTL_SECONDS in millis; unset, non-numeric or non-positive values use the default. */
export function resolveCacheTtlMs(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.CACHE_TTL_SECONDS?.trim();
  const parsed = cacheTtlSchema.safeParse(raw || DEFAULT_CACHE_TTL_SECONDS);
  return (parsed.success ? parsed.data : DEFAULT_CACHE_TTL_SECONDS) * 1000;
}

export const CONFIG = {
  port: Number(process.env.PORT || 43117),
  host: String(process.env.HOST || '0.0.0.0'),
  token: process.env.TOKEN || '',
  corsOrigin: process.env.CORS_ORIGIN || '*',
  cacheTtlMs: resolveCacheTtlMs(),
};

export interface ConnectionSettings {
  url: string;
  key: string;
  table: string;
  timestampColumn: string;
  rowLimit: number;
}

export type ConnectionResult =
  | { ok: true; settings: ConnectionSettings }
  | { ok: false; error: ConfigurationError };

const envString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const connectionEnvSchema = z.object({
  LOGGER_SUPABASE_URL: envString.pipe(z.string({ required_error: 'is not set' }).url('must be a URL')),
  LOGGER_SUPABASE_KEY: envString.pipe(z.string({ required_error: 'is not set' })),
  LOGS_TABLE: envString.transform((v) => v ?? 'task_logs'),
  LOGS_TIMESTAMP_COLUMN: envString.transform((v) => v ?? 'created_at'),
  LOGS_ROW_LIMIT: envString.pipe(z.coerce.number().int().positive().optional()).transform((v) => v ?? 1000),
});

/**
 * Reads the Supabase connection from the environment. Missing or malformed
 * credentials come back as a ConfigurationError value; nothing is thrown.
 */
export function resolveConnection(env: NodeJS.ProcessEnv = process.env): ConnectionResult {
  const parsed = connectionEnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    return { ok: false, error: new ConfigurationError(problems) };
  }
  const value = parsed.data;
  return {
    ok: true,
    settings: {
      url: value.LOGGER_SUPABASE_URL,
      key: value.LOGGER_SUPABASE_KEY,
      table: value.LOGS_TABLE,
      timestampColumn: value.LOGS_TIMESTAMP_COLUMN,
      rowLimit: value.LOGS_ROW_LIMIT,
    },
  };
}
