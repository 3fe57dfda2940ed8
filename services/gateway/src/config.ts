import 'dotenv/config';
import { z } from 'zod';
import { MisconfigurationError } from './errors';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

// unset and empty variables both fall back to the default
const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const int = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const str = (fallback: string) => z.preprocess(blankToUndefined, z.string().min(1).default(fallback));

const envSchema = z.object({
  HOST: str('127.0.0.1'),
  PORT: int(8080, 0, 65535),
  IDENTITY_FILE: str('/var/lib/tor/gateway/hostname'),
  LOOPBACK_ALIAS: str('localhost'),
  ALLOWED_HOSTS: z.string().optional(),
  IDENTITY_RETRIES: int(10, 1),
  IDENTITY_BACKOFF_MS: int(250, 0),
  IDENTITY_BACKOFF_MAX_MS: int(5_000, 0),
  SHUTDOWN_GRACE_MS: int(10_000, 0),
  MAX_CONNECTIONS: int(256, 1),
  STORE_BACKEND: z.preprocess(blankToUndefined, z.enum(['memory', 'redis']).default('memory')),
  REDIS_URL: str('redis://localhost:6379'),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('info')),
});

export type LogLevel = (typeof LOG_LEVELS)[number];
export type StoreBackend = 'memory' | 'redis';

export interface IdentityWaitOptions {
  /** Total read attempts before giving up. */
  retries: number;
  backoffMs: number;
  maxBackoffMs: number;
}

export interface GatewayConfig {
  host: string;
  port: number;
  identityFile: string;
  loopbackAlias: string;
  allowedHosts: readonly string[];
  identity: IdentityWaitOptions;
  shutdownGraceMs: number;
  maxConnections: number;
  store: {
    backend: StoreBackend;
    redisUrl: string;
  };
  logLevel: LogLevel;
}

/**
 * Reads the gateway configuration from the environment.
 * Called once at startup; the result is frozen and passed by reference.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new MisconfigurationError(`invalid configuration: ${detail}`);
  }

  const e = parsed.data;
  const allowedHosts = (e.ALLOWED_HOSTS ?? '')
    .split(',')
    .map((h) => h.trim())
    .filter((h) => h.length > 0);

  return Object.freeze({
    host: e.HOST,
    port: e.PORT,
    identityFile: e.IDENTITY_FILE,
    loopbackAlias: e.LOOPBACK_ALIAS,
    allowedHosts: Object.freeze(allowedHosts),
    identity: Object.freeze({
      retries: e.IDENTITY_RETRIES,
      backoffMs: e.IDENTITY_BACKOFF_MS,
      maxBackoffMs: Math.max(e.IDENTITY_BACKOFF_MAX_MS, e.IDENTITY_BACKOFF_MS),
    }),
    shutdownGraceMs: e.SHUTDOWN_GRACE_MS,
    maxConnections: e.MAX_CONNECTIONS,
    store: Object.freeze({ backend: e.STORE_BACKEND, redisUrl: e.REDIS_URL }),
    logLevel: e.LOG_LEVEL,
  });
}
