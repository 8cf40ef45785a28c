import { DEFAULT_MAX_BACKOFF_MS } from "./backoff.js";
import type { QueueStore } from "./internal/store.js";
import { isLogLevel, type Logger, type LogLevel } from "./logger.js";
import type { QueueTimeouts } from "./types.js";

export type QueueBackend = "redis" | "postgres" | "memory";

export interface QueueRegistryConfig {
  /** Deployment tag; queues in different environments never share keys. */
  environment: string;
  backend?: QueueBackend;
  redisUrl?: string;
  postgresUrl?: string;
  /** Injected store; the registry will not close it. */
  store?: QueueStore;
  removeOnSuccess?: boolean;
  removeOnFailure?: boolean;
  maxBackoffMs?: number;
  timeouts?: Partial<QueueTimeouts>;
  logLevel?: LogLevel;
  logger?: Logger;
}

const DEFAULT_REDIS_URL = "redis://localhost:6379";

/**
 * Reads registry settings from environment variables.
 */
export function loadQueueConfig(
  env: NodeJS.ProcessEnv = process.env,
): QueueRegistryConfig {
  const postgresUrl = env.POSTGRES_URL ?? env.DATABASE_URL;
  const logLevel = env.LOG_LEVEL?.toLowerCase();

  return {
    environment:
      env.QUEUE_ENVIRONMENT ?? env.APP_ENV ?? env.NODE_ENV ?? "development",
    backend: parseBackend(env.QUEUE_BACKEND),
    redisUrl: env.REDIS_URL ?? buildRedisUrl(env),
    postgresUrl,
    removeOnSuccess: parseBoolean(env.QUEUE_REMOVE_ON_SUCCESS, true),
    removeOnFailure: parseBoolean(env.QUEUE_REMOVE_ON_FAILURE, false),
    maxBackoffMs: Math.max(
      0,
      parseInteger(env.QUEUE_MAX_BACKOFF_MS, DEFAULT_MAX_BACKOFF_MS),
    ),
    logLevel: logLevel && isLogLevel(logLevel) ? logLevel : "info",
  };
}

export function buildRedisUrl(env: NodeJS.ProcessEnv): string {
  if (!env.REDIS_HOST) {
    return DEFAULT_REDIS_URL;
  }

  const username = env.REDIS_USERNAME ? encodeURIComponent(env.REDIS_USERNAME) : "";
  const password = env.REDIS_PASSWORD ? encodeURIComponent(env.REDIS_PASSWORD) : "";
  const auth = password ? `${username}:${password}@` : "";
  const port = parseInteger(env.REDIS_PORT, 6379);
  const db = parseInteger(env.REDIS_DB, 0);

  return `redis://${auth}${env.REDIS_HOST}:${port}/${db}`;
}

function parseBackend(value: string | undefined): QueueBackend {
  switch (value?.toLowerCase()) {
    case "redis":
      return "redis";
    case "postgres":
    case "postgresql":
      return "postgres";
    case "memory":
      return "memory";
    default:
      return "redis";
  }
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  switch (value?.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      return fallback;
  }
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}
