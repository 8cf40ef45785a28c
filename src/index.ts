export { JobQueue, DEFAULT_TIMEOUTS, JOB_TTL_SECONDS } from "./job-queue.js";
export type {
  EnqueueOptions,
  JobHandler,
  JobQueueOptions,
  JobRecord,
  JobResult,
  JobStatus,
  QueueEventListener,
  QueueEventName,
  QueueEvents,
  QueueStats,
  QueueTimeouts,
  WorkerController,
  WorkerOptions,
} from "./job-queue.js";
export type { JobContext, TerminalJobStatus } from "./types.js";
export { QueueRegistry, type CreateQueueOptions } from "./queue-registry.js";
export {
  loadQueueConfig,
  buildRedisUrl,
  type QueueBackend,
  type QueueRegistryConfig,
} from "./config.js";
export {
  DEFAULT_JOB_TIMEOUT_MS,
  canRetry,
  createJobRecord,
  deserializeJobRecord,
  incrementRetry,
  isTerminal,
  markCompleted,
  markFailed,
  markProcessing,
  markRetrying,
  serializeJobRecord,
  type CreateJobOptions,
} from "./job-record.js";
export {
  DEFAULT_BACKOFF_MS,
  DEFAULT_MAX_BACKOFF_MS,
  computeBackoff,
} from "./backoff.js";
export {
  AlreadyInitializedError,
  DuplicateJobError,
  HandlerError,
  HandlerTimeoutError,
  JobNotFoundError,
  JobResultTimeoutError,
  NotInitializedError,
  QueueError,
  QueueErrorCode,
  SerializationError,
  StoreError,
  StoreTimeoutError,
  StoreUnavailableError,
} from "./errors.js";
export { Logger, type LogLevel } from "./logger.js";
export type { QueueStore } from "./internal/store.js";
export { MemoryQueueStore } from "./internal/memory-store.js";
export {
  PgQueueStore,
  type PgQueueStoreOptions,
} from "./internal/pg-store.js";
export {
  RedisQueueStore,
  type RedisQueueStoreOptions,
} from "./internal/redis-store.js";
