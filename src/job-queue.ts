import { EventEmitter } from "node:events";

import { DEFAULT_BACKOFF_MS, DEFAULT_MAX_BACKOFF_MS } from "./backoff.js";
import {
  DuplicateJobError,
  JobNotFoundError,
  JobResultTimeoutError,
  QueueError,
  StoreError,
  StoreUnavailableError,
} from "./errors.js";
import {
  DEFAULT_JOB_TIMEOUT_MS,
  createJobRecord,
  deserializeJobRecord,
  isTerminal,
  serializeJobRecord,
} from "./job-record.js";
import { Logger, type LogLevel } from "./logger.js";
import { ConnectionGate } from "./internal/connection-gate.js";
import { delay, storeDeadline } from "./internal/deadline.js";
import { HealthMonitor } from "./internal/health-monitor.js";
import { queueKeys, type QueueKeys } from "./internal/keys.js";
import type { QueueStore } from "./internal/store.js";
import { WorkerPool, type WorkerController } from "./internal/worker-pool.js";
import type {
  JobHandler,
  JobRecord,
  JobResult,
  QueueEventListener,
  QueueEventName,
  QueueStats,
  QueueTimeouts,
} from "./types.js";

export interface JobQueueOptions {
  store: QueueStore;
  /** Fully namespaced queue key; every store key of the queue starts with it. */
  name: string;
  maxRetries?: number;
  timeoutMs?: number;
  backoffMs?: number;
  maxBackoffMs?: number;
  removeOnSuccess?: boolean;
  removeOnFailure?: boolean;
  concurrency?: number;
  jobTtlSeconds?: number;
  timeouts?: Partial<QueueTimeouts>;
  logger?: Logger;
  logLevel?: LogLevel;
  /** Shared connection state when several queues use one store. */
  connection?: ConnectionGate;
}

export interface EnqueueOptions {
  id?: string;
  maxRetries?: number;
  timeoutMs?: number;
  backoffMs?: number;
}

export interface WorkerOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

export type {
  JobHandler,
  JobRecord,
  JobResult,
  JobStatus,
  QueueStats,
  QueueTimeouts,
} from "./types.js";
export type {
  QueueEvents,
  QueueEventListener,
  QueueEventName,
} from "./types.js";
export type { WorkerController } from "./internal/worker-pool.js";

export const DEFAULT_TIMEOUTS: QueueTimeouts = {
  healthCheckMs: 2000,
  connectMs: 3000,
  enqueueMs: 5000,
  operationMs: 3000,
  blockMs: 5000,
  unhealthyPauseMs: 10_000,
  errorPauseMs: 5000,
  resultPollMs: 500,
};

export const JOB_TTL_SECONDS = 24 * 60 * 60;

interface QueueConfig {
  maxRetries: number;
  timeoutMs: number;
  backoffMs: number;
  maxBackoffMs: number;
  removeOnSuccess: boolean;
  removeOnFailure: boolean;
  concurrency: number;
  jobTtlSeconds: number;
  timeouts: QueueTimeouts;
}

/**
 * One named queue: producers enqueue, a single worker pool consumes, and
 * any holder of the queue can read job status and list statistics.
 */
export class JobQueue<TPayload = unknown, TResult = unknown> {
  public readonly name: string;
  private readonly store: QueueStore;
  private readonly keys: QueueKeys;
  private readonly config: QueueConfig;
  private readonly logger: Logger;
  private readonly connection: ConnectionGate;
  private readonly health: HealthMonitor;
  private readonly events = new EventEmitter();
  private workerPool?: WorkerPool<TPayload, TResult>;

  public constructor(options: JobQueueOptions) {
    const timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };

    this.name = options.name;
    this.store = options.store;
    this.keys = queueKeys(options.name);
    this.config = {
      maxRetries: Math.max(0, options.maxRetries ?? 3),
      timeoutMs: Math.max(1, options.timeoutMs ?? DEFAULT_JOB_TIMEOUT_MS),
      backoffMs: Math.max(0, options.backoffMs ?? DEFAULT_BACKOFF_MS),
      maxBackoffMs: Math.max(0, options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS),
      removeOnSuccess: options.removeOnSuccess ?? true,
      removeOnFailure: options.removeOnFailure ?? false,
      concurrency: Math.max(1, options.concurrency ?? 1),
      jobTtlSeconds: Math.max(1, options.jobTtlSeconds ?? JOB_TTL_SECONDS),
      timeouts,
    };
    this.logger =
      options.logger?.child(options.name) ??
      new Logger(options.name, options.logLevel ?? "info");
    this.connection =
      options.connection ?? new ConnectionGate(this.store, timeouts.connectMs);
    this.health = new HealthMonitor(
      this.store,
      timeouts.healthCheckMs,
      this.logger,
    );
  }

  public on<K extends QueueEventName<TPayload, TResult>>(
    event: K,
    listener: QueueEventListener<TPayload, K, TResult>,
  ): this {
    this.events.on(event, listener);
    return this;
  }

  public off<K extends QueueEventName<TPayload, TResult>>(
    event: K,
    listener: QueueEventListener<TPayload, K, TResult>,
  ): this {
    this.events.off(event, listener);
    return this;
  }

  public once<K extends QueueEventName<TPayload, TResult>>(
    event: K,
    listener: QueueEventListener<TPayload, K, TResult>,
  ): this {
    this.events.once(event, listener);
    return this;
  }

  /**
   * Persists a job and appends it to the waiting list. Fails fast with
   * `StoreUnavailableError` when the store does not answer its health check.
   */
  public async enqueue(
    payload: TPayload,
    options: EnqueueOptions = {},
  ): Promise<string> {
    if (!(await this.health.isHealthy())) {
      throw new StoreUnavailableError(
        `Store is not available. Job cannot be added to queue '${this.name}'.`,
      );
    }

    const job = createJobRecord<TPayload, TResult>(this.name, payload, {
      id: options.id,
      maxRetries: options.maxRetries ?? this.config.maxRetries,
      timeoutMs: options.timeoutMs ?? this.config.timeoutMs,
      backoffMs: options.backoffMs ?? this.config.backoffMs,
    });
    const encoded = serializeJobRecord(job);
    const jobKey = this.keys.job(job.id);

    const added = await this.guard(
      "enqueue",
      async () => {
        await this.connection.ensure();
        // Not atomic: two producers racing on one id can both pass.
        if (options.id !== undefined && (await this.store.get(jobKey)) !== null) {
          return false;
        }
        await this.store.setWithExpiry(jobKey, encoded, this.config.jobTtlSeconds);
        await this.store.appendRight(this.keys.waiting, encoded);
        return true;
      },
      this.config.timeouts.enqueueMs,
    );
    if (!added) {
      throw new DuplicateJobError(job.id);
    }

    this.logger.debug(`Job ${job.id} added to queue`);
    this.events.emit("jobEnqueued", { job });
    return job.id;
  }

  /**
   * Starts the worker loops. A queue runs at most one pool; a second call
   * while it runs throws.
   */
  public start(
    handler: JobHandler<TPayload, TResult>,
    options: WorkerOptions = {},
  ): WorkerController {
    if (this.workerPool) {
      throw new Error(
        "Workers already running. Call stop() before starting again.",
      );
    }

    this.workerPool = new WorkerPool<TPayload, TResult>(this.store, {
      keys: this.keys,
      concurrency: Math.max(1, options.concurrency ?? this.config.concurrency),
      timeouts: this.config.timeouts,
      removeOnSuccess: this.config.removeOnSuccess,
      removeOnFailure: this.config.removeOnFailure,
      maxBackoffMs: this.config.maxBackoffMs,
      jobTtlSeconds: this.config.jobTtlSeconds,
      health: this.health,
      ensureReady: () => this.connection.ensure(),
      serializeError: this.serializeError,
      events: this.events,
      logger: this.logger,
    });

    this.workerPool.start(handler);
    const controller: WorkerController = { stop: () => this.stop() };

    if (options.signal) {
      if (options.signal.aborted) {
        void this.stop();
      } else {
        options.signal.addEventListener(
          "abort",
          () => {
            void this.stop();
          },
          { once: true },
        );
      }
    }

    return controller;
  }

  public async stop(): Promise<void> {
    const pool = this.workerPool;
    await pool?.stop();
    if (this.workerPool === pool) {
      this.workerPool = undefined;
    }
  }

  public isRunning(): boolean {
    return this.workerPool?.isRunning() ?? false;
  }

  public async getJob(id: string): Promise<JobRecord<TPayload, TResult> | null> {
    const raw = await this.guard(
      "get",
      async () => {
        await this.connection.ensure();
        return this.store.get(this.keys.job(id));
      },
      this.config.timeouts.operationMs,
    );
    return raw === null ? null : deserializeJobRecord<TPayload, TResult>(raw);
  }

  /**
   * Polls the job's record until it reaches a terminal status.
   */
  public async getJobResult(
    id: string,
    timeoutMs = 30_000,
  ): Promise<JobResult<TResult>> {
    const deadline =
      Date.now() + (Number.isNaN(timeoutMs) ? 0 : Math.max(0, timeoutMs));

    while (true) {
      const job = await this.getJob(id);
      if (!job) {
        throw new JobNotFoundError(id);
      }
      if (isTerminal(job.status)) {
        return {
          jobId: job.id,
          status: job.status,
          result: job.result,
          error: job.error,
        };
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new JobResultTimeoutError(id, timeoutMs);
      }
      await delay(Math.min(this.config.timeouts.resultPollMs, remaining));
    }
  }

  /**
   * List lengths. A count that cannot be read reports 0; an unhealthy store
   * fails the whole call.
   */
  public async getStats(): Promise<QueueStats> {
    if (!(await this.health.isHealthy())) {
      throw new StoreUnavailableError(
        `Store is not available. Cannot get stats for queue '${this.name}'.`,
      );
    }

    const [waiting, processing, succeeded, failed] = await Promise.all([
      this.countOrZero(this.keys.waiting),
      this.countOrZero(this.keys.processing),
      this.countOrZero(this.keys.succeeded),
      this.countOrZero(this.keys.failed),
    ]);

    return { waiting, processing, succeeded, failed };
  }

  /**
   * Returns entries orphaned in the processing list (e.g. by a crashed
   * worker) to the tail of the waiting list. Only safe while no worker for
   * this queue runs anywhere.
   */
  public async recoverProcessing(): Promise<number> {
    if (this.workerPool) {
      throw new Error("Cannot recover processing entries while workers are running.");
    }

    let recovered = 0;
    while (true) {
      const entry = await this.guard(
        "move",
        async () => {
          await this.connection.ensure();
          return this.store.move(this.keys.processing, this.keys.waiting);
        },
        this.config.timeouts.operationMs,
      );
      if (entry === null) {
        break;
      }
      recovered += 1;
    }

    if (recovered > 0) {
      this.logger.info(`Recovered ${recovered} orphaned job(s) from processing`);
    }
    return recovered;
  }

  private async countOrZero(listKey: string): Promise<number> {
    try {
      return await storeDeadline(
        "length",
        this.store.length(listKey),
        this.config.timeouts.operationMs,
      );
    } catch (error) {
      this.logger.debug(`Could not read length of ${listKey}`, error);
      return 0;
    }
  }

  private async guard<T>(
    operation: string,
    run: () => Promise<T>,
    timeoutMs: number,
  ): Promise<T> {
    try {
      return await storeDeadline(operation, run(), timeoutMs);
    } catch (error) {
      if (error instanceof QueueError) {
        throw error;
      }
      throw new StoreError(
        `Store operation '${operation}' failed on queue '${this.name}': ${
          error instanceof Error ? error.message : String(error)
        }`,
        error,
      );
    }
  }

  private serializeError(error: unknown): string {
    if (error instanceof Error) {
      return error.stack ?? error.message;
    }
    if (typeof error === "string") {
      return error;
    }
    try {
      const encoded: string | undefined = JSON.stringify(error);
      return encoded ?? String(error);
    } catch (serializationError) {
      return String(serializationError);
    }
  }
}
