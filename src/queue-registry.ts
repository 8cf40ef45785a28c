import type { QueueRegistryConfig } from "./config.js";
import { AlreadyInitializedError, NotInitializedError } from "./errors.js";
import { JobQueue, DEFAULT_TIMEOUTS, type JobQueueOptions } from "./job-queue.js";
import { Logger } from "./logger.js";
import { ConnectionGate } from "./internal/connection-gate.js";
import { MemoryQueueStore } from "./internal/memory-store.js";
import { PgQueueStore } from "./internal/pg-store.js";
import { RedisQueueStore } from "./internal/redis-store.js";
import type { QueueStore } from "./internal/store.js";

export type CreateQueueOptions = Pick<
  JobQueueOptions,
  | "maxRetries"
  | "timeoutMs"
  | "backoffMs"
  | "maxBackoffMs"
  | "removeOnSuccess"
  | "removeOnFailure"
  | "concurrency"
  | "jobTtlSeconds"
>;

const QUEUE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Binds queue names to one shared store connection. Pass an instance to the
 * code that needs queues, or use the process-wide `init`/`global` pair.
 */
export class QueueRegistry {
  private static globalRegistry?: QueueRegistry;

  public readonly environment: string;
  private readonly store: QueueStore;
  private readonly ownsStore: boolean;
  private readonly connection: ConnectionGate;
  private readonly logger: Logger;
  private readonly queues = new Map<string, { stop: () => Promise<void> }>();

  public constructor(private readonly config: QueueRegistryConfig) {
    if (!QUEUE_NAME_PATTERN.test(config.environment)) {
      throw new Error(`Invalid queue environment: ${config.environment}`);
    }

    this.environment = config.environment;
    this.store = config.store ?? QueueRegistry.createStore(config);
    this.ownsStore = config.store === undefined;
    this.logger =
      config.logger ?? new Logger("taskrelay", config.logLevel ?? "info");
    this.connection = new ConnectionGate(
      this.store,
      config.timeouts?.connectMs ?? DEFAULT_TIMEOUTS.connectMs,
    );
  }

  public static init(config: QueueRegistryConfig): QueueRegistry {
    if (QueueRegistry.globalRegistry) {
      throw new AlreadyInitializedError();
    }
    QueueRegistry.globalRegistry = new QueueRegistry(config);
    QueueRegistry.globalRegistry.logger.info("Queue registry initialized");
    return QueueRegistry.globalRegistry;
  }

  public static global(): QueueRegistry {
    if (!QueueRegistry.globalRegistry) {
      throw new NotInitializedError();
    }
    return QueueRegistry.globalRegistry;
  }

  public static async shutdownGlobal(): Promise<void> {
    const registry = QueueRegistry.globalRegistry;
    QueueRegistry.globalRegistry = undefined;
    await registry?.close();
  }

  public queueKey(name: string): string {
    return `${this.environment}_${name}_queue`;
  }

  /**
   * Creates the queue `<environment>_<name>_queue`. Each name may be
   * created once per registry.
   */
  public createQueue<TPayload = unknown, TResult = unknown>(
    name: string,
    options: CreateQueueOptions = {},
  ): JobQueue<TPayload, TResult> {
    if (!QUEUE_NAME_PATTERN.test(name)) {
      throw new Error(`Invalid queue name: ${name}`);
    }

    const key = this.queueKey(name);
    if (this.queues.has(key)) {
      throw new Error(`Queue '${key}' has already been created.`);
    }

    const queue = new JobQueue<TPayload, TResult>({
      removeOnSuccess: this.config.removeOnSuccess,
      removeOnFailure: this.config.removeOnFailure,
      maxBackoffMs: this.config.maxBackoffMs,
      ...options,
      store: this.store,
      name: key,
      timeouts: this.config.timeouts,
      logger: this.logger,
      connection: this.connection,
    });

    this.queues.set(key, queue);
    return queue;
  }

  public queueNames(): string[] {
    return [...this.queues.keys()];
  }

  /** Stops every queue's workers, then closes the store if the registry opened it. */
  public async close(): Promise<void> {
    await Promise.all([...this.queues.values()].map((queue) => queue.stop()));
    this.queues.clear();
    if (this.ownsStore) {
      await this.store.close();
    }
  }

  private static createStore(config: QueueRegistryConfig): QueueStore {
    switch (config.backend ?? "redis") {
      case "postgres":
        return new PgQueueStore({ connectionString: config.postgresUrl });
      case "memory":
        return new MemoryQueueStore();
      case "redis":
        return new RedisQueueStore({
          url: config.redisUrl ?? "redis://localhost:6379",
        });
    }
  }
}
