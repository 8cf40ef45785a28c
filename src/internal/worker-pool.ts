import type { EventEmitter } from "node:events";
import { performance } from "node:perf_hooks";

import { computeBackoff } from "../backoff.js";
import { HandlerError, HandlerTimeoutError } from "../errors.js";
import {
  canRetry,
  deserializeJobRecord,
  incrementRetry,
  markCompleted,
  markFailed,
  markProcessing,
  markRetrying,
  serializeJobRecord,
} from "../job-record.js";
import type { Logger } from "../logger.js";
import type { JobHandler, JobRecord, QueueTimeouts } from "../types.js";
import { delay, storeDeadline, withDeadline } from "./deadline.js";
import type { HealthMonitor } from "./health-monitor.js";
import type { QueueKeys } from "./keys.js";
import type { QueueStore } from "./store.js";

interface WorkerPoolOptions {
  keys: QueueKeys;
  concurrency: number;
  timeouts: QueueTimeouts;
  removeOnSuccess: boolean;
  removeOnFailure: boolean;
  maxBackoffMs: number;
  jobTtlSeconds: number;
  health: HealthMonitor;
  ensureReady: () => Promise<void>;
  serializeError: (error: unknown) => string;
  events: EventEmitter;
  logger: Logger;
}

export interface WorkerController {
  stop: () => Promise<void>;
}

// `held` is true while `entry` sits in processing on this loop's behalf.
interface Claim {
  entry: string;
  requeueValue: string;
  held: boolean;
}

type HandlerOutcome<TResult> =
  | { ok: true; result: TResult | null }
  | { ok: false; error: HandlerError | HandlerTimeoutError; message: string };

/**
 * Runs `concurrency` independent loops, each claiming one job at a time by
 * atomically moving it from the waiting list into the processing list.
 * Holding the claimed entry in processing is what makes a loop its owner.
 */
export class WorkerPool<TPayload, TResult> {
  private workerState?: {
    abortController: AbortController;
    promises: Promise<void>[];
  };

  public constructor(
    private readonly store: QueueStore,
    private readonly options: WorkerPoolOptions,
  ) {}

  public isRunning(): boolean {
    return this.workerState !== undefined;
  }

  public start(handler: JobHandler<TPayload, TResult>): WorkerController {
    if (this.workerState) {
      throw new Error(
        "Workers already running. Call stop() before starting again.",
      );
    }

    const abortController = new AbortController();
    const promises: Promise<void>[] = [];

    this.workerState = {
      abortController,
      promises,
    };

    for (let i = 0; i < this.options.concurrency; i += 1) {
      promises.push(this.runWorker(handler, abortController.signal));
    }

    this.options.logger.info(
      `Worker started with concurrency ${this.options.concurrency}`,
    );

    const stop = async () => {
      await this.stop();
    };

    return { stop };
  }

  public async stop(): Promise<void> {
    if (!this.workerState) {
      return;
    }

    this.workerState.abortController.abort();
    await Promise.allSettled(this.workerState.promises);
    this.workerState = undefined;
    this.options.logger.info("Worker stopped");
  }

  private async runWorker(
    handler: JobHandler<TPayload, TResult>,
    signal: AbortSignal,
  ): Promise<void> {
    const { keys, timeouts, logger } = this.options;

    while (!signal.aborted) {
      try {
        if (!(await this.options.health.isHealthy())) {
          logger.warn(
            `Store health check failed, pausing ${timeouts.unhealthyPauseMs}ms`,
          );
          this.options.events.emit("storeUnavailable", {
            pauseMs: timeouts.unhealthyPauseMs,
          });
          await delay(timeouts.unhealthyPauseMs, signal);
          continue;
        }

        await this.options.ensureReady();
        const entry = await storeDeadline(
          "moveBlocking",
          this.store.moveBlocking(keys.waiting, keys.processing, timeouts.blockMs),
          timeouts.blockMs + timeouts.operationMs,
        );

        if (entry === null) {
          this.options.events.emit("idle", { durationMs: timeouts.blockMs });
          continue;
        }

        await this.processEntry(entry, handler, signal);
      } catch (error) {
        logger.error("Worker iteration failed", error);
        this.emitError(error);
        await delay(timeouts.errorPauseMs, signal);
      }
    }
  }

  private async processEntry(
    entry: string,
    handler: JobHandler<TPayload, TResult>,
    signal: AbortSignal,
  ): Promise<void> {
    let claimed: JobRecord<TPayload, TResult>;
    try {
      claimed = deserializeJobRecord<TPayload, TResult>(entry);
    } catch (error) {
      // Park undecodable entries so they never block the processing list.
      await this.call(
        "relocate",
        this.store.relocate(
          this.options.keys.processing,
          entry,
          this.options.keys.failed,
          entry,
        ),
      );
      this.options.logger.error("Discarded undecodable job entry", error);
      this.emitError(error);
      return;
    }

    const claim: Claim = { entry, requeueValue: entry, held: true };
    try {
      const job = markProcessing(incrementRetry(claimed));
      await this.persist(job);

      this.options.logger.debug(
        `Processing job ${job.id} (attempt ${job.attempts}/${job.maxRetries})`,
      );
      this.options.events.emit("jobReserved", { job });
      this.options.events.emit("jobStarted", { job });

      const startedAt = performance.now();
      const outcome = await this.invoke(handler, job, signal);

      if (outcome.ok) {
        await this.complete(claim, job, outcome.result, performance.now() - startedAt, signal);
      } else {
        await this.fail(claim, job, outcome.error, outcome.message, signal);
      }
    } catch (error) {
      if (claim.held) {
        await this.requeue(claim, claimed.id);
      }
      throw error;
    }
  }

  // Hands a claimed entry back to the waiting tail after a store error.
  private async requeue(claim: Claim, jobId: string): Promise<void> {
    const { keys, logger } = this.options;
    try {
      await this.call(
        "relocate",
        this.store.relocate(keys.processing, claim.entry, keys.waiting, claim.requeueValue),
      );
      claim.held = false;
      logger.warn(`Returned job ${jobId} to waiting after a store error`);
    } catch (requeueError) {
      logger.error(
        `Job ${jobId} stays in processing; recoverProcessing() will return it`,
        requeueError,
      );
    }
  }

  private async invoke(
    handler: JobHandler<TPayload, TResult>,
    job: JobRecord<TPayload, TResult>,
    workerSignal: AbortSignal,
  ): Promise<HandlerOutcome<TResult>> {
    const controller = new AbortController();
    const onStop = () => {
      controller.abort(workerSignal.reason);
    };
    workerSignal.addEventListener("abort", onStop, { once: true });

    try {
      const result = await withDeadline(
        Promise.resolve().then(() =>
          handler(job, { attempt: job.attempts, signal: controller.signal }),
        ),
        job.timeoutMs,
        () => new HandlerTimeoutError(job.id, job.timeoutMs),
      );
      return { ok: true, result: result ?? null };
    } catch (error) {
      if (error instanceof HandlerTimeoutError) {
        // The handler keeps running; the signal asks it to give up.
        controller.abort(error);
        return { ok: false, error, message: error.message };
      }
      return {
        ok: false,
        error: new HandlerError(job.id, error),
        message: this.options.serializeError(error),
      };
    } finally {
      workerSignal.removeEventListener("abort", onStop);
    }
  }

  private async complete(
    claim: Claim,
    job: JobRecord<TPayload, TResult>,
    result: TResult | null,
    durationMs: number,
    signal: AbortSignal,
  ): Promise<void> {
    const { keys, removeOnSuccess } = this.options;
    const completed = markCompleted(job, result);

    let encoded: string;
    try {
      encoded = serializeJobRecord(completed);
    } catch (error) {
      await this.fail(
        claim,
        job,
        new HandlerError(job.id, error),
        this.options.serializeError(error),
        signal,
      );
      return;
    }

    if (removeOnSuccess) {
      await this.call("removeOne", this.store.removeOne(keys.processing, claim.entry));
      claim.held = false;
      await this.call("delete", this.store.delete(keys.job(job.id)));
    } else {
      await this.persistEncoded(job.id, encoded);
      await this.call(
        "relocate",
        this.store.relocate(keys.processing, claim.entry, keys.succeeded, encoded),
      );
      claim.held = false;
    }

    this.options.logger.debug(
      `Job ${job.id} completed in ${durationMs.toFixed(1)}ms`,
    );
    this.options.events.emit("jobCompleted", { job: completed, durationMs });
  }

  private async fail(
    claim: Claim,
    job: JobRecord<TPayload, TResult>,
    error: HandlerError | HandlerTimeoutError,
    message: string,
    signal: AbortSignal,
  ): Promise<void> {
    const { keys, logger } = this.options;

    if (canRetry(job)) {
      const retrying = markRetrying(job, message);
      const encoded = serializeJobRecord(retrying);
      const backoffMs = computeBackoff(
        job.backoffMs,
        job.attempts - 1,
        this.options.maxBackoffMs,
      );

      await this.persistEncoded(job.id, encoded);
      claim.requeueValue = encoded;
      logger.debug(
        `Retrying job ${job.id} (attempt ${job.attempts}/${job.maxRetries}) after ${backoffMs}ms`,
      );
      this.options.events.emit("jobFailed", {
        job: retrying,
        error,
        willRetry: true,
      });

      // The entry stays in processing during backoff, so a crash here
      // leaves it recoverable rather than lost.
      await delay(backoffMs, signal);
      await this.call(
        "relocate",
        this.store.relocate(keys.processing, claim.entry, keys.waiting, encoded),
      );
      claim.held = false;
      return;
    }

    const failed = markFailed(job, message);
    if (this.options.removeOnFailure) {
      await this.call("removeOne", this.store.removeOne(keys.processing, claim.entry));
      claim.held = false;
      await this.call("delete", this.store.delete(keys.job(job.id)));
    } else {
      const encoded = serializeJobRecord(failed);
      await this.persistEncoded(job.id, encoded);
      await this.call(
        "relocate",
        this.store.relocate(keys.processing, claim.entry, keys.failed, encoded),
      );
      claim.held = false;
    }

    logger.warn(
      `Job ${job.id} failed permanently after ${job.attempts} attempts: ${message}`,
    );
    this.options.events.emit("jobFailed", { job: failed, error, willRetry: false });
  }

  private async persist(job: JobRecord<TPayload, TResult>): Promise<void> {
    await this.persistEncoded(job.id, serializeJobRecord(job));
  }

  private async persistEncoded(id: string, encoded: string): Promise<void> {
    await this.call(
      "setWithExpiry",
      this.store.setWithExpiry(
        this.options.keys.job(id),
        encoded,
        this.options.jobTtlSeconds,
      ),
    );
  }

  private call<T>(operation: string, pending: Promise<T>): Promise<T> {
    return storeDeadline(operation, pending, this.options.timeouts.operationMs);
  }

  private emitError(error: unknown): void {
    // An unhandled "error" event would throw out of the loop.
    if (this.options.events.listenerCount("error") > 0) {
      this.options.events.emit("error", { error });
    }
  }
}
