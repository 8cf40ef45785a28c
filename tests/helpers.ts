import { randomUUID } from "node:crypto";

import {
  JobQueue,
  MemoryQueueStore,
  type JobQueueOptions,
  type QueueEventName,
  type QueueEvents,
} from "../src/index.js";
import { queueKeys } from "../src/internal/keys.js";

interface WaitForOptions {
  timeout?: number;
  interval?: number;
}

export const wait = (ms: number) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export async function waitFor<T>(
  predicate: () => Promise<T | undefined | null | false> | T | undefined | null | false,
  options: WaitForOptions = {},
): Promise<T> {
  const timeout = options.timeout ?? 5000;
  const interval = options.interval ?? 10;
  const start = Date.now();

  while (true) {
    const result = await predicate();
    if (result) {
      return result;
    }
    if (Date.now() - start > timeout) {
      throw new Error("waitFor timed out");
    }
    await wait(interval);
  }
}

export function waitForEvent<
  TPayload,
  TResult,
  K extends QueueEventName<TPayload, TResult>,
>(
  queue: JobQueue<TPayload, TResult>,
  event: K,
  predicate: (payload: QueueEvents<TPayload, TResult>[K]) => boolean = () => true,
  timeout = 5000,
): Promise<QueueEvents<TPayload, TResult>[K]> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      queue.off(event, listener);
      reject(new Error(`Timed out waiting for ${String(event)}`));
    }, timeout);

    const listener = (payload: QueueEvents<TPayload, TResult>[K]) => {
      if (!predicate(payload)) {
        return;
      }
      clearTimeout(timer);
      queue.off(event, listener);
      resolve(payload);
    };

    queue.on(event, listener);
  });
}

export function randomName(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, "")}`;
}

export function createQueue<TPayload = unknown, TResult = unknown>(
  options: Partial<Omit<JobQueueOptions, "store">> = {},
  store = new MemoryQueueStore(),
) {
  const name = options.name ?? randomName("test_queue");

  const queue = new JobQueue<TPayload, TResult>({
    backoffMs: 10,
    logLevel: "silent",
    ...options,
    name,
    store,
    timeouts: {
      blockMs: 20,
      errorPauseMs: 10,
      unhealthyPauseMs: 20,
      resultPollMs: 10,
      ...options.timeouts,
    },
  });

  return { queue, store, name, keys: queueKeys(name) };
}
