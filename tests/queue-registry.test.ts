import { afterEach, describe, it, expect, vi } from "vitest";

import {
  AlreadyInitializedError,
  MemoryQueueStore,
  NotInitializedError,
  QueueRegistry,
} from "../src/index.js";
import { waitFor, waitForEvent } from "./helpers.js";

const fastTimeouts = { blockMs: 20, resultPollMs: 10, unhealthyPauseMs: 20 };

describe("QueueRegistry", () => {
  afterEach(async () => {
    await QueueRegistry.shutdownGlobal();
  });

  it("namespaces queues by environment", () => {
    const registry = new QueueRegistry({
      environment: "staging",
      store: new MemoryQueueStore(),
    });

    const queue = registry.createQueue("emails");

    expect(queue.name).toBe("staging_emails_queue");
    expect(registry.queueKey("reports")).toBe("staging_reports_queue");
    expect(registry.queueNames()).toEqual(["staging_emails_queue"]);
  });

  it("refuses to create the same queue twice", () => {
    const registry = new QueueRegistry({
      environment: "dev",
      store: new MemoryQueueStore(),
    });
    registry.createQueue("emails");

    expect(() => registry.createQueue("emails")).toThrow(
      "Queue 'dev_emails_queue' has already been created.",
    );
  });

  it("rejects names that would break the key layout", () => {
    const registry = new QueueRegistry({
      environment: "dev",
      store: new MemoryQueueStore(),
    });

    expect(() => registry.createQueue("emails:urgent")).toThrow(
      "Invalid queue name: emails:urgent",
    );
    expect(() => registry.createQueue("")).toThrow("Invalid queue name: ");
    expect(
      () => new QueueRegistry({ environment: "dev env", store: new MemoryQueueStore() }),
    ).toThrow("Invalid queue environment: dev env");
  });

  it("keeps queues on a shared store apart", async () => {
    const store = new MemoryQueueStore();
    const registry = new QueueRegistry({ environment: "dev", store });
    const emails = registry.createQueue("emails");
    const reports = registry.createQueue("reports");

    await emails.enqueue({ to: "a@example.test" });
    await emails.enqueue({ to: "b@example.test" });
    await reports.enqueue({ month: "2026-01" });

    expect((await emails.getStats()).waiting).toBe(2);
    expect((await reports.getStats()).waiting).toBe(1);
    expect(store.values("dev_emails_queue:waiting")).toHaveLength(2);
  });

  it("passes registry defaults to its queues", async () => {
    const registry = new QueueRegistry({
      environment: "dev",
      store: new MemoryQueueStore(),
      removeOnSuccess: false,
      timeouts: fastTimeouts,
      logLevel: "silent",
    });
    const queue = registry.createQueue<{ n: number }, number>("math", {
      maxRetries: 1,
    });

    const jobId = await queue.enqueue({ n: 21 });
    queue.start(async (job) => job.payload.n * 2);
    const result = await queue.getJobResult(jobId, 3000);

    expect(result.result).toBe(42);
    await waitFor(async () => (await queue.getStats()).succeeded === 1);
    await registry.close();
  });

  it("stops every queue on close without closing an injected store", async () => {
    const store = new MemoryQueueStore();
    const closeStore = vi.spyOn(store, "close");
    const registry = new QueueRegistry({
      environment: "dev",
      store,
      timeouts: fastTimeouts,
      logLevel: "silent",
    });
    const queue = registry.createQueue("emails");
    const idle = waitForEvent(queue, "idle");
    queue.start(async () => {});
    await idle;

    await registry.close();

    expect(queue.isRunning()).toBe(false);
    expect(registry.queueNames()).toEqual([]);
    expect(closeStore).not.toHaveBeenCalled();
  });

  it("closes a store it created", async () => {
    const registry = new QueueRegistry({
      environment: "dev",
      backend: "memory",
      logLevel: "silent",
    });
    const queue = registry.createQueue("emails");
    await queue.enqueue({ to: "a@example.test" });

    await expect(registry.close()).resolves.toBeUndefined();
  });

  it("holds one process-wide registry", async () => {
    expect(() => QueueRegistry.global()).toThrow(NotInitializedError);

    const registry = QueueRegistry.init({
      environment: "dev",
      backend: "memory",
      logLevel: "silent",
    });

    expect(QueueRegistry.global()).toBe(registry);
    expect(() =>
      QueueRegistry.init({ environment: "dev", backend: "memory" }),
    ).toThrow(AlreadyInitializedError);

    await QueueRegistry.shutdownGlobal();
    expect(() => QueueRegistry.global()).toThrow(NotInitializedError);
  });
});
