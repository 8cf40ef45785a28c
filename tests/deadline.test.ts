import { describe, it, expect, vi } from "vitest";

import { Logger, MemoryQueueStore, StoreTimeoutError } from "../src/index.js";
import { ConnectionGate } from "../src/internal/connection-gate.js";
import { delay, storeDeadline, withDeadline } from "../src/internal/deadline.js";
import { HealthMonitor } from "../src/internal/health-monitor.js";

const never = <T>() => new Promise<T>(() => {});

describe("deadlines", () => {
  it("resolves with the operation when it beats the deadline", async () => {
    await expect(
      withDeadline(Promise.resolve("done"), 50, () => new Error("late")),
    ).resolves.toBe("done");
  });

  it("rejects with the timeout error when the deadline passes", async () => {
    await expect(
      withDeadline(never<string>(), 10, () => new Error("late")),
    ).rejects.toThrow("late");
  });

  it("names the store operation that timed out", async () => {
    const attempt = storeDeadline("ping", never<boolean>(), 10);

    await expect(attempt).rejects.toBeInstanceOf(StoreTimeoutError);
    await expect(attempt).rejects.toThrow(
      "Store operation 'ping' timed out after 10ms",
    );
  });

  it("cuts a delay short when aborted", async () => {
    const controller = new AbortController();
    const startedAt = Date.now();

    const pending = delay(10_000, controller.signal);
    controller.abort();
    await pending;

    expect(Date.now() - startedAt).toBeLessThan(1000);
  });
});

describe("HealthMonitor", () => {
  const logger = new Logger("health", "silent");

  it("reports a responsive store as healthy", async () => {
    const monitor = new HealthMonitor(new MemoryQueueStore(), 50, logger);

    expect(await monitor.isHealthy()).toBe(true);
  });

  it("reports an unavailable store as unhealthy", async () => {
    const store = new MemoryQueueStore();
    store.setAvailable(false);

    expect(await new HealthMonitor(store, 50, logger).isHealthy()).toBe(false);
  });

  it("reports a failing or hanging ping as unhealthy", async () => {
    const store = new MemoryQueueStore();
    const monitor = new HealthMonitor(store, 20, logger);
    const ping = vi.spyOn(store, "ping");

    ping.mockRejectedValueOnce(new Error("ECONNREFUSED"));
    expect(await monitor.isHealthy()).toBe(false);

    ping.mockReturnValueOnce(never<boolean>());
    expect(await monitor.isHealthy()).toBe(false);
  });
});

describe("ConnectionGate", () => {
  it("connects once for concurrent callers", async () => {
    const store = new MemoryQueueStore();
    const connect = vi.spyOn(store, "connect");
    const gate = new ConnectionGate(store, 100);

    await Promise.all([gate.ensure(), gate.ensure(), gate.ensure()]);
    await gate.ensure();

    expect(connect).toHaveBeenCalledTimes(1);
    expect(gate.isConnected()).toBe(true);
  });

  it("retries after a failed attempt", async () => {
    const store = new MemoryQueueStore();
    const connect = vi.spyOn(store, "connect");
    const gate = new ConnectionGate(store, 100);

    connect.mockRejectedValueOnce(new Error("refused"));
    await expect(gate.ensure()).rejects.toThrow("refused");
    expect(gate.isConnected()).toBe(false);

    await gate.ensure();
    expect(connect).toHaveBeenCalledTimes(2);
    expect(gate.isConnected()).toBe(true);
  });

  it("gives up on a connect that hangs", async () => {
    const store = new MemoryQueueStore();
    vi.spyOn(store, "connect").mockReturnValue(never<void>());
    const gate = new ConnectionGate(store, 20);

    await expect(gate.ensure()).rejects.toBeInstanceOf(StoreTimeoutError);
  });
});
