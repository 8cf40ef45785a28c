import { setTimeout as sleep } from "node:timers/promises";

import { QueueRegistry, loadQueueConfig } from "../../src/index.js";

type NotificationPayload = {
  userId: string;
  message: string;
};

type DeliveryReceipt = {
  deliveredAt: string;
};

const config = loadQueueConfig();

const registry = QueueRegistry.init({
  ...config,
  removeOnSuccess: false,
  timeouts: { blockMs: 1000 },
});

const notifications = registry.createQueue<NotificationPayload, DeliveryReceipt>(
  "notifications",
  { maxRetries: 3, backoffMs: 200, timeoutMs: 5000 },
);

notifications.on("jobStarted", ({ job }) => {
  console.log(`[queue] started job ${job.id} (attempt ${job.attempts})`);
});

notifications.on("jobCompleted", ({ job, durationMs }) => {
  console.log(`[queue] completed job ${job.id} in ${durationMs.toFixed(1)}ms`);
});

notifications.on("jobFailed", ({ job, willRetry }) => {
  console.warn(
    `[queue] job ${job.id} failed${willRetry ? " (retrying)" : ""}: ${job.error}`,
  );
});

notifications.on("error", ({ error }) => {
  console.error(`[queue] worker error:`, error);
});

async function main(): Promise<void> {
  console.log(
    `[main] using ${config.backend} backend in environment ${config.environment}`,
  );

  const recovered = await notifications.recoverProcessing();
  if (recovered > 0) {
    console.log(`[main] re-queued ${recovered} orphaned job(s)`);
  }

  notifications.start(async (job, { signal }) => {
    console.log(`[worker] notifying ${job.payload.userId}: ${job.payload.message}`);
    if (job.attempts === 1 && job.payload.userId === "user-2") {
      throw new Error("push gateway unavailable");
    }
    await sleep(100, undefined, { signal });
    return { deliveredAt: new Date().toISOString() };
  });

  try {
    const ids = await Promise.all([
      notifications.enqueue({ userId: "user-1", message: "Welcome aboard" }),
      notifications.enqueue({ userId: "user-2", message: "Password changed" }),
    ]);

    for (const id of ids) {
      const result = await notifications.getJobResult(id, 15_000);
      console.log(`[main] job ${id} finished with status ${result.status}`, result.result);
    }

    console.log(`[main] queue stats`, await notifications.getStats());
  } finally {
    await QueueRegistry.shutdownGlobal();
  }
}

await main().catch((error) => {
  console.error(`[main] example failed:`, error);
  process.exitCode = 1;
});
