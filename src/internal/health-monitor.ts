import type { Logger } from "../logger.js";
import { storeDeadline } from "./deadline.js";
import type { QueueStore } from "./store.js";

export class HealthMonitor {
  public constructor(
    private readonly store: QueueStore,
    private readonly timeoutMs: number,
    private readonly logger: Logger,
  ) {}

  /** Never rejects: any failure or a missed deadline reads as unhealthy. */
  public async isHealthy(): Promise<boolean> {
    try {
      return await storeDeadline("ping", this.store.ping(), this.timeoutMs);
    } catch (error) {
      this.logger.debug("Store health check failed", error);
      return false;
    }
  }
}
