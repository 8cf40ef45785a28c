import { storeDeadline } from "./deadline.js";
import type { QueueStore } from "./store.js";

/**
 * Connects a store once, sharing the attempt among concurrent callers. A
 * failed or timed-out attempt is forgotten so the next caller retries.
 */
export class ConnectionGate {
  private connected = false;
  private pending?: Promise<void>;

  public constructor(
    private readonly store: QueueStore,
    private readonly timeoutMs: number,
  ) {}

  public isConnected(): boolean {
    return this.connected;
  }

  public async ensure(): Promise<void> {
    if (this.connected) {
      return;
    }

    if (!this.pending) {
      this.pending = storeDeadline("connect", this.store.connect(), this.timeoutMs)
        .then(() => {
          this.connected = true;
        })
        .finally(() => {
          this.pending = undefined;
        });
    }

    await this.pending;
  }
}
