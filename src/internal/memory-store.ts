import type { QueueStore } from "./store.js";

interface BlockedMove {
  destKey: string;
  resolve: (value: string | null) => void;
  timer: NodeJS.Timeout;
}

interface ExpiringEntry {
  value: string;
  expiresAt: number;
}

/**
 * In-process store with the same list and expiry semantics as the remote
 * adapters. Suitable for tests and single-process development.
 */
export class MemoryQueueStore implements QueueStore {
  private readonly lists = new Map<string, string[]>();
  private readonly entries = new Map<string, ExpiringEntry>();
  private readonly blocked = new Map<string, BlockedMove[]>();
  private available = true;

  /** Simulates an outage: while unavailable every call rejects. */
  public setAvailable(available: boolean): void {
    this.available = available;
  }

  /** Copy of a list's current contents, head first. */
  public values(listKey: string): string[] {
    return [...(this.lists.get(listKey) ?? [])];
  }

  public async connect(): Promise<void> {
    this.assertAvailable();
  }

  public async appendRight(listKey: string, value: string): Promise<void> {
    this.assertAvailable();
    this.push(listKey, value);
  }

  public async appendLeft(listKey: string, value: string): Promise<void> {
    this.assertAvailable();
    this.listFor(listKey).unshift(value);
    this.wake(listKey);
  }

  public async popLeft(listKey: string): Promise<string | null> {
    this.assertAvailable();
    return this.lists.get(listKey)?.shift() ?? null;
  }

  public async move(sourceKey: string, destKey: string): Promise<string | null> {
    this.assertAvailable();
    return this.shiftInto(sourceKey, destKey);
  }

  public async moveBlocking(
    sourceKey: string,
    destKey: string,
    timeoutMs: number,
  ): Promise<string | null> {
    this.assertAvailable();
    const value = this.shiftInto(sourceKey, destKey);
    if (value !== null || timeoutMs <= 0) {
      return value;
    }

    return new Promise<string | null>((resolve) => {
      const waiters = this.blocked.get(sourceKey) ?? [];
      const waiter: BlockedMove = {
        destKey,
        resolve,
        timer: setTimeout(() => {
          const remaining = this.blocked.get(sourceKey) ?? [];
          this.blocked.set(
            sourceKey,
            remaining.filter((entry) => entry !== waiter),
          );
          resolve(null);
        }, timeoutMs),
      };
      waiters.push(waiter);
      this.blocked.set(sourceKey, waiters);
    });
  }

  public async removeOne(listKey: string, value: string): Promise<number> {
    this.assertAvailable();
    return this.removeFirst(listKey, value);
  }

  public async relocate(
    sourceKey: string,
    value: string,
    destKey: string,
    nextValue: string,
  ): Promise<void> {
    this.assertAvailable();
    this.removeFirst(sourceKey, value);
    this.push(destKey, nextValue);
  }

  public async length(listKey: string): Promise<number> {
    this.assertAvailable();
    return this.lists.get(listKey)?.length ?? 0;
  }

  public async setWithExpiry(
    key: string,
    value: string,
    ttlSeconds: number,
  ): Promise<void> {
    this.assertAvailable();
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  public async get(key: string): Promise<string | null> {
    this.assertAvailable();
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  public async delete(key: string): Promise<void> {
    this.assertAvailable();
    this.entries.delete(key);
  }

  public async ping(): Promise<boolean> {
    return this.available;
  }

  public async close(): Promise<void> {
    for (const waiters of this.blocked.values()) {
      for (const waiter of waiters) {
        clearTimeout(waiter.timer);
        waiter.resolve(null);
      }
    }
    this.blocked.clear();
  }

  private assertAvailable(): void {
    if (!this.available) {
      throw new Error("Memory store is unavailable");
    }
  }

  private listFor(listKey: string): string[] {
    let list = this.lists.get(listKey);
    if (!list) {
      list = [];
      this.lists.set(listKey, list);
    }
    return list;
  }

  private push(listKey: string, value: string): void {
    this.listFor(listKey).push(value);
    this.wake(listKey);
  }

  private shiftInto(sourceKey: string, destKey: string): string | null {
    const value = this.lists.get(sourceKey)?.shift();
    if (value === undefined) {
      return null;
    }
    this.push(destKey, value);
    return value;
  }

  private removeFirst(listKey: string, value: string): number {
    const list = this.lists.get(listKey);
    const index = list?.indexOf(value) ?? -1;
    if (!list || index < 0) {
      return 0;
    }
    list.splice(index, 1);
    return 1;
  }

  // Hands newly visible items to callers blocked on this list, oldest first.
  private wake(listKey: string): void {
    const waiters = this.blocked.get(listKey);
    while (waiters && waiters.length > 0 && this.listFor(listKey).length > 0) {
      const waiter = waiters.shift();
      if (!waiter) {
        break;
      }
      clearTimeout(waiter.timer);
      waiter.resolve(this.shiftInto(listKey, waiter.destKey));
    }
  }
}
