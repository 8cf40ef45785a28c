import { Redis, type RedisOptions } from "ioredis";

import type { QueueStore } from "./store.js";

export interface RedisQueueStoreOptions {
  /** Existing client; the store will not close it. */
  client?: Redis;
  url?: string;
  redisOptions?: RedisOptions;
}

const HEALTH_CHECK_KEY = "__health_check_key__";

export class RedisQueueStore implements QueueStore {
  private readonly client: Redis;
  private readonly ownsClient: boolean;
  private blockingClient?: Redis;

  public constructor(options: RedisQueueStoreOptions = {}) {
    if (options.client) {
      this.client = options.client;
      this.ownsClient = false;
    } else if (options.url) {
      this.client = new Redis(options.url, {
        lazyConnect: true,
        maxRetriesPerRequest: 1,
        ...options.redisOptions,
      });
      this.ownsClient = true;
    } else {
      throw new Error(
        "A Redis URL is required when no client instance is provided.",
      );
    }
  }

  public async connect(): Promise<void> {
    if (this.client.status === "wait") {
      await this.client.connect();
    }
  }

  public async appendRight(listKey: string, value: string): Promise<void> {
    await this.client.rpush(listKey, value);
  }

  public async appendLeft(listKey: string, value: string): Promise<void> {
    await this.client.lpush(listKey, value);
  }

  public async popLeft(listKey: string): Promise<string | null> {
    return this.client.lpop(listKey);
  }

  public async move(sourceKey: string, destKey: string): Promise<string | null> {
    return (await this.client.lmove(sourceKey, destKey, "LEFT", "RIGHT")) ?? null;
  }

  public async moveBlocking(
    sourceKey: string,
    destKey: string,
    timeoutMs: number,
  ): Promise<string | null> {
    // BLMOVE treats 0 as "wait forever".
    if (timeoutMs <= 0) {
      return this.move(sourceKey, destKey);
    }

    // A blocked connection cannot serve other commands.
    const blocking = this.getBlockingClient();
    const value = await blocking.blmove(
      sourceKey,
      destKey,
      "LEFT",
      "RIGHT",
      timeoutMs / 1000,
    );
    return value ?? null;
  }

  public async removeOne(listKey: string, value: string): Promise<number> {
    return this.client.lrem(listKey, 1, value);
  }

  public async relocate(
    sourceKey: string,
    value: string,
    destKey: string,
    nextValue: string,
  ): Promise<void> {
    const results = await this.client
      .multi()
      .lrem(sourceKey, 1, value)
      .rpush(destKey, nextValue)
      .exec();

    if (!results) {
      throw new Error(`Transaction moving entry to ${destKey} was aborted`);
    }
    for (const [error] of results) {
      if (error) {
        throw error;
      }
    }
  }

  public async length(listKey: string): Promise<number> {
    return this.client.llen(listKey);
  }

  public async setWithExpiry(
    key: string,
    value: string,
    ttlSeconds: number,
  ): Promise<void> {
    await this.client.set(key, value, "EX", Math.max(1, Math.ceil(ttlSeconds)));
  }

  public async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  public async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  public async ping(): Promise<boolean> {
    await this.client.get(HEALTH_CHECK_KEY);
    return true;
  }

  public async close(): Promise<void> {
    if (this.blockingClient) {
      this.blockingClient.disconnect();
      this.blockingClient = undefined;
    }
    if (this.ownsClient) {
      await this.client.quit();
    }
  }

  private getBlockingClient(): Redis {
    if (!this.blockingClient) {
      this.blockingClient = this.client.duplicate();
    }
    return this.blockingClient;
  }
}
