/**
 * List and key/value primitives the queue engine needs from its backing
 * store. Values are opaque strings; timeouts are in milliseconds.
 *
 * Every method may reject with a connectivity error. Callers apply their
 * own deadlines.
 */
export interface QueueStore {
  /** Establishes the connection and prepares any schema. Idempotent. */
  connect(): Promise<void>;
  appendRight(listKey: string, value: string): Promise<void>;
  appendLeft(listKey: string, value: string): Promise<void>;
  popLeft(listKey: string): Promise<string | null>;
  /**
   * Atomically moves the head of `sourceKey` to the tail of `destKey`.
   * Resolves `null` when the source is empty.
   */
  move(sourceKey: string, destKey: string): Promise<string | null>;
  /**
   * Like `move`, but waits up to `timeoutMs` for an item to appear. No two
   * callers ever receive the same item.
   */
  moveBlocking(
    sourceKey: string,
    destKey: string,
    timeoutMs: number,
  ): Promise<string | null>;
  /** Removes the first occurrence of `value`; resolves the number removed. */
  removeOne(listKey: string, value: string): Promise<number>;
  /**
   * Atomically removes the first occurrence of `value` from `sourceKey` and
   * appends `nextValue` to the tail of `destKey`.
   */
  relocate(
    sourceKey: string,
    value: string,
    destKey: string,
    nextValue: string,
  ): Promise<void>;
  length(listKey: string): Promise<number>;
  setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void>;
  get(key: string): Promise<string | null>;
  delete(key: string): Promise<void>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
