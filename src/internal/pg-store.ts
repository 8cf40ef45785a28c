import { Pool } from "pg";

import { delay } from "./deadline.js";
import { StoreSchema } from "./schema.js";
import { storeTables, type StoreTables } from "./sql.js";
import type { QueueStore } from "./store.js";

export interface PgQueueStoreOptions {
  connectionString?: string;
  /** Existing pool; the store will not end it. */
  pool?: Pool;
  tablePrefix?: string;
  autoMigrate?: boolean;
  /** How often a blocking move re-checks an empty list. */
  pollIntervalMs?: number;
}

/**
 * Lists and expiring entries on Postgres. Each list item is a row ordered
 * by `position`: right pushes take the next sequence value, left pushes its
 * negation, so both ends stay ordered without locking the list.
 */
export class PgQueueStore implements QueueStore {
  private readonly pool: Pool;
  private readonly ownsPool: boolean;
  private readonly tables: StoreTables;
  private readonly schema: StoreSchema;
  private readonly autoMigrate: boolean;
  private readonly pollIntervalMs: number;
  private readonly nextPosition: string;

  public constructor(options: PgQueueStoreOptions = {}) {
    const pool = options.pool;
    const connectionString =
      options.connectionString ??
      process.env.POSTGRES_URL ??
      process.env.DATABASE_URL;

    if (!pool && !connectionString) {
      throw new Error(
        "A connection string is required when no Pool instance is provided.",
      );
    }

    this.pool = pool ?? new Pool({ connectionString });
    this.ownsPool = pool === undefined;
    this.tables = storeTables(options.tablePrefix ?? "taskrelay");
    this.schema = new StoreSchema(this.pool, this.tables);
    this.autoMigrate = options.autoMigrate ?? true;
    this.pollIntervalMs = Math.max(10, options.pollIntervalMs ?? 100);
    this.nextPosition = `nextval('${this.tables.positionSequence}')`;
  }

  /** Creates the tables even when `autoMigrate` is off. */
  public async runMigrations(): Promise<void> {
    await this.schema.create();
  }

  public async connect(): Promise<void> {
    await this.schema.ensure(this.autoMigrate);
    await this.pool.query(
      `DELETE FROM ${this.tables.entries} WHERE expires_at <= NOW()`,
    );
  }

  public async appendRight(listKey: string, value: string): Promise<void> {
    await this.pool.query(
      `INSERT INTO ${this.tables.lists} (list_key, position, value)
       VALUES ($1, ${this.nextPosition}, $2)`,
      [listKey, value],
    );
  }

  public async appendLeft(listKey: string, value: string): Promise<void> {
    await this.pool.query(
      `INSERT INTO ${this.tables.lists} (list_key, position, value)
       VALUES ($1, -${this.nextPosition}, $2)`,
      [listKey, value],
    );
  }

  public async popLeft(listKey: string): Promise<string | null> {
    const result = await this.pool.query<{ value: string }>(
      `DELETE FROM ${this.tables.lists}
       WHERE id = (${this.headOf("$1")})
       RETURNING value`,
      [listKey],
    );
    return result.rows[0]?.value ?? null;
  }

  public async move(sourceKey: string, destKey: string): Promise<string | null> {
    const result = await this.pool.query<{ value: string }>(
      `WITH moved AS (
        DELETE FROM ${this.tables.lists}
        WHERE id = (${this.headOf("$1")})
        RETURNING value
      )
      INSERT INTO ${this.tables.lists} (list_key, position, value)
      SELECT $2, ${this.nextPosition}, value FROM moved
      RETURNING value`,
      [sourceKey, destKey],
    );
    return result.rows[0]?.value ?? null;
  }

  public async moveBlocking(
    sourceKey: string,
    destKey: string,
    timeoutMs: number,
  ): Promise<string | null> {
    const deadline = Date.now() + Math.max(0, timeoutMs);

    while (true) {
      const value = await this.move(sourceKey, destKey);
      const remaining = deadline - Date.now();
      if (value !== null || remaining <= 0) {
        return value;
      }
      await delay(Math.min(this.pollIntervalMs, remaining));
    }
  }

  public async removeOne(listKey: string, value: string): Promise<number> {
    const result = await this.pool.query(
      `DELETE FROM ${this.tables.lists}
       WHERE id = (${this.firstMatch("$1", "$2")})`,
      [listKey, value],
    );
    return result.rowCount ?? 0;
  }

  public async relocate(
    sourceKey: string,
    value: string,
    destKey: string,
    nextValue: string,
  ): Promise<void> {
    // Data-modifying CTEs always run, so removal and insert share one statement.
    await this.pool.query(
      `WITH removed AS (
        DELETE FROM ${this.tables.lists}
        WHERE id = (${this.firstMatch("$1", "$2")})
      )
      INSERT INTO ${this.tables.lists} (list_key, position, value)
      VALUES ($3, ${this.nextPosition}, $4)`,
      [sourceKey, value, destKey, nextValue],
    );
  }

  public async length(listKey: string): Promise<number> {
    const result = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*)::text AS count FROM ${this.tables.lists} WHERE list_key = $1`,
      [listKey],
    );
    return Number.parseInt(result.rows[0]?.count ?? "0", 10);
  }

  public async setWithExpiry(
    key: string,
    value: string,
    ttlSeconds: number,
  ): Promise<void> {
    await this.pool.query(
      `INSERT INTO ${this.tables.entries} (key, value, expires_at)
       VALUES ($1, $2, NOW() + ($3 * INTERVAL '1 second'))
       ON CONFLICT (key) DO UPDATE
       SET value = EXCLUDED.value, expires_at = EXCLUDED.expires_at`,
      [key, value, ttlSeconds],
    );
  }

  public async get(key: string): Promise<string | null> {
    const result = await this.pool.query<{ value: string }>(
      `SELECT value FROM ${this.tables.entries} WHERE key = $1 AND expires_at > NOW()`,
      [key],
    );
    return result.rows[0]?.value ?? null;
  }

  public async delete(key: string): Promise<void> {
    await this.pool.query(`DELETE FROM ${this.tables.entries} WHERE key = $1`, [
      key,
    ]);
  }

  public async ping(): Promise<boolean> {
    await this.pool.query("SELECT 1");
    return true;
  }

  public async close(): Promise<void> {
    if (this.ownsPool) {
      await this.pool.end();
    }
  }

  private headOf(listParam: string): string {
    return `SELECT id FROM ${this.tables.lists}
      WHERE list_key = ${listParam}
      ORDER BY position ASC
      LIMIT 1
      FOR UPDATE SKIP LOCKED`;
  }

  private firstMatch(listParam: string, valueParam: string): string {
    return `SELECT id FROM ${this.tables.lists}
      WHERE list_key = ${listParam} AND value = ${valueParam}
      ORDER BY position ASC
      LIMIT 1
      FOR UPDATE`;
  }
}
