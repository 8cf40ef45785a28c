import type { Pool } from "pg";

import type { StoreTables } from "./sql.js";

function schemaStatements(tables: StoreTables): string[] {
  return [
    `CREATE SEQUENCE IF NOT EXISTS ${tables.positionSequence}`,
    `CREATE TABLE IF NOT EXISTS ${tables.lists} (
      id BIGSERIAL PRIMARY KEY,
      list_key TEXT NOT NULL,
      position BIGINT NOT NULL,
      value TEXT NOT NULL
    )`,
    `CREATE INDEX IF NOT EXISTS ${tables.listIndex}
      ON ${tables.lists} (list_key, position)`,
    `CREATE TABLE IF NOT EXISTS ${tables.entries} (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      expires_at TIMESTAMPTZ NOT NULL
    )`,
    `CREATE INDEX IF NOT EXISTS ${tables.expiryIndex}
      ON ${tables.entries} (expires_at)`,
  ];
}

/**
 * Creates or checks the list and entry tables. Creation is idempotent DDL
 * in one transaction, serialized across processes by an advisory lock
 * keyed on the table prefix.
 */
export class StoreSchema {
  private ready = false;
  private pending?: Promise<void>;

  public constructor(
    private readonly pool: Pool,
    private readonly tables: StoreTables,
  ) {}

  /**
   * With `create` the tables are made if missing; without it their absence
   * is an error. Settles once per store; concurrent callers share a run.
   */
  public async ensure(create: boolean): Promise<void> {
    if (this.ready) {
      return;
    }

    if (!this.pending) {
      this.pending = (create ? this.create() : this.verify())
        .then(() => {
          this.ready = true;
        })
        .finally(() => {
          this.pending = undefined;
        });
    }

    await this.pending;
  }

  public async create(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      try {
        await client.query("SELECT pg_advisory_xact_lock(hashtext($1))", [
          this.tables.prefix,
        ]);
        for (const statement of schemaStatements(this.tables)) {
          await client.query(statement);
        }
        await client.query("COMMIT");
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
    } finally {
      client.release();
    }
    this.ready = true;
  }

  private async verify(): Promise<void> {
    const result = await this.pool.query<{
      lists: string | null;
      entries: string | null;
    }>("SELECT to_regclass($1) AS lists, to_regclass($2) AS entries", [
      this.tables.lists,
      this.tables.entries,
    ]);
    const row = result.rows[0];
    if (!row?.lists || !row.entries) {
      throw new Error(
        `Queue tables for prefix '${this.tables.prefix}' are missing. Call runMigrations() or enable autoMigrate.`,
      );
    }
  }
}
