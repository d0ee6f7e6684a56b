// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/db-client/session`
 * Purpose: Transaction-scoped database sessions for the unit of work.
 * Scope: Lazy BEGIN, explicit COMMIT/ROLLBACK, connection release. Does not build engines.
 * Invariants:
 *   - A transaction begins on first db() call, not at construction
 *   - commit()/rollback() without an open transaction are no-ops
 *   - close() rolls back an open transaction, then releases the connection
 *   - PostgresSession holds one reserved pool connection for its lifetime; concurrent db() calls share it
 *   - SqliteSession shares the engine's single handle: one open session per SQLite engine at a time
 * Side-effects: IO (database)
 * Links: src/unit-of-work.ts, src/engine.ts
 * @public
 */

import type { Client } from "@libsql/client";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type { LibSQLDatabase } from "drizzle-orm/libsql";
import type { ReservedSql } from "postgres";

export type SchemaRecord = Record<string, unknown>;

/** Minimal lifecycle every session exposes to the unit of work. */
export interface DbSession {
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

/** Connection pool slice a session needs; postgres.js `Sql` satisfies it. */
export interface ConnectionPool<TConnection> {
  reserve(): Promise<TConnection>;
}

/** Reserved connection slice a session needs; postgres.js `ReservedSql` satisfies it. */
export interface PooledConnection {
  (template: TemplateStringsArray): PromiseLike<unknown>;
  release(): void;
}

export class PostgresSession<
  TDatabase = PostgresJsDatabase<Record<string, never>>,
  TConnection extends PooledConnection = ReservedSql,
> implements DbSession
{
  private reserving: Promise<TConnection> | undefined;
  private beginning: Promise<void> | undefined;
  private reserved: TConnection | undefined;
  private handle: TDatabase | undefined;
  private inTransaction = false;

  constructor(
    private readonly pool: ConnectionPool<TConnection>,
    private readonly bind: (connection: TConnection) => TDatabase
  ) {}

  /** Drizzle handle bound to this session's connection, inside an open transaction. */
  async db(): Promise<TDatabase> {
    this.reserving ??= this.reserveConnection();
    const connection = await this.reserving;
    this.beginning ??= this.beginTransaction(connection);
    await this.beginning;
    this.handle ??= this.bind(connection);
    return this.handle;
  }

  async commit(): Promise<void> {
    await this.finish("COMMIT");
  }

  async rollback(): Promise<void> {
    await this.finish("ROLLBACK");
  }

  async close(): Promise<void> {
    const connection = this.reserved;
    if (!connection) return;
    try {
      await this.rollback();
    } finally {
      connection.release();
      this.reserved = undefined;
      this.reserving = undefined;
      this.beginning = undefined;
      this.handle = undefined;
    }
  }

  private async reserveConnection(): Promise<TConnection> {
    try {
      const connection = await this.pool.reserve();
      this.reserved = connection;
      return connection;
    } catch (error) {
      this.reserving = undefined;
      throw error;
    }
  }

  private async beginTransaction(connection: TConnection): Promise<void> {
    try {
      await connection`BEGIN`;
      this.inTransaction = true;
    } catch (error) {
      this.beginning = undefined;
      throw error;
    }
  }

  private async finish(statement: "COMMIT" | "ROLLBACK"): Promise<void> {
    const connection = this.reserved;
    if (!connection || !this.inTransaction) return;
    if (statement === "COMMIT") {
      await connection`COMMIT`;
    } else {
      await connection`ROLLBACK`;
    }
    this.inTransaction = false;
    this.beginning = undefined;
  }
}

export class SqliteSession<TSchema extends SchemaRecord = Record<string, never>>
  implements DbSession
{
  private beginning: Promise<void> | undefined;
  private inTransaction = false;

  constructor(
    private readonly client: Client,
    private readonly handle: LibSQLDatabase<TSchema>
  ) {}

  /** Drizzle handle on the engine's connection, inside an open transaction. */
  async db(): Promise<LibSQLDatabase<TSchema>> {
    this.beginning ??= this.beginTransaction();
    await this.beginning;
    return this.handle;
  }

  async commit(): Promise<void> {
    await this.finish("COMMIT");
  }

  async rollback(): Promise<void> {
    await this.finish("ROLLBACK");
  }

  async close(): Promise<void> {
    await this.rollback();
  }

  private async beginTransaction(): Promise<void> {
    try {
      await this.client.execute("BEGIN");
      this.inTransaction = true;
    } catch (error) {
      this.beginning = undefined;
      throw error;
    }
  }

  private async finish(statement: "COMMIT" | "ROLLBACK"): Promise<void> {
    if (!this.inTransaction) return;
    await this.client.execute(statement);
    this.inTransaction = false;
    this.beginning = undefined;
  }
}
