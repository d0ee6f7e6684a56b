// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/db-client/engine`
 * Purpose: Build a Drizzle database engine from a DSN.
 * Scope: Client construction and session factory. Does not read from environment; does not run DDL.
 * Invariants:
 *   - DSN injected, never from process.env
 *   - PostgreSQL pool: max 10, idle 20s, connect timeout 10s, application_name set
 *   - `extensions` are recorded only; creating them is the caller's migration job
 *   - Unsupported dialects throw UnsupportedDialectError before any connection is made
 * Notes: postgres.js has no pre-ping; dead pooled connections surface as query errors and are replaced on next reserve.
 * Notes: each PostgresSession builds its own drizzle handle over its reserved connection.
 * Side-effects: IO (database connections)
 * Links: src/session.ts, src/dsn.ts
 * @public
 */

import { type Client, createClient } from "@libsql/client";
import { getLogger } from "@phoenix/observability";
import type { DrizzleConfig, Logger as DrizzleLogger } from "drizzle-orm";
import { drizzle as drizzleSqlite, type LibSQLDatabase } from "drizzle-orm/libsql";
import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres, { type ReservedSql, type Sql } from "postgres";

import {
  detectDialect,
  redactDsn,
  toLibsqlUrl,
  toPostgresConnectionString,
} from "./dsn";
import { UnsupportedDialectError } from "./errors";
import { PostgresSession, type SchemaRecord, SqliteSession } from "./session";

const log = getLogger("db.engine");

export interface CreateDatabaseOptions<TSchema extends SchemaRecord> {
  /** Log every statement at debug level. */
  echo?: boolean;
  /** Postgres extensions the caller expects (e.g. `vector`). */
  extensions?: readonly string[];
  applicationName?: string;
  schema?: TSchema;
}

interface EngineBase {
  readonly url: URL;
  readonly extensions: readonly string[];
  dispose(): Promise<void>;
}

export interface PostgresEngine<TSchema extends SchemaRecord = Record<string, never>>
  extends EngineBase {
  readonly dialect: "postgresql";
  readonly client: Sql;
  readonly db: PostgresJsDatabase<TSchema>;
  createSession(): PostgresSession<PostgresJsDatabase<TSchema>>;
}

export interface SqliteEngine<TSchema extends SchemaRecord = Record<string, never>>
  extends EngineBase {
  readonly dialect: "sqlite";
  readonly client: Client;
  readonly db: LibSQLDatabase<TSchema>;
  createSession(): SqliteSession<TSchema>;
}

export type DatabaseEngine<TSchema extends SchemaRecord = Record<string, never>> =
  | PostgresEngine<TSchema>
  | SqliteEngine<TSchema>;

class PinoQueryLogger implements DrizzleLogger {
  logQuery(query: string, params: unknown[]): void {
    log.debug({ query, paramCount: params.length }, "db.query");
  }
}

export function createDatabaseFromDsn<
  TSchema extends SchemaRecord = Record<string, never>,
>(
  dsn: string,
  options: CreateDatabaseOptions<TSchema> = {}
): DatabaseEngine<TSchema> {
  const { dialect, url } = detectDialect(dsn);
  const extensions = [...(options.extensions ?? [])];
  const config: DrizzleConfig<TSchema> = {
    ...(options.schema ? { schema: options.schema } : {}),
    ...(options.echo ? { logger: new PinoQueryLogger() } : {}),
  };

  if (dialect === "postgresql") {
    const client = postgres(toPostgresConnectionString(url), {
      max: 10,
      idle_timeout: 20,
      connect_timeout: 10,
      connection: {
        application_name: options.applicationName ?? "app",
      },
    });
    log.debug({ dialect, dsn: redactDsn(dsn), extensions }, "db.engine.created");
    return {
      dialect: "postgresql",
      url,
      extensions,
      client,
      db: drizzle(client, config),
      createSession: () =>
        new PostgresSession<PostgresJsDatabase<TSchema>, ReservedSql>(client, (connection) =>
          drizzle(connection, config)
        ),
      dispose: () => client.end(),
    };
  }

  if (dialect === "sqlite") {
    const client = createClient({ url: toLibsqlUrl(url) });
    const db = drizzleSqlite(client, config);
    log.debug({ dialect, dsn: redactDsn(dsn), extensions }, "db.engine.created");
    return {
      dialect: "sqlite",
      url,
      extensions,
      client,
      db,
      createSession: () => new SqliteSession(client, db),
      dispose: async () => {
        client.close();
      },
    };
  }

  throw new UnsupportedDialectError(`Unsupported database dialect: ${dialect}`, dialect);
}
