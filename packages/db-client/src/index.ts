// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/db-client`
 * Purpose: Database engine construction, sessions and unit of work.
 * Scope: Re-exports public API. Does not read environment.
 * Invariants: DSN always injected by the caller.
 * Side-effects: none
 * @public
 */

export { detectDialect, type KnownDialect, type ParsedDsn, redactDsn } from "./dsn";
export {
  type CreateDatabaseOptions,
  createDatabaseFromDsn,
  type DatabaseEngine,
  type PostgresEngine,
  type SqliteEngine,
} from "./engine";
export { UnitOfWorkError, UnsupportedDialectError } from "./errors";
export {
  type ConnectionPool,
  type DbSession,
  type PooledConnection,
  PostgresSession,
  type SchemaRecord,
  SqliteSession,
} from "./session";
export { BaseUnitOfWork } from "./unit-of-work";
