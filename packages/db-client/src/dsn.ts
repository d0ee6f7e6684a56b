// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/db-client/dsn`
 * Purpose: Parse database DSNs and classify their dialect.
 * Scope: String/URL handling only. Does not open connections.
 * Invariants:
 *   - Driver suffixes (`postgresql+asyncpg`, `sqlite+aiosqlite`) classify by prefix
 *   - SQLite paths: `sqlite:///rel.db` is relative, `sqlite:////abs.db` is absolute, empty or `:memory:` is in-memory
 * Side-effects: none
 * @public
 */

import { UnsupportedDialectError } from "./errors";

export type KnownDialect = "postgresql" | "mysql" | "sqlite";

export interface ParsedDsn {
  /** Normalised dialect, or the raw lower-cased driver name for unknown drivers. */
  dialect: KnownDialect | (string & {});
  /** Driver name as written, lower-cased (e.g. `postgresql+asyncpg`). */
  driver: string;
  url: URL;
}

export function detectDialect(dsn: string): ParsedDsn {
  let url: URL;
  try {
    url = new URL(dsn);
  } catch {
    throw new UnsupportedDialectError(`Invalid database DSN: ${redactDsn(dsn)}`);
  }

  const driver = url.protocol.replace(/:$/, "").toLowerCase();
  if (driver.startsWith("postgres")) return { dialect: "postgresql", driver, url };
  if (driver.startsWith("mysql")) return { dialect: "mysql", driver, url };
  if (driver.startsWith("sqlite")) return { dialect: "sqlite", driver, url };
  return { dialect: driver, driver, url };
}

/** postgres.js only understands `postgres://` / `postgresql://`; drop any `+driver` suffix. */
export function toPostgresConnectionString(url: URL): string {
  return url.href.replace(/^[^:]+:/, "postgres:");
}

export function toSqliteFilename(url: URL): string {
  const filename = decodeURIComponent(url.pathname).replace(/^\//, "");
  return filename === "" ? ":memory:" : filename;
}

/** libsql client URL for a SQLite DSN: `:memory:` or `file:<path>`. */
export function toLibsqlUrl(url: URL): string {
  const filename = toSqliteFilename(url);
  return filename === ":memory:" ? filename : `file:${filename}`;
}

/** Mask the password component for log and error messages. */
export function redactDsn(dsn: string): string {
  return dsn.replace(/(\/\/[^:/@]+:)[^@]*@/, "$1***@");
}
