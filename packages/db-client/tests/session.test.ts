// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/db-client/tests/session.test`
 * Purpose: PostgresSession connection reservation and transaction statements against a fake pool.
 * Side-effects: none
 * Links: src/session.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { type ConnectionPool, type PooledConnection, PostgresSession } from "../src/session";

class FakePool implements ConnectionPool<PooledConnection> {
  reserved = 0;
  released = 0;
  readonly statements: string[] = [];

  async reserve(): Promise<PooledConnection> {
    this.reserved += 1;
    await new Promise((resolve) => setTimeout(resolve, 10));
    const connection = async (template: TemplateStringsArray): Promise<unknown[]> => {
      this.statements.push(template.join(""));
      return [];
    };
    return Object.assign(connection, {
      release: () => {
        this.released += 1;
      },
    });
  }
}

type FakeHandle = { connection: PooledConnection };

function createSession(pool: FakePool): PostgresSession<FakeHandle, PooledConnection> {
  return new PostgresSession(pool, (connection) => ({ connection }));
}

describe("PostgresSession", () => {
  it("reserves one connection for concurrent db() calls", async () => {
    const pool = new FakePool();
    const session = createSession(pool);

    const [first, second] = await Promise.all([session.db(), session.db()]);
    await session.close();

    expect(first).toBe(second);
    expect({ reserved: pool.reserved, released: pool.released }).toEqual({
      reserved: 1,
      released: 1,
    });
    expect(pool.statements).toEqual(["BEGIN", "ROLLBACK"]);
  });

  it("begins a new transaction after commit on the same connection", async () => {
    const pool = new FakePool();
    const session = createSession(pool);

    await session.db();
    await session.commit();
    await session.db();
    await session.commit();
    await session.close();

    expect(pool.statements).toEqual(["BEGIN", "COMMIT", "BEGIN", "COMMIT"]);
    expect(pool.reserved).toBe(1);
    expect(pool.released).toBe(1);
  });

  it("does not reserve a connection when db() is never called", async () => {
    const pool = new FakePool();
    const session = createSession(pool);

    await session.commit();
    await session.rollback();
    await session.close();

    expect(pool.reserved).toBe(0);
    expect(pool.statements).toEqual([]);
  });
});
