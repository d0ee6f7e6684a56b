// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/db-client/unit-of-work`
 * Purpose: Scope a transactional database session around a block of work.
 * Scope: Session acquisition, commit/rollback on exit, release of owned sessions. Does not build engines.
 * Invariants:
 *   - run(): work succeeds -> commit; work throws -> rollback, original error rethrown
 *   - Injected sessions are committed/rolled back but never closed here
 *   - Owned sessions (from createSession) are closed and forgotten on exit
 *   - clearRepos() runs on every exit, success or failure
 *   - commit()/rollback() without an active session are no-ops
 * Side-effects: IO (via session)
 * Links: src/session.ts
 * @public
 */

import { getLogger } from "@phoenix/observability";

import { UnitOfWorkError } from "./errors";
import type { DbSession } from "./session";

const log = getLogger("db.unit-of-work");

/**
 * Subclasses expose repositories built on `this.session` and reset them in
 * {@link BaseUnitOfWork.clearRepos}. Override {@link BaseUnitOfWork.createSession}
 * to open sessions on demand; otherwise inject one through the constructor.
 */
export class BaseUnitOfWork<TSession extends DbSession = DbSession> {
  private readonly injected: TSession | undefined;
  private active: TSession | undefined;

  constructor(session?: TSession) {
    this.injected = session;
    this.active = session;
  }

  /** Active session, created on first access when none was injected. */
  get session(): TSession {
    if (!this.active) {
      this.active = this.createSession();
    }
    return this.active;
  }

  get hasSession(): boolean {
    return this.active !== undefined;
  }

  protected createSession(): TSession {
    throw new UnitOfWorkError(
      "No session provided and createSession() is not implemented"
    );
  }

  /** Drop repository instances bound to the finished session. */
  protected clearRepos(): void {}

  async commit(): Promise<void> {
    if (this.active) await this.active.commit();
  }

  async rollback(): Promise<void> {
    if (this.active) await this.active.rollback();
  }

  async run<T>(work: (uow: this) => Promise<T>): Promise<T> {
    let result: T;
    try {
      result = await work(this);
    } catch (error) {
      try {
        await this.rollback();
      } catch (rollbackError) {
        log.error({ err: rollbackError }, "db.unit_of_work.rollback_failed");
      } finally {
        await this.release();
      }
      throw error;
    }

    try {
      await this.commit();
    } finally {
      await this.release();
    }
    return result;
  }

  private async release(): Promise<void> {
    const owned = this.active !== undefined && this.active !== this.injected;
    try {
      if (owned && this.active) await this.active.close();
    } finally {
      this.clearRepos();
      if (owned) this.active = undefined;
    }
  }
}
