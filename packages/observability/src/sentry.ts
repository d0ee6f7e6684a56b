// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/observability/sentry`
 * Purpose: Sentry SDK initialization shared by every service.
 * Scope: One-time SDK init plus service tag. Does not capture events itself.
 * Invariants:
 *   - No DSN or enabled=false => SDK untouched, returns false
 *   - sendDefaultPii is always false; attachStacktrace always true
 *   - HTTP instrumentation unless useHttp=false; Postgres instrumentation only when usePostgres
 * Side-effects: global (Sentry client)
 * @public
 */

import * as Sentry from "@sentry/node";

export interface SentryOptions {
  dsn: string | undefined;
  /** Human-readable service tag, e.g. "job-assistant". */
  serviceName: string;
  environment?: string;
  release?: string;
  /** Fraction of transactions to sample (0.0–1.0). */
  tracesSampleRate?: number;
  enabled?: boolean;
  usePostgres?: boolean;
  useHttp?: boolean;
}

export function initSentry(options: SentryOptions): boolean {
  const {
    dsn,
    serviceName,
    environment = "production",
    release,
    tracesSampleRate = 1.0,
    enabled = true,
    usePostgres = false,
    useHttp = true,
  } = options;

  if (!dsn || !enabled) {
    return false;
  }

  const integrations = [];
  if (useHttp) {
    integrations.push(Sentry.httpIntegration());
  }
  if (usePostgres) {
    integrations.push(Sentry.postgresIntegration());
  }

  Sentry.init({
    dsn,
    environment,
    ...(release ? { release } : {}),
    tracesSampleRate,
    integrations,
    sendDefaultPii: false,
    attachStacktrace: true,
  });

  Sentry.setTag("service", serviceName);
  return true;
}
