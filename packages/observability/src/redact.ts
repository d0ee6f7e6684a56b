// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/observability/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Notes: Used by pino redact configuration during logger initialization.
 * @public
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "secret",
  "apiKey",
  "api_key",
  "dsn",
  "secretKey",
  // Session cookies carried in watcher DTOs
  "li_at",
  "jsession_id",
  "additional_cookies",
  // HTTP headers
  "headers.authorization",
  "headers.cookie",
];
