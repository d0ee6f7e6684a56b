// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/observability`
 * Purpose: Public API for structured logging and error reporting.
 * Scope: Re-export logger factory, redaction paths and Sentry init. Does not implement logging transport.
 * Invariants: none
 * Side-effects: none
 * Notes: Import from this module, not from submodules.
 * @public
 */

export type { Logger } from "./logger";
export {
  configureLogging,
  getLogger,
  makeLogger,
  makeNoopLogger,
  toPinoLevel,
} from "./logger";
export { REDACT_PATHS } from "./redact";
export { initSentry, type SentryOptions } from "./sentry";
