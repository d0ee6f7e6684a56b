// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers and module-scoped children. Does not handle request-scoped logging.
 * Invariants: Always emits JSON to stdout; no worker transports. Safe to call at module scope (no env validation).
 * Side-effects: process.env (read only), stdout
 * Notes: getLogger caches one child per module name; configureLogging re-levels the root and every cached child.
 * Notes: Reads logging-specific env vars directly (NODE_ENV, LOG_LEVEL, SERVICE_NAME) so importing never triggers full env validation.
 * Links: src/redact.ts
 * @public
 */

import type { Level, Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

const LEVELS: readonly Level[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

let configuredLevel: Level | undefined;
let rootLogger: Logger | undefined;
const moduleLoggers = new Map<string, Logger>();

// Silence logs in test tooling (VITEST or NODE_ENV=test)
function isTestTooling(): boolean {
  return process.env.VITEST === "true" || (process.env.NODE_ENV ?? "development") === "test";
}

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = makeLogger();
  }
  return rootLogger;
}

/** Map a free-form level name (e.g. "DEBUG", "warning") to a pino level; unknown names become "info". */
export function toPinoLevel(name: string | undefined): Level {
  const normalized = (name ?? "").trim().toLowerCase();
  if (normalized === "warning") return "warn";
  if (normalized === "critical") return "fatal";
  return LEVELS.find((level) => level === normalized) ?? "info";
}

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const serviceName = process.env.SERVICE_NAME ?? "app";
  const level = configuredLevel ?? toPinoLevel(process.env.LOG_LEVEL);

  return pino(
    {
      level,
      enabled: !isTestTooling(),
      // Stable base: bindings first, then reserved keys (prevents overwrite)
      base: { ...bindings, service: serviceName },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    // Sync in dev for immediate crash visibility, async in prod
    pino.destination({
      dest: 1,
      sync: nodeEnv !== "production",
      minLength: 4096,
    })
  );
}

/**
 * Configure the process-wide log level. Applies to loggers obtained before
 * and after the call. Disabled (test tooling) loggers stay silent.
 */
export function configureLogging(logLevel = "INFO"): Level {
  const level = toPinoLevel(logLevel);
  configuredLevel = level;
  if (isTestTooling()) return level;

  // pino children copy the parent level at creation, so re-level each one
  getRootLogger().level = level;
  for (const logger of moduleLoggers.values()) {
    logger.level = level;
  }
  return level;
}

/** Structured logger for a module, bound with `{ module: name }`. Same instance per name. */
export function getLogger(name: string): Logger {
  let logger = moduleLoggers.get(name);
  if (!logger) {
    logger = getRootLogger().child({ module: name });
    moduleLoggers.set(name, logger);
  }
  return logger;
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
