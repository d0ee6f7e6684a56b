// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/config/env`
 * Purpose: Zod-validated environment shared by the LLM client, tracing and error reporting.
 * Scope: Parses process.env lazily on first access and caches the result. Does not read config files.
 * Invariants: Validation happens once per process (until resetSharedEnv); invalid env throws EnvValidationError listing missing and invalid keys.
 * Side-effects: process.env
 * Links: src/errors.ts
 * @public
 */

import { ZodError, z } from "zod";

import { EnvValidationError } from "./errors";

const TRACING_OFF = new Set(["false", "0", "no", "off"]);

const sharedSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Service identity for logs and error reports
  SERVICE_NAME: z.string().default("app"),
  LOG_LEVEL: z.string().default("INFO"),

  // LLM proxy (LiteLLM, OpenAI-compatible)
  LITELLM_BASE_URL: z.string().url().default("http://localhost:4000"),
  LITELLM_API_KEY: z.string().min(1).optional(),

  // Tracing
  LANGFUSE_PUBLIC_KEY: z.string().min(1).optional(),
  LANGFUSE_SECRET_KEY: z.string().min(1).optional(),
  LANGFUSE_BASE_URL: z.string().url().optional(),
  LANGCHAIN_TRACING_V2: z.string().optional(),

  // Error reporting
  SENTRY_DSN: z.string().optional(),
});

export type SharedEnv = z.infer<typeof sharedSchema> & {
  isProd: boolean;
  isTest: boolean;
  tracingDisabled: boolean;
};

let ENV: SharedEnv | null = null;

export function sharedEnv(): SharedEnv {
  if (ENV !== null) {
    return ENV;
  }

  try {
    const parsed = sharedSchema.parse(process.env);
    const tracingFlag = (parsed.LANGCHAIN_TRACING_V2 ?? "").trim().toLowerCase();
    ENV = {
      ...parsed,
      isProd: parsed.NODE_ENV === "production",
      isTest: parsed.NODE_ENV === "test",
      tracingDisabled: TRACING_OFF.has(tracingFlag),
    };
    return ENV;
  } catch (error) {
    if (error instanceof ZodError) {
      const missing = new Set<string>();
      const invalid = new Set<string>();

      for (const issue of error.issues) {
        const key = issue.path[0]?.toString();
        if (!key) continue;

        if (issue.code === "invalid_type" && issue.received === "undefined") {
          missing.add(key);
        } else {
          invalid.add(key);
        }
      }

      throw new EnvValidationError({
        code: "INVALID_ENV",
        missing: [...missing],
        invalid: [...invalid],
      });
    }
    throw error;
  }
}

/** Drop the cached env so the next sharedEnv() call re-reads process.env. */
export function resetSharedEnv(): void {
  ENV = null;
}
