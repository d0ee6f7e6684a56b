// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/setup`
 * Purpose: Global test environment for all package suites.
 * Scope: Sets env vars that keep tests offline and quiet. Does NOT mock specific services or ports.
 * Invariants: No test reaches a real LLM proxy, Langfuse, Sentry or database server.
 * Side-effects: process.env
 * Links: vitest.config.mts
 * @public
 */

import { beforeAll } from "vitest";

beforeAll(() => {
  Object.assign(process.env, {
    NODE_ENV: "test",
    SERVICE_NAME: "test-service",
    // Tracing and error reporting stay off unless a test opts in
    LANGCHAIN_TRACING_V2: "false",
    SENTRY_DSN: "",
    LITELLM_BASE_URL: "http://localhost:4000",
  });
});
