// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/llm/tracing/resolve-tracer`
 * Purpose: Decide from the environment whether LLM calls are traced.
 * Scope: Returns a tracer or undefined. Never throws.
 * Invariants:
 *   - LANGCHAIN_TRACING_V2 in {false, 0, no, off} -> undefined
 *   - Missing Langfuse public or secret key -> undefined
 *   - A failing tracer constructor -> undefined (logged at debug)
 * Side-effects: none
 * @public
 */

import type { SharedEnv } from "@phoenix/config";
import { getLogger } from "@phoenix/observability";

import { LangfuseTracer, type LangfuseTracerConfig } from "./langfuse.tracer";
import type { LlmTracer } from "./tracer.port";

const log = getLogger("llm.tracing");

export type TracerEnv = Pick<
  SharedEnv,
  "tracingDisabled" | "LANGFUSE_PUBLIC_KEY" | "LANGFUSE_SECRET_KEY" | "LANGFUSE_BASE_URL"
>;

export function resolveTracer(
  env: TracerEnv,
  create: (config: LangfuseTracerConfig) => LlmTracer = (config) =>
    new LangfuseTracer(config)
): LlmTracer | undefined {
  if (env.tracingDisabled) return undefined;
  if (!env.LANGFUSE_PUBLIC_KEY || !env.LANGFUSE_SECRET_KEY) return undefined;

  try {
    return create({
      publicKey: env.LANGFUSE_PUBLIC_KEY,
      secretKey: env.LANGFUSE_SECRET_KEY,
      ...(env.LANGFUSE_BASE_URL ? { baseUrl: env.LANGFUSE_BASE_URL } : {}),
    });
  } catch (error) {
    log.debug({ err: error }, "langfuse.client.init.failed");
    return undefined;
  }
}
