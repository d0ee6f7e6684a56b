// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/llm/tracing/tracer.port`
 * Purpose: Provider-agnostic tracing interface for LLM invocations.
 * Scope: Types only. Does not depend on any tracing SDK.
 * Invariants: Pure types, no runtime dependencies
 * Side-effects: none
 * Links: langfuse.tracer.ts, src/client.ts
 * @public
 */

/** Handle for an open span; call end() once the invocation settles. */
export interface TraceSpan {
  end(output: unknown): void;
}

export interface LlmTracer {
  startSpan(params: { name: string; input: unknown }): TraceSpan;
  /** Send buffered events. Callers do not await this on the request path. */
  flush(): Promise<void>;
}
