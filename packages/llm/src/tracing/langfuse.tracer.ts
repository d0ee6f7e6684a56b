// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/llm/tracing/langfuse.tracer`
 * Purpose: Langfuse SDK implementation of LlmTracer.
 * Scope: One trace per invocation with a single span inside it. Does not decide whether tracing is enabled (see resolve-tracer.ts).
 * Invariants:
 *   - Trace and span are both named after the prompt
 *   - end() records the output on the span and on the trace
 *   - SDK errors propagate; the client absorbs them
 * Side-effects: IO (Langfuse API calls, batched)
 * Links: LlmTracer
 * @public
 */

import { Langfuse } from "langfuse";

import type { LlmTracer, TraceSpan } from "./tracer.port";

export interface LangfuseTracerConfig {
  publicKey: string;
  secretKey: string;
  baseUrl?: string;
}

export class LangfuseTracer implements LlmTracer {
  private readonly langfuse: Langfuse;

  constructor(config: LangfuseTracerConfig) {
    this.langfuse = new Langfuse({
      publicKey: config.publicKey,
      secretKey: config.secretKey,
      ...(config.baseUrl ? { baseUrl: config.baseUrl } : {}),
    });
  }

  startSpan(params: { name: string; input: unknown }): TraceSpan {
    const trace = this.langfuse.trace({ name: params.name, input: params.input });
    const span = trace.span({ name: params.name, input: params.input });
    return {
      end: (output) => {
        span.end({ output });
        trace.update({ output });
      },
    };
  }

  async flush(): Promise<void> {
    await this.langfuse.flushAsync();
  }
}
