// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/llm`
 * Purpose: Shared LLM client and response normalization.
 * Scope: Re-exports public API.
 * Invariants: normalizeResult/extractText never throw.
 * Side-effects: none
 * @public
 */

export { LlmClient, type LlmClientOptions, type PromptContext } from "./client";
export {
  DEFAULT_LLM_MODEL,
  type LlmConfig,
  type LlmConfigInput,
  llmConfigSchema,
  parseLlmConfig,
} from "./config";
export { PromptNotFoundError, PromptTemplateError } from "./errors";
export {
  type ChatModelFactory,
  connectionFromEnv,
  createChatModel,
  type LlmConnection,
  UNAUTHENTICATED_PROXY_KEY,
} from "./model-factory";
export { extractText } from "./normalize/extract-text";
export { normalizeResult } from "./normalize/normalize-result";
export { PromptLoader } from "./prompts";
export { LangfuseTracer, type LangfuseTracerConfig } from "./tracing/langfuse.tracer";
export { resolveTracer, type TracerEnv } from "./tracing/resolve-tracer";
export type { LlmTracer, TraceSpan } from "./tracing/tracer.port";
