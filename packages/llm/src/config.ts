// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/llm/config`
 * Purpose: Per-use-case model selection (LiteLLM model id + provider params).
 * Scope: Schema and parsing only. Does not build models.
 * Invariants: Every parse yields its own `params` object.
 * Side-effects: none
 * @public
 */

import { z } from "zod";

export const DEFAULT_LLM_MODEL = "openai/gpt-4o-mini";

export const llmConfigSchema = z.object({
  /** LiteLLM model string, e.g. `openai/gpt-4o-mini` or `anthropic/claude-3-5-sonnet`. */
  model: z.string().min(1).default(DEFAULT_LLM_MODEL),
  /** Extra provider parameters: temperature, max_tokens, thinking_level, ... */
  params: z.record(z.string(), z.unknown()).default(() => ({})),
});

export type LlmConfig = z.infer<typeof llmConfigSchema>;
export type LlmConfigInput = z.input<typeof llmConfigSchema>;

export function parseLlmConfig(input: LlmConfigInput = {}): LlmConfig {
  return llmConfigSchema.parse(input);
}
