// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/llm/model-factory`
 * Purpose: Build LangChain chat models that talk to the LiteLLM proxy.
 * Scope: Model construction only; the proxy owns provider routing and credentials.
 * Invariants:
 *   - `model` is passed through untouched (LiteLLM ids such as `openai/gpt-4o-mini`)
 *   - `params` become `modelKwargs` only when non-empty
 * Side-effects: none (clients connect lazily on first call)
 * Links: src/client.ts
 * @public
 */

import type { SharedEnv } from "@phoenix/config";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { ChatOpenAI } from "@langchain/openai";

import type { LlmConfig } from "./config";

/** Sent when the proxy runs without a master key. */
export const UNAUTHENTICATED_PROXY_KEY = "no-key";

export interface LlmConnection {
  baseURL: string;
  apiKey: string;
}

export type ChatModelFactory = (config: LlmConfig) => BaseChatModel;

export function connectionFromEnv(
  env: Pick<SharedEnv, "LITELLM_BASE_URL" | "LITELLM_API_KEY">
): LlmConnection {
  return {
    baseURL: env.LITELLM_BASE_URL,
    apiKey: env.LITELLM_API_KEY ?? UNAUTHENTICATED_PROXY_KEY,
  };
}

export function createChatModel(config: LlmConfig, connection: LlmConnection): ChatOpenAI {
  return new ChatOpenAI({
    model: config.model,
    apiKey: connection.apiKey,
    configuration: { baseURL: connection.baseURL },
    ...(Object.keys(config.params).length > 0 ? { modelKwargs: config.params } : {}),
  });
}
