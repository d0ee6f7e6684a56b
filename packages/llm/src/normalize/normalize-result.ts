// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/llm/normalize/normalize-result`
 * Purpose: Single entry point turning a raw LLM response into a plain string.
 * Scope: Extraction plus one top-level fence strip. Never throws.
 * Invariants:
 *   - null/undefined -> ""
 *   - string input -> stripMarkdownCodeFences(input)
 *   - fences are stripped once here, never during recursive extraction
 * Side-effects: none
 * Links: src/normalize/extract-text.ts, @phoenix/utils stripMarkdownCodeFences
 * @public
 */

import { stripMarkdownCodeFences } from "@phoenix/utils";

import { extractText } from "./extract-text";

export function normalizeResult(result: unknown): string {
  if (result === null || result === undefined) return "";
  if (typeof result === "string") return stripMarkdownCodeFences(result);
  return stripMarkdownCodeFences(extractText(result));
}
