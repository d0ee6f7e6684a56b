// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/utils/text`
 * Purpose: Remove a markdown code fence that wraps an entire LLM output.
 * Scope: Single-pass, pure string transform. Does not touch interior or partial fences.
 * Invariants:
 *   - Only strips when the trimmed text both starts and ends with a fence
 *   - Non-matching input is returned untrimmed, exactly as given
 *   - Matched body is returned trimmed
 * Side-effects: none
 * Links: packages/llm/src/normalize/normalize-result.ts
 * @public
 */

const FENCE = "```";

/** Opening fence with optional language tag (letters, digits, `_`, `-`), body, optional newline, closing fence. */
const TAGGED_FENCE_RE = /^```[A-Za-z0-9_-]*\n([\s\S]+)\n?```$/;
const BARE_FENCE_RE = /^```\n([\s\S]+)\n?```$/;

/**
 * Strip markdown code fences when the whole text is wrapped in them.
 *
 * Handles ```` ```json\n{...}\n``` ````, ```` ```\n{...}\n``` ```` and
 * upper-case or hyphenated tags such as `JSON` or `shell-session`.
 */
export function stripMarkdownCodeFences(text: string): string {
  if (!text || typeof text !== "string") {
    return text;
  }

  const trimmed = text.trim();
  if (!trimmed.startsWith(FENCE)) {
    return text;
  }

  const tagged = TAGGED_FENCE_RE.exec(trimmed);
  if (tagged?.[1] !== undefined) {
    return tagged[1].trim();
  }

  const bare = BARE_FENCE_RE.exec(trimmed);
  if (bare?.[1] !== undefined) {
    return bare[1].trim();
  }

  return text;
}
