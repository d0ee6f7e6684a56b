// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/utils/filenames`
 * Purpose: Sanitize user- or model-supplied names into portable, header-safe filenames.
 * Scope: Pure string transforms. Does not touch the filesystem.
 * Invariants: Output is ASCII `[A-Za-z0-9.-]`; never empty (fallback applies); extension lower-cased.
 * Side-effects: none
 * @public
 */

import path from "node:path";

const UNICODE_DASHES_RE = /[‐‑‒–—―−]+/g;
const SEPARATORS_RE = /[\s_]+/g;
const INVALID_BASE_CHAR_RE = /[^A-Za-z0-9.-]+/g;
const INVALID_EXT_CHAR_RE = /[^A-Za-z0-9]+/g;
const MULTI_DASH_RE = /-+/g;
const NON_ASCII_RE = /[^\x00-\x7F]/g;
const EDGE_DASH_DOT_RE = /^[-.]+|[-.]+$/g;

function asciiNormalize(value: string): string {
  return value
    .replace(UNICODE_DASHES_RE, "-")
    .normalize("NFKD")
    .replace(NON_ASCII_RE, "");
}

/** Sanitize a single filename component into dash-separated words. */
export function sanitizeFilenameComponent(
  value: string,
  fallback = "file"
): string {
  const normalized = asciiNormalize(value ?? "")
    .replace(SEPARATORS_RE, "-")
    .replace(INVALID_BASE_CHAR_RE, "-")
    .replace(MULTI_DASH_RE, "-")
    .replace(EDGE_DASH_DOT_RE, "");
  return normalized || fallback;
}

/**
 * Sanitize a filename for cross-platform use and HTTP headers.
 *
 * Spaces and underscores become dashes, unicode punctuation is folded to
 * ASCII where possible, and unsupported characters are dropped.
 */
export function sanitizeFilename(filename: string, fallback = "download"): string {
  const raw = (filename ?? "").trim();
  const ext = path.extname(raw);
  const base = ext ? raw.slice(0, -ext.length) : raw;

  const safeBase = sanitizeFilenameComponent(base || raw, fallback);
  const safeExt = asciiNormalize(ext)
    .replace(/^\.+/, "")
    .replace(INVALID_EXT_CHAR_RE, "");

  return safeExt ? `${safeBase}.${safeExt.toLowerCase()}` : safeBase;
}
