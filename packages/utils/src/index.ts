// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/utils`
 * Purpose: Small, dependency-free helpers shared by every service.
 * Scope: Text, filename, ID and time helpers. Does not perform IO.
 * Invariants: All exports are pure except shortId (randomness) and utcTimestamp (clock).
 * Side-effects: none
 * @public
 */

export { sanitizeFilename, sanitizeFilenameComponent } from "./filenames";
export { shortId } from "./ids";
export { stripMarkdownCodeFences } from "./text";
export { utcTimestamp } from "./time";
