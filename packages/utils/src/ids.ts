// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/utils/ids`
 * Purpose: Short random identifiers for request correlation and file suffixes.
 * Scope: ID generation only. Not suitable as a database primary key.
 * Invariants: Alphabet is lowercase ASCII letters and digits; uses a CSPRNG.
 * Side-effects: none
 * @public
 */

import { randomInt } from "node:crypto";

const ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

export function shortId(length = 8): string {
  let id = "";
  for (let i = 0; i < length; i++) {
    id += ALPHABET.charAt(randomInt(ALPHABET.length));
  }
  return id;
}
