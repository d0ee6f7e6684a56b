// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/** Current UTC time as an ISO-8601 string (e.g. `2025-01-01T12:00:00.000Z`). */
export function utcTimestamp(): string {
  return new Date().toISOString();
}
