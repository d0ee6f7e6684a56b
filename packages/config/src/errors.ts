// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/config/errors`
 * Purpose: Typed failures for configuration and environment validation.
 * Scope: Error classes only.
 * Side-effects: none
 * @public
 */

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid shared env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends Error {
  readonly source: string | undefined;
  readonly issues: readonly ConfigIssue[];

  constructor(source: string | undefined, issues: readonly ConfigIssue[]) {
    const where = source ?? "defaults";
    const detail = issues
      .map((issue) => `${issue.path || "<root>"}: ${issue.message}`)
      .join("; ");
    super(`Invalid configuration (${where}): ${detail}`);
    this.name = "ConfigValidationError";
    this.source = source;
    this.issues = issues;
  }
}
