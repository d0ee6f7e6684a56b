// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/llm/prompts`
 * Purpose: Load prompt templates from `<baseDir>/<name>.yaml`.
 * Scope: File read + YAML parse; returns the raw `template` string. Does not render.
 * Invariants:
 *   - Missing file -> PromptNotFoundError
 *   - Unparseable YAML, non-mapping document, or empty/non-string `template` -> PromptTemplateError
 *   - Other keys in the file are ignored
 * Side-effects: IO (filesystem)
 * @public
 */

import { readFile } from "node:fs/promises";
import path from "node:path";

import { parse } from "yaml";

import { PromptNotFoundError, PromptTemplateError } from "./errors";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class PromptLoader {
  constructor(readonly baseDir: string) {}

  pathFor(name: string): string {
    return path.join(this.baseDir, `${name}.yaml`);
  }

  async load(name: string): Promise<string> {
    const filePath = this.pathFor(name);

    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) throw new PromptNotFoundError(name, filePath);
      throw error;
    }

    let data: unknown;
    try {
      data = parse(raw);
    } catch (error) {
      throw new PromptTemplateError(name, filePath, { cause: error });
    }

    const template: unknown =
      typeof data === "object" && data !== null && "template" in data
        ? data.template
        : undefined;
    if (typeof template !== "string" || template === "") {
      throw new PromptTemplateError(name, filePath);
    }
    return template;
  }
}
