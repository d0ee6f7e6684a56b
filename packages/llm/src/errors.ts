// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

export class PromptNotFoundError extends Error {
  readonly promptName: string;
  readonly filePath: string;

  constructor(promptName: string, filePath: string) {
    super(`Prompt '${promptName}' not found at ${filePath}`);
    this.name = "PromptNotFoundError";
    this.promptName = promptName;
    this.filePath = filePath;
  }
}

export class PromptTemplateError extends Error {
  readonly promptName: string;
  readonly filePath: string;

  constructor(promptName: string, filePath: string, options?: { cause?: unknown }) {
    super(`Prompt '${promptName}' missing 'template' key in ${filePath}`, options);
    this.name = "PromptTemplateError";
    this.promptName = promptName;
    this.filePath = filePath;
  }
}
