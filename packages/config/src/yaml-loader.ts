// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/config/yaml-loader`
 * Purpose: Resolve and read a service's YAML configuration file.
 * Scope: File resolution (env var, container path, local path), YAML parsing, optional zod validation. Does not merge env overrides.
 * Invariants:
 *   - Resolution order: APP_CONFIG_PATH > dockerPath (only if it exists) > localPath
 *   - loadYamlConfig never throws: missing, empty, unreadable or malformed files yield {}
 *   - loadValidatedConfig throws ConfigValidationError when the schema rejects the data
 * Side-effects: IO (reads config file), process.env (APP_CONFIG_PATH)
 * Links: src/errors.ts
 * @public
 */

import fs from "node:fs";

import { getLogger } from "@phoenix/observability";
import { parse } from "yaml";
import type { z } from "zod";

import { ConfigValidationError } from "./errors";

export const CONFIG_FILE_ENV_VAR = "APP_CONFIG_PATH";

const log = getLogger("config.yaml-loader");

export interface YamlConfigOptions {
  /** Path to the local development config file, e.g. `config/config.yaml`. */
  localPath?: string;
  /** Path inside a container, e.g. `/app/config/config.yaml`; used only if it exists. */
  dockerPath?: string;
}

export type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Pick the config file path per the resolution order, or undefined when none applies. */
export function resolveConfigPath(
  options: YamlConfigOptions = {}
): string | undefined {
  const fromEnv = process.env[CONFIG_FILE_ENV_VAR];
  if (fromEnv) return fromEnv;
  if (options.dockerPath && fs.existsSync(options.dockerPath)) {
    return options.dockerPath;
  }
  return options.localPath;
}

function readConfigFile(configPath: string): ConfigRecord {
  let content: string;
  try {
    content = fs.readFileSync(configPath, "utf8");
  } catch (error) {
    log.error({ err: error, configPath }, "error reading config file");
    return {};
  }

  let data: unknown;
  try {
    data = parse(content);
  } catch (error) {
    log.error({ err: error, configPath }, "error parsing YAML config");
    return {};
  }

  if (data === null || data === undefined) {
    return {};
  }
  if (!isRecord(data)) {
    log.error(
      { configPath, type: Array.isArray(data) ? "array" : typeof data },
      "YAML config is not a mapping"
    );
    return {};
  }

  log.info({ configPath }, "loaded configuration");
  return data;
}

/**
 * Load configuration from a YAML file if available.
 * Returns {} if no file is found, the file is empty, or it cannot be read or parsed.
 */
export function loadYamlConfig(options: YamlConfigOptions = {}): ConfigRecord {
  const configPath = resolveConfigPath(options);
  if (!configPath || !fs.existsSync(configPath)) {
    log.debug({ configPath }, "config file not found, using defaults");
    return {};
  }
  return readConfigFile(configPath);
}

/**
 * Load the YAML config and validate it against a zod schema.
 * Schema defaults fill in whatever the file omits (including a missing file).
 *
 * @throws ConfigValidationError when the data does not satisfy the schema
 */
export function loadValidatedConfig<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  options: YamlConfigOptions = {}
): z.output<TSchema> {
  const data = loadYamlConfig(options);
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ConfigValidationError(
      resolveConfigPath(options),
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
  return result.data;
}
