// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/config`
 * Purpose: Configuration loading for services: YAML files and validated shared env.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export { resetSharedEnv, type SharedEnv, sharedEnv } from "./env";
export {
  type ConfigIssue,
  ConfigValidationError,
  EnvValidationError,
  type EnvValidationMeta,
} from "./errors";
export {
  CONFIG_FILE_ENV_VAR,
  type ConfigRecord,
  loadValidatedConfig,
  loadYamlConfig,
  resolveConfigPath,
  type YamlConfigOptions,
} from "./yaml-loader";
