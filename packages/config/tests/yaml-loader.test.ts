// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/config/tests/yaml-loader.test`
 * Purpose: Verify config file resolution order and graceful degradation on bad files.
 * Scope: Uses temp directories; does not read repository config.
 * Side-effects: process.env (APP_CONFIG_PATH), temp filesystem
 * Links: src/yaml-loader.ts
 * @internal
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";

import { ConfigValidationError } from "../src/errors";
import {
  CONFIG_FILE_ENV_VAR,
  loadValidatedConfig,
  loadYamlConfig,
  resolveConfigPath,
} from "../src/yaml-loader";

let tmpDir: string;

function writeFile(name: string, content: string): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, content);
  return file;
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "yaml-config-"));
  delete process.env[CONFIG_FILE_ENV_VAR];
});

afterEach(() => {
  delete process.env[CONFIG_FILE_ENV_VAR];
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("resolveConfigPath", () => {
  it("prefers the env var over both paths", () => {
    const docker = writeFile("docker.yaml", "a: 1");
    process.env[CONFIG_FILE_ENV_VAR] = "/elsewhere/config.yaml";
    expect(resolveConfigPath({ dockerPath: docker, localPath: "local.yaml" })).toBe(
      "/elsewhere/config.yaml"
    );
  });

  it("uses the docker path only when it exists", () => {
    const docker = writeFile("docker.yaml", "a: 1");
    expect(resolveConfigPath({ dockerPath: docker, localPath: "local.yaml" })).toBe(
      docker
    );
    expect(
      resolveConfigPath({
        dockerPath: path.join(tmpDir, "missing.yaml"),
        localPath: "local.yaml",
      })
    ).toBe("local.yaml");
  });

  it("returns undefined when nothing is configured", () => {
    expect(resolveConfigPath()).toBeUndefined();
  });
});

describe("loadYamlConfig", () => {
  it("parses a mapping from the local path", () => {
    const local = writeFile(
      "config.yaml",
      ["llm:", "  model: openai/gpt-4o-mini", "  params:", "    temperature: 0.2"].join(
        "\n"
      )
    );
    expect(loadYamlConfig({ localPath: local })).toEqual({
      llm: { model: "openai/gpt-4o-mini", params: { temperature: 0.2 } },
    });
  });

  it("reads the file named by APP_CONFIG_PATH", () => {
    process.env[CONFIG_FILE_ENV_VAR] = writeFile("env.yaml", "source: env");
    const local = writeFile("local.yaml", "source: local");
    expect(loadYamlConfig({ localPath: local })).toEqual({ source: "env" });
  });

  it("returns {} for a missing file", () => {
    expect(loadYamlConfig({ localPath: path.join(tmpDir, "nope.yaml") })).toEqual(
      {}
    );
    expect(loadYamlConfig()).toEqual({});
  });

  it("returns {} for an empty file", () => {
    expect(loadYamlConfig({ localPath: writeFile("empty.yaml", "") })).toEqual({});
  });

  it("returns {} for malformed YAML", () => {
    const bad = writeFile("bad.yaml", "key: [unclosed\n  - x: : y");
    expect(loadYamlConfig({ localPath: bad })).toEqual({});
  });

  it("returns {} when the document is not a mapping", () => {
    expect(loadYamlConfig({ localPath: writeFile("list.yaml", "- a\n- b") })).toEqual(
      {}
    );
  });

  it("returns {} when the path is a directory", () => {
    expect(loadYamlConfig({ localPath: tmpDir })).toEqual({});
  });
});

describe("loadValidatedConfig", () => {
  const schema = z.object({
    port: z.number().int().default(8080),
    name: z.string(),
  });

  it("applies schema defaults to file values", () => {
    const local = writeFile("svc.yaml", "name: watcher");
    expect(loadValidatedConfig(schema, { localPath: local })).toEqual({
      port: 8080,
      name: "watcher",
    });
  });

  it("throws ConfigValidationError naming the offending path", () => {
    const local = writeFile("svc.yaml", "name: watcher\nport: eighty");
    expect(() => loadValidatedConfig(schema, { localPath: local })).toThrow(
      ConfigValidationError
    );
    try {
      loadValidatedConfig(schema, { localPath: local });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.source).toBe(local);
        expect(error.issues.map((issue) => issue.path)).toEqual(["port"]);
      }
    }
  });
});
