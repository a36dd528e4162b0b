import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { deepMerge, envOverrides, loadConfig, resolveConfig } from "../../../src/core/config-loader.js";
import { ConfigValidationError } from "../../../src/utils/errors.js";
import { makeTmpDir } from "../../helpers/fakes.js";

describe("config-loader", () => {
  let cwd: string;
  let userDir: string;

  function writeConfig(file: string, yaml: string): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, yaml);
  }

  beforeEach(() => {
    cwd = makeTmpDir();
    userDir = makeTmpDir();
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
    fs.rmSync(userDir, { recursive: true, force: true });
  });

  it("falls back to schema defaults when no file exists", () => {
    const { config, layers } = resolveConfig({ cwd, userConfigDir: userDir, env: {} });

    assert.deepEqual(layers, ["defaults"]);
    assert.equal(config.pool.max_concurrent_compiles, 10);
    assert.equal(config.toolchain.command, "platformio");
    assert.equal(config.catalog.refresh_interval_sec, 3600);
    assert.equal(config.storage.data_dir, ".firmforge/data");
    assert.equal(config.boards.length, 5);
  });

  it("layers user, project and local files in that order", () => {
    writeConfig(path.join(userDir, "config.yaml"), "pool:\n  max_concurrent_compiles: 2\nlogging:\n  level: debug\n");
    writeConfig(path.join(cwd, ".firmforge", "config.yaml"), "pool:\n  max_concurrent_compiles: 4\n");
    writeConfig(path.join(cwd, ".firmforge", "config.local.yaml"), "toolchain:\n  command: pio\n");

    const { config, layers } = resolveConfig({ cwd, userConfigDir: userDir, env: {} });

    assert.deepEqual(layers, [
      "defaults",
      "~/.firmforge/config.yaml",
      ".firmforge/config.yaml",
      ".firmforge/config.local.yaml",
    ]);
    assert.equal(config.pool.max_concurrent_compiles, 4);
    assert.equal(config.logging.level, "debug");
    assert.equal(config.toolchain.command, "pio");
    assert.equal(config.toolchain.compile_timeout_sec, 300);
  });

  it("applies FIRMFORGE_* environment overrides last", () => {
    writeConfig(path.join(cwd, ".firmforge", "config.yaml"), "pool:\n  max_concurrent_compiles: 4\n");

    const config = loadConfig({
      cwd,
      userConfigDir: userDir,
      env: {
        FIRMFORGE_MAX_CONCURRENT_COMPILES: "3",
        FIRMFORGE_CATALOG_REFRESH_SEC: "0",
        FIRMFORGE_DATA_DIR: "/srv/firmforge",
        FIRMFORGE_LOG_LEVEL: "warn",
        FIRMFORGE_CATALOG_URL: "https://index.example.test/library_index.json",
      },
    });

    assert.equal(config.pool.max_concurrent_compiles, 3);
    assert.equal(config.catalog.refresh_interval_sec, 0);
    assert.equal(config.storage.data_dir, "/srv/firmforge");
    assert.equal(config.logging.level, "warn");
    assert.equal(config.catalog.index_url, "https://index.example.test/library_index.json");
  });

  it("replaces the board list instead of merging it", () => {
    writeConfig(
      path.join(cwd, ".firmforge", "config.yaml"),
      "boards:\n  - fqbn: arduino:avr:uno\n    env: uno\n    platform: atmelavr\n",
    );
    const config = loadConfig({ cwd, userConfigDir: userDir, env: {} });

    assert.deepEqual(config.boards, [
      { fqbn: "arduino:avr:uno", env: "uno", platform: "atmelavr", framework: "arduino" },
    ]);
  });

  it("reports the failing field", () => {
    writeConfig(path.join(cwd, ".firmforge", "config.yaml"), "pool:\n  max_concurrent_compiles: 0\n");

    assert.throws(
      () => loadConfig({ cwd, userConfigDir: userDir, env: {} }),
      (err: unknown) =>
        err instanceof ConfigValidationError && err.code === "CONFIG_INVALID_POOL_MAX_CONCURRENT_COMPILES",
    );
  });

  it("rejects duplicate board envs", () => {
    writeConfig(
      path.join(cwd, ".firmforge", "config.yaml"),
      "boards:\n" +
        "  - { fqbn: 'arduino:avr:uno', env: uno, platform: atmelavr }\n" +
        "  - { fqbn: 'arduino:avr:uno2', env: uno, platform: atmelavr }\n",
    );
    assert.throws(() => loadConfig({ cwd, userConfigDir: userDir, env: {} }), ConfigValidationError);
  });

  it("rejects YAML that is not a mapping", () => {
    writeConfig(path.join(cwd, ".firmforge", "config.yaml"), "- just\n- a list\n");
    assert.throws(() => loadConfig({ cwd, userConfigDir: userDir, env: {} }), ConfigValidationError);
  });

  it("treats an empty file as an empty layer", () => {
    writeConfig(path.join(cwd, ".firmforge", "config.yaml"), "");
    const { layers } = resolveConfig({ cwd, userConfigDir: userDir, env: {} });
    assert.deepEqual(layers, ["defaults", ".firmforge/config.yaml"]);
  });
});

describe("envOverrides", () => {
  it("rejects a non-numeric pool size", () => {
    assert.throws(
      () => envOverrides({ FIRMFORGE_MAX_CONCURRENT_COMPILES: "lots" }),
      (err: unknown) =>
        err instanceof ConfigValidationError && err.code === "CONFIG_INVALID_FIRMFORGE_MAX_CONCURRENT_COMPILES",
    );
  });

  it("ignores unrelated variables", () => {
    assert.deepEqual(envOverrides({ PATH: "/usr/bin" }), {});
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    assert.deepEqual(
      deepMerge({ a: { x: 1, y: 2 }, list: [1, 2] }, { a: { y: 3 }, list: [9] }),
      { a: { x: 1, y: 3 }, list: [9] },
    );
  });
});
