import os from "node:os";

import fs from "fs-extra";
import path from "pathe";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { loadConfig, validateFileConfig } from "../config.js";
import { ConfigError } from "../errors.js";

vi.mock("@reliverse/relinka", () => ({ relinka: vi.fn() }));

describe("validateFileConfig", () => {
  test("keeps known fields", () => {
    expect(
      validateFileConfig("cfg.json", {
        scheme: "build",
        structuredManifests: ["Cargo.toml"],
        dryRun: true,
        unknown: 1,
      }),
    ).toEqual({
      scheme: "build",
      structuredManifests: ["Cargo.toml"],
      dryRun: true,
    });
  });

  test("rejects an unknown scheme", () => {
    expect(() => validateFileConfig("cfg.json", { scheme: "calver" })).toThrow(
      ConfigError,
    );
  });

  test("rejects non-string manifest lists", () => {
    expect(() =>
      validateFileConfig("cfg.json", { jsonManifests: ["a.json", 3] }),
    ).toThrow('Invalid config cfg.json: "jsonManifests" must be an array of strings');
  });

  test("rejects a non-object document", () => {
    expect(() => validateFileConfig("cfg.json", [])).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "commit-bump-config-"));
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  test("falls back to defaults without a config file", async () => {
    expect(await loadConfig({ root })).toEqual({
      root,
      scheme: "semver",
      canonical: "src-tauri/tauri.conf.json",
      structuredManifests: ["src-tauri/Cargo.toml"],
      jsonManifests: ["src-tauri/tauri.conf.json"],
      section: "package",
      dryRun: false,
    });
  });

  test("merges the config file under explicit overrides", async () => {
    await fs.outputJson(path.join(root, ".config/commit-bump.json"), {
      scheme: "build",
      canonical: "app.json",
      structuredManifests: ["Cargo.toml", "crates/core/Cargo.toml"],
      dryRun: true,
    });

    const config = await loadConfig({ root, dryRun: false });
    expect(config.scheme).toBe("build");
    expect(config.canonical).toBe("app.json");
    expect(config.jsonManifests).toEqual(["app.json"]);
    expect(config.structuredManifests).toEqual([
      "Cargo.toml",
      "crates/core/Cargo.toml",
    ]);
    expect(config.dryRun).toBe(false);
  });

  test("reads a config file named explicitly", async () => {
    await fs.outputJson(path.join(root, "bump.json"), { section: "workspace.package" });
    const config = await loadConfig({ root, configFile: "bump.json" });
    expect(config.section).toBe("workspace.package");
  });

  test("rejects a config file that is not JSON", async () => {
    await fs.outputFile(path.join(root, ".config/commit-bump.json"), "scheme=build");
    await expect(loadConfig({ root })).rejects.toBeInstanceOf(ConfigError);
  });
});
