import os from "node:os";

import { relinka } from "@reliverse/relinka";
import fs from "fs-extra";
import path from "pathe";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { runBump } from "../command.js";

vi.mock("@reliverse/relinka", () => ({ relinka: vi.fn() }));

const cargoToml = (version: string) =>
  `[package]\nname = "studio"\nversion = "${version}"\n`;

describe("runBump", () => {
  let root: string;

  const writeManifests = async (version: string) => {
    await fs.outputFile(
      path.join(root, "src-tauri/Cargo.toml"),
      cargoToml(version),
      "utf8",
    );
    await fs.outputJson(path.join(root, "src-tauri/tauri.conf.json"), {
      version,
    });
  };

  beforeEach(() => {
    vi.mocked(relinka).mockClear();
    root = fs.mkdtempSync(path.join(os.tmpdir(), "commit-bump-command-"));
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  test("exits 1 with usage when the message is missing", async () => {
    expect(await runBump({ root })).toBe(1);
    expect(vi.mocked(relinka)).toHaveBeenCalledWith(
      "error",
      "Usage: commit-bump <commit_message>",
    );
  });

  test("exits 1 on an unknown scheme", async () => {
    expect(await runBump({ message: "fix(a): b", root, scheme: "calver" })).toBe(1);
    expect(vi.mocked(relinka)).toHaveBeenCalledWith(
      "error",
      "Invalid version scheme: calver",
    );
  });

  test("classifies an empty message as no bump", async () => {
    await writeManifests("0.3.1");
    expect(await runBump({ message: "", root })).toBe(0);
    expect(vi.mocked(relinka)).toHaveBeenCalledWith(
      "log",
      "No version change: 0.3.1",
    );
  });

  test("exits 0 after bumping", async () => {
    await writeManifests("0.3.1");
    expect(await runBump({ message: "fix(core): repair bug", root })).toBe(0);
    expect(await fs.readJson(path.join(root, "src-tauri/tauri.conf.json"))).toEqual({
      version: "0.3.2",
    });
  });

  test("exits 2 on an unparseable canonical version", async () => {
    await writeManifests("0.3.1");
    await fs.outputJson(path.join(root, "src-tauri/tauri.conf.json"), {
      version: "next",
    });
    expect(await runBump({ message: "fix(core): repair bug", root })).toBe(2);
    expect(vi.mocked(relinka)).toHaveBeenCalledWith(
      "error",
      expect.stringMatching(/: Invalid version format: next$/),
    );
  });

  test("exits 2 on an invalid config file", async () => {
    await fs.outputJson(path.join(root, ".config/commit-bump.json"), {
      scheme: "calver",
    });
    expect(await runBump({ message: "fix(core): repair bug", root })).toBe(2);
  });

  test("an explicit dryRun=false overrides the config file", async () => {
    await writeManifests("0.3.1");
    await fs.outputJson(path.join(root, ".config/commit-bump.json"), {
      dryRun: true,
    });
    expect(
      await runBump({ message: "feature(ui): add panel", root, dryRun: false }),
    ).toBe(0);
    expect(
      await fs.readFile(path.join(root, "src-tauri/Cargo.toml"), "utf8"),
    ).toBe(cargoToml("0.4.0"));
  });
});
