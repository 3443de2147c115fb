import { relinka } from "@reliverse/relinka";
import fs from "fs-extra";
import path from "pathe";

import type { BumpConfig, VersionScheme } from "./types.js";

import { ConfigError } from "./errors.js";

export const CONFIG_FILE = ".config/commit-bump.json";

const versionSchemes: VersionScheme[] = ["semver", "build"];

export const DEFAULT_CONFIG: Omit<BumpConfig, "root"> = {
  scheme: "semver",
  canonical: "src-tauri/tauri.conf.json",
  structuredManifests: ["src-tauri/Cargo.toml"],
  jsonManifests: [],
  section: "package",
  dryRun: false,
};

export type ConfigOverrides = Partial<BumpConfig> & {
  /** Config file, relative to the root (defaults to CONFIG_FILE) */
  configFile?: string;
};

type FileConfig = Partial<Omit<BumpConfig, "root">>;

export const isVersionScheme = (value: unknown): value is VersionScheme =>
  typeof value === "string" && versionSchemes.some((s) => s === value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

/**
 * Checks the fields of a parsed config file. Unknown keys are ignored.
 */
export function validateFileConfig(file: string, data: unknown): FileConfig {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ConfigError(file, "expected a JSON object");
  }
  const raw: Map<string, unknown> = new Map(Object.entries(data));
  const config: FileConfig = {};

  const scheme = raw.get("scheme");
  if (scheme !== undefined) {
    if (!isVersionScheme(scheme)) {
      throw new ConfigError(
        file,
        `"scheme" must be one of ${versionSchemes.join(", ")}`,
      );
    }
    config.scheme = scheme;
  }

  for (const key of ["canonical", "section"] as const) {
    const value = raw.get(key);
    if (value === undefined) continue;
    if (typeof value !== "string" || !value.trim()) {
      throw new ConfigError(file, `"${key}" must be a non-empty string`);
    }
    config[key] = value;
  }

  for (const key of ["structuredManifests", "jsonManifests"] as const) {
    const value = raw.get(key);
    if (value === undefined) continue;
    if (!isStringArray(value)) {
      throw new ConfigError(file, `"${key}" must be an array of strings`);
    }
    config[key] = value;
  }

  const dryRun = raw.get("dryRun");
  if (dryRun !== undefined) {
    if (typeof dryRun !== "boolean") {
      throw new ConfigError(file, '"dryRun" must be a boolean');
    }
    config.dryRun = dryRun;
  }

  return config;
}

async function readFileConfig(configPath: string): Promise<FileConfig> {
  if (!(await fs.pathExists(configPath))) {
    relinka("verbose", `No config found at ${configPath}, using defaults`);
    return {};
  }
  let data: unknown;
  try {
    data = await fs.readJson(configPath);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(configPath, "not valid JSON");
    }
    throw error;
  }
  return validateFileConfig(configPath, data);
}

const sanitizePaths = (paths: string[]): string[] =>
  paths.map((p) => p.trim()).filter(Boolean);

/**
 * Resolves the full bump configuration: defaults, then the config file
 * under the root, then explicit overrides.
 */
export async function loadConfig(
  overrides: ConfigOverrides = {},
): Promise<BumpConfig> {
  const { configFile, ...explicit } = overrides;
  const root = path.resolve(explicit.root ?? process.cwd());
  const fromFile = await readFileConfig(
    path.resolve(root, configFile ?? CONFIG_FILE),
  );

  const canonical = (
    explicit.canonical ??
    fromFile.canonical ??
    DEFAULT_CONFIG.canonical
  ).trim();
  const jsonManifests = sanitizePaths(
    explicit.jsonManifests ??
      fromFile.jsonManifests ??
      DEFAULT_CONFIG.jsonManifests,
  );
  if (!jsonManifests.includes(canonical)) {
    jsonManifests.unshift(canonical);
  }

  return {
    root,
    scheme: explicit.scheme ?? fromFile.scheme ?? DEFAULT_CONFIG.scheme,
    canonical,
    structuredManifests: sanitizePaths(
      explicit.structuredManifests ??
        fromFile.structuredManifests ??
        DEFAULT_CONFIG.structuredManifests,
    ),
    jsonManifests,
    section: explicit.section ?? fromFile.section ?? DEFAULT_CONFIG.section,
    dryRun: explicit.dryRun ?? fromFile.dryRun ?? DEFAULT_CONFIG.dryRun,
  };
}
