import { relinka } from "@reliverse/relinka";
import path from "pathe";

import type { BumpConfig, BumpResult } from "./types.js";

import { classifyCommit } from "./classify.js";
import { InvalidVersionError, MalformedManifestError } from "./errors.js";
import { readJsonVersion, updateJsonManifest, updateStructuredManifest } from "./manifest.js";
import { bumpVersion, parseVersion } from "./version.js";

/**
 * Reads the current version from the canonical manifest and checks that
 * it parses under the configured scheme.
 */
export async function getCurrentVersion(config: BumpConfig): Promise<string> {
  const canonicalPath = path.resolve(config.root, config.canonical);
  const version = await readJsonVersion(canonicalPath);
  try {
    parseVersion(version, config.scheme);
  } catch (error) {
    if (error instanceof InvalidVersionError) {
      throw new MalformedManifestError(canonicalPath, error.message, {
        cause: error,
      });
    }
    throw error;
  }
  return version;
}

/**
 * Handles version bumping for one commit message.
 */
export async function bumpHandler(
  commitMessage: string,
  config: BumpConfig,
): Promise<BumpResult> {
  const { root, scheme, section, dryRun } = config;
  const prefix = dryRun ? "[dry run] " : "";

  const bumpType = classifyCommit(commitMessage, scheme);
  relinka("verbose", `Commit classified as "${bumpType}" (${scheme} scheme)`);

  const currentVersion = await getCurrentVersion(config);
  const newVersion = bumpVersion(currentVersion, bumpType, scheme);

  if (newVersion === currentVersion) {
    relinka("log", `No version change: ${currentVersion}`);
    return { bumpType, currentVersion, newVersion, changed: false, updated: [] };
  }

  const updated: string[] = [];
  for (const file of config.structuredManifests) {
    const changed = await updateStructuredManifest(
      path.resolve(root, file),
      newVersion,
      { section, dryRun },
    );
    if (changed) updated.push(file);
  }
  for (const file of config.jsonManifests) {
    const changed = await updateJsonManifest(path.resolve(root, file), newVersion, {
      dryRun,
    });
    if (changed) updated.push(file);
  }

  if (updated.length === 0) {
    relinka("log", `${prefix}No changes made for version: ${currentVersion}`);
    return { bumpType, currentVersion, newVersion, changed: false, updated };
  }

  relinka(
    "log",
    `${prefix}Version bumped: ${currentVersion} -> ${newVersion} (${bumpType})`,
  );
  for (const file of updated) {
    relinka("log", `${prefix}Updated: ${file}`);
  }
  return { bumpType, currentVersion, newVersion, changed: true, updated };
}
