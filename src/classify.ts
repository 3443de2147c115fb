import type { BumpType, VersionScheme } from "./types.js";

type PrefixRule = readonly [prefix: string, bumpType: BumpType];

// first matching prefix wins
const prefixRules: Record<VersionScheme, readonly PrefixRule[]> = {
  semver: [
    ["release(", "major"],
    ["feature(", "minor"],
    ["fix(", "patch"],
  ],
  build: [
    ["fix(", "patch"],
    ["feature(", "minor"],
    ["release(", "major"],
  ],
};

const fallbackBump: Record<VersionScheme, BumpType> = {
  semver: "none",
  build: "build",
};

/**
 * Maps a commit message to a bump type by its prefix, e.g.
 * `feature(ui): add panel` → minor.
 */
export function classifyCommit(
  message: string,
  scheme: VersionScheme,
): BumpType {
  const normalized = message.trim().toLowerCase();
  const rule = prefixRules[scheme].find(([prefix]) =>
    normalized.startsWith(prefix),
  );
  return rule ? rule[1] : fallbackBump[scheme];
}
