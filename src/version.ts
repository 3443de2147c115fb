import semver from "semver";

import type { BumpType, VersionScheme, VersionTuple } from "./types.js";

import { InvalidVersionError } from "./errors.js";

// patterns are anchored at the start only: "1.2.3-beta" still parses as 1.2.3
const versionPatterns = {
  four: /^(\d+)\.(\d+)\.(\d+)\.(\d+)/,
  three: /^(\d+)\.(\d+)\.(\d+)/,
} as const;

const outOfRange = (version: string): InvalidVersionError =>
  new InvalidVersionError(
    version,
    `Version component out of range in ${version}`,
  );

const toComponent = (value: string, version: string): number => {
  const n = Number(value);
  if (!Number.isSafeInteger(n)) throw outOfRange(version);
  return n;
};

const increment = (n: number, version: string): number => {
  if (!Number.isSafeInteger(n + 1)) throw outOfRange(version);
  return n + 1;
};

/**
 * Parses a version string into a tuple whose arity follows the scheme:
 * - build: 1.2.3.4 → [1, 2, 3, 4], 1.2.3 → [1, 2, 3, 0]
 * - semver: 1.2.3 → [1, 2, 3], 1.2.3.4 → [1, 2, 3]
 *
 * Components beyond Number.MAX_SAFE_INTEGER are rejected.
 */
export const parseVersion = (
  version: string,
  scheme: VersionScheme,
): VersionTuple => {
  const match =
    versionPatterns.four.exec(version) ?? versionPatterns.three.exec(version);
  if (!match) {
    throw new InvalidVersionError(version);
  }

  const [major, minor, patch, build] = match
    .slice(1, scheme === "build" ? 5 : 4)
    .map((part) => toComponent(part, version));
  return scheme === "build"
    ? [major ?? 0, minor ?? 0, patch ?? 0, build ?? 0]
    : [major ?? 0, minor ?? 0, patch ?? 0];
};

export const formatVersion = (tuple: VersionTuple): string => tuple.join(".");

/**
 * Increments one component and zeroes every lower one. `none` hands the
 * input back untouched.
 */
export const bumpVersion = (
  version: string,
  bumpType: BumpType,
  scheme: VersionScheme,
): string => {
  if (bumpType === "none") return version;

  const tuple = parseVersion(version, scheme);
  const [major, minor, patch] = tuple;

  if (scheme === "semver") {
    if (bumpType === "build") {
      throw new InvalidVersionError(
        version,
        `Cannot apply a build bump to ${version} under the semver scheme`,
      );
    }
    const next = semver.inc(formatVersion(tuple), bumpType);
    if (!next) {
      throw new InvalidVersionError(version);
    }
    return next;
  }

  const build = tuple.length === 4 ? tuple[3] : 0;
  switch (bumpType) {
    case "major":
      return formatVersion([increment(major, version), 0, 0, 0]);
    case "minor":
      return formatVersion([major, increment(minor, version), 0, 0]);
    case "patch":
      return formatVersion([major, minor, increment(patch, version), 0]);
    case "build":
      return formatVersion([major, minor, patch, increment(build, version)]);
  }
};
