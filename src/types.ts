export type VersionScheme = "semver" | "build";

export type BumpType = "major" | "minor" | "patch" | "build" | "none";

export type VersionTuple =
  | readonly [number, number, number]
  | readonly [number, number, number, number];

export type BumpConfig = {
  /** Absolute project root; every manifest path is relative to it */
  root: string;
  scheme: VersionScheme;
  /** JSON manifest holding the current version */
  canonical: string;
  structuredManifests: string[];
  jsonManifests: string[];
  /** Section of a structured manifest that owns the version line */
  section: string;
  dryRun: boolean;
};

export type BumpResult = {
  bumpType: BumpType;
  currentVersion: string;
  newVersion: string;
  changed: boolean;
  /** Manifests (relative to root) whose contents changed */
  updated: string[];
};
