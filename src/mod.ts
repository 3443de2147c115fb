export type {
  BumpConfig,
  BumpResult,
  BumpType,
  VersionScheme,
  VersionTuple,
} from "./types.js";
export type { BumpArgs } from "./command.js";
export type { ConfigOverrides } from "./config.js";
export type {
  ManifestSection,
  ManifestWriteOptions,
  StructuredManifestOptions,
} from "./manifest.js";

export { classifyCommit } from "./classify.js";
export { main, runBump } from "./command.js";
export {
  CONFIG_FILE,
  DEFAULT_CONFIG,
  isVersionScheme,
  loadConfig,
  validateFileConfig,
} from "./config.js";
export {
  ConfigError,
  InvalidVersionError,
  MalformedManifestError,
  isBumpError,
} from "./errors.js";
export { bumpHandler, getCurrentVersion } from "./impl.js";
export {
  parseSections,
  readJsonVersion,
  readStructuredVersion,
  serializeSections,
  updateJsonManifest,
  updateStructuredManifest,
  updateStructuredVersion,
} from "./manifest.js";
export {
  bumpVersion,
  formatVersion,
  parseVersion,
} from "./version.js";
