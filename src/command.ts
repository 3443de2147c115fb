import { relinka } from "@reliverse/relinka";
import { defineCommand, defineArgs } from "@reliverse/rempts";

import { isVersionScheme, loadConfig } from "./config.js";
import { isBumpError } from "./errors.js";
import { bumpHandler } from "./impl.js";

const USAGE = "Usage: commit-bump <commit_message>";

export type BumpArgs = {
  message?: string;
  root?: string;
  scheme?: string;
  config?: string;
  dryRun?: boolean;
};

/**
 * Runs one bump from parsed CLI arguments and resolves to the exit code:
 * 0 on success or no-op, 1 on usage errors, 2 on a malformed manifest,
 * version or config. Other failures are rethrown.
 */
export async function runBump(args: BumpArgs): Promise<number> {
  if (typeof args.message !== "string") {
    relinka("error", USAGE);
    return 1;
  }

  if (args.scheme !== undefined && !isVersionScheme(args.scheme)) {
    relinka("error", `Invalid version scheme: ${args.scheme}`);
    return 1;
  }

  try {
    const config = await loadConfig({
      root: args.root,
      scheme: isVersionScheme(args.scheme) ? args.scheme : undefined,
      configFile: args.config,
      dryRun: args.dryRun,
    });
    await bumpHandler(args.message, config);
  } catch (error) {
    if (isBumpError(error)) {
      relinka("error", error.message);
      return 2;
    }
    throw error;
  }
  return 0;
}

export const main = defineCommand({
  meta: {
    name: "commit-bump",
    description:
      "Bumps the project version from a commit message prefix (release(, feature(, fix().",
  },
  args: defineArgs({
    message: {
      type: "positional",
      description: "The commit message to classify",
      required: false,
    },
    root: {
      type: "string",
      description: "Project root the manifest paths are relative to",
    },
    scheme: {
      type: "string",
      description: "Version scheme: semver (x.y.z) or build (x.y.z.b)",
      allowed: ["semver", "build"],
    },
    config: {
      type: "string",
      description: "Config file relative to the root (defaults to .config/commit-bump.json)",
    },
    dryRun: {
      type: "boolean",
      description: "Preview changes without writing files",
    },
  }),
  async run({ args }) {
    process.exit(
      await runBump({
        message: typeof args.message === "string" ? args.message : undefined,
        root: args.root,
        scheme: args.scheme,
        config: args.config,
        dryRun: args.dryRun,
      }),
    );
  },
});
