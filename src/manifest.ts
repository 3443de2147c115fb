import { relinka } from "@reliverse/relinka";
import fs from "fs-extra";

import { MalformedManifestError } from "./errors.js";

/**
 * A run of lines in a structured (TOML-style) manifest. `name` is the
 * header of the section (`package`, `dependencies.serde`), or `null` for
 * the lines before the first header. The header line itself is the first
 * entry of `lines`.
 */
export type ManifestSection = {
  name: string | null;
  lines: string[];
};

export type ManifestWriteOptions = {
  dryRun?: boolean;
};

export type StructuredManifestOptions = ManifestWriteOptions & {
  section?: string;
};

type JsonManifest = Record<string, unknown>;

const DEFAULT_SECTION = "package";

// matches both [table] and [[array.of.tables]] headers
const sectionHeaderPattern = /^\[\[?\s*([^[\]]+?)\s*\]\]?(?:\s*#.*)?$/;
const versionLinePattern = /^(\s*version\s*=\s*)(["'])([^"']*)\2(.*)$/s;

/**
 * Net change in open `[` brackets on a line, skipping quoted strings and
 * trailing comments.
 */
function bracketDelta(line: string): number {
  let delta = 0;
  let quote: string | null = null;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quote) {
      if (char === "\\" && quote === '"') i++;
      else if (char === quote) quote = null;
      continue;
    }
    if (char === '"' || char === "'") quote = char;
    else if (char === "#") break;
    else if (char === "[") delta++;
    else if (char === "]") delta--;
  }

  return delta;
}

export function parseSections(content: string): ManifestSection[] {
  let current: ManifestSection = { name: null, lines: [] };
  const sections = [current];
  // open array brackets of a multi-line value; headers only count at zero
  let depth = 0;

  for (const line of content.split("\n")) {
    const header =
      depth === 0 ? sectionHeaderPattern.exec(line.trim()) : null;
    if (header?.[1]) {
      current = { name: header[1], lines: [line] };
      sections.push(current);
    } else {
      current.lines.push(line);
      depth = Math.max(0, depth + bracketDelta(line));
    }
  }

  return sections;
}

export const serializeSections = (sections: ManifestSection[]): string =>
  sections.flatMap((section) => section.lines).join("\n");

const findVersionLine = (
  sections: ManifestSection[],
  sectionName: string,
): { section: ManifestSection; index: number } | null => {
  const section = sections.find((s) => s.name === sectionName);
  if (!section) return null;
  const index = section.lines.findIndex((line) =>
    versionLinePattern.test(line),
  );
  return index === -1 ? null : { section, index };
};

/**
 * Returns the version assigned inside `[section]`, ignoring `version`
 * keys of every other table.
 */
export function readStructuredVersion(
  content: string,
  sectionName = DEFAULT_SECTION,
): string | null {
  const found = findVersionLine(parseSections(content), sectionName);
  if (!found) return null;
  const line = found.section.lines[found.index] ?? "";
  return versionLinePattern.exec(line)?.[3] ?? null;
}

/**
 * Rewrites the first `version = "..."` line of `[section]`. Quote style,
 * spacing, trailing comments and line endings are kept as they were.
 */
export function updateStructuredVersion(
  content: string,
  newVersion: string,
  sectionName = DEFAULT_SECTION,
): string {
  const sections = parseSections(content);
  const found = findVersionLine(sections, sectionName);
  if (!found) return content;

  const { section, index } = found;
  const line = section.lines[index] ?? "";
  section.lines[index] = line.replace(
    versionLinePattern,
    (_match, lead: string, quote: string, _old: string, tail: string) =>
      `${lead}${quote}${newVersion}${quote}${tail}`,
  );
  return serializeSections(sections);
}

/**
 * Writes content to a file, logging the failure before rethrowing it.
 */
async function writeFileSafe(
  filePath: string,
  content: string,
  reason: string,
): Promise<void> {
  try {
    await fs.writeFile(filePath, content, "utf8");
    relinka(
      "verbose",
      `Successfully wrote file: ${filePath} [Reason: ${reason}]`,
    );
  } catch (error) {
    relinka(
      "error",
      `Failed to write file: ${filePath} [Reason: ${reason}]`,
      error,
    );
    throw error;
  }
}

/**
 * Updates the version of a structured manifest. The file is only written
 * when its content actually changes.
 */
export async function updateStructuredManifest(
  filePath: string,
  newVersion: string,
  options: StructuredManifestOptions = {},
): Promise<boolean> {
  const section = options.section ?? DEFAULT_SECTION;
  const content = await fs.readFile(filePath, "utf8");
  const updated = updateStructuredVersion(content, newVersion, section);

  if (updated === content) {
    relinka(
      "verbose",
      `[updateStructuredManifest] No [${section}] version updated in: ${filePath}`,
    );
    return false;
  }

  if (options.dryRun) {
    relinka("verbose", `[dry run] Would write: ${filePath}`);
  } else {
    await writeFileSafe(filePath, updated, "version update");
  }
  return true;
}

const isJsonManifest = (value: unknown): value is JsonManifest =>
  typeof value === "object" && value !== null && !Array.isArray(value);

async function readJsonManifest(filePath: string): Promise<JsonManifest> {
  let data: unknown;
  try {
    data = await fs.readJson(filePath);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new MalformedManifestError(filePath, "not valid JSON", {
        cause: error,
      });
    }
    throw error;
  }

  if (!isJsonManifest(data)) {
    throw new MalformedManifestError(filePath, "expected a JSON object");
  }
  return data;
}

export async function readJsonVersion(filePath: string): Promise<string> {
  const manifest = await readJsonManifest(filePath);
  const { version } = manifest;
  if (typeof version !== "string") {
    throw new MalformedManifestError(
      filePath,
      'missing string "version" field',
    );
  }
  return version;
}

/**
 * Sets the top-level `version` of a JSON manifest and rewrites the whole
 * document with 2-space indentation. Resolves to `true` when the stored
 * value differed from `newVersion`.
 */
export async function updateJsonManifest(
  filePath: string,
  newVersion: string,
  options: ManifestWriteOptions = {},
): Promise<boolean> {
  const manifest = await readJsonManifest(filePath);
  const oldVersion = manifest.version;
  manifest.version = newVersion;

  if (options.dryRun) {
    relinka("verbose", `[dry run] Would write: ${filePath}`);
  } else {
    await fs.writeJson(filePath, manifest, { spaces: 2 });
    relinka("verbose", `Successfully wrote file: ${filePath}`);
  }
  return oldVersion !== newVersion;
}
