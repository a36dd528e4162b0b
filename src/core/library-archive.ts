import fs from "node:fs";
import path from "node:path";
import { unzipSync } from "fflate";

const SOURCE_EXTENSIONS = new Set([".c", ".cpp", ".h", ".hpp"]);

export interface LibraryProperties {
  /** Architecture tags; ["*"] when the library supports everything or does not say */
  architectures: string[];
  /** Dependency names with any "(>=1.0)" style constraint removed */
  depends: string[];
}

export interface ExtractedLibrary {
  properties: LibraryProperties;
  /** Raw library.properties text, empty when the archive has none */
  rawProperties: string;
  /** Written paths, relative to the destination directory */
  files: string[];
}

/** Parse `key=value` lines; only the first "=" splits, later ones stay in the value */
export function parsePropertiesFile(text: string): Map<string, string> {
  const props = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    const eq = line.indexOf("=");
    if (eq === -1 || line.trimStart().startsWith("#")) continue;
    props.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
  }
  return props;
}

export function parseLibraryProperties(text: string): LibraryProperties {
  const props = parsePropertiesFile(text);
  const list = (value: string | undefined): string[] =>
    (value ?? "")
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);

  const architectures = list(props.get("architectures"));
  return {
    architectures: architectures.length > 0 ? architectures : ["*"],
    depends: list(props.get("depends")).map((dep) => dep.replace(/\s*\(.*\)\s*$/, "").trim()),
  };
}

/**
 * Where an archive entry lands relative to the library's src/ directory, or
 * undefined when it is not kept. Everything in the zip is rooted at `<base>/`:
 *   <base>/src/a/b.h  → a/b.h
 *   <base>/foo.cpp    → foo.cpp
 *   <base>/examples/… → ignored
 */
export function sourceDestination(entry: string, archiveBaseName: string): string | undefined {
  if (!SOURCE_EXTENSIONS.has(path.posix.extname(entry))) return undefined;

  const root = `${archiveBaseName}/`;
  if (!entry.startsWith(root)) return undefined;

  const rest = entry.slice(root.length);
  if (rest.startsWith("src/")) {
    const rel = rest.slice("src/".length);
    return isSafeRelative(rel) ? rel : undefined;
  }
  return rest.includes("/") || !isSafeRelative(rest) ? undefined : rest;
}

/** Extract a library zip into `destSrcDir` and read its library.properties */
export function extractLibraryArchive(
  archive: Uint8Array,
  archiveBaseName: string,
  destSrcDir: string,
): ExtractedLibrary {
  const entries = unzipSync(archive);
  const files: string[] = [];
  let rawProperties = "";

  for (const [entry, data] of Object.entries(entries)) {
    if (entry === `${archiveBaseName}/library.properties`) {
      rawProperties = new TextDecoder().decode(data);
      continue;
    }
    const rel = sourceDestination(entry, archiveBaseName);
    if (rel === undefined) continue;

    const target = path.join(destSrcDir, rel);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, data);
    files.push(rel);
  }

  return {
    properties: parseLibraryProperties(rawProperties),
    rawProperties,
    files: files.sort(),
  };
}

/** Rejects absolute paths and any ".." segment (zip-slip) */
function isSafeRelative(rel: string): boolean {
  if (rel.length === 0 || rel.startsWith("/")) return false;
  return !rel.split("/").some((segment) => segment === ".." || segment === "");
}
