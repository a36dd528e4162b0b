import path from "node:path";
import os from "node:os";

/** Resolve .firmforge/ workspace root from cwd */
export function getWorkspaceDir(cwd?: string): string {
  return path.join(cwd ?? process.cwd(), ".firmforge");
}

/** Resolve a path relative to workspace */
export function workspacePath(relative: string, cwd?: string): string {
  return path.join(getWorkspaceDir(cwd), relative);
}

/** User-global config directory (~/.firmforge) */
export function getUserConfigDir(): string {
  return path.join(os.homedir(), ".firmforge");
}

/** Resolve the data directory: absolute paths are kept, relative ones hang off cwd */
export function resolveDataDir(dataDir: string, cwd?: string): string {
  return path.resolve(cwd ?? process.cwd(), dataDir);
}

/** Directory name of one installed library version: "<name>@<version>" */
export function libraryKey(name: string, version: string): string {
  return `${name}@${version}`;
}

