/**
 * On-disk artifact cache, one directory per installed library version:
 *
 *   <root>/<name>@<version>/
 *     src/                 extracted headers and sources
 *     library.properties   copied from the archive
 *     build/               toolchain project used to build the static archives
 *     lib<Name>-<env>.a    one static archive per board env that built
 *     manifest.json        written last; its presence marks the install complete
 *
 * Installed directories are never evicted. The in-memory LRU only remembers
 * recently confirmed artifacts so hot paths skip the filesystem.
 */

import fs from "node:fs";
import path from "node:path";
import { LRUCache } from "lru-cache";
import {
  ManifestSchema,
  type ArchitectureFlags,
  type Manifest,
  type ResolvedArtifact,
} from "../schemas/manifest.schema.js";
import { libraryKey } from "../utils/paths.js";
import { parseLibraryProperties, type LibraryProperties } from "./library-archive.js";
import * as log from "../utils/logger.js";

const MANIFEST_FILE = "manifest.json";
const PROPERTIES_FILE = "library.properties";

export interface ArtifactStoreOptions {
  /** How long a confirmed artifact is trusted without touching the disk */
  ttlMs: number;
  maxEntries: number;
}

export class ArtifactStore {
  private readonly known: LRUCache<string, ResolvedArtifact>;

  constructor(
    readonly rootDir: string,
    opts: ArtifactStoreOptions,
  ) {
    this.known = new LRUCache<string, ResolvedArtifact>({ max: opts.maxEntries, ttl: opts.ttlMs });
  }

  installDir(name: string, version: string): string {
    return path.join(this.rootDir, libraryKey(name, version));
  }

  sourceDir(name: string, version: string): string {
    return path.join(this.installDir(name, version), "src");
  }

  buildDir(name: string, version: string): string {
    return path.join(this.installDir(name, version), "build");
  }

  /** Create (or reuse) the install directory; existing files are overwritten, not cleared */
  prepare(name: string, version: string): string {
    const dir = this.installDir(name, version);
    fs.mkdirSync(path.join(dir, "src"), { recursive: true });
    return dir;
  }

  /** Completed artifact for name@version, or undefined if it was never fully installed */
  lookup(name: string, version: string): ResolvedArtifact | undefined {
    const key = libraryKey(name, version);
    const hit = this.known.get(key);
    if (hit) return hit;

    const manifestPath = path.join(this.installDir(name, version), MANIFEST_FILE);
    if (!fs.existsSync(manifestPath)) return undefined;

    const artifact = this.load(name, version);
    this.known.set(key, artifact);
    return artifact;
  }

  readManifest(name: string, version: string): Manifest {
    const raw = fs.readFileSync(path.join(this.installDir(name, version), MANIFEST_FILE), "utf-8");
    return ManifestSchema.parse(JSON.parse(raw));
  }

  readProperties(name: string, version: string): LibraryProperties {
    const file = path.join(this.installDir(name, version), PROPERTIES_FILE);
    if (!fs.existsSync(file)) return { architectures: ["*"], depends: [] };
    return parseLibraryProperties(fs.readFileSync(file, "utf-8"));
  }

  writeProperties(name: string, version: string, raw: string): void {
    fs.writeFileSync(path.join(this.installDir(name, version), PROPERTIES_FILE), raw);
  }

  /** Persist the manifest and publish the artifact to the in-memory cache */
  commit(name: string, version: string, manifest: Manifest): ResolvedArtifact {
    const dir = this.installDir(name, version);
    // Write-then-rename so a crash never leaves a half-written manifest behind
    const tmp = path.join(dir, `${MANIFEST_FILE}.${process.pid}.tmp`);
    fs.writeFileSync(tmp, JSON.stringify(manifest, null, 2));
    fs.renameSync(tmp, path.join(dir, MANIFEST_FILE));

    const artifact = this.load(name, version);
    this.known.set(libraryKey(name, version), artifact);
    log.debug(`Artifact ${libraryKey(name, version)} committed (${manifest.arches.join(", ") || "no boards"})`);
    return artifact;
  }

  /** Path of the static archive built for one board env */
  archivePath(name: string, version: string, env: string): string {
    return path.join(this.installDir(name, version), `lib${archiveName(name, env)}.a`);
  }

  /** Resolve a manifest's "../name@version/..." references against the cache root */
  absolutize(text: string): string {
    return text.split("../").join(`${this.rootDir}/`);
  }

  private load(name: string, version: string): ResolvedArtifact {
    const manifest = this.readManifest(name, version);
    const props = this.readProperties(name, version);
    const perArchitecture: Record<string, ArchitectureFlags> = {};
    for (const env of manifest.arches) {
      perArchitecture[env] = {
        includeFlags: manifest.include[env] ?? "",
        libraryDirs: manifest.dirs[env] ?? "",
      };
    }
    return Object.freeze({
      name,
      version,
      installDir: this.installDir(name, version),
      declaredArchitectures: Object.freeze([...props.architectures]),
      dependencies: Object.freeze([...manifest.depends]),
      perArchitecture: Object.freeze(perArchitecture),
    });
  }
}

/** Library name as used in file and linker names; spaces are not valid in -l flags */
export function libraryStem(name: string): string {
  return name.replace(/ /g, "-");
}

/** Linker name of a library's archive for one env */
export function archiveName(name: string, env: string): string {
  return `${libraryStem(name)}-${env}`;
}
