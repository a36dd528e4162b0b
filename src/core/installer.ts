/**
 * Dependency installer: turns library requests into installed, built artifacts.
 *
 * Per request: resolve the version, short-circuit on a cached artifact,
 * otherwise download + extract, install declared dependencies first
 * (depth-first, in declaration order), build one static archive per
 * supported board env, and commit the manifest. A board that fails to build
 * is logged and left out of the manifest; the install itself still succeeds.
 *
 * Builds of one name@version share its build/ directory, so they run one at a
 * time. Pass a GatedToolchain to count library builds against the pool limit.
 */

import fs from "node:fs";
import path from "node:path";
import { LibraryRequestSchema, type LibraryRequest } from "../schemas/compile.schema.js";
import { emptyManifest, type Manifest, type ResolvedArtifact } from "../schemas/manifest.schema.js";
import { CyclicDependencyError, InvalidInputError, NotFoundError } from "../utils/errors.js";
import { libraryKey } from "../utils/paths.js";
import { Semaphore } from "../utils/semaphore.js";
import { archiveName, libraryStem, type ArtifactStore } from "./artifact-store.js";
import { renderBoardSections, supportsBoard, type BoardDefinition } from "./boards.js";
import type { LibraryCatalog } from "./catalog.js";
import { extractLibraryArchive, type LibraryProperties } from "./library-archive.js";
import type { ArchiveFetcher, ConnectivityProbe } from "./network.js";
import type { Toolchain } from "./toolchain.js";
import { resolveVersion } from "./version-resolver.js";
import * as log from "../utils/logger.js";

export interface InstallScope {
  /** Boards to build static archives for (filtered by what each library supports) */
  boards: readonly BoardDefinition[];
  /**
   * Treat a cached artifact that supports a scoped board but has no build for
   * it as incomplete, and build just the missing boards from the sources on disk.
   */
  rebuildMissing?: boolean;
}

export interface InstallerOptions {
  catalog: LibraryCatalog;
  store: ArtifactStore;
  fetcher: ArchiveFetcher;
  toolchain: Toolchain;
  connectivity?: ConnectivityProbe;
  /** Parallel job hint passed to the toolchain */
  jobs: number;
  /** Deadline for one library build */
  timeoutMs: number;
}

/** Installed libraries keyed by requested name */
export type InstalledLibraries = Map<string, ResolvedArtifact>;

interface DependencyFlags {
  include: string;
  dirs: string;
}

const STUB_SKETCH = "#include <Arduino.h>\nvoid setup() {}\nvoid loop() {}\n";

export class DependencyInstaller {
  private readonly buildLocks = new Map<string, Semaphore>();

  constructor(private readonly opts: InstallerOptions) {}

  /**
   * Install every request and its transitive dependencies.
   * Offline, nothing is resolved or built and the result is empty.
   */
  async install(requests: readonly LibraryRequest[], scope: InstallScope): Promise<InstalledLibraries> {
    if (requests.length === 0) return new Map();

    if (this.opts.connectivity && !(await this.opts.connectivity.isOnline())) {
      log.warn("No internet connection, skipping library install");
      return new Map();
    }

    return this.installAll(requests, [], scope);
  }

  private async installAll(
    requests: readonly LibraryRequest[],
    stack: readonly string[],
    scope: InstallScope,
  ): Promise<InstalledLibraries> {
    const installed: InstalledLibraries = new Map();
    for (const request of requests) {
      installed.set(request.name, await this.installOne(request, stack, scope));
    }
    return installed;
  }

  private async installOne(
    request: LibraryRequest,
    stack: readonly string[],
    scope: InstallScope,
  ): Promise<ResolvedArtifact> {
    const { name } = request;
    if (stack.includes(name)) throw new CyclicDependencyError([...stack, name]);

    const { catalog, store } = this.opts;
    const version = resolveVersion(request, catalog);
    const key = libraryKey(name, version);

    const cached = store.lookup(name, version);
    if (cached) {
      const missing = scope.rebuildMissing ? missingBoards(cached, scope.boards) : [];
      if (missing.length === 0) {
        log.debug(`${key} already installed`);
        return cached;
      }
      log.info(`Rebuilding ${key} for ${missing.map((b) => b.env).join(", ")}`);
      return this.build(name, version, {
        dependencies: cached.dependencies.map(splitLibraryKey),
        targets: missing,
        manifest: store.readManifest(name, version),
        stack,
        scope,
      });
    }

    const entry = catalog.find(name, version);
    if (!entry) throw new NotFoundError(name, version);

    log.info(`Installing library ${key}`);
    const archive = await this.opts.fetcher.download(entry.downloadUrl);

    store.prepare(name, version);
    const sourceDir = store.sourceDir(name, version);
    const extracted = extractLibraryArchive(archive, entry.archiveBaseName, sourceDir);
    // Names the built archive lib<Name>.a so it can be told apart from its dependencies'
    fs.writeFileSync(
      path.join(sourceDir, "library.json"),
      JSON.stringify({ name: libraryStem(name), version }, null, 2),
    );
    log.debug(`${key}: extracted ${extracted.files.length} file(s)`);

    // Without library.properties the index entry is the only metadata there is
    const properties: LibraryProperties =
      extracted.rawProperties === ""
        ? {
            depends: [...entry.dependsOn],
            architectures: entry.supportedArchitectures.length > 0 ? [...entry.supportedArchitectures] : ["*"],
          }
        : extracted.properties;
    store.writeProperties(
      name,
      version,
      extracted.rawProperties === ""
        ? `architectures=${properties.architectures.join(",")}\ndepends=${properties.depends.join(",")}\n`
        : extracted.rawProperties,
    );

    return this.build(name, version, {
      dependencies: properties.depends.map((dep) => dependencyRequest(dep, key)),
      targets: scope.boards.filter((b) => supportsBoard(properties.architectures, b)),
      manifest: emptyManifest(),
      stack,
      scope,
    });
  }

  private async build(
    name: string,
    version: string,
    plan: {
      dependencies: LibraryRequest[];
      targets: readonly BoardDefinition[];
      manifest: Manifest;
      stack: readonly string[];
      scope: InstallScope;
    },
  ): Promise<ResolvedArtifact> {
    const key = libraryKey(name, version);
    const deps = await this.installAll(plan.dependencies, [...plan.stack, name], plan.scope);

    const manifest: Manifest = {
      include: { ...plan.manifest.include },
      dirs: { ...plan.manifest.dirs },
      arches: [...plan.manifest.arches],
      depends: [...deps.values()].map((d) => libraryKey(d.name, d.version)),
    };

    for (const board of plan.targets) {
      const flags = this.dependencyFlags(deps, board);
      if (await this.buildForBoard(name, version, board, flags)) {
        manifest.include[board.env] = flags.include;
        manifest.dirs[board.env] = flags.dirs;
        if (!manifest.arches.includes(board.env)) manifest.arches.push(board.env);
      }
    }

    if (plan.targets.length > 0 && plan.targets.every((b) => !manifest.arches.includes(b.env))) {
      log.warn(`${key} did not build for any requested board`);
    }

    return this.opts.store.commit(name, version, manifest);
  }

  /**
   * Flags a build of this library for `board` needs from its dependencies:
   * each dependency's source dir and archive, plus whatever that dependency
   * itself recorded. Paths are "../"-relative to the cache root.
   */
  private dependencyFlags(deps: InstalledLibraries, board: BoardDefinition): DependencyFlags {
    let include = "";
    let dirs = "";
    for (const dep of deps.values()) {
      const depFlags = dep.perArchitecture[board.env];
      if (!depFlags) continue;

      const rel = `../${libraryKey(dep.name, dep.version)}/`;
      dirs += `\t\t\t${rel}src\n${depFlags.libraryDirs}`;
      include += `-I'${rel}src/' `;
      if (fs.existsSync(this.opts.store.archivePath(dep.name, dep.version, board.env))) {
        include += `-L'${rel}' -l${archiveName(dep.name, board.env)} `;
      }
      include += depFlags.includeFlags;
    }
    return { include, dirs };
  }

  /** Run `fn` while holding the build directory of `key` */
  private async withBuildLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.buildLocks.get(key);
    if (!lock) {
      lock = new Semaphore(1);
      this.buildLocks.set(key, lock);
    }
    await lock.acquire();
    try {
      return await fn();
    } finally {
      lock.release();
      if (lock.inUse === 0 && lock.pending === 0) this.buildLocks.delete(key);
    }
  }

  /** Build one board env; true when the toolchain succeeded */
  private buildForBoard(
    name: string,
    version: string,
    board: BoardDefinition,
    flags: DependencyFlags,
  ): Promise<boolean> {
    const key = libraryKey(name, version);
    return this.withBuildLock(key, () => this.runBuild(name, version, board, flags));
  }

  private async runBuild(
    name: string,
    version: string,
    board: BoardDefinition,
    flags: DependencyFlags,
  ): Promise<boolean> {
    const { store, toolchain } = this.opts;
    const key = libraryKey(name, version);
    const buildDir = store.buildDir(name, version);

    fs.mkdirSync(path.join(buildDir, "src"), { recursive: true });
    fs.writeFileSync(path.join(buildDir, "src", "main.cpp"), STUB_SKETCH);
    fs.writeFileSync(path.join(buildDir, "platformio.ini"), this.renderLibraryConfig(name, version, board, flags));

    const result = await toolchain.run({
      cwd: buildDir,
      environment: board.env,
      jobs: this.opts.jobs,
      timeoutMs: this.opts.timeoutMs,
      label: `${key} [${board.env}]`,
    });

    const archivePath = store.archivePath(name, version, board.env);
    if (result.timedOut || result.exitCode !== 0) {
      const reason = result.timedOut ? `timed out after ${this.opts.timeoutMs}ms` : `exit code ${result.exitCode}`;
      log.warn(`Install failure: ${key} for ${board.env} (${reason}), leaving it out`);
      log.debug(result.output);
      fs.rmSync(archivePath, { force: true });
      return false;
    }

    const built = findFile(
      path.join(buildDir, ".pio", "build", board.env),
      `lib${libraryStem(name)}.a`,
    );
    if (built) {
      fs.copyFileSync(built, archivePath);
    } else {
      // Header-only libraries produce no archive
      fs.rmSync(archivePath, { force: true });
    }
    return true;
  }

  private renderLibraryConfig(
    name: string,
    version: string,
    board: BoardDefinition,
    flags: DependencyFlags,
  ): string {
    const { store } = this.opts;
    return (
      "[env]\n" +
      "lib_ldf_mode = deep+\n" +
      "build_type = release\n" +
      `build_flags = -w ${store.absolutize(flags.include)}\n` +
      `lib_deps =\n\t\t\t${store.sourceDir(name, version)}\n${store.absolutize(flags.dirs)}\n` +
      renderBoardSections([board])
    );
  }
}

/** Boards in scope the artifact supports but was never built for */
function missingBoards(artifact: ResolvedArtifact, boards: readonly BoardDefinition[]): BoardDefinition[] {
  return boards.filter(
    (b) => supportsBoard(artifact.declaredArchitectures, b) && !(b.env in artifact.perArchitecture),
  );
}

function dependencyRequest(dep: string, declaredBy: string): LibraryRequest {
  const parsed = LibraryRequestSchema.safeParse({ name: dep });
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid dependency "${dep}" declared by ${declaredBy}`, "libraries");
  }
  return parsed.data;
}

/** "Name@1.2.3" back into a pinned request */
function splitLibraryKey(key: string): LibraryRequest {
  const at = key.lastIndexOf("@");
  return { name: key.slice(0, at), version: key.slice(at + 1) };
}

function findFile(dir: string, fileName: string): string | undefined {
  if (!fs.existsSync(dir)) return undefined;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      const nested = findFile(full, fileName);
      if (nested) return nested;
    } else if (entry.name === fileName) {
      return full;
    }
  }
  return undefined;
}
