/**
 * Compile service: the single entry point a transport layer calls.
 *
 * handle(): validate → code cache → install libraries (full scope, then one
 * narrowed pass for the job's board) → hold a build slot → compile.
 */

import fs from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import { LRUCache } from "lru-cache";
import type { ZodError } from "zod";
import {
  CompileRequestSchema,
  LibrarySpecSchema,
  toCompileResponse,
  type CompileJob,
  type CompileResponse,
  type LibraryRequest,
} from "../schemas/compile.schema.js";
import type { Config } from "../schemas/config.schema.js";
import { describeError, InstallFailureError, InvalidInputError } from "../utils/errors.js";
import { resolveDataDir } from "../utils/paths.js";
import { ArtifactStore } from "./artifact-store.js";
import { BoardRegistry, supportsBoard, type BoardDefinition } from "./boards.js";
import { BuildSlotPool } from "./build-slot-pool.js";
import {
  HttpCatalogSource,
  LibraryCatalog,
  startCatalogRefresh,
  type CatalogSource,
  type RefreshHandle,
} from "./catalog.js";
import { DependencyInstaller, type InstalledLibraries, type InstallScope } from "./installer.js";
import {
  HttpArchiveFetcher,
  HttpConnectivityProbe,
  type ArchiveFetcher,
  type ConnectivityProbe,
} from "./network.js";
import { attemptWithNarrowing } from "./retry-policy.js";
import { SketchCompiler } from "./sketch-compiler.js";
import { GatedToolchain, PlatformIOToolchain, type Toolchain } from "./toolchain.js";
import { resolveVersion } from "./version-resolver.js";
import * as log from "../utils/logger.js";

export interface CompileServiceParts {
  boards: BoardRegistry;
  catalog: LibraryCatalog;
  installer: DependencyInstaller;
  pool: BuildSlotPool;
  compiler: SketchCompiler;
}

export interface CompileServiceOptions {
  /** 0 disables the startup fetch and the periodic refresh */
  refreshIntervalSec: number;
  codeCacheTtlMs: number;
  maxCodeCacheEntries: number;
}

export class CompileService {
  readonly boards: BoardRegistry;
  readonly catalog: LibraryCatalog;
  private readonly installer: DependencyInstaller;
  private readonly pool: BuildSlotPool;
  private readonly compiler: SketchCompiler;
  private readonly codeCache: LRUCache<string, CompileResponse>;
  private refresher: RefreshHandle | null = null;

  constructor(
    parts: CompileServiceParts,
    private readonly opts: CompileServiceOptions,
  ) {
    this.boards = parts.boards;
    this.catalog = parts.catalog;
    this.installer = parts.installer;
    this.pool = parts.pool;
    this.compiler = parts.compiler;
    this.codeCache = new LRUCache<string, CompileResponse>({
      max: opts.maxCodeCacheEntries,
      ttl: opts.codeCacheTtlMs,
    });
  }

  /** Load the library index and keep it fresh in the background */
  async start(): Promise<void> {
    this.stop();
    this.refresher = await startCatalogRefresh(this.catalog, this.opts.refreshIntervalSec);
  }

  stop(): void {
    this.refresher?.stop();
    this.refresher = null;
  }

  /**
   * Compile one request. Rejects with InvalidInputError before anything is
   * installed or spawned; the build slot is released on every exit path.
   */
  async handle(request: unknown, signal?: AbortSignal): Promise<CompileResponse> {
    const parsed = CompileRequestSchema.safeParse(request);
    if (!parsed.success) throw fromZodError(parsed.error);
    const job: CompileJob = parsed.data;
    const board = this.boards.get(job.board);

    const cacheKey = codeCacheKey(job);
    const cached = this.codeCache.get(cacheKey);
    if (cached) {
      log.debug(`Code cache hit for ${board.fqbn}`);
      return cached;
    }

    const resolved = await this.installForJob(job, board);
    log.debug(`Waiting for a build slot (${this.pool.available}/${this.pool.size} free)`);
    const image = await this.pool.withSlot((slot) => this.compiler.compile(job, slot, resolved), signal);

    const response = toCompileResponse(image);
    this.codeCache.set(cacheKey, response);
    return response;
  }

  /** Install libraries given as "Name" or "Name@version" for some (default: all) boards */
  async install(specs: readonly string[], fqbns: readonly string[] = []): Promise<InstalledLibraries> {
    const requests = specs.map(parseLibrarySpec);
    const boards = fqbns.length > 0 ? fqbns.map((fqbn) => this.boards.get(fqbn)) : this.boards.all();
    return this.installer.install(requests, { boards });
  }

  /** Concrete version the resolver picks for "Name" or "Name@version" */
  resolve(spec: string): string {
    return resolveVersion(parseLibrarySpec(spec), this.catalog);
  }

  get codeCacheSize(): number {
    return this.codeCache.size;
  }

  private installForJob(job: CompileJob, board: BoardDefinition): Promise<InstalledLibraries> {
    return attemptWithNarrowing<InstallScope, InstalledLibraries>({
      full: { boards: this.boards.all() },
      narrowed: { boards: [board], rebuildMissing: true },
      attempt: (scope) => this.installer.install(job.libraries, scope),
      accept: (installed) => unbuiltFor(installed, board).length === 0,
      onNarrow: (outcome) => {
        const reason = outcome.ok
          ? `${unbuiltFor(outcome.result, board).join(", ")} not built for ${board.env}`
          : describeError(outcome.error);
        log.warn(`Library install incomplete (${reason}), retrying for ${board.env} only`);
      },
      fail: (outcome) => {
        if (!outcome.ok) {
          return outcome.error instanceof Error ? outcome.error : new Error(String(outcome.error));
        }
        const missing = unbuiltFor(outcome.result, board);
        return new InstallFailureError(
          `Could not build ${missing.join(", ")} for ${board.fqbn}`,
          missing[0] ?? "",
          board.env,
        );
      },
    });
  }
}

/** Libraries that claim to support the board but have no build for it */
function unbuiltFor(installed: InstalledLibraries, board: BoardDefinition): string[] {
  const missing: string[] = [];
  for (const artifact of installed.values()) {
    if (supportsBoard(artifact.declaredArchitectures, board) && !(board.env in artifact.perArchitecture)) {
      missing.push(`${artifact.name}@${artifact.version}`);
    }
  }
  return missing;
}

function parseLibrarySpec(spec: string): LibraryRequest {
  const parsed = LibrarySpecSchema.safeParse(spec);
  if (!parsed.success) throw fromZodError(parsed.error, "libraries");
  return parsed.data;
}

function fromZodError(err: ZodError, fallbackField = "request"): InvalidInputError {
  const issue = err.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : fallbackField;
  return new InvalidInputError(`Invalid ${field}: ${issue?.message ?? err.message}`, field);
}

/** Identical requests (board, libraries, source) share one compiled response */
export function codeCacheKey(job: CompileJob): string {
  const normalized = JSON.stringify({
    board: job.board,
    libraries: job.libraries.map((l) => (l.version ? `${l.name}@${l.version}` : l.name)),
    sourceCode: job.sourceCode,
  });
  return createHash("md5").update(normalized).digest("hex");
}

/** External collaborators a caller may swap out (tests, offline tooling) */
export interface CompileServiceOverrides {
  cwd?: string;
  catalogSource?: CatalogSource;
  connectivity?: ConnectivityProbe;
  fetcher?: ArchiveFetcher;
  toolchain?: Toolchain;
}

/** Wire every component from a validated config */
export function createCompileService(config: Config, overrides: CompileServiceOverrides = {}): CompileService {
  const dataDir = resolveDataDir(config.storage.data_dir, overrides.cwd);
  const boards = new BoardRegistry(config.boards);

  const connectivity =
    overrides.connectivity ??
    new HttpConnectivityProbe(config.network.connectivity_url, config.network.connectivity_timeout_ms);
  const catalog = new LibraryCatalog(
    overrides.catalogSource ?? new HttpCatalogSource(config.catalog.index_url, config.catalog.fetch_timeout_ms),
    connectivity,
  );

  const store = new ArtifactStore(path.join(dataDir, config.storage.libraries_subdir), {
    ttlMs: config.cache.library_ttl_sec * 1000,
    maxEntries: config.cache.max_libraries,
  });
  fs.mkdirSync(store.rootDir, { recursive: true });

  const toolchain = overrides.toolchain ?? PlatformIOToolchain.fromConfig(config.toolchain);
  const pool = BuildSlotPool.provision(
    path.join(dataDir, config.storage.slots_subdir),
    config.pool.max_concurrent_compiles,
    boards.all(),
  );
  const installer = new DependencyInstaller({
    catalog,
    store,
    fetcher: overrides.fetcher ?? new HttpArchiveFetcher(config.network.download_timeout_ms),
    // Library builds take pool permits; sketch compiles already hold a slot
    toolchain: new GatedToolchain(toolchain, pool),
    connectivity,
    jobs: config.toolchain.threads_per_compile,
    timeoutMs: config.toolchain.library_timeout_sec * 1000,
  });

  const compiler = new SketchCompiler({
    toolchain,
    store,
    boards,
    jobs: config.toolchain.threads_per_compile,
    timeoutMs: config.toolchain.compile_timeout_sec * 1000,
  });

  return new CompileService(
    { boards, catalog, installer, pool, compiler },
    {
      refreshIntervalSec: config.catalog.refresh_interval_sec,
      codeCacheTtlMs: config.cache.code_ttl_sec * 1000,
      maxCodeCacheEntries: config.cache.max_code_entries,
    },
  );
}
