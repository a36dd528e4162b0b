/**
 * Library catalog: name → known releases, fetched from a remote index.
 *
 * The snapshot is replaced wholesale on refresh and never mutated in place,
 * so readers holding a snapshot see a consistent view across a refresh.
 */

import {
  IndexReleaseSchema,
  LibraryIndexSchema,
  toCatalogEntry,
  type CatalogEntry,
} from "../schemas/catalog.schema.js";
import { describeError } from "../utils/errors.js";
import { fetchWithRetry } from "../utils/retry.js";
import type { ConnectivityProbe } from "./network.js";
import * as log from "../utils/logger.js";

export type CatalogSnapshot = ReadonlyMap<string, readonly CatalogEntry[]>;

/** Where the raw index document comes from */
export interface CatalogSource {
  fetchIndex(): Promise<unknown>;
}

export class HttpCatalogSource implements CatalogSource {
  constructor(
    private readonly indexUrl: string,
    private readonly timeoutMs: number,
  ) {}

  async fetchIndex(): Promise<unknown> {
    const res = await fetchWithRetry(this.indexUrl, {
      source: "library index",
      timeoutMs: this.timeoutMs,
      retry: { maxAttempts: 2, initialDelayMs: 500 },
      onRetry: (attempt, delay) => log.warn(`Library index retry ${attempt} in ${delay}ms...`),
    });
    return res.json();
  }
}

/** Group a raw index document by library name, skipping malformed releases */
export function buildSnapshot(document: unknown): CatalogSnapshot {
  const index = LibraryIndexSchema.parse(document);
  const byName = new Map<string, CatalogEntry[]>();
  let skipped = 0;

  for (const raw of index.libraries) {
    const parsed = IndexReleaseSchema.safeParse(raw);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    const entry = toCatalogEntry(parsed.data);
    const list = byName.get(entry.name);
    if (list) list.push(entry);
    else byName.set(entry.name, [entry]);
  }

  if (skipped > 0) log.debug(`Library index: skipped ${skipped} malformed release(s)`);

  const frozen = new Map<string, readonly CatalogEntry[]>();
  for (const [name, list] of byName) frozen.set(name, Object.freeze(list));
  return frozen;
}

export class LibraryCatalog {
  private snapshot: CatalogSnapshot = new Map();
  private refreshedAt: Date | null = null;

  constructor(
    private readonly source: CatalogSource,
    private readonly connectivity?: ConnectivityProbe,
  ) {}

  /**
   * Fetch the index and swap in a new snapshot.
   * Returns false (keeping the previous snapshot) when offline or the fetch fails.
   */
  async refresh(): Promise<boolean> {
    if (this.connectivity && !(await this.connectivity.isOnline())) {
      log.warn("No internet connection, skipping library index refresh");
      return false;
    }

    log.info("Updating library index...");
    try {
      const next = buildSnapshot(await this.source.fetchIndex());
      this.snapshot = next;
      this.refreshedAt = new Date();
      log.debug(`Library index: ${next.size} libraries`);
      return true;
    } catch (err) {
      log.warn(`Library index refresh failed, keeping previous index: ${describeError(err)}`);
      return false;
    }
  }

  /** Replace the snapshot directly (used by tests and offline seeding) */
  load(snapshot: CatalogSnapshot): void {
    this.snapshot = snapshot;
    this.refreshedAt = new Date();
  }

  /** Current snapshot; callers should hold on to it for the duration of one resolution */
  current(): CatalogSnapshot {
    return this.snapshot;
  }

  releases(name: string): readonly CatalogEntry[] {
    return this.snapshot.get(name) ?? [];
  }

  has(name: string): boolean {
    return this.snapshot.has(name);
  }

  find(name: string, version: string): CatalogEntry | undefined {
    return this.releases(name).find((e) => e.version === version);
  }

  get size(): number {
    return this.snapshot.size;
  }

  get lastRefreshed(): Date | null {
    return this.refreshedAt;
  }
}

export interface RefreshHandle {
  stop(): void;
}

/**
 * Refresh once now and then every `intervalSec`. An interval of 0 disables both.
 * The timer is unref'd so it never keeps the process alive on its own.
 */
export async function startCatalogRefresh(
  catalog: LibraryCatalog,
  intervalSec: number,
): Promise<RefreshHandle> {
  if (intervalSec <= 0) return { stop: () => {} };

  await catalog.refresh();

  let running = false;
  const timer = setInterval(() => {
    if (running) return;
    running = true;
    catalog
      .refresh()
      .catch((err: unknown) => log.error(`Library index refresh crashed: ${describeError(err)}`))
      .finally(() => {
        running = false;
      });
  }, intervalSec * 1000);
  timer.unref();

  return { stop: () => clearInterval(timer) };
}
