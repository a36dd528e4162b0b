import type { LibraryRequest } from "../schemas/compile.schema.js";
import type { CatalogEntry } from "../schemas/catalog.schema.js";
import { NotFoundError } from "../utils/errors.js";
import type { LibraryCatalog } from "./catalog.js";

/**
 * Numeric [major, minor, patch] of a version string.
 * Everything but digits and dots is stripped first ("1.2.0-beta" → 1.2.0,
 * "v2.1" → 2.1.0); missing or empty components count as 0.
 */
export function versionKey(version: string): [number, number, number] {
  const parts = version.replace(/[^.0-9]/g, "").split(".");
  const num = (i: number): number => {
    const n = Number.parseInt(parts[i] ?? "", 10);
    return Number.isNaN(n) ? 0 : n;
  };
  return [num(0), num(1), num(2)];
}

/** Negative, zero or positive like Array.prototype.sort comparators */
export function compareVersions(a: string, b: string): number {
  const ka = versionKey(a);
  const kb = versionKey(b);
  for (let i = 0; i < 3; i++) {
    if (ka[i] !== kb[i]) return ka[i] - kb[i];
  }
  return 0;
}

/** Highest release; on a tie the earliest one in catalog order wins */
export function selectLatest(releases: readonly CatalogEntry[]): CatalogEntry | undefined {
  let best: CatalogEntry | undefined;
  for (const release of releases) {
    if (!best || compareVersions(release.version, best.version) > 0) best = release;
  }
  return best;
}

/**
 * Concrete version to install for a request.
 * An explicit version is returned verbatim; whether it exists is only
 * checked when the installer looks up the archive.
 */
export function resolveVersion(request: LibraryRequest, catalog: LibraryCatalog): string {
  if (request.version) return request.version;
  const latest = selectLatest(catalog.releases(request.name));
  if (!latest) throw new NotFoundError(request.name);
  return latest.version;
}
