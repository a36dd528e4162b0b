import { z } from "zod";

/**
 * On-disk record of one installed library version (manifest.json).
 * Keys of `include` and `dirs` are board env names; `arches` lists the
 * envs the library was built for successfully. `depends` holds the
 * "name@version" of the direct dependencies it was built against.
 */
export const ManifestSchema = z.object({
  include: z.record(z.string()).default({}),
  dirs: z.record(z.string()).default({}),
  arches: z.array(z.string()).default([]),
  depends: z.array(z.string()).default([]),
});

export type Manifest = z.infer<typeof ManifestSchema>;

export interface ArchitectureFlags {
  /** Compiler flags (-I/-L/-l) a dependent needs for this library's own dependencies */
  readonly includeFlags: string;
  /** Extra lib_deps entries, newline-separated, possibly "../"-relative to the cache root */
  readonly libraryDirs: string;
}

export interface ResolvedArtifact {
  readonly name: string;
  readonly version: string;
  readonly installDir: string;
  /** As declared in library.properties ("*" means universal) */
  readonly declaredArchitectures: readonly string[];
  /** "name@version" of direct dependencies */
  readonly dependencies: readonly string[];
  readonly perArchitecture: Readonly<Record<string, ArchitectureFlags>>;
}

export function emptyManifest(): Manifest {
  return { include: {}, dirs: {}, arches: [], depends: [] };
}
