import { z } from "zod";

/** One release as published in the library index (unknown keys are dropped) */
export const IndexReleaseSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  url: z.string().url(),
  archiveFileName: z.string().min(1),
  dependencies: z.array(z.object({ name: z.string() })).default([]),
  architectures: z.array(z.string()).default(["*"]),
});

export const LibraryIndexSchema = z.object({
  libraries: z.array(z.unknown()),
});

export type IndexRelease = z.infer<typeof IndexReleaseSchema>;

export interface CatalogEntry {
  readonly name: string;
  readonly version: string;
  readonly downloadUrl: string;
  /** Archive file name without ".zip"; every entry in the zip lives under this folder */
  readonly archiveBaseName: string;
  readonly dependsOn: readonly string[];
  readonly supportedArchitectures: readonly string[];
}

export function toCatalogEntry(release: IndexRelease): CatalogEntry {
  return Object.freeze({
    name: release.name,
    version: release.version,
    downloadUrl: release.url,
    archiveBaseName: release.archiveFileName.replace(/\.zip$/, ""),
    dependsOn: Object.freeze(release.dependencies.map((d) => d.name)),
    supportedArchitectures: Object.freeze([...release.architectures]),
  });
}
