/**
 * Public API surface for the firmforge library.
 * Re-exports the compile service and its components for programmatic use.
 */

// Config
export { loadConfig, resolveConfig } from "./core/config-loader.js";
export { ConfigSchema, DEFAULT_BOARDS } from "./schemas/config.schema.js";
export type { Config, BoardConfig } from "./schemas/config.schema.js";

// Service
export { CompileService, createCompileService, codeCacheKey } from "./core/compile-service.js";
export type { CompileServiceOverrides } from "./core/compile-service.js";
export { CompileRequestSchema, LibrarySpecSchema, toCompileResponse } from "./schemas/compile.schema.js";
export type {
  CompileRequest,
  CompileResponse,
  CompileJob,
  FirmwareImage,
  LibraryRequest,
} from "./schemas/compile.schema.js";

// Components
export { BoardRegistry, supportsBoard } from "./core/boards.js";
export type { BoardDefinition } from "./core/boards.js";
export { LibraryCatalog, HttpCatalogSource, buildSnapshot, startCatalogRefresh } from "./core/catalog.js";
export type { CatalogSource, CatalogSnapshot } from "./core/catalog.js";
export { resolveVersion, compareVersions, selectLatest } from "./core/version-resolver.js";
export { ArtifactStore } from "./core/artifact-store.js";
export type { ResolvedArtifact } from "./schemas/manifest.schema.js";
export { DependencyInstaller } from "./core/installer.js";
export type { InstallScope, InstalledLibraries } from "./core/installer.js";
export { BuildSlotPool } from "./core/build-slot-pool.js";
export type { BuildSlot } from "./core/build-slot-pool.js";
export { SketchCompiler } from "./core/sketch-compiler.js";
export { PlatformIOToolchain } from "./core/toolchain.js";
export type { Toolchain, ToolchainRun, ToolchainResult } from "./core/toolchain.js";
export { HttpConnectivityProbe, HttpArchiveFetcher } from "./core/network.js";
export type { ConnectivityProbe, ArchiveFetcher } from "./core/network.js";
export { attemptWithNarrowing } from "./core/retry-policy.js";

// Errors
export {
  FirmforgeError,
  NotFoundError,
  InvalidInputError,
  InstallFailureError,
  CyclicDependencyError,
  CompileError,
  TimeoutError,
  NetworkError,
  ConfigValidationError,
} from "./utils/errors.js";
