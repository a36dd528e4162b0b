import fs from "node:fs";
import path from "node:path";
import type { CompileJob, FirmwareEncoding, FirmwareImage } from "../schemas/compile.schema.js";
import type { ResolvedArtifact } from "../schemas/manifest.schema.js";
import { CompileError, TimeoutError } from "../utils/errors.js";
import type { ArtifactStore } from "./artifact-store.js";
import type { BoardDefinition, BoardRegistry } from "./boards.js";
import type { BuildSlot } from "./build-slot-pool.js";
import type { Toolchain } from "./toolchain.js";
import * as log from "../utils/logger.js";

/** Checked in this order; the first one present is the job's firmware */
export const FIRMWARE_OUTPUTS: ReadonlyArray<{ file: string; encoding: FirmwareEncoding }> = [
  { file: "firmware.hex", encoding: "hex" },
  { file: "firmware.uf2", encoding: "uf2" },
  { file: "firmware.bin", encoding: "bin" },
];

export const SKETCH_PRELUDE = "#include <Arduino.h>\n";

export interface SketchCompilerOptions {
  toolchain: Toolchain;
  store: ArtifactStore;
  boards: BoardRegistry;
  jobs: number;
  timeoutMs: number;
}

export class SketchCompiler {
  constructor(private readonly opts: SketchCompilerOptions) {}

  async compile(
    job: CompileJob,
    slot: BuildSlot,
    resolved: ReadonlyMap<string, ResolvedArtifact>,
  ): Promise<FirmwareImage> {
    const board = this.opts.boards.get(job.board);
    fs.mkdirSync(slot.sourceDir, { recursive: true });
    fs.writeFileSync(path.join(slot.sourceDir, "main.cpp"), SKETCH_PRELUDE + job.sourceCode);
    fs.writeFileSync(slot.configPath, this.renderSlotConfig(slot, board, resolved));

    // Slots are reused: never pick up a previous job's image
    const outDir = path.join(slot.buildDir, board.env);
    for (const output of FIRMWARE_OUTPUTS) {
      fs.rmSync(path.join(outDir, output.file), { force: true });
    }

    const result = await this.opts.toolchain.run({
      cwd: slot.rootDir,
      environment: board.env,
      jobs: this.opts.jobs,
      timeoutMs: this.opts.timeoutMs,
      label: `sketch [${board.env}] in slot ${slot.id}`,
    });

    if (result.timedOut) {
      throw new TimeoutError(`Compile for ${board.fqbn}`, this.opts.timeoutMs);
    }
    if (result.exitCode !== 0) {
      log.warn(`Compilation failed for ${board.fqbn} (exit code ${result.exitCode})`);
      throw new CompileError(result.output, result.exitCode);
    }

    return readFirmware(outDir);
  }

  /**
   * Job-specific [env] section followed by the slot's pre-templated board sections.
   * Each library contributes its own source dir plus the flags its manifest
   * recorded for this board.
   */
  renderSlotConfig(
    slot: BuildSlot,
    board: BoardDefinition,
    resolved: ReadonlyMap<string, ResolvedArtifact>,
  ): string {
    const { store } = this.opts;
    let includes = "";
    let libs = "";
    for (const artifact of resolved.values()) {
      const srcDir = path.join(artifact.installDir, "src");
      includes += `-I'${srcDir}' `;
      libs += `\n\t\t\t${srcDir}`;
      const flags = artifact.perArchitecture[board.env];
      if (!flags) {
        log.warn(`${artifact.name}@${artifact.version} has no build for ${board.env}; compiling from source only`);
        continue;
      }
      includes += store.absolutize(flags.includeFlags);
      const dirs = store.absolutize(flags.libraryDirs).trimEnd();
      if (dirs) libs += `\n${dirs}`;
    }

    return (
      "[env]\n" +
      `build_flags = -w ${includes}`.trimEnd() +
      "\n" +
      `lib_deps =${libs}\n` +
      "\n" +
      slot.boardTemplate
    );
  }
}

/** First firmware image present in `outDir`; hex stays text, binary forms are base64 */
export function readFirmware(outDir: string): FirmwareImage {
  for (const output of FIRMWARE_OUTPUTS) {
    const file = path.join(outDir, output.file);
    if (!fs.existsSync(file)) continue;
    const firmware =
      output.encoding === "hex"
        ? fs.readFileSync(file, "utf-8")
        : fs.readFileSync(file).toString("base64");
    return { firmware, encoding: output.encoding };
  }
  throw new CompileError(
    `Toolchain reported success but produced no firmware (looked for ${FIRMWARE_OUTPUTS.map((o) => o.file).join(", ")})`,
    0,
  );
}
