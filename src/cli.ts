#!/usr/bin/env node

import { Command } from "commander";
import { loadConfig } from "./core/config-loader.js";
import { createCompileService, type CompileService } from "./core/compile-service.js";
import type { CommandContext } from "./commands/context.js";
import { EXIT_CODES, exitCodeFor, statusFor } from "./commands/exit-codes.js";
import { configureLogger, configureOutputMode, getOutputMode } from "./utils/logger.js";
import type { OutputMode } from "./utils/logger.js";
import { CompileError, describeError, FirmforgeError } from "./utils/errors.js";
import * as log from "./utils/logger.js";

interface OutputFlags {
  json?: boolean;
  quiet?: boolean;
}

const program = new Command();

program
  .name("firmforge")
  .description("Remote firmware compile service: library resolution, artifact cache and build slots")
  .version("0.1.0");

// firmforge compile <file>
program
  .command("compile <file>")
  .description("Compile a sketch for a board, installing the libraries it names")
  .requiredOption("-b, --board <fqbn>", "Board identifier, e.g. arduino:avr:uno")
  .option("-l, --lib <library...>", 'Libraries as "Name" or "Name@1.2.3"')
  .option("-o, --out <path>", "Where to write the firmware image")
  .option("--json", "Output a single JSON summary to stdout (suppresses all other stdout)")
  .option("--quiet", "Suppress all stdout output")
  .action(async (file: string, opts: { board: string; lib?: string[]; out?: string } & OutputFlags) => {
    const { handleCompile } = await import("./commands/compile.js");
    await runCommand("compile", opts, (ctx) => handleCompile(file, opts, ctx));
  });

// firmforge install <libraries...>
program
  .command("install <libraries...>")
  .description("Install libraries and build them for the configured boards")
  .option("-b, --board <fqbn...>", "Only build for these boards")
  .option("--json", "Output a single JSON summary to stdout")
  .action(async (libraries: string[], opts: { board?: string[] } & OutputFlags) => {
    const { handleInstall } = await import("./commands/install.js");
    await runCommand("install", opts, (ctx) => handleInstall(libraries, opts, ctx));
  });

// firmforge resolve <name>
program
  .command("resolve <library>")
  .description("Print the concrete version a library request resolves to")
  .option("--json", "Output a single JSON summary to stdout")
  .action(async (library: string, opts: OutputFlags) => {
    const { handleResolve } = await import("./commands/resolve.js");
    await runCommand("resolve", opts, (ctx) => handleResolve(library, ctx));
  });

// firmforge boards
program
  .command("boards")
  .description("List the configured boards")
  .option("--json", "Output a single JSON summary to stdout")
  .action(async (opts: OutputFlags) => {
    const { handleBoards } = await import("./commands/boards.js");
    await runCommand("boards", opts, async (ctx) => handleBoards(ctx));
  });

// firmforge catalog refresh
const catalog = program.command("catalog").description("Library index maintenance");
catalog
  .command("refresh")
  .description("Fetch the library index and report its size")
  .option("--json", "Output a single JSON summary to stdout")
  .action(async (opts: OutputFlags) => {
    const { handleCatalogRefresh } = await import("./commands/catalog.js");
    await runCommand("catalog refresh", opts, (ctx) => handleCatalogRefresh(ctx));
  });

/** Set up logging and the service, run one command, report and exit */
async function runCommand<T>(
  command: string,
  flags: OutputFlags,
  fn: (ctx: CommandContext) => Promise<T>,
): Promise<void> {
  let outMode: OutputMode = "normal";
  if (flags.json) outMode = "json";
  else if (flags.quiet) outMode = "quiet";
  configureOutputMode(outMode);

  const held: { service: CompileService | null } = { service: null };
  let exitCode: number = EXIT_CODES.success;
  let result: T | null = null;
  let failure: unknown = null;

  try {
    const config = loadConfig();
    // Disable colors when stdout is not a TTY
    configureLogger({ level: config.logging.level, color: config.logging.color && (process.stdout.isTTY ?? false) });

    const ctx: CommandContext = {
      config,
      service: () => {
        held.service ??= createCompileService(config);
        return held.service;
      },
    };
    result = await fn(ctx);
  } catch (err) {
    failure = err;
    exitCode = exitCodeFor(err);
    reportFailure(err);
  } finally {
    held.service?.stop();
  }

  outputJsonSummary(command, exitCode, result, failure);
  process.exit(exitCode);
}

function reportFailure(err: unknown): void {
  if (err instanceof CompileError) {
    log.error("Compilation failed:");
    // Toolchain diagnostics go out untouched
    process.stderr.write(err.output.endsWith("\n") ? err.output : `${err.output}\n`);
    return;
  }
  log.error(describeError(err));
}

/** Emit a JSON summary to stdout (bypasses logger quiet gate) */
function outputJsonSummary(command: string, exitCode: number, result: unknown, failure: unknown): void {
  if (getOutputMode() !== "json") return;

  const summary: Record<string, unknown> = {
    command,
    status: statusFor(exitCode),
    exit_code: exitCode,
    result,
    error: null,
  };
  if (failure !== null) {
    summary.error = {
      message: failure instanceof CompileError ? "Compilation failed" : describeError(failure),
      code: failure instanceof FirmforgeError ? failure.code : "ERROR",
      output: failure instanceof CompileError ? failure.output : undefined,
    };
  }

  process.stdout.write(JSON.stringify(summary) + "\n");
}

await program.parseAsync();
