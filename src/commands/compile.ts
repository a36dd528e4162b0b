import fs from "node:fs";
import path from "node:path";
import { withSpinner } from "../utils/ui.js";
import type { CommandContext } from "./context.js";
import * as log from "../utils/logger.js";

export interface CompileCommandOptions {
  board: string;
  lib?: string[];
  out?: string;
}

export interface CompileCommandResult {
  board: string;
  format: "hex" | "binary";
  out: string;
  bytes: number;
}

/** Default output next to the sketch: blink.ino -> blink.hex / blink.bin */
export function defaultOutputPath(file: string, format: CompileCommandResult["format"]): string {
  const parsed = path.parse(file);
  return path.join(parsed.dir, `${parsed.name}.${format === "hex" ? "hex" : "bin"}`);
}

export async function handleCompile(
  file: string,
  opts: CompileCommandOptions,
  ctx: CommandContext,
): Promise<CompileCommandResult> {
  const sourceCode = fs.readFileSync(file, "utf-8");
  const service = ctx.service();
  await service.catalog.refresh();

  const response = await withSpinner(`Compiling ${path.basename(file)} for ${opts.board}...`, () =>
    service.handle({ sourceCode, board: opts.board, libraries: opts.lib ?? [] }),
  );

  const format = "hex" in response ? "hex" : "binary";
  const data = "hex" in response ? Buffer.from(response.hex, "utf-8") : Buffer.from(response.sketch, "base64");
  const out = opts.out ?? defaultOutputPath(file, format);
  fs.writeFileSync(out, data);

  log.success(`Firmware written to ${out} (${data.length} bytes)`);
  return { board: opts.board, format, out, bytes: data.length };
}
