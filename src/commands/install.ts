import { withSpinner } from "../utils/ui.js";
import type { CommandContext } from "./context.js";
import * as log from "../utils/logger.js";

export interface InstallCommandOptions {
  board?: string[];
}

export interface InstalledLibrarySummary {
  name: string;
  version: string;
  boards: string[];
}

export async function handleInstall(
  libraries: string[],
  opts: InstallCommandOptions,
  ctx: CommandContext,
): Promise<InstalledLibrarySummary[]> {
  const service = ctx.service();
  await service.catalog.refresh();

  const installed = await withSpinner(`Installing ${libraries.join(", ")}...`, () =>
    service.install(libraries, opts.board ?? []),
  );

  const summary = [...installed.values()].map((a) => ({
    name: a.name,
    version: a.version,
    boards: Object.keys(a.perArchitecture),
  }));
  for (const lib of summary) {
    log.success(`${lib.name}@${lib.version}: ${lib.boards.length > 0 ? lib.boards.join(", ") : "no boards built"}`);
  }
  if (summary.length < libraries.length) {
    log.warn(`${libraries.length - summary.length} librar${libraries.length - summary.length === 1 ? "y was" : "ies were"} not installed`);
  }
  return summary;
}
