import { NetworkError } from "../utils/errors.js";
import { withSpinner } from "../utils/ui.js";
import type { CommandContext } from "./context.js";
import * as log from "../utils/logger.js";

export async function handleCatalogRefresh(
  ctx: CommandContext,
): Promise<{ libraries: number; releases: number }> {
  const { catalog } = ctx.service();
  const refreshed = await withSpinner("Fetching library index...", () => catalog.refresh());
  if (!refreshed) {
    throw new NetworkError("Library index could not be refreshed", undefined, "library index");
  }

  let releases = 0;
  for (const entries of catalog.current().values()) releases += entries.length;
  log.success(`${catalog.size} libraries, ${releases} releases`);
  return { libraries: catalog.size, releases };
}
