import type { CommandContext } from "./context.js";
import * as log from "../utils/logger.js";

export async function handleResolve(
  spec: string,
  ctx: CommandContext,
): Promise<{ name: string; version: string }> {
  const service = ctx.service();
  await service.catalog.refresh();
  const version = service.resolve(spec);
  const at = spec.indexOf("@");
  const name = (at === -1 ? spec : spec.slice(0, at)).trim();
  log.output(`${name}@${version}`);
  return { name, version };
}
