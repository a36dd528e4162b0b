import { BoardRegistry } from "../core/boards.js";
import type { CommandContext } from "./context.js";
import * as log from "../utils/logger.js";

export function handleBoards(ctx: CommandContext): Array<{ fqbn: string; env: string; platform: string }> {
  const boards = new BoardRegistry(ctx.config.boards).all();
  log.heading("Supported boards");
  const width = Math.max(...boards.map((b) => b.fqbn.length));
  for (const b of boards) {
    log.output(`  ${b.fqbn.padEnd(width)}  ${b.env} (${b.platform})`);
  }
  return boards.map((b) => ({ fqbn: b.fqbn, env: b.env, platform: b.platform }));
}
