import type { Config } from "../schemas/config.schema.js";
import type { CompileService } from "../core/compile-service.js";

export interface CommandContext {
  config: Config;
  /** Built on first use; commands that need the index call start() themselves */
  service(): CompileService;
}
