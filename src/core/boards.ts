import type { BoardConfig } from "../schemas/config.schema.js";
import { InvalidInputError } from "../utils/errors.js";

export interface BoardDefinition extends BoardConfig {
  /** Architecture tag matched against library.properties, the middle fqbn segment */
  readonly architecture: string;
}

export class BoardRegistry {
  private readonly byFqbn: ReadonlyMap<string, BoardDefinition>;

  constructor(boards: BoardConfig[]) {
    this.byFqbn = new Map(
      boards.map((b) => [b.fqbn, Object.freeze({ ...b, architecture: b.fqbn.split(":")[1] ?? "" })]),
    );
  }

  all(): BoardDefinition[] {
    return [...this.byFqbn.values()];
  }

  /** Look up a board by fqbn; unknown boards are rejected before anything runs */
  get(fqbn: string): BoardDefinition {
    const board = this.byFqbn.get(fqbn);
    if (!board) {
      throw new InvalidInputError(
        `Unsupported board "${fqbn}". Supported: ${[...this.byFqbn.keys()].join(", ")}`,
        "board",
      );
    }
    return board;
  }
}

/** Does a library declaring `architectures` build for this board? */
export function supportsBoard(architectures: readonly string[], board: BoardDefinition): boolean {
  return architectures.includes("*") || architectures.includes(board.architecture);
}

/**
 * PlatformIO environment sections for every board.
 * Appended after the per-job [env] section in slot and library build configs.
 */
export function renderBoardSections(boards: readonly BoardDefinition[]): string {
  return boards
    .map((b) => `[env:${b.env}]\nplatform = ${b.platform}\nboard = ${b.env}\nframework = ${b.framework}\n`)
    .join("\n");
}
