/**
 * Fixed pool of reusable build workspaces, one per concurrent compile.
 *
 * A counting semaphore bounds how many slots are out at once; the free list
 * is popped synchronously right after a permit is granted, so two acquirers
 * can never be handed the same slot. Waiters are served in arrival order.
 *
 * The same semaphore gates library builds (withPermit), so at most `size`
 * toolchain processes run at once across compiles and installs.
 */

import fs from "node:fs";
import path from "node:path";
import { Semaphore } from "../utils/semaphore.js";
import { renderBoardSections, type BoardDefinition } from "./boards.js";
import type { ToolchainGate } from "./toolchain.js";
import * as log from "../utils/logger.js";

export interface BuildSlot {
  readonly id: number;
  readonly rootDir: string;
  /** Where the job's main.cpp goes */
  readonly sourceDir: string;
  /** Toolchain output (.pio/build) */
  readonly buildDir: string;
  /** platformio.ini, rewritten for every job */
  readonly configPath: string;
  /** Board environment sections written at provisioning time */
  readonly boardTemplate: string;
  busy: boolean;
}

export class BuildSlotPool implements ToolchainGate {
  private readonly semaphore: Semaphore;
  private readonly free: BuildSlot[];

  private constructor(private readonly slots: readonly BuildSlot[]) {
    this.semaphore = new Semaphore(slots.length);
    this.free = [...slots];
  }

  /**
   * Create `size` slot directories under `rootDir` (reusing existing ones) and
   * pre-template each config with every board's environment section.
   */
  static provision(rootDir: string, size: number, boards: readonly BoardDefinition[]): BuildSlotPool {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Build slot pool size must be a positive integer, got ${size}`);
    }
    const boardTemplate = renderBoardSections(boards);
    const slots: BuildSlot[] = [];
    for (let id = 0; id < size; id++) {
      const slotDir = path.join(rootDir, `slot-${id}`);
      const slot: BuildSlot = {
        id,
        rootDir: slotDir,
        sourceDir: path.join(slotDir, "src"),
        buildDir: path.join(slotDir, ".pio", "build"),
        configPath: path.join(slotDir, "platformio.ini"),
        boardTemplate,
        busy: false,
      };
      fs.mkdirSync(slot.sourceDir, { recursive: true });
      fs.writeFileSync(slot.configPath, boardTemplate);
      slots.push(slot);
    }
    log.debug(`Provisioned ${size} build slot(s) in ${rootDir}`);
    return new BuildSlotPool(slots);
  }

  get size(): number {
    return this.slots.length;
  }

  get available(): number {
    return this.free.length;
  }

  /** Jobs waiting for a slot */
  get pending(): number {
    return this.semaphore.pending;
  }

  /** Suspend until a slot is free. Aborting the signal withdraws the request. */
  async acquire(signal?: AbortSignal): Promise<BuildSlot> {
    await this.semaphore.acquire(signal);
    const slot = this.free.shift();
    if (!slot) {
      // Unreachable while permits and free slots stay in step
      this.semaphore.release();
      throw new Error("Build slot pool out of sync: permit granted with no free slot");
    }
    slot.busy = true;
    log.debug(`Build slot ${slot.id} acquired`);
    return slot;
  }

  release(slot: BuildSlot): void {
    if (!this.slots.includes(slot)) {
      throw new Error(`Build slot ${slot.id} does not belong to this pool`);
    }
    if (!slot.busy) {
      throw new Error(`Build slot ${slot.id} released while not held`);
    }
    slot.busy = false;
    this.free.push(slot);
    this.semaphore.release();
    log.debug(`Build slot ${slot.id} released`);
  }

  /**
   * Run `fn` holding a toolchain permit but no slot. A permit granted here
   * still leaves a free slot for every other permit holder.
   */
  async withPermit<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.semaphore.acquire(signal);
    try {
      return await fn();
    } finally {
      this.semaphore.release();
    }
  }

  /** Run `fn` with a slot held; the slot goes back on every exit path */
  async withSlot<T>(fn: (slot: BuildSlot) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const slot = await this.acquire(signal);
    try {
      return await fn(slot);
    } finally {
      this.release(slot);
    }
  }
}
