import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { BuildSlotPool } from "../../../src/core/build-slot-pool.js";
import { makeTmpDir, testBoards } from "../../helpers/fakes.js";

describe("BuildSlotPool", () => {
  let tmpDir: string;
  const boards = testBoards().all();

  beforeEach(() => {
    tmpDir = makeTmpDir();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("provisions N slot directories with every board pre-templated", () => {
    const pool = BuildSlotPool.provision(tmpDir, 3, boards);

    assert.equal(pool.size, 3);
    assert.equal(pool.available, 3);
    for (const id of [0, 1, 2]) {
      assert.ok(fs.existsSync(path.join(tmpDir, `slot-${id}`, "src")));
      assert.equal(
        fs.readFileSync(path.join(tmpDir, `slot-${id}`, "platformio.ini"), "utf-8"),
        "[env:uno]\nplatform = atmelavr\nboard = uno\nframework = arduino\n\n" +
          "[env:pico]\nplatform = raspberrypi\nboard = pico\nframework = arduino\n",
      );
    }
  });

  it("rejects a non-positive size", () => {
    assert.throws(() => BuildSlotPool.provision(tmpDir, 0, boards), RangeError);
  });

  it("never hands the same slot to two holders", async () => {
    const pool = BuildSlotPool.provision(tmpDir, 2, boards);
    const a = await pool.acquire();
    const b = await pool.acquire();

    assert.notEqual(a.id, b.id);
    assert.ok(a.busy && b.busy);
    assert.equal(pool.available, 0);
  });

  it("makes a released slot immediately available to a pending job", async () => {
    const pool = BuildSlotPool.provision(tmpDir, 1, boards);
    const held = await pool.acquire();

    let granted = false;
    const pending = pool.acquire().then((slot) => {
      granted = true;
      return slot;
    });
    await new Promise((resolve) => setImmediate(resolve));
    assert.equal(granted, false);
    assert.equal(pool.pending, 1);

    pool.release(held);
    const next = await pending;
    assert.equal(next.id, held.id);
    assert.equal(next.busy, true);
  });

  it("serves waiters in arrival order", async () => {
    const pool = BuildSlotPool.provision(tmpDir, 1, boards);
    const held = await pool.acquire();
    const order: string[] = [];

    const first = pool.acquire().then((slot) => {
      order.push("first");
      pool.release(slot);
    });
    const second = pool.acquire().then((slot) => {
      order.push("second");
      pool.release(slot);
    });

    pool.release(held);
    await Promise.all([first, second]);
    assert.deepEqual(order, ["first", "second"]);
  });

  it("refuses to release a slot that is not held", async () => {
    const pool = BuildSlotPool.provision(tmpDir, 1, boards);
    const slot = await pool.acquire();
    pool.release(slot);

    assert.throws(() => pool.release(slot), /released while not held/);
  });

  it("refuses a slot from another pool", async () => {
    const pool = BuildSlotPool.provision(path.join(tmpDir, "a"), 1, boards);
    const other = BuildSlotPool.provision(path.join(tmpDir, "b"), 1, boards);
    const foreign = await other.acquire();

    assert.throws(() => pool.release(foreign), /does not belong to this pool/);
  });

  it("releases the slot when the job throws", async () => {
    const pool = BuildSlotPool.provision(tmpDir, 1, boards);

    await assert.rejects(
      () =>
        pool.withSlot(async () => {
          throw new Error("compile exploded");
        }),
      { message: "compile exploded" },
    );
    assert.equal(pool.available, 1);
  });

  it("withdraws a waiter whose signal aborts", async () => {
    const pool = BuildSlotPool.provision(tmpDir, 1, boards);
    const held = await pool.acquire();
    const controller = new AbortController();

    const waiting = pool.acquire(controller.signal);
    controller.abort(new Error("client went away"));

    await assert.rejects(waiting, { message: "client went away" });
    assert.equal(pool.pending, 0);
    pool.release(held);
    assert.equal(pool.available, 1);
  });
});
