import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { ArtifactStore } from "../../../src/core/artifact-store.js";
import { BuildSlotPool, type BuildSlot } from "../../../src/core/build-slot-pool.js";
import { readFirmware, SketchCompiler } from "../../../src/core/sketch-compiler.js";
import type { ResolvedArtifact } from "../../../src/schemas/manifest.schema.js";
import { CompileError, TimeoutError } from "../../../src/utils/errors.js";
import { FakeToolchain, TEST_HEX, makeTmpDir, testBoards } from "../../helpers/fakes.js";

describe("SketchCompiler", () => {
  let tmpDir: string;
  let store: ArtifactStore;
  let toolchain: FakeToolchain;
  let compiler: SketchCompiler;
  let slot: BuildSlot;
  const boards = testBoards();
  const uno = boards.get("arduino:avr:uno");

  beforeEach(async () => {
    tmpDir = makeTmpDir();
    store = new ArtifactStore(path.join(tmpDir, "libraries"), { ttlMs: 60_000, maxEntries: 10 });
    toolchain = new FakeToolchain();
    compiler = new SketchCompiler({ toolchain, store, boards, jobs: 2, timeoutMs: 5000 });
    const pool = BuildSlotPool.provision(path.join(tmpDir, "slots"), 1, [uno]);
    slot = await pool.acquire();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function installed(name: string, version: string, include: string, dirs: string): ResolvedArtifact {
    store.prepare(name, version);
    return store.commit(name, version, { include: { uno: include }, dirs: { uno: dirs }, arches: ["uno"], depends: [] });
  }

  it("writes the sketch with the Arduino prelude and returns hex as text", async () => {
    const image = await compiler.compile({ sourceCode: "void loop() {}", board: "arduino:avr:uno", libraries: [] }, slot, new Map());

    assert.deepEqual(image, { firmware: TEST_HEX, encoding: "hex" });
    assert.equal(
      fs.readFileSync(path.join(slot.sourceDir, "main.cpp"), "utf-8"),
      "#include <Arduino.h>\nvoid loop() {}",
    );
    assert.deepEqual(toolchain.runs[0], {
      cwd: slot.rootDir,
      environment: "uno",
      jobs: 2,
      timeoutMs: 5000,
      label: "sketch [uno] in slot 0",
    });
  });

  it("renders the job's [env] section ahead of the board template", () => {
    const root = store.rootDir;
    const servo = installed("Servo", "1.2.1", "-I'../Dep@1.0.0/src/' ", "\t\t\t../Dep@1.0.0/src\n");

    const ini = compiler.renderSlotConfig(slot, uno, new Map([["Servo", servo]]));

    assert.equal(
      ini,
      "[env]\n" +
        `build_flags = -w -I'${root}/Servo@1.2.1/src' -I'${root}/Dep@1.0.0/src/'\n` +
        `lib_deps =\n\t\t\t${root}/Servo@1.2.1/src\n\t\t\t${root}/Dep@1.0.0/src\n` +
        "\n" +
        "[env:uno]\nplatform = atmelavr\nboard = uno\nframework = arduino\n",
    );
  });

  it("renders an empty [env] section without libraries", () => {
    assert.equal(
      compiler.renderSlotConfig(slot, uno, new Map()),
      "[env]\nbuild_flags = -w\nlib_deps =\n\n[env:uno]\nplatform = atmelavr\nboard = uno\nframework = arduino\n",
    );
  });

  it("throws CompileError carrying stdout followed by stderr", async () => {
    toolchain.behaviour = () => ({ exitCode: 1, stdout: "out\n", stderr: "err\n" });

    await assert.rejects(
      () => compiler.compile({ sourceCode: "", board: "arduino:avr:uno", libraries: [] }, slot, new Map()),
      (err: unknown) => err instanceof CompileError && err.output === "out\nerr\n" && err.exitCode === 1,
    );
  });

  it("throws TimeoutError when the toolchain hits its deadline", async () => {
    toolchain.behaviour = () => ({ exitCode: 1, timedOut: true });

    await assert.rejects(
      () => compiler.compile({ sourceCode: "", board: "arduino:avr:uno", libraries: [] }, slot, new Map()),
      { message: "Compile for arduino:avr:uno timed out after 5000ms" },
    );
  });

  it("never returns a stale image from a previous job", async () => {
    const outDir = path.join(slot.buildDir, "uno");
    fs.mkdirSync(outDir, { recursive: true });
    fs.writeFileSync(path.join(outDir, "firmware.hex"), "stale");
    toolchain.behaviour = () => ({ outputs: { "firmware.bin": "BIN" } });

    const image = await compiler.compile({ sourceCode: "", board: "arduino:avr:uno", libraries: [] }, slot, new Map());

    assert.deepEqual(image, { firmware: Buffer.from("BIN").toString("base64"), encoding: "bin" });
  });
});

describe("readFirmware", () => {
  let outDir: string;

  beforeEach(() => {
    outDir = makeTmpDir();
  });

  afterEach(() => {
    fs.rmSync(outDir, { recursive: true, force: true });
  });

  it("prefers hex, then uf2, then bin", () => {
    fs.writeFileSync(path.join(outDir, "firmware.bin"), "B");
    assert.equal(readFirmware(outDir).encoding, "bin");
    fs.writeFileSync(path.join(outDir, "firmware.uf2"), "U");
    assert.deepEqual(readFirmware(outDir), { firmware: Buffer.from("U").toString("base64"), encoding: "uf2" });
    fs.writeFileSync(path.join(outDir, "firmware.hex"), "H");
    assert.deepEqual(readFirmware(outDir), { firmware: "H", encoding: "hex" });
  });

  it("fails when the toolchain left no image", () => {
    assert.throws(() => readFirmware(outDir), (err: unknown) => err instanceof CompileError && err.exitCode === 0);
  });
});
