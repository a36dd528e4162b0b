import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { archiveName, ArtifactStore, libraryStem } from "../../../src/core/artifact-store.js";
import { makeTmpDir } from "../../helpers/fakes.js";

describe("ArtifactStore", () => {
  let tmpDir: string;
  let store: ArtifactStore;

  beforeEach(() => {
    tmpDir = makeTmpDir();
    store = new ArtifactStore(tmpDir, { ttlMs: 60_000, maxEntries: 10 });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("knows nothing until a manifest is committed", () => {
    store.prepare("Servo", "1.2.1");
    assert.equal(store.lookup("Servo", "1.2.1"), undefined);
  });

  it("builds the artifact from the manifest and library.properties", () => {
    store.prepare("Servo", "1.2.1");
    store.writeProperties("Servo", "1.2.1", "name=Servo\narchitectures=avr\n");

    const artifact = store.commit("Servo", "1.2.1", {
      include: { uno: "-I'../LibA@1.0.0/src/' " },
      dirs: { uno: "\t\t\t../LibA@1.0.0/src\n" },
      arches: ["uno"],
      depends: ["LibA@1.0.0"],
    });

    assert.deepEqual(artifact, {
      name: "Servo",
      version: "1.2.1",
      installDir: path.join(tmpDir, "Servo@1.2.1"),
      declaredArchitectures: ["avr"],
      dependencies: ["LibA@1.0.0"],
      perArchitecture: {
        uno: { includeFlags: "-I'../LibA@1.0.0/src/' ", libraryDirs: "\t\t\t../LibA@1.0.0/src\n" },
      },
    });
    assert.ok(Object.isFrozen(artifact));
    assert.equal(store.lookup("Servo", "1.2.1"), artifact);
  });

  it("finds committed artifacts from disk after a restart", () => {
    store.prepare("Servo", "1.2.1");
    store.commit("Servo", "1.2.1", { include: {}, dirs: {}, arches: [], depends: [] });

    const restarted = new ArtifactStore(tmpDir, { ttlMs: 60_000, maxEntries: 10 });
    const artifact = restarted.lookup("Servo", "1.2.1");

    assert.equal(artifact?.version, "1.2.1");
    assert.deepEqual(artifact?.declaredArchitectures, ["*"]);
    assert.deepEqual(fs.readdirSync(path.join(tmpDir, "Servo@1.2.1")).sort(), ["manifest.json", "src"]);
  });

  it("resolves ../ references against the cache root", () => {
    assert.equal(
      store.absolutize("-I'../LibA@1.0.0/src/' -L'../LibA@1.0.0/'"),
      `-I'${tmpDir}/LibA@1.0.0/src/' -L'${tmpDir}/LibA@1.0.0/'`,
    );
  });

  it("names archives per env with spaces made linker-safe", () => {
    assert.equal(libraryStem("Adafruit GFX Library"), "Adafruit-GFX-Library");
    assert.equal(archiveName("Adafruit GFX Library", "uno"), "Adafruit-GFX-Library-uno");
    assert.equal(
      store.archivePath("Adafruit GFX Library", "1.0.0", "uno"),
      path.join(tmpDir, "Adafruit GFX Library@1.0.0", "libAdafruit-GFX-Library-uno.a"),
    );
  });
});
