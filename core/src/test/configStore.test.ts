import { strict as assert } from "assert";
import { afterEach, describe, it } from "mocha";
import { mkdtemp, writeFile } from "fs/promises";
import path from "path";
import { tmpdir } from "os";
import { configStore } from "../config/configStore";
import { DEFAULT_CONFIG, createDumpConfig } from "../config/dumpConfig";
import { Base } from "../types";

async function configDir(contents?: object): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), "hexlines-store-"));
  if (contents) {
    await writeFile(path.join(dir, ".hexlines.json"), JSON.stringify(contents), "utf8");
  }
  return dir;
}

describe("configStore", () => {
  afterEach(() => {
    configStore.clear();
  });

  it("installs and resets the default configuration", () => {
    const octal = createDumpConfig({ base: Base.Oct });
    assert.equal(configStore.current(), DEFAULT_CONFIG);
    assert.equal(configStore.install(octal), DEFAULT_CONFIG);
    assert.equal(configStore.current(), octal);

    configStore.reset();
    assert.equal(configStore.current(), DEFAULT_CONFIG);
  });

  it("caches a loaded directory until it is refreshed", async () => {
    const dir = await configDir({ base: "bin" });
    const first = await configStore.load(dir);
    assert.equal(first.base, Base.Bin);

    await writeFile(path.join(dir, ".hexlines.json"), JSON.stringify({ base: "dec" }), "utf8");
    assert.equal(await configStore.load(dir + path.sep), first);
    assert.equal((await configStore.refresh(dir)).base, Base.Dec);
  });

  it("shares a load in progress", async () => {
    const dir = await configDir({ groupsPerLine: 4 });
    const [a, b] = await Promise.all([configStore.load(dir), configStore.load(dir)]);
    assert.equal(a, b);
    assert.equal(a.bytesPerLine, 4);
  });

  it("saves and serves the saved configuration", async () => {
    const dir = await configDir();
    const config = createDumpConfig({ base: Base.Dec, hideDuplicates: true });
    await configStore.save(dir, config);

    assert.equal(await configStore.load(dir), config);
    configStore.clear();
    assert.deepEqual(await configStore.load(dir), config);
  });

  it("does not cache a failed load", async () => {
    const dir = await configDir();
    await writeFile(path.join(dir, ".hexlines.json"), "not json", "utf8");
    await assert.rejects(configStore.load(dir));

    await writeFile(path.join(dir, ".hexlines.json"), "{}", "utf8");
    assert.deepEqual(await configStore.load(dir), DEFAULT_CONFIG);
  });
});
