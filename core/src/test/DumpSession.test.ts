import { strict as assert } from "assert";
import { describe, it } from "mocha";
import { createDumpConfig } from "../config/dumpConfig";
import { DumpSession } from "../dump/DumpSession";
import { ConfigError } from "../errors";

describe("DumpSession", () => {
  const config = createDumpConfig({ groupsPerLine: 4, hideDuplicates: true });

  it("advances the offset by the size of each line", () => {
    const session = new DumpSession(config, 0x100n);
    assert.equal(session.accept(Uint8Array.from([0x41, 0x42, 0x43, 0x44])), "00000100: 41 42 43 44  ABCD");
    assert.equal(session.accept(Uint8Array.from([0x45])), "00000104: 45           E   ");
    assert.equal(session.bytesConsumed, 5n);
  });

  it("counts hidden lines towards the offset", () => {
    const session = new DumpSession(config);
    const zeros = new Uint8Array(4);
    assert.equal(session.accept(zeros), "00000000: 00 00 00 00  ....");
    assert.equal(session.accept(zeros), "*");
    assert.equal(session.accept(zeros), null);
    assert.equal(session.accept(Uint8Array.from([9, 9, 9, 9])), "0000000c: 09 09 09 09  ....");
    assert.equal(session.finish(), null);
  });

  it("renders the owed line once on finish", () => {
    const session = new DumpSession(config);
    const zeros = new Uint8Array(4);
    session.accept(zeros);
    session.accept(zeros);
    session.accept(zeros);

    assert.equal(session.finish(), "00000008: 00 00 00 00  ....");
    assert.equal(session.isFinished, true);
    assert.equal(session.finish(), null);
  });

  it("accepts a new base offset only before the first line", () => {
    const session = new DumpSession(config);
    session.setBaseOffset(0x20);
    assert.equal(session.accept(Uint8Array.from([0x30])), "00000020: 30           0   ");
    assert.throws(() => session.setBaseOffset(0), ConfigError);
  });
});
