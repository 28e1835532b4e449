import { strict as assert } from "assert";
import { describe, it } from "mocha";
import { createDumpConfig } from "../config/dumpConfig";
import { GroupEncoder, asciiChar, asciiPanel, encodeGroup } from "../format/GroupEncoder";
import { Base, Endianness, GroupSize } from "../types";

const bytes = (...values: number[]) => Uint8Array.from(values);

describe("asciiChar", () => {
  it("shows graphic characters and hides the rest", () => {
    assert.equal(asciiChar(0x41), "A");
    assert.equal(asciiChar(0x21), "!");
    assert.equal(asciiChar(0x7e), "~");
    assert.equal(asciiChar(0x20), ".");
    assert.equal(asciiChar(0x7f), ".");
    assert.equal(asciiChar(0x00), ".");
    assert.equal(asciiChar(0xff), ".");
  });

  it("builds a panel for a run of bytes", () => {
    assert.equal(asciiPanel(bytes(0x48, 0x69, 0x20, 0x0a)), "Hi..");
  });
});

describe("GroupEncoder", () => {
  it("pads single bytes to the width of the base", () => {
    assert.equal(encodeGroup(bytes(0x0a), createDumpConfig()).digits, "0a");
    assert.equal(encodeGroup(bytes(7), createDumpConfig({ base: Base.Dec })).digits, "007");
    assert.equal(encodeGroup(bytes(8), createDumpConfig({ base: Base.Oct })).digits, "010");
    assert.equal(encodeGroup(bytes(5), createDumpConfig({ base: Base.Bin })).digits, "00000101");
  });

  it("reads groups in the configured byte order", () => {
    const group = bytes(0x00, 0x01, 0x02, 0x03);
    const little = new GroupEncoder(createDumpConfig({ groupSize: GroupSize.Dword }));
    const big = new GroupEncoder(
      createDumpConfig({ groupSize: GroupSize.Dword, endianness: Endianness.Big })
    );

    assert.equal(little.digits(group), "03020100");
    assert.equal(big.digits(group), "00010203");
  });

  it("renders full-width 64-bit values", () => {
    const encoder = new GroupEncoder(createDumpConfig({ groupSize: GroupSize.Qword, base: Base.Dec }));
    assert.equal(encoder.digits(new Uint8Array(8).fill(0xff)), "18446744073709551615");
    assert.equal(encoder.value(bytes(1)), 1n);
  });

  it("right-aligns a short big-endian group", () => {
    const config = createDumpConfig({ groupSize: GroupSize.Word, endianness: Endianness.Big });
    assert.deepEqual(encodeGroup(bytes(0x41), config), { digits: "0041", ascii: "A" });
  });

  it("keeps the low bytes of a short little-endian group", () => {
    const config = createDumpConfig({ groupSize: GroupSize.Dword });
    assert.equal(encodeGroup(bytes(0x34, 0x12), config).digits, "00001234");
  });

  it("does not carry bytes over from a previous group", () => {
    const encoder = new GroupEncoder(createDumpConfig({ groupSize: GroupSize.Dword, endianness: Endianness.Big }));
    encoder.encode(bytes(0xff, 0xff, 0xff, 0xff));
    assert.equal(encoder.digits(bytes(0x01)), "00000001");
  });

  it("formats octal dwords", () => {
    const encoder = new GroupEncoder(createDumpConfig({ groupSize: GroupSize.Dword, base: Base.Oct }));
    assert.equal(encoder.digits(bytes(0, 0, 0, 0)), "00000000000");
    assert.equal(encoder.digits(bytes(0, 1, 2, 3)), "00300400400");
  });
});
