import { strict as assert } from "assert";
import { describe, it } from "mocha";
import { closeSync, openSync } from "fs";
import { mkdtemp, writeFile } from "fs/promises";
import path from "path";
import { tmpdir } from "os";
import { BufferSource, FileSource, LimitedSource, sliceStream } from "../io/sources";
import type { ByteSource } from "../types";

function drain(source: ByteSource, chunkSize = 4): number[] {
  const buffer = new Uint8Array(chunkSize);
  const out: number[] = [];
  for (let read = source.read(buffer); read > 0; read = source.read(buffer)) {
    out.push(...buffer.subarray(0, read));
  }
  return out;
}

async function* chunks(...parts: number[][]): AsyncGenerator<Uint8Array> {
  for (const part of parts) yield Uint8Array.from(part);
}

describe("BufferSource", () => {
  it("reads the array in order and then reports the end", () => {
    const source = new BufferSource(Uint8Array.from([1, 2, 3, 4, 5, 6]));
    assert.deepEqual(drain(source), [1, 2, 3, 4, 5, 6]);
    assert.equal(source.read(new Uint8Array(4)), 0);
  });
});

describe("LimitedSource", () => {
  it("stops after the limit", () => {
    const source = new LimitedSource(new BufferSource(Uint8Array.from([1, 2, 3, 4, 5, 6])), 5);
    assert.deepEqual(drain(source), [1, 2, 3, 4, 5]);
  });

  it("treats a negative limit as zero", () => {
    assert.deepEqual(drain(new LimitedSource(new BufferSource(Uint8Array.from([1])), -3)), []);
  });
});

describe("FileSource", () => {
  it("reads a file from a start position", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "hexlines-source-"));
    const file = path.join(dir, "data.bin");
    await writeFile(file, Uint8Array.from([10, 11, 12, 13, 14, 15, 16]));

    const fd = openSync(file, "r");
    try {
      assert.deepEqual(drain(new FileSource(fd, 2), 3), [12, 13, 14, 15, 16]);
      assert.deepEqual(drain(new FileSource(fd), 3), [10, 11, 12, 13, 14, 15, 16]);
    } finally {
      closeSync(fd);
    }
  });
});

describe("sliceStream", () => {
  it("skips and limits across chunk boundaries", async () => {
    const out: number[] = [];
    for await (const chunk of sliceStream(chunks([1, 2], [3, 4, 5], [6, 7, 8]), { skip: 3, length: 4 })) {
      out.push(...chunk);
    }
    assert.deepEqual(out, [4, 5, 6, 7]);
  });

  it("passes everything through without options", async () => {
    const out: number[] = [];
    for await (const chunk of sliceStream(chunks([1], [2, 3]), {})) out.push(...chunk);
    assert.deepEqual(out, [1, 2, 3]);
  });

  it("yields nothing for a zero length", async () => {
    const out: number[] = [];
    for await (const chunk of sliceStream(chunks([1, 2, 3]), { length: 0 })) out.push(...chunk);
    assert.deepEqual(out, []);
  });
});
