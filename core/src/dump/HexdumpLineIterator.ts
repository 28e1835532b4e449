import debug from "debug";
import type { ByteSource, DumpConfig, Offset } from "../types";
import { DumpSession } from "./DumpSession";

const log = debug("Hexlines:Iterator");

/**
 * Lazy, single-pass sequence of formatted lines pulled from a {@link ByteSource}.
 * Lines are computed only when requested; hidden duplicate lines are skipped without returning
 * to the caller. Restarting needs a fresh source and a fresh iterator.
 */
export class HexdumpLineIterator implements IterableIterator<string> {
  private readonly session: DumpSession;
  private readonly buffer: Uint8Array;
  private exhausted = false;
  private done = false;

  constructor(private readonly source: ByteSource, config: DumpConfig, baseOffset: Offset = 0n) {
    this.session = new DumpSession(config, baseOffset);
    this.buffer = new Uint8Array(config.bytesPerLine);
  }

  /** Sets the address shown for the first byte. Only valid before the first line is read. */
  offset(baseOffset: Offset): this {
    this.session.setBaseOffset(baseOffset);
    return this;
  }

  next(): IteratorResult<string, undefined> {
    while (!this.done) {
      let size: number;
      try {
        size = this.fill();
      } catch (err) {
        // A partly filled line cannot be resumed without losing its bytes.
        this.done = true;
        log("Read failed after %s bytes", this.session.bytesConsumed.toString());
        throw err;
      }
      if (size === 0) {
        this.done = true;
        const last = this.session.finish();
        if (last !== null) return { done: false, value: last };
        break;
      }
      const line = this.session.accept(this.buffer.subarray(0, size));
      if (line !== null) return { done: false, value: line };
    }
    return { done: true, value: undefined };
  }

  return(): IteratorResult<string, undefined> {
    if (!this.done) log("Iteration stopped after %s bytes", this.session.bytesConsumed.toString());
    this.done = true;
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }

  // Sources may return fewer bytes than asked for before the end; keep reading until the line is
  // full so only the final line of a dump can be short.
  private fill(): number {
    let size = 0;
    while (size < this.buffer.length && !this.exhausted) {
      const read = this.source.read(this.buffer.subarray(size));
      if (read <= 0) {
        this.exhausted = true;
        break;
      }
      size += read;
    }
    return size;
  }
}
