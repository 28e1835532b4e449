import debug from "debug";
import { DUPLICATE_MARKER } from "../const";
import { ConfigError } from "../errors";
import { LineRenderer } from "../format/LineRenderer";
import type { DumpConfig, Offset } from "../types";
import { DuplicateRunDetector } from "./DuplicateRunDetector";

const log = debug("Hexlines:Session");

/**
 * Offset bookkeeping, duplicate detection and rendering for one dump. Both the pull-based
 * iterator and the async stream variant feed it whole lines, so they produce identical text.
 */
export class DumpSession {
  private readonly renderer: LineRenderer;
  private readonly detector: DuplicateRunDetector;
  private baseOffset: bigint;
  private consumed = 0n;
  private emitted = 0;
  private finished = false;

  constructor(readonly config: DumpConfig, baseOffset: Offset = 0n) {
    this.renderer = new LineRenderer(config);
    this.detector = new DuplicateRunDetector(config.hideDuplicates);
    this.baseOffset = BigInt(baseOffset);
  }

  setBaseOffset(offset: Offset): void {
    if (this.consumed > 0n) {
      throw new ConfigError("The base offset cannot change once a dump has started");
    }
    this.baseOffset = BigInt(offset);
  }

  get bytesConsumed(): bigint {
    return this.consumed;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * Consumes one line of at most `bytesPerLine` bytes. Returns its text, the duplicate marker, or
   * `null` when the line is hidden inside a duplicate run.
   */
  accept(bytes: Uint8Array): string | null {
    if (this.consumed === 0n) {
      log("Starting dump at offset %s, %d bytes per line", this.baseOffset.toString(16), this.config.bytesPerLine);
    }
    const offset = this.baseOffset + this.consumed;
    this.consumed += BigInt(bytes.length);

    switch (this.detector.observe(bytes, offset)) {
      case "emit":
        this.emitted++;
        return this.renderer.render(offset, bytes);
      case "marker":
        this.emitted++;
        return DUPLICATE_MARKER;
      case "suppress":
        return null;
    }
  }

  /** Signals the end of the data; returns the final line owed by a trailing duplicate run. */
  finish(): string | null {
    if (this.finished) return null;
    this.finished = true;

    const pending = this.detector.flush();
    const line = pending ? this.renderer.render(pending.offset, pending.bytes) : null;
    if (line !== null) this.emitted++;
    log("Dump finished: %s bytes, %d lines", this.consumed.toString(), this.emitted);
    return line;
  }
}
