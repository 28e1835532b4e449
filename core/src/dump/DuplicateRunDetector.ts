import type { LineDisposition, PendingLine } from "../types";

function sameBytes(left: Uint8Array, right: Uint8Array): boolean {
  if (left.length !== right.length) return false;
  for (let i = 0; i < left.length; i++) {
    if (left[i] !== right[i]) return false;
  }
  return true;
}

/**
 * Decides, line by line, whether a run of identical lines is shown, collapsed into a single
 * marker, or skipped. The first repeat of a line becomes the marker and the following repeats are
 * suppressed. When the data ends inside such a run, {@link flush} hands back the last consumed line
 * so the dump still finishes on a concrete offset.
 */
export class DuplicateRunDetector {
  private previous: Uint8Array | null = null;
  private markerShown = false;
  private pending: PendingLine | null = null;

  constructor(private readonly enabled: boolean) {}

  observe(bytes: Uint8Array, offset: bigint): LineDisposition {
    if (!this.enabled) return "emit";

    if (this.previous === null || !sameBytes(bytes, this.previous)) {
      // Copy: the caller reuses its read buffer for the next line.
      this.previous = Uint8Array.from(bytes);
      this.markerShown = false;
      this.pending = null;
      return "emit";
    }

    this.pending = { offset, bytes: this.previous };
    if (this.markerShown) return "suppress";
    this.markerShown = true;
    return "marker";
  }

  /** Ends the current dump: returns the line still owed to the output, if any, and resets. */
  flush(): PendingLine | null {
    const pending = this.pending;
    this.reset();
    return pending;
  }

  reset(): void {
    this.previous = null;
    this.markerShown = false;
    this.pending = null;
  }
}
