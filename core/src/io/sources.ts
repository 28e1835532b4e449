import fs from "fs";
import type { ByteSource } from "../types";

/** Reads from an in-memory byte array. */
export class BufferSource implements ByteSource {
  private position = 0;

  constructor(private readonly data: Uint8Array) {}

  read(buffer: Uint8Array): number {
    const size = Math.min(buffer.length, this.data.length - this.position);
    if (size <= 0) return 0;
    buffer.set(this.data.subarray(this.position, this.position + size));
    this.position += size;
    return size;
  }
}

/**
 * Reads from an open file descriptor. With a `start` position the file is read with positional
 * reads and the descriptor's own position is left untouched.
 */
export class FileSource implements ByteSource {
  private position: number | null;

  constructor(private readonly fd: number, start?: number) {
    this.position = start ?? null;
  }

  read(buffer: Uint8Array): number {
    if (buffer.length === 0) return 0;
    const size = fs.readSync(this.fd, buffer, 0, buffer.length, this.position);
    if (this.position !== null) this.position += size;
    return size;
  }
}

/** Stops after `limit` bytes of the wrapped source. */
export class LimitedSource implements ByteSource {
  private remaining: number;

  constructor(private readonly source: ByteSource, limit: number) {
    this.remaining = Math.max(0, limit);
  }

  read(buffer: Uint8Array): number {
    if (this.remaining === 0) return 0;
    const size = this.source.read(buffer.subarray(0, Math.min(buffer.length, this.remaining)));
    this.remaining -= size;
    return size;
  }
}

export interface StreamSlice {
  skip?: number;
  length?: number;
}

/** Drops the first `skip` bytes of a stream and ends it after `length` bytes. */
export async function* sliceStream(
  stream: AsyncIterable<Uint8Array>,
  { skip = 0, length }: StreamSlice
): AsyncGenerator<Uint8Array> {
  let toSkip = skip;
  let remaining = length ?? Number.POSITIVE_INFINITY;
  if (remaining <= 0) return;

  for await (const chunk of stream) {
    let view = chunk;
    if (toSkip > 0) {
      const dropped = Math.min(toSkip, view.length);
      toSkip -= dropped;
      view = view.subarray(dropped);
    }
    if (view.length === 0) continue;
    if (view.length > remaining) view = view.subarray(0, remaining);
    remaining -= view.length;
    yield view;
    if (remaining === 0) return;
  }
}
