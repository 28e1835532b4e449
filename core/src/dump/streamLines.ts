import type { DumpConfig, Offset } from "../types";
import { DumpSession } from "./DumpSession";

/**
 * Regroups arbitrarily sized chunks (as delivered by a readable stream) into whole lines of
 * `lineSize` bytes. Only the last yielded line can be shorter. The yielded array is reused between
 * lines; copy it to keep it.
 */
export async function* rechunk(stream: AsyncIterable<Uint8Array>, lineSize: number): AsyncGenerator<Uint8Array> {
  const line = new Uint8Array(lineSize);
  let filled = 0;
  for await (const chunk of stream) {
    let cursor = 0;
    while (cursor < chunk.length) {
      const take = Math.min(lineSize - filled, chunk.length - cursor);
      line.set(chunk.subarray(cursor, cursor + take), filled);
      filled += take;
      cursor += take;
      if (filled === lineSize) {
        yield line;
        filled = 0;
      }
    }
  }
  if (filled > 0) yield line.subarray(0, filled);
}

/** Async counterpart of {@link HexdumpLineIterator} for Node streams and other async byte sequences. */
export async function* streamHexdumpLines(
  stream: AsyncIterable<Uint8Array>,
  config: DumpConfig,
  baseOffset: Offset = 0n
): AsyncGenerator<string> {
  const session = new DumpSession(config, baseOffset);
  for await (const bytes of rechunk(stream, config.bytesPerLine)) {
    const line = session.accept(bytes);
    if (line !== null) yield line;
  }
  const last = session.finish();
  if (last !== null) yield last;
}
