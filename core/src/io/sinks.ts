import fs from "fs";
import { DumpIOError } from "../errors";
import type { ByteSink } from "../types";

const encoder = new TextEncoder();

/** Collects everything written to it. */
export class MemorySink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];

  write(chunk: Uint8Array): boolean {
    this.chunks.push(Uint8Array.from(chunk));
    return true;
  }

  bytes(): Uint8Array {
    const total = this.chunks.reduce((sum, chunk) => sum + chunk.length, 0);
    const out = new Uint8Array(total);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  toString(): string {
    return new TextDecoder().decode(this.bytes());
  }
}

/** Writes synchronously to a file descriptor. */
export class FileSink implements ByteSink {
  constructor(private readonly fd: number) {}

  write(chunk: Uint8Array): boolean {
    let written = 0;
    try {
      while (written < chunk.length) {
        written += fs.writeSync(this.fd, chunk, written, chunk.length - written);
      }
    } catch (err) {
      throw new DumpIOError(`Write to file descriptor ${this.fd} failed`, { cause: err });
    }
    return true;
  }
}

export function stdoutSink(): ByteSink {
  return new FileSink(1);
}

function encodeLine(line: string): Uint8Array {
  return encoder.encode(line + "\n");
}

/** Writes each line plus a newline terminator. Returns the number of lines written. */
export function writeHexdump(sink: ByteSink, lines: Iterable<string>): number {
  let count = 0;
  for (const line of lines) {
    if (!sink.write(encodeLine(line))) {
      throw new DumpIOError(`Write failed after ${count} line(s)`);
    }
    count++;
  }
  return count;
}

export async function pipeHexdump(sink: ByteSink, lines: AsyncIterable<string>): Promise<number> {
  let count = 0;
  for await (const line of lines) {
    if (!sink.write(encodeLine(line))) {
      throw new DumpIOError(`Write failed after ${count} line(s)`);
    }
    count++;
  }
  return count;
}

/**
 * Writes lines to a Node writable stream. When the stream reports it is full, waits until the pending
 * write completes. A failed write, reported through the write callback or an `error` event, stops the
 * dump with a {@link DumpIOError}.
 */
export async function writeLinesToStream(
  lines: Iterable<string> | AsyncIterable<string>,
  stream: NodeJS.WritableStream
): Promise<number> {
  let failure: unknown = null;
  let errorEmitted = false;
  const fail = (err: unknown) => {
    failure ??= err;
  };
  const onError = (err: unknown) => {
    errorEmitted = true;
    fail(err);
  };
  stream.on("error", onError);

  let count = 0;
  let pending: Promise<void> = Promise.resolve();
  try {
    for await (const line of lines) {
      if (failure !== null) break;
      let accepted = true;
      pending = new Promise<void>((resolve) => {
        accepted = stream.write(line + "\n", (err) => {
          if (err) fail(err);
          resolve();
        });
      });
      count++;
      if (!accepted) await pending;
    }
    await pending;
  } finally {
    // A failed write reaches its callback before the stream emits `error`; stay subscribed until
    // the event has arrived.
    if (failure === null || errorEmitted) stream.off("error", onError);
  }

  if (failure !== null) {
    throw new DumpIOError(`Write failed after ${count} line(s)`, { cause: failure });
  }
  return count;
}
