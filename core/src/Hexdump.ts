import debug from "debug";
import { configStore } from "./config/configStore";
import { describeConfig } from "./config/dumpConfig";
import { HexdumpLineIterator } from "./dump/HexdumpLineIterator";
import { streamHexdumpLines } from "./dump/streamLines";
import { BufferSource } from "./io/sources";
import { pipeHexdump, stdoutSink, writeHexdump } from "./io/sinks";
import type { ByteSink, ByteSource, DumpConfig, Offset } from "./types";

const log = debug("Hexlines");

function joinLines(lines: Iterable<string>): string {
  let out = "";
  for (const line of lines) out += line + "\n";
  return out;
}

/** Formats buffers, byte sources and streams with one fixed configuration. */
export class Hexdump {
  readonly config: DumpConfig;

  constructor(config: DumpConfig = configStore.current()) {
    this.config = config;
  }

  /** Lazily formatted lines of `source`, without terminators. */
  lines(source: ByteSource, offset: Offset = 0n): HexdumpLineIterator {
    return new HexdumpLineIterator(source, this.config, offset);
  }

  linesOf(bytes: Uint8Array, offset: Offset = 0n): HexdumpLineIterator {
    return this.lines(new BufferSource(bytes), offset);
  }

  /** The whole dump as text, every line terminated by `\n`. Empty input gives `""`. */
  dumpBytes(bytes: Uint8Array, offset: Offset = 0n): string {
    return joinLines(this.linesOf(bytes, offset));
  }

  dumpSource(source: ByteSource, offset: Offset = 0n): string {
    return joinLines(this.lines(source, offset));
  }

  dumpTo(sink: ByteSink, source: ByteSource, offset: Offset = 0n): number {
    const count = writeHexdump(sink, this.lines(source, offset));
    log("Wrote %d line(s)", count);
    return count;
  }

  streamLines(stream: AsyncIterable<Uint8Array>, offset: Offset = 0n): AsyncGenerator<string> {
    return streamHexdumpLines(stream, this.config, offset);
  }

  async dumpStream(stream: AsyncIterable<Uint8Array>, offset: Offset = 0n): Promise<string> {
    let out = "";
    for await (const line of this.streamLines(stream, offset)) out += line + "\n";
    return out;
  }

  async pipeStream(sink: ByteSink, stream: AsyncIterable<Uint8Array>, offset: Offset = 0n): Promise<number> {
    const count = await pipeHexdump(sink, this.streamLines(stream, offset));
    log("Piped %d line(s)", count);
    return count;
  }

  toString(): string {
    return `Hexdump { ${describeConfig(this.config)} }`;
  }
}

/** Formats `bytes` with the installed default configuration. */
export function hexdump(bytes: Uint8Array, offset: Offset = 0n): string {
  return new Hexdump(configStore.current()).dumpBytes(bytes, offset);
}

/** Writes the dump of `bytes` to stdout using the installed default configuration. */
export function printHexdump(bytes: Uint8Array, offset: Offset = 0n): void {
  new Hexdump(configStore.current()).dumpTo(stdoutSink(), new BufferSource(bytes), offset);
}

/** Replaces the process-wide default configuration; returns the one it replaces. */
export function installDefaultConfig(config: DumpConfig): DumpConfig {
  return configStore.install(config);
}
