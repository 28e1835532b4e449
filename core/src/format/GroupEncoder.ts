import { MAX_GROUP_BYTES } from "../const";
import { groupTextWidth } from "../config/dumpConfig";
import { type DumpConfig, type EncodedGroup, Endianness } from "../types";

const DOT = ".";

/** Graphic ASCII (`!` through `~`) is shown as-is; spaces and everything else become dots. */
export function asciiChar(byte: number): string {
  return byte >= 0x21 && byte <= 0x7e ? String.fromCharCode(byte) : DOT;
}

export function asciiPanel(bytes: Uint8Array): string {
  let text = "";
  for (const byte of bytes) text += asciiChar(byte);
  return text;
}

/**
 * Encodes one group of bytes as a numeral and its ASCII fragment.
 * The scratch buffer is owned by the encoder so a line renderer can reuse it for every group.
 */
export class GroupEncoder {
  private readonly scratch = new Uint8Array(MAX_GROUP_BYTES);
  private readonly view = new DataView(this.scratch.buffer);
  private readonly width: number;
  private readonly littleEndian: boolean;

  constructor(private readonly config: DumpConfig) {
    this.width = groupTextWidth(config.groupSize, config.base);
    this.littleEndian = config.endianness === Endianness.Little;
  }

  /** Accepts 1..groupSize bytes; a short slice is the final, partial group of a dump. */
  encode(bytes: Uint8Array): EncodedGroup {
    return { digits: this.digits(bytes), ascii: asciiPanel(bytes) };
  }

  digits(bytes: Uint8Array): string {
    return this.value(bytes).toString(this.config.base).padStart(this.width, "0");
  }

  value(bytes: Uint8Array): bigint {
    const group = bytes.subarray(0, MAX_GROUP_BYTES);
    this.scratch.fill(0);
    // Big-endian groups are right-aligned so the zero fill never counts as significant bytes.
    this.scratch.set(group, this.littleEndian ? 0 : MAX_GROUP_BYTES - group.length);
    return this.view.getBigUint64(0, this.littleEndian);
  }
}

export function encodeGroup(bytes: Uint8Array, config: DumpConfig): EncodedGroup {
  return new GroupEncoder(config).encode(bytes);
}
