export enum Base {
  Bin = 2,
  Oct = 8,
  Dec = 10,
  Hex = 16,
}

export enum Endianness {
  Big = "big",
  Little = "little",
}

export enum OffsetWidth {
  Bits32 = 32,
  Bits64 = 64,
}

/** Number of bytes rendered as one numeral. */
export enum GroupSize {
  Byte = 1,
  Word = 2,
  Dword = 4,
  Qword = 8,
}

export enum TemplateField {
  OFFSET = "OFFSET",
  RAW = "RAW",
  ASCII = "ASCII",
}

/**
 * Parsed `#[FIELD]` layout. `separators` always holds one more entry than `fields`:
 * the first is the prefix and the last the suffix.
 */
export interface LineTemplate {
  readonly source: string;
  readonly fields: readonly TemplateField[];
  readonly separators: readonly string[];
}

export interface DumpConfig {
  readonly base: Base;
  readonly endianness: Endianness;
  readonly offsetWidth: OffsetWidth;
  readonly groupSize: GroupSize;
  readonly groupsPerLine: number;
  readonly bytesPerLine: number;
  readonly hideDuplicates: boolean;
  readonly template: LineTemplate | null;
}

export type DumpConfigInput = Partial<Omit<DumpConfig, "bytesPerLine">> & {
  format?: string | null;
};

export interface EncodedGroup {
  digits: string;
  ascii: string;
}

export interface LineFields {
  offset: string;
  raw: string;
  ascii: string;
}

export type LineDisposition = "emit" | "marker" | "suppress";

export interface PendingLine {
  offset: bigint;
  bytes: Uint8Array;
}

/** Pull-based byte source. A return value of 0 means the data is exhausted. */
export interface ByteSource {
  read(buffer: Uint8Array): number;
}

/** Byte destination. Returning `false` reports a failed write. */
export interface ByteSink {
  write(chunk: Uint8Array): boolean;
}

export type Offset = number | bigint;
