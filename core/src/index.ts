// Public surface
export { Hexdump, hexdump, printHexdump, installDefaultConfig } from "./Hexdump";
export { configStore } from "./config/configStore";
export { DumpConfigBuilder } from "./config/DumpConfigBuilder";
export {
  DEFAULT_CONFIG,
  createDumpConfig,
  withOverrides,
  groupTextWidth,
  offsetTextWidth,
  rawFieldWidth,
  lineWidth,
  describeConfig,
  serializeConfig,
  normalizeConfig,
  parseBase,
  parseEndianness,
  parseOffsetWidth,
  parseGroupSize,
  configPath,
  loadDumpConfig,
  saveDumpConfig,
  ensureDefaultConfig,
} from "./config/dumpConfig";
export type { DumpConfigFile } from "./config/dumpConfig";
export { GroupEncoder, encodeGroup, asciiChar, asciiPanel } from "./format/GroupEncoder";
export { LineRenderer, renderLine } from "./format/LineRenderer";
export { parseLineTemplate, applyLineTemplate } from "./format/LineTemplate";
export { DuplicateRunDetector } from "./dump/DuplicateRunDetector";
export { DumpSession } from "./dump/DumpSession";
export { HexdumpLineIterator } from "./dump/HexdumpLineIterator";
export { streamHexdumpLines, rechunk } from "./dump/streamLines";
export { BufferSource, FileSource, LimitedSource, sliceStream } from "./io/sources";
export type { StreamSlice } from "./io/sources";
export { MemorySink, FileSink, stdoutSink, writeHexdump, pipeHexdump, writeLinesToStream } from "./io/sinks";
export { ConfigError, DumpIOError } from "./errors";
export { CONFIG_FILE, DEFAULT_TEMPLATE, DUPLICATE_MARKER } from "./const";
export { Base, Endianness, OffsetWidth, GroupSize, TemplateField } from "./types";
export type {
  ByteSink,
  ByteSource,
  DumpConfig,
  DumpConfigInput,
  EncodedGroup,
  LineDisposition,
  LineFields,
  LineTemplate,
  Offset,
  PendingLine,
} from "./types";
