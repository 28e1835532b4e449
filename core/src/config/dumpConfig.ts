import fs from "fs/promises";
import upath from "upath";
import debug from "debug";
import { CONFIG_FILE } from "../const";
import { ConfigError } from "../errors";
import { parseLineTemplate } from "../format/LineTemplate";
import { Base, type DumpConfig, type DumpConfigInput, Endianness, GroupSize, OffsetWidth } from "../types";

const log = debug("Hexlines:Config");

const BASE_NAMES: Record<string, Base> = {
  bin: Base.Bin,
  binary: Base.Bin,
  oct: Base.Oct,
  octal: Base.Oct,
  dec: Base.Dec,
  decimal: Base.Dec,
  hex: Base.Hex,
  hexadecimal: Base.Hex,
};

const BASE_LABELS: Record<Base, string> = {
  [Base.Bin]: "Binary",
  [Base.Oct]: "Octal",
  [Base.Dec]: "Decimal",
  [Base.Hex]: "Hexadecimal",
};

const GROUP_LABELS: Record<GroupSize, string> = {
  [GroupSize.Byte]: "Byte (8-bit)",
  [GroupSize.Word]: "Word (16-bit)",
  [GroupSize.Dword]: "Dword (32-bit)",
  [GroupSize.Qword]: "Qword (64-bit)",
};

/** Shape of `.hexlines.json`. */
export interface DumpConfigFile {
  base: string;
  endianness: Endianness;
  offsetWidth: OffsetWidth;
  groupSize: GroupSize;
  groupsPerLine: number;
  hideDuplicates: boolean;
  format: string | null;
}

export function parseBase(value: unknown): Base | undefined {
  if (typeof value === "number") {
    return value === 2 || value === 8 || value === 10 || value === 16 ? value : undefined;
  }
  if (typeof value !== "string") return undefined;
  const key = value.trim().toLowerCase();
  if (key in BASE_NAMES) return BASE_NAMES[key];
  return /^\d+$/.test(key) ? parseBase(Number(key)) : undefined;
}

export function parseEndianness(value: unknown): Endianness | undefined {
  if (typeof value !== "string") return undefined;
  switch (value.trim().toLowerCase()) {
    case "big":
    case "be":
      return Endianness.Big;
    case "little":
    case "le":
      return Endianness.Little;
    default:
      return undefined;
  }
}

export function parseOffsetWidth(value: unknown): OffsetWidth | undefined {
  const bits = typeof value === "string" ? Number(value.trim()) : value;
  if (bits === 32) return OffsetWidth.Bits32;
  if (bits === 64) return OffsetWidth.Bits64;
  return undefined;
}

export function parseGroupSize(value: unknown): GroupSize | undefined {
  const size = typeof value === "string" ? Number(value.trim()) : value;
  switch (size) {
    case 1:
      return GroupSize.Byte;
    case 2:
      return GroupSize.Word;
    case 4:
      return GroupSize.Dword;
    case 8:
      return GroupSize.Qword;
    default:
      return undefined;
  }
}

function buildConfig(input: DumpConfigInput, fallback: DumpConfig | null): DumpConfig {
  const groupSize = parseGroupSize(input.groupSize ?? fallback?.groupSize ?? GroupSize.Byte);
  if (groupSize === undefined) {
    throw new ConfigError(`Invalid group size ${String(input.groupSize)}: expected 1, 2, 4 or 8 bytes`);
  }

  const requested = input.groupsPerLine ?? fallback?.groupsPerLine ?? 16;
  if (!Number.isSafeInteger(requested) || requested < 0) {
    throw new ConfigError(`Invalid groups per line ${requested}: expected a non-negative integer`);
  }
  const groupsPerLine = requested === 0 ? 1 : requested;

  let template = input.template !== undefined ? input.template : fallback?.template ?? null;
  if (input.format !== undefined) {
    template = input.format === null ? null : parseLineTemplate(input.format);
  }

  return Object.freeze({
    base: input.base ?? fallback?.base ?? Base.Hex,
    endianness: input.endianness ?? fallback?.endianness ?? Endianness.Little,
    offsetWidth: input.offsetWidth ?? fallback?.offsetWidth ?? OffsetWidth.Bits32,
    groupSize,
    groupsPerLine,
    bytesPerLine: groupSize * groupsPerLine,
    hideDuplicates: input.hideDuplicates ?? fallback?.hideDuplicates ?? false,
    template: template
      ? Object.freeze({
          source: template.source,
          fields: Object.freeze([...template.fields]),
          separators: Object.freeze([...template.separators]),
        })
      : null,
  });
}

export const DEFAULT_CONFIG: DumpConfig = buildConfig({}, null);

/**
 * Builds a frozen configuration, filling unset fields from `DEFAULT_CONFIG`.
 * A `groupsPerLine` of 0 is coerced to 1; `format`, when given, replaces `template`.
 */
export function createDumpConfig(input: DumpConfigInput = {}): DumpConfig {
  return buildConfig(input, DEFAULT_CONFIG);
}

export function withOverrides(config: DumpConfig, overrides: DumpConfigInput): DumpConfig {
  return buildConfig(overrides, config);
}

/** Digits needed for the largest value of a group: ceil(log_base(2^(8 * groupSize) - 1)). */
export function groupTextWidth(groupSize: GroupSize, base: Base): number {
  const max = (1n << BigInt(8 * groupSize)) - 1n;
  return max.toString(base).length;
}

export function offsetTextWidth(offsetWidth: OffsetWidth): number {
  return offsetWidth / 4;
}

/** Width of the numeral field of a full line, separators between groups included. */
export function rawFieldWidth(config: DumpConfig): number {
  return config.groupsPerLine * (groupTextWidth(config.groupSize, config.base) + 1) - 1;
}

/** Size of a formatted fixed-layout line, counting its terminator. */
export function lineWidth(config: DumpConfig): number {
  const numerals =
    offsetTextWidth(config.offsetWidth) +
    1 +
    (groupTextWidth(config.groupSize, config.base) + 1) * config.groupsPerLine;
  return numerals + 2 + config.bytesPerLine + 1;
}

export function describeConfig(config: DumpConfig): string {
  return (
    "DumpConfig { " +
    `base: ${BASE_LABELS[config.base]}, ` +
    `endianness: ${config.endianness}, ` +
    `offsetWidth: ${config.offsetWidth}-bit, ` +
    `groupSize: ${GROUP_LABELS[config.groupSize]}, ` +
    `groupsPerLine: ${config.groupsPerLine}, ` +
    `hideDuplicates: ${config.hideDuplicates}, ` +
    `format: ${config.template ? JSON.stringify(config.template.source) : "fixed"} }`
  );
}

export function serializeConfig(config: DumpConfig): DumpConfigFile {
  const baseName = Object.keys(BASE_NAMES).find((name) => name.length === 3 && BASE_NAMES[name] === config.base);
  return {
    base: baseName ?? "hex",
    endianness: config.endianness,
    offsetWidth: config.offsetWidth,
    groupSize: config.groupSize,
    groupsPerLine: config.groupsPerLine,
    hideDuplicates: config.hideDuplicates,
    format: config.template ? config.template.source : null,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

// Ill-typed entries fall back to defaults; only an unknown format field is reported.
export function normalizeConfig(raw: Record<string, unknown>): DumpConfig {
  const groupsPerLine =
    typeof raw.groupsPerLine === "number" && Number.isSafeInteger(raw.groupsPerLine) && raw.groupsPerLine >= 0
      ? raw.groupsPerLine
      : undefined;

  return createDumpConfig({
    base: parseBase(raw.base),
    endianness: parseEndianness(raw.endianness),
    offsetWidth: parseOffsetWidth(raw.offsetWidth),
    groupSize: parseGroupSize(raw.groupSize),
    groupsPerLine,
    hideDuplicates: typeof raw.hideDuplicates === "boolean" ? raw.hideDuplicates : undefined,
    format: typeof raw.format === "string" && raw.format.length > 0 ? raw.format : undefined,
  });
}

export function configPath(dir: string): string {
  return upath.join(dir, CONFIG_FILE);
}

export async function loadDumpConfig(dir: string): Promise<DumpConfig> {
  const filePath = configPath(dir);
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      log("No %s in %s, using defaults", CONFIG_FILE, dir);
      return DEFAULT_CONFIG;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (parseErr) {
    const reason = parseErr instanceof Error ? parseErr.message : String(parseErr);
    throw new ConfigError(`Invalid JSON in ${filePath}: ${reason}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Invalid configuration in ${filePath}: expected a JSON object`);
  }

  let config: DumpConfig;
  try {
    config = normalizeConfig(parsed);
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new ConfigError(`Invalid configuration in ${filePath}: ${err.message}`);
    }
    throw err;
  }
  log("Loaded %s", filePath);
  return config;
}

export async function saveDumpConfig(dir: string, config: DumpConfig): Promise<void> {
  const filePath = configPath(dir);
  await fs.writeFile(filePath, JSON.stringify(serializeConfig(config), null, 2) + "\n", "utf8");
  log("Saved %s", filePath);
}

/** Writes a default config file unless one exists. Returns true when a file was created. */
export async function ensureDefaultConfig(dir: string): Promise<boolean> {
  try {
    await fs.access(configPath(dir));
    return false;
  } catch (err) {
    if (!isErrnoException(err) || err.code !== "ENOENT") throw err;
  }
  await fs.mkdir(dir, { recursive: true });
  await saveDumpConfig(dir, DEFAULT_CONFIG);
  return true;
}
