import {
  ConfigError,
  type DumpConfigInput,
  parseBase,
  parseEndianness,
  parseGroupSize,
  parseOffsetWidth,
} from '@hexlines/core';

/** Raw option values as commander hands them over. */
export interface DumpCliOptions {
  base?: string;
  endian?: string;
  offsetWidth?: string;
  groupSize?: string;
  groups?: string;
  squeeze?: boolean;
  offset?: string;
  skip?: string;
  length?: string;
  format?: string;
  config?: string;
}

export interface DumpPlan {
  overrides: DumpConfigInput;
  offset: bigint;
  skip: number;
  length?: number;
}

/** Parses `0x`-prefixed hex or plain decimal. */
export function parseAddress(value: string, option: string): bigint {
  const text = value.trim().toLowerCase();
  if (/^0x[0-9a-f]+$/.test(text) || /^\d+$/.test(text)) {
    return BigInt(text);
  }
  throw new ConfigError(`Invalid ${option} "${value}": expected a decimal or 0x-prefixed hex number`);
}

export function parseCount(value: string, option: string): number {
  const count = parseAddress(value, option);
  if (count > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new ConfigError(`Invalid ${option} "${value}": too large`);
  }
  return Number(count);
}

function required<T>(parsed: T | undefined, value: string, option: string, expected: string): T {
  if (parsed === undefined) {
    throw new ConfigError(`Invalid ${option} "${value}": expected ${expected}`);
  }
  return parsed;
}

/**
 * Turns command-line options into configuration overrides. Options left out keep the value from
 * the configuration file.
 */
export function planDump(options: DumpCliOptions): DumpPlan {
  const overrides: { -readonly [K in keyof DumpConfigInput]: DumpConfigInput[K] } = {};

  if (options.base !== undefined) {
    overrides.base = required(parseBase(options.base), options.base, '--base', 'bin, oct, dec, hex, 2, 8, 10 or 16');
  }
  if (options.endian !== undefined) {
    overrides.endianness = required(parseEndianness(options.endian), options.endian, '--endian', 'little or big');
  }
  if (options.offsetWidth !== undefined) {
    overrides.offsetWidth = required(parseOffsetWidth(options.offsetWidth), options.offsetWidth, '--offset-width', '32 or 64');
  }
  if (options.groupSize !== undefined) {
    overrides.groupSize = required(parseGroupSize(options.groupSize), options.groupSize, '--group-size', '1, 2, 4 or 8');
  }
  if (options.groups !== undefined) {
    overrides.groupsPerLine = parseCount(options.groups, '--groups');
  }
  if (options.squeeze) {
    overrides.hideDuplicates = true;
  }
  if (options.format !== undefined) {
    overrides.format = options.format;
  }

  return {
    overrides,
    offset: options.offset !== undefined ? parseAddress(options.offset, '--offset') : 0n,
    skip: options.skip !== undefined ? parseCount(options.skip, '--skip') : 0,
    length: options.length !== undefined ? parseCount(options.length, '--length') : undefined,
  };
}
