#!/usr/bin/env node
import { Command } from 'commander';
import { resolve } from 'path';
import { configPath, configStore, describeConfig, ensureDefaultConfig } from '@hexlines/core';
import type { DumpCliOptions } from './options.js';
import { runDump } from './dump.js';

function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`❌ ${message}`);
  process.exit(1);
}

const program = new Command();

program
  .name('hexlines')
  .description('Hexdump files or stdin with configurable grouping, base and endianness')
  .version('0.1.0')
  .argument('[file]', 'File to dump; stdin when omitted or "-"')
  .option('-b, --base <base>', 'Numeral base: bin, oct, dec, hex (or 2, 8, 10, 16)')
  .option('-e, --endian <endianness>', 'Byte order inside a group: little or big')
  .option('-w, --offset-width <bits>', 'Offset column width: 32 or 64')
  .option('-g, --group-size <bytes>', 'Bytes per group: 1, 2, 4 or 8')
  .option('-n, --groups <count>', 'Groups per line')
  .option('-s, --squeeze', 'Collapse runs of identical lines into "*"')
  .option('-o, --offset <address>', 'Address shown for the first byte (decimal or 0x hex)')
  .option('-k, --skip <bytes>', 'Skip bytes at the start of the input')
  .option('-l, --length <bytes>', 'Stop after this many bytes')
  .option('-f, --format <template>', 'Line layout using #[OFFSET], #[RAW] and #[ASCII]')
  .option('-c, --config <dir>', 'Directory holding .hexlines.json', '.')
  .action(async (file: string | undefined, options: DumpCliOptions) => {
    try {
      await runDump(file, options, {
        cwd: process.cwd(),
        stdin: process.stdin,
        stdout: process.stdout,
      });
    } catch (error) {
      fail(error);
    }
  });

const configCommand = program
  .command('config')
  .description('Manage the .hexlines.json configuration file');

configCommand
  .command('init')
  .description('Write a default .hexlines.json unless one exists')
  .argument('[dir]', 'Directory', '.')
  .action(async (dir: string) => {
    try {
      const target = resolve(dir);
      const created = await ensureDefaultConfig(target);
      console.log(created ? `Created ${configPath(target)}` : `${configPath(target)} already exists`);
    } catch (error) {
      fail(error);
    }
  });

configCommand
  .command('show')
  .description('Print the configuration resolved from .hexlines.json')
  .argument('[dir]', 'Directory', '.')
  .action(async (dir: string) => {
    try {
      const config = await configStore.load(resolve(dir));
      console.log(describeConfig(config));
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
