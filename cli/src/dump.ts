import { closeSync, openSync } from 'fs';
import { resolve } from 'path';
import debug from 'debug';
import {
  type ByteSource,
  FileSource,
  Hexdump,
  LimitedSource,
  configStore,
  sliceStream,
  withOverrides,
  writeLinesToStream,
} from '@hexlines/core';
import { type DumpCliOptions, planDump } from './options.js';

const log = debug('Hexlines:Cli');

export interface DumpCommandDeps {
  cwd: string;
  stdin: AsyncIterable<Uint8Array>;
  stdout: NodeJS.WritableStream;
}

/**
 * Dumps `file` (or stdin when it is missing or `-`) to `deps.stdout`.
 * Returns the number of lines written.
 */
export async function runDump(file: string | undefined, options: DumpCliOptions, deps: DumpCommandDeps): Promise<number> {
  const plan = planDump(options);
  const configDir = resolve(deps.cwd, options.config ?? '.');
  const config = withOverrides(await configStore.load(configDir), plan.overrides);
  const dumper = new Hexdump(config);
  const displayOffset = plan.offset + BigInt(plan.skip);

  if (file === undefined || file === '-') {
    log('Dumping stdin');
    const input = sliceStream(deps.stdin, { skip: plan.skip, length: plan.length });
    return writeLinesToStream(dumper.streamLines(input, displayOffset), deps.stdout);
  }

  const path = resolve(deps.cwd, file);
  log('Dumping %s', path);
  const fd = openSync(path, 'r');
  try {
    let source: ByteSource = new FileSource(fd, plan.skip > 0 ? plan.skip : undefined);
    if (plan.length !== undefined) {
      source = new LimitedSource(source, plan.length);
    }
    return await writeLinesToStream(dumper.lines(source, displayOffset), deps.stdout);
  } finally {
    closeSync(fd);
  }
}
