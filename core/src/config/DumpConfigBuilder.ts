import { Base, type DumpConfig, type DumpConfigInput, Endianness, GroupSize, OffsetWidth } from "../types";
import { createDumpConfig, describeConfig } from "./dumpConfig";

/**
 * Fluent, immutable builder for {@link DumpConfig}. Every setter returns a new builder, so a
 * partially configured builder can be shared and specialised.
 *
 * ```ts
 * const config = new DumpConfigBuilder()
 *   .base(Base.Oct)
 *   .groupSize(GroupSize.Word)
 *   .groupsPerLine(4)
 *   .build();
 * ```
 */
export class DumpConfigBuilder {
  constructor(private readonly input: DumpConfigInput = {}) {}

  static from(config: DumpConfig): DumpConfigBuilder {
    return new DumpConfigBuilder({ ...config });
  }

  base(base: Base): DumpConfigBuilder {
    return this.with({ base });
  }

  endianness(endianness: Endianness): DumpConfigBuilder {
    return this.with({ endianness });
  }

  offsetWidth(offsetWidth: OffsetWidth): DumpConfigBuilder {
    return this.with({ offsetWidth });
  }

  groupSize(groupSize: GroupSize): DumpConfigBuilder {
    return this.with({ groupSize });
  }

  groupsPerLine(groupsPerLine: number): DumpConfigBuilder {
    return this.with({ groupsPerLine });
  }

  hideDuplicates(hideDuplicates: boolean): DumpConfigBuilder {
    return this.with({ hideDuplicates });
  }

  /** Sets a `#[OFFSET]`/`#[RAW]`/`#[ASCII]` layout; `null` restores the fixed layout. */
  format(format: string | null): DumpConfigBuilder {
    return this.with({ format });
  }

  build(): DumpConfig {
    return createDumpConfig(this.input);
  }

  toString(): string {
    return `DumpConfigBuilder { ${describeConfig(this.build())} }`;
  }

  private with(patch: DumpConfigInput): DumpConfigBuilder {
    return new DumpConfigBuilder({ ...this.input, ...patch });
  }
}
