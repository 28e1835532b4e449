import { offsetTextWidth, rawFieldWidth } from "../config/dumpConfig";
import { type DumpConfig, type LineFields, OffsetWidth } from "../types";
import { GroupEncoder } from "./GroupEncoder";
import { applyLineTemplate } from "./LineTemplate";

export class LineRenderer {
  private readonly encoder: GroupEncoder;
  private readonly rawWidth: number;
  private readonly offsetDigits: number;

  constructor(private readonly config: DumpConfig) {
    this.encoder = new GroupEncoder(config);
    this.rawWidth = rawFieldWidth(config);
    this.offsetDigits = offsetTextWidth(config.offsetWidth);
  }

  formatOffset(offset: bigint): string {
    return BigInt.asUintN(this.config.offsetWidth === OffsetWidth.Bits32 ? 32 : 64, offset)
      .toString(16)
      .padStart(this.offsetDigits, "0");
  }

  /**
   * Renders the three padded columns of a line. A short line keeps the numeral and ASCII
   * columns at full-line width so that it stays aligned with the lines above it.
   */
  renderFields(offset: bigint, bytes: Uint8Array): LineFields {
    const groups: string[] = [];
    let ascii = "";
    for (let start = 0; start < bytes.length; start += this.config.groupSize) {
      const group = this.encoder.encode(bytes.subarray(start, start + this.config.groupSize));
      groups.push(group.digits);
      ascii += group.ascii;
    }

    return {
      offset: this.formatOffset(offset),
      raw: groups.join(" ").padEnd(this.rawWidth, " "),
      ascii: ascii.padEnd(this.config.bytesPerLine, " "),
    };
  }

  render(offset: bigint, bytes: Uint8Array): string {
    const fields = this.renderFields(offset, bytes);
    if (this.config.template) {
      return applyLineTemplate(this.config.template, fields);
    }
    return `${fields.offset}: ${fields.raw}  ${fields.ascii}`;
  }
}

export function renderLine(config: DumpConfig, offset: bigint, bytes: Uint8Array): string {
  return new LineRenderer(config).render(offset, bytes);
}
