import { TEMPLATE_END_MARK, TEMPLATE_START_MARK } from "../const";
import { ConfigError } from "../errors";
import { type LineFields, type LineTemplate, TemplateField } from "../types";

const FIELD_NAMES = new Set<string>(Object.values(TemplateField));

function isTemplateField(name: string): name is TemplateField {
  return FIELD_NAMES.has(name);
}

/**
 * Parses a layout such as `#[OFFSET]: #[RAW] | #[ASCII]`.
 * Text outside the `#[...]` marks is kept verbatim as separators; an opening mark that is never
 * closed ends the scan and the remainder becomes the suffix.
 */
export function parseLineTemplate(source: string): LineTemplate {
  const fields: TemplateField[] = [];
  const separators: string[] = [];
  let cursor = 0;

  while (cursor < source.length) {
    const start = source.indexOf(TEMPLATE_START_MARK, cursor);
    if (start === -1) break;
    const end = source.indexOf(TEMPLATE_END_MARK, start + TEMPLATE_START_MARK.length);
    if (end === -1) break;

    const name = source.slice(start + TEMPLATE_START_MARK.length, end);
    if (!isTemplateField(name)) {
      throw new ConfigError(`Unknown format field "${name}" in "${source}"`);
    }

    separators.push(source.slice(cursor, start));
    fields.push(name);
    cursor = end + TEMPLATE_END_MARK.length;
  }

  separators.push(source.slice(cursor));
  return { source, fields, separators };
}

export function applyLineTemplate(template: LineTemplate, values: LineFields): string {
  let line = "";
  template.fields.forEach((field, index) => {
    line += template.separators[index] ?? "";
    switch (field) {
      case TemplateField.OFFSET:
        line += values.offset;
        break;
      case TemplateField.RAW:
        line += values.raw;
        break;
      case TemplateField.ASCII:
        line += values.ascii;
        break;
    }
  });
  return line + (template.separators[template.fields.length] ?? "");
}
