export const CONFIG_FILE = ".hexlines.json";
export const DUPLICATE_MARKER = "*";
export const DEFAULT_TEMPLATE = "#[OFFSET]: #[RAW]  #[ASCII]";
export const TEMPLATE_START_MARK = "#[";
export const TEMPLATE_END_MARK = "]";
export const MAX_GROUP_BYTES = 8;
