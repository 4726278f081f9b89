// CHANGE: Central export file for all type definitions
// PURITY: CORE (re-exports only)

export type { CLIOptions, CruncherConfig, SheetSelector } from "./config.js";
export type { JSONObject, JSONPrimitive, JSONValue } from "./json.js";
export { isJSONArray, isJSONObject } from "./json.js";
export type { CellValue, RawRow } from "./sheet.js";
