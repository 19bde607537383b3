/**
 * Fixed repairs for the tax calculator module: the comma-less
 * `log_event` signature and `LOG_DATA.append` list, and the missing
 * `return tax_data` at the end of `process_for_tax`.
 */

import type { LineRule, RegionInsertion, Replacement } from "./types.js";

export const LOG_EVENT_LITERAL_FIXES: readonly Replacement[] = [
  {
    find: "def log_event(event: str details: str) -> None:",
    replace: "def log_event(event: str, details: str) -> None:",
  },
  {
    find: "LOG_DATA.append([timestamp event details])",
    replace: "LOG_DATA.append([timestamp, event, details])",
  },
];

/** Same repair without the return annotation, for signatures formatted differently. */
export const LOG_EVENT_SHORT_LITERAL_FIXES: readonly Replacement[] = [
  {
    find: "def log_event(event: str details: str)",
    replace: "def log_event(event: str, details: str)",
  },
  {
    find: "LOG_DATA.append([timestamp event details])",
    replace: "LOG_DATA.append([timestamp, event, details])",
  },
];

export const LOG_EVENT_LINE_RULES: readonly LineRule[] = [
  {
    requires: ["def log_event(event: str", "details: str"],
    unlessContains: ",",
    edits: [{ find: "def log_event(event: str", replace: "def log_event(event: str," }],
  },
  {
    requires: ["LOG_DATA.append([timestamp"],
    unlessContains: ",",
    edits: [
      { find: "LOG_DATA.append([timestamp", replace: "LOG_DATA.append([timestamp," },
      { find: "timestamp, event", replace: "timestamp, event," },
    ],
  },
];

export const PROCESS_FOR_TAX_RETURN: RegionInsertion = {
  pattern: /def process_for_tax\([^)]*\).*?processed_refids\.add\(refid\)/s,
  insertion: "\n\n    # Return the tax data for further processing\n    return tax_data",
};
