import type { RegionInsertion } from "./types.js";

export type RegionResult =
  | { matched: true; text: string; offset: number }
  | { matched: false; text: string };

/**
 * Insert right after the end of the first match. Matching across lines is
 * up to the pattern (use the `s` flag for dot-matches-newline).
 */
export function insertAfterRegion(text: string, { pattern, insertion }: RegionInsertion): RegionResult {
  const flags = pattern.flags.replace(/[gy]/g, "");
  const match = new RegExp(pattern.source, flags).exec(text);
  if (!match) return { matched: false, text };

  const offset = match.index + match[0].length;
  return {
    matched: true,
    text: text.slice(0, offset) + insertion + text.slice(offset),
    offset,
  };
}
