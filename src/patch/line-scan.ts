import { applyLiteralReplacements } from "./literal.js";
import type { LineRule } from "./types.js";

export interface LineScanResult {
  text: string;
  /** 0-based indexes of lines that were edited */
  changedLines: number[];
}

/** Splits after each "\n", so "\r\n" and a final unterminated line survive a join(""). */
export function splitLinesKeepEnds(text: string): string[] {
  if (text === "") return [];
  return text.split(/(?<=\n)/);
}

export function lineMatches(line: string, rule: LineRule): boolean {
  if (rule.unlessContains && line.includes(rule.unlessContains)) return false;
  return rule.requires.every((fragment) => line.includes(fragment));
}

export function scanLines(text: string, rules: readonly LineRule[]): LineScanResult {
  const changedLines: number[] = [];
  const lines = splitLinesKeepEnds(text).map((line, index) => {
    let current = line;
    for (const rule of rules) {
      if (lineMatches(current, rule)) {
        current = applyLiteralReplacements(current, rule.edits);
      }
    }
    if (current !== line) changedLines.push(index);
    return current;
  });
  return { text: lines.join(""), changedLines };
}
