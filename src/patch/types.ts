export interface Replacement {
  find: string;
  replace: string;
}

/**
 * A line is edited when it contains every `requires` fragment and does not
 * contain `unlessContains`. Edits run in order on the already-edited line.
 * Rules are chained: each rule is matched against the line as left by the
 * rules before it, so a comma added by one rule blocks a later rule that
 * guards on ",".
 */
export interface LineRule {
  requires: string[];
  unlessContains: string;
  edits: Replacement[];
}

export interface RegionInsertion {
  /** Only the first (leftmost) match is used; `g` and `y` flags are ignored */
  pattern: RegExp;
  insertion: string;
}

export interface PatchOutcome {
  file: string;
  /** Text differs from what was read */
  changed: boolean;
  /** Target was written back (line-scan and literal always write) */
  wrote: boolean;
  backupPath?: string;
}
