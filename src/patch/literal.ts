import type { Replacement } from "./types.js";

/** Every occurrence of each `find`, in list order. */
export function applyLiteralReplacements(text: string, replacements: readonly Replacement[]): string {
  let out = text;
  for (const { find, replace } of replacements) {
    if (!find) continue;
    out = out.split(find).join(replace);
  }
  return out;
}
