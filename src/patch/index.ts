/**
 * Patch commands: read the target, transform, write back.
 */

import { applyLiteralReplacements } from "./literal.js";
import { scanLines } from "./line-scan.js";
import { insertAfterRegion } from "./region.js";
import { readTextFile, writeTextFile, type WriteOptions } from "./text-file.js";
import {
  LOG_EVENT_LINE_RULES,
  LOG_EVENT_LITERAL_FIXES,
  LOG_EVENT_SHORT_LITERAL_FIXES,
  PROCESS_FOR_TAX_RETURN,
} from "./fixes.js";
import type { LineRule, PatchOutcome, RegionInsertion, Replacement } from "./types.js";
import type { PatchStrategy } from "../config/schema.js";
import { emit, type MaintIO } from "../utils/io.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("patch");

export interface PatchFileOptions extends WriteOptions {
  file: string;
}

export async function patchLiteral(
  opts: PatchFileOptions & { replacements: readonly Replacement[] },
): Promise<PatchOutcome> {
  const before = await readTextFile(opts.file);
  const after = applyLiteralReplacements(before, opts.replacements);
  const { backupPath } = await writeTextFile(opts.file, after, opts);
  return { file: opts.file, changed: after !== before, wrote: true, backupPath };
}

export async function patchLineScan(
  opts: PatchFileOptions & { rules: readonly LineRule[] },
): Promise<PatchOutcome> {
  const before = await readTextFile(opts.file);
  const { text, changedLines } = scanLines(before, opts.rules);
  log.debug(`Line scan edited ${changedLines.length} line(s) in ${opts.file}`);
  const { backupPath } = await writeTextFile(opts.file, text, opts);
  return { file: opts.file, changed: changedLines.length > 0, wrote: true, backupPath };
}

/** Writes only when the region is found. */
export async function patchRegion(
  opts: PatchFileOptions & { region: RegionInsertion },
): Promise<PatchOutcome> {
  const before = await readTextFile(opts.file);
  const result = insertAfterRegion(before, opts.region);
  if (!result.matched) {
    return { file: opts.file, changed: false, wrote: false };
  }
  log.debug(`Region ends at offset ${result.offset} in ${opts.file}`);
  const { backupPath } = await writeTextFile(opts.file, result.text, opts);
  return { file: opts.file, changed: true, wrote: true, backupPath };
}

export interface FixParamsOptions extends PatchFileOptions {
  strategy: PatchStrategy;
  /** Literal strategy only: match the signature without its return annotation */
  short?: boolean;
  io: MaintIO;
}

export async function runFixParams(opts: FixParamsOptions): Promise<PatchOutcome> {
  const { io, strategy, ...fileOpts } = opts;
  let outcome: PatchOutcome;
  if (strategy === "literal") {
    outcome = await patchLiteral({
      ...fileOpts,
      replacements: opts.short ? LOG_EVENT_SHORT_LITERAL_FIXES : LOG_EVENT_LITERAL_FIXES,
    });
    reportBackup(io, outcome);
    emit(io, "success", "Direct string replacements completed");
  } else {
    outcome = await patchLineScan({ ...fileOpts, rules: LOG_EVENT_LINE_RULES });
    reportBackup(io, outcome);
    emit(io, "success", `Function definition fixed in ${outcome.file}`);
  }
  return outcome;
}

export interface AddReturnOptions extends PatchFileOptions {
  io: MaintIO;
}

export async function runAddReturn(opts: AddReturnOptions): Promise<PatchOutcome> {
  const { io, ...fileOpts } = opts;
  const outcome = await patchRegion({ ...fileOpts, region: PROCESS_FOR_TAX_RETURN });
  if (!outcome.wrote) {
    emit(io, "warn", "Could not find the process_for_tax function. No changes made.");
    return outcome;
  }
  reportBackup(io, outcome);
  emit(io, "success", `Successfully added return statement to process_for_tax in ${outcome.file}`);
  return outcome;
}

function reportBackup(io: MaintIO, outcome: PatchOutcome): void {
  if (outcome.backupPath) emit(io, "info", `Backed up previous content: ${outcome.backupPath}`);
}
