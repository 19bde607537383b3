import { chmod, copyFile, readFile, rename, stat, unlink, writeFile } from "node:fs/promises";
import { PatchError, PatchErrorCode } from "./errors.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("patch.file");

export interface WriteOptions {
  /** Temp file + rename so an interrupted write never truncates the target */
  atomic?: boolean;
  /** Copy the current content to `<file>.bak.<timestamp>` first */
  backup?: boolean;
}

export interface WriteResult {
  backupPath?: string;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Invalid UTF-8 must fail rather than round-trip as U+FFFD; a BOM stays in the text.
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export async function readTextFile(filePath: string): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new PatchError(`Patch target not found: ${filePath}`, PatchErrorCode.TARGET_NOT_FOUND);
    }
    throw new PatchError(`Cannot read ${filePath}: ${errorMessage(err)}`, PatchErrorCode.IO_FAILED, {
      cause: errorCode(err),
    });
  }
  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw new PatchError(`Cannot decode ${filePath} as UTF-8: ${errorMessage(err)}`, PatchErrorCode.IO_FAILED);
  }
}

async function existingMode(filePath: string): Promise<number | undefined> {
  try {
    return (await stat(filePath)).mode & 0o7777;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return undefined;
    throw err;
  }
}

export function backupPathFor(filePath: string, now: Date = new Date()): string {
  return `${filePath}.bak.${now.toISOString().replace(/[:.]/g, "-")}`;
}

async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const mode = await existingMode(filePath);
  const tmpPath = `${filePath}.${process.pid}.${Math.random().toString(16).slice(2)}.tmp`;
  try {
    await writeFile(tmpPath, contents, "utf-8");
    if (mode !== undefined) await chmod(tmpPath, mode);
    await rename(tmpPath, filePath);
  } catch (err) {
    await unlink(tmpPath).catch(() => undefined);
    throw err;
  }
}

export async function writeTextFile(
  filePath: string,
  contents: string,
  opts: WriteOptions = {},
): Promise<WriteResult> {
  const atomic = opts.atomic ?? true;
  const result: WriteResult = {};
  try {
    if (opts.backup) {
      result.backupPath = backupPathFor(filePath);
      await copyFile(filePath, result.backupPath);
      log.debug(`Backed up ${filePath} to ${result.backupPath}`);
    }
    if (atomic) {
      await writeFileAtomic(filePath, contents);
    } else {
      await writeFile(filePath, contents, "utf-8");
    }
  } catch (err) {
    throw new PatchError(`Cannot write ${filePath}: ${errorMessage(err)}`, PatchErrorCode.IO_FAILED, {
      cause: errorCode(err),
    });
  }
  log.debug(`Wrote ${contents.length} chars to ${filePath}${atomic ? " (atomic)" : ""}`);
  return result;
}
