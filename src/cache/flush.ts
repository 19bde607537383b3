/**
 * Price cache flushing: delete every regular file directly inside a
 * directory. Subdirectories and their contents are never touched.
 */

import { readdir, rm, stat, unlink } from "node:fs/promises";
import { join } from "node:path";
import { emit, type MaintIO } from "../utils/io.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("cache");

export interface FlushFailure {
  name: string;
  message: string;
}

export interface FlushReport {
  directory: string;
  existed: boolean;
  deleted: string[];
  failed: FlushFailure[];
}

export interface FlushCacheOptions {
  dir: string;
  io: MaintIO;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    // ENOTDIR: some parent of the path is a regular file
    if (err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
      return false;
    }
    throw err;
  }
}

export async function flushCache(opts: FlushCacheOptions): Promise<FlushReport> {
  const { dir, io } = opts;
  const report: FlushReport = { directory: dir, existed: false, deleted: [], failed: [] };

  if (!(await isDirectory(dir))) {
    emit(io, "info", `Cache directory ${dir} does not exist. Nothing to flush.`);
    return report;
  }
  report.existed = true;

  emit(io, "info", `Flushing price cache at ${dir}...`);
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (!entry.isFile()) {
      log.debug(`Skipping ${entry.name} (not a regular file)`);
      continue;
    }
    try {
      await unlink(join(dir, entry.name));
      report.deleted.push(entry.name);
      io.print(`Deleted ${entry.name}`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      report.failed.push({ name: entry.name, message });
      emit(io, "error", `Error deleting ${entry.name}: ${message}`);
    }
  }
  emit(io, "success", "Cache flush complete.");
  return report;
}

export interface FlushAllOptions {
  priceDir: string;
  databaseFile: string;
  io: MaintIO;
}

export interface FlushAllReport {
  cache: FlushReport;
  databaseFile: string;
}

/** Price cache plus the API response database; a missing database is fine. */
export async function flushAll(opts: FlushAllOptions): Promise<FlushAllReport> {
  const { io } = opts;
  io.print("Flushing all caches and database...");

  io.print("Flushing price cache...");
  const cache = await flushCache({ dir: opts.priceDir, io });

  io.print("Flushing database...");
  await rm(opts.databaseFile, { force: true });
  log.debug(`Removed ${opts.databaseFile}`);

  emit(io, "success", "All caches and database have been flushed.");
  return { cache, databaseFile: opts.databaseFile };
}
