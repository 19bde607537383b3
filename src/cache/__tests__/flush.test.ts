import { describe, it, expect, beforeEach, afterEach } from "vitest";
import os from "node:os";
import path from "node:path";
import { mkdir, mkdtemp, readdir, rm, stat, writeFile } from "node:fs/promises";

import { flushAll, flushCache } from "../flush.js";
import { createTestIO } from "../../test-utils/io.js";

describe("flushCache", () => {
  let root: string;
  let cacheDir: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "taxmaint-flush-"));
    cacheDir = path.join(root, "data", "price_cache");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("deletes every file and keeps the directory", async () => {
    await mkdir(cacheDir, { recursive: true });
    await writeFile(path.join(cacheDir, "BTC_EUR_2024.json"), "{}", "utf-8");
    await writeFile(path.join(cacheDir, "ETH_EUR_2024.json"), "{}", "utf-8");

    const { io, lines } = createTestIO();
    const report = await flushCache({ dir: cacheDir, io });

    expect(await readdir(cacheDir)).toEqual([]);
    expect(report.existed).toBe(true);
    expect([...report.deleted].sort()).toEqual(["BTC_EUR_2024.json", "ETH_EUR_2024.json"]);
    expect(report.failed).toEqual([]);
    expect(lines[0]).toBe(`Flushing price cache at ${cacheDir}...`);
    expect(lines).toContain("Deleted BTC_EUR_2024.json");
    expect(lines).toContain("Deleted ETH_EUR_2024.json");
    expect(lines[lines.length - 1]).toBe("Cache flush complete.");
  });

  it("leaves subdirectories and their contents alone", async () => {
    await mkdir(path.join(cacheDir, "archive"), { recursive: true });
    await writeFile(path.join(cacheDir, "archive", "old.json"), "{}", "utf-8");
    await writeFile(path.join(cacheDir, "fresh.json"), "{}", "utf-8");

    const { io } = createTestIO();
    const report = await flushCache({ dir: cacheDir, io });

    expect(report.deleted).toEqual(["fresh.json"]);
    expect(await readdir(cacheDir)).toEqual(["archive"]);
    expect(await readdir(path.join(cacheDir, "archive"))).toEqual(["old.json"]);
  });

  it("reports completion without deletions when only subdirectories exist", async () => {
    await mkdir(path.join(cacheDir, "nested"), { recursive: true });

    const { io, lines } = createTestIO();
    const report = await flushCache({ dir: cacheDir, io });

    expect(report.deleted).toEqual([]);
    expect(lines).toEqual([`Flushing price cache at ${cacheDir}...`, "Cache flush complete."]);
  });

  it("does nothing for a missing directory and does not create it", async () => {
    const { io, lines } = createTestIO();
    const report = await flushCache({ dir: cacheDir, io });

    expect(report).toEqual({ directory: cacheDir, existed: false, deleted: [], failed: [] });
    expect(lines).toEqual([`Cache directory ${cacheDir} does not exist. Nothing to flush.`]);
    await expect(stat(cacheDir)).rejects.toThrow();
  });

  it("treats a path below a regular file as missing", async () => {
    await writeFile(path.join(root, "data"), "not a directory", "utf-8");

    const { io, lines } = createTestIO();
    const report = await flushCache({ dir: cacheDir, io });

    expect(report.existed).toBe(false);
    expect(lines).toEqual([`Cache directory ${cacheDir} does not exist. Nothing to flush.`]);
  });
});

describe("flushAll", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "taxmaint-flush-all-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("flushes the price cache and removes the database file", async () => {
    const priceDir = path.join(root, "price_cache");
    const databaseFile = path.join(root, "kraken_cache.db");
    await mkdir(priceDir);
    await writeFile(path.join(priceDir, "XBT.json"), "{}", "utf-8");
    await writeFile(databaseFile, "sqlite", "utf-8");

    const { io, lines } = createTestIO();
    const report = await flushAll({ priceDir, databaseFile, io });

    expect(report.cache.deleted).toEqual(["XBT.json"]);
    expect(await readdir(root)).toEqual(["price_cache"]);
    expect(lines).toEqual([
      "Flushing all caches and database...",
      "Flushing price cache...",
      `Flushing price cache at ${priceDir}...`,
      "Deleted XBT.json",
      "Cache flush complete.",
      "Flushing database...",
      "All caches and database have been flushed.",
    ]);
  });

  it("tolerates a missing database file and a missing cache directory", async () => {
    const { io, lines } = createTestIO();
    const report = await flushAll({
      priceDir: path.join(root, "none"),
      databaseFile: path.join(root, "none.db"),
      io,
    });

    expect(report.cache.existed).toBe(false);
    expect(lines[lines.length - 1]).toBe("All caches and database have been flushed.");
  });
});
