#!/usr/bin/env node
/**
 * taxmaint entry point
 */

import { program, type Command } from "commander";
import { join, dirname } from "node:path";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { loadConfig } from "./config/loader.js";
import { patchStrategySchema, type Config } from "./config/schema.js";
import { flushAll, flushCache } from "./cache/flush.js";
import { runAddReturn, runFixParams } from "./patch/index.js";
import { createDefaultIO } from "./utils/io.js";
import { logger } from "./utils/logger.js";

const log = logger;

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8")) as {
  name: string;
  version: string;
};

interface CommonOptions {
  config?: string;
  root?: string;
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option(
      "-c, --config <path>",
      "Config file path (default: ./taxmaint.yaml when present)",
      process.env.TAXMAINT_CONFIG_PATH,
    )
    .option("--root <dir>", "Base directory for cache and patch paths (overrides config root)");
}

async function resolveConfig(options: CommonOptions): Promise<Config> {
  return loadConfig({ path: options.config, root: options.root });
}

program
  .name("taxmaint")
  .description("Cache flushing and source repairs for the crypto tax calculator")
  .version(pkg.version);

withCommonOptions(
  program
    .command("flush-cache")
    .description("Delete every file in the price cache directory")
    .option("--dir <dir>", "Cache directory (default: <root>/data/price_cache)"),
).action(async (options: CommonOptions & { dir?: string }) => {
  try {
    const config = await resolveConfig(options);
    await flushCache({ dir: options.dir ?? config.cache.priceDir, io: createDefaultIO() });
  } catch (err) {
    log.error("Cache flush failed", err);
    process.exit(1);
  }
});

withCommonOptions(
  program
    .command("flush-all")
    .description("Flush the price cache and remove the API cache database"),
).action(async (options: CommonOptions) => {
  try {
    const config = await resolveConfig(options);
    await flushAll({
      priceDir: config.cache.priceDir,
      databaseFile: config.cache.databaseFile,
      io: createDefaultIO(),
    });
  } catch (err) {
    log.error("Flush failed", err);
    process.exit(1);
  }
});

interface PatchCommandOptions extends CommonOptions {
  target?: string;
  atomic: boolean;
  backup?: boolean;
}

withCommonOptions(
  program
    .command("fix-params")
    .description("Insert the missing commas in log_event and its LOG_DATA.append call")
    .option("--target <file>", "File to patch (default: <root>/krypto-accounting_german_tax.py)")
    .option("--strategy <name>", "line-scan (re-runnable) or literal")
    .option("--short", "Literal strategy: match the signature without '-> None:'")
    .option("--no-atomic", "Truncate and write in place instead of temp file + rename")
    .option("--backup", "Keep a .bak copy of the previous content"),
).action(async (options: PatchCommandOptions & { strategy?: string; short?: boolean }) => {
  try {
    const config = await resolveConfig(options);
    const strategy = patchStrategySchema.parse(options.strategy ?? config.patch.strategy);
    await runFixParams({
      file: options.target ?? config.patch.target,
      strategy,
      short: options.short,
      atomic: options.atomic && config.patch.atomic,
      backup: options.backup ?? config.patch.backup,
      io: createDefaultIO(),
    });
  } catch (err) {
    log.error("Parameter fix failed", err);
    process.exit(1);
  }
});

withCommonOptions(
  program
    .command("add-return")
    .description("Append 'return tax_data' after the last statement of process_for_tax")
    .option("--target <file>", "File to patch (default: <root>/krypto-accounting_german_tax.py)")
    .option("--no-atomic", "Truncate and write in place instead of temp file + rename")
    .option("--backup", "Keep a .bak copy of the previous content"),
).action(async (options: PatchCommandOptions) => {
  try {
    const config = await resolveConfig(options);
    // A missing function is reported, not an error: exit code stays 0.
    await runAddReturn({
      file: options.target ?? config.patch.target,
      atomic: options.atomic && config.patch.atomic,
      backup: options.backup ?? config.patch.backup,
      io: createDefaultIO(),
    });
  } catch (err) {
    log.error("Return insertion failed", err);
    process.exit(1);
  }
});

await program.parseAsync();
