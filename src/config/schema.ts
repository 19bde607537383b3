/**
 * Configuration schema (Zod)
 */

import { z } from "zod";

export const patchStrategySchema = z.enum(["line-scan", "literal"]);

export const cacheConfigSchema = z
  .object({
    /** Price cache directory; every regular file in it is deleted on flush */
    priceDir: z.string().min(1).default("data/price_cache"),
    /** API response database removed by flush-all */
    databaseFile: z.string().min(1).default("data/kraken_cache.db"),
  })
  .default({});

export const patchConfigSchema = z
  .object({
    target: z.string().min(1).default("krypto-accounting_german_tax.py"),
    strategy: patchStrategySchema.default("line-scan"),
    /** Write through a temp file + rename instead of truncating in place */
    atomic: z.boolean().default(true),
    backup: z.boolean().default(false),
  })
  .default({});

export const configSchema = z.object({
  /** Base directory; relative paths below resolve against it */
  root: z.string().min(1).default("."),
  cache: cacheConfigSchema,
  patch: patchConfigSchema,
});

export type PatchStrategy = z.infer<typeof patchStrategySchema>;
export type Config = z.infer<typeof configSchema>;
