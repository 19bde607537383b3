/**
 * Config loader with environment variable expansion
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { resolve, dirname, isAbsolute } from "node:path";
import { configSchema, type Config } from "./schema.js";
import { createLogger } from "../utils/logger.js";
import { ZodError } from "zod";
import { expandEnvVarsDeep } from "./expand-env.js";

const log = createLogger("config");

export const DEFAULT_CONFIG_FILENAME = "taxmaint.yaml";

export interface LoadConfigOptions {
  /** Explicit config path; a missing file is an error */
  path?: string;
  /** Directory searched for taxmaint.yaml when no path is given */
  cwd?: string;
  /** Overrides the configured root; resolved against cwd */
  root?: string;
  env?: Record<string, string | undefined>;
}

export function expandHome(path: string, env: Record<string, string | undefined>): string {
  const home = env.HOME ?? env.USERPROFILE ?? ".";
  if (path === "~") return home;
  if (path.startsWith("~/")) return resolve(home, path.slice(2));
  return path;
}

/**
 * Load and validate config. `root` and every relative path in the result
 * are resolved to absolute paths: root against the config file's
 * directory (or cwd without a file), the rest against root.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<Config> {
  const env = opts.env ?? process.env;
  const cwd = resolve(opts.cwd ?? process.cwd());
  const explicit = opts.path !== undefined;
  const configPath = explicit
    ? resolve(cwd, expandHome(opts.path ?? "", env))
    : resolve(cwd, DEFAULT_CONFIG_FILENAME);

  let raw: unknown = {};
  let baseDir = cwd;
  try {
    const content = await readFile(configPath, "utf-8");
    log.info(`Loading config from ${configPath}`);
    raw = parse(content) ?? {};
    baseDir = dirname(configPath);
  } catch (err) {
    if (!isNodeError(err) || err.code !== "ENOENT") throw err;
    if (explicit) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    log.debug(`No ${DEFAULT_CONFIG_FILENAME} in ${cwd}, using defaults`);
  }

  let config: Config;
  try {
    config = configSchema.parse(expandEnvVarsDeep(raw, env));
  } catch (err) {
    if (err instanceof ZodError) {
      throw new Error(formatZodError(err));
    }
    throw err;
  }

  if (opts.root !== undefined) {
    config = { ...config, root: expandHome(opts.root, env) };
    baseDir = cwd;
  }

  return resolveConfigPaths(config, baseDir);
}

export function resolveConfigPaths(config: Config, baseDir: string): Config {
  const root = resolve(baseDir, config.root);
  const under = (p: string) => (isAbsolute(p) ? p : resolve(root, p));
  const resolved: Config = {
    root,
    cache: {
      priceDir: under(config.cache.priceDir),
      databaseFile: under(config.cache.databaseFile),
    },
    patch: { ...config.patch, target: under(config.patch.target) },
  };
  log.debug(`Resolved root: ${resolved.root}`);
  return resolved;
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function formatZodError(error: ZodError): string {
  const lines = error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `- ${path}: ${issue.message}`;
  });
  return `Config validation failed:\n${lines.join("\n")}`;
}
