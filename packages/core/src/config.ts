/**
 * Configuration for the sexpr packages.
 *
 * Values are merged from (lowest to highest priority):
 *
 * 1. Defaults
 * 2. Config files found by cosmiconfig: `package.json#sexpr`, `.sexprrc`, `sexpr.config.js`, ...
 * 3. Environment variables: SEXPR_* (for CI overrides)
 * 4. Programmatic: config.set() calls
 *
 * A bad value in a file or the environment is skipped with a warning, so a
 * stray variable never stops parsing. `config.set()` throws `ConfigError`.
 *
 * @example
 * ```typescript
 * import { config } from "@sexpr/core";
 *
 * config.get("maxDepth");        // → 256
 * config.set({ debug: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";
import { createLogger } from "./logger.js";

// Created on use: logger.ts reads this module.
function warn(message: string): void {
  createLogger("config").warn(message);
}

// ============================================================================
// Types
// ============================================================================

/** Fully resolved configuration. */
export interface SexprConfig {
  /** Emit debug log lines. */
  debug: boolean;
  /** Deepest list nesting the Lisp grammar accepts. */
  maxDepth: number;
}

export type SexprConfigKey = keyof SexprConfig;

const DEFAULTS: SexprConfig = {
  debug: false,
  maxDepth: 256,
};

// ============================================================================
// Global State
// ============================================================================

let configStore: SexprConfig = { ...DEFAULTS };
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

// ============================================================================
// Value normalization
// ============================================================================

function isConfigKey(key: string): key is SexprConfigKey {
  return Object.prototype.hasOwnProperty.call(DEFAULTS, key);
}

function toBoolean(key: string, source: string, value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (value === 1 || value === "1" || value === "true") return true;
  if (value === 0 || value === "0" || value === "false" || value === "") return false;
  throw new ConfigError(key, source, `expected a boolean, got ${JSON.stringify(value)}`);
}

function toDepth(key: string, source: string, value: unknown): number {
  const n = typeof value === "string" && /^\d+$/.test(value) ? parseInt(value, 10) : value;
  if (typeof n === "number" && Number.isInteger(n) && n >= 0) return n;
  throw new ConfigError(key, source, `expected a non-negative integer, got ${JSON.stringify(value)}`);
}

function assign(out: Partial<SexprConfig>, key: SexprConfigKey, source: string, value: unknown): void {
  switch (key) {
    case "debug":
      out.debug = toBoolean(key, source, value);
      break;
    case "maxDepth":
      out.maxDepth = toDepth(key, source, value);
      break;
  }
}

/**
 * Check a loosely typed record against the schema. Unknown keys are ignored.
 * In `strict` mode a bad value throws; otherwise it is logged and skipped.
 */
function normalize(
  raw: Record<string, unknown>,
  source: string,
  strict: boolean
): Partial<SexprConfig> {
  const out: Partial<SexprConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined || !isConfigKey(key)) continue;
    try {
      assign(out, key, source, value);
    } catch (e: unknown) {
      if (strict || !(e instanceof ConfigError)) throw e;
      warn(`${e.message}; ignoring it`);
    }
  }
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "SEXPR_";

/**
 * Map SEXPR_* variables onto config keys. Underscores and case are ignored
 * when matching, so SEXPR_MAX_DEPTH and SEXPR_MAXDEPTH both set `maxDepth`.
 *
 *   SEXPR_DEBUG=1          → { debug: true }
 *   SEXPR_MAX_DEPTH=64     → { maxDepth: 64 }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Partial<SexprConfig> {
  const byFoldedName = new Map<string, SexprConfigKey>();
  for (const key of Object.keys(DEFAULTS)) {
    if (isConfigKey(key)) byFoldedName.set(key.toLowerCase(), key);
  }

  const raw: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || value === undefined) continue;
    const folded = name.slice(ENV_PREFIX.length).replace(/_/g, "").toLowerCase();
    const key = byFoldedName.get(folded);
    if (key) raw[key] = value;
  }
  return normalize(raw, "env", false);
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "sexpr";

function loadConfigFromFiles(): Partial<SexprConfig> {
  try {
    return searchConfigFile();
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    warn(`could not load config file: ${msg}`);
    return {};
  }
}

function searchConfigFile(): Partial<SexprConfig> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  const result = explorer.search(searchFrom);
  if (!result || result.isEmpty) return {};

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    warn(`ignoring ${result.filepath}: config file must contain an object`);
    return {};
  }
  configFilePath = result.filepath;
  return normalize(loaded, result.filepath, false);
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv(process.env);

  configStore = { ...DEFAULTS, ...fileConfig, ...envConfig };
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/** Read one configuration value. */
function get<K extends SexprConfigKey>(key: K): SexprConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Override configuration values.
 *
 * @throws ConfigError if a value has the wrong type.
 */
function set(values: Partial<SexprConfig>): void {
  initializeConfig();
  configStore = { ...configStore, ...normalize({ ...values }, "set", true) };
}

/** Check whether a configuration key has a truthy value. */
function has(key: SexprConfigKey): boolean {
  return !!get(key);
}

function getAll(): Readonly<SexprConfig> {
  initializeConfig();
  return { ...configStore };
}

/** Path of the config file that was loaded, if any. */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Forget every loaded and set value; the next read loads sources again.
 * `options.searchFrom` sets the directory config files are looked up in
 * (default: the working directory).
 */
function reset(options: { searchFrom?: string } = {}): void {
  configStore = { ...DEFAULTS };
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = options.searchFrom;
}

// ============================================================================
// Export: config object
// ============================================================================

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for writing typed config files (`sexpr.config.js`).
 */
export function defineConfig(cfg: Partial<SexprConfig>): Partial<SexprConfig> {
  return cfg;
}
