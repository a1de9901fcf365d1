/**
 * Unified Configuration System
 *
 * Configuration is layered (lowest to highest priority):
 *
 * 1. Defaults
 * 2. Config files: package.json#hitch, .hitchrc, hitch.config.js, etc.
 * 3. Environment variables: HITCH_* (for CI overrides)
 * 4. Programmatic: config.set() calls
 *
 * @example
 * ```typescript
 * import { config } from "@hitch/core";
 *
 * config.get("expansion.feedbackLimit")   // → number
 * config.set({ expansion: { unknownAttributes: "ignore" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/** What to do with a decorator that names no visible macro */
export type UnknownAttributePolicy = "error" | "ignore";

export interface ExpansionConfig {
  /** Feedback rounds a batch may take before it is declared nonterminating */
  feedbackLimit?: number;
  unknownAttributes?: UnknownAttributePolicy;
}

/**
 * Full hitch configuration schema.
 */
export interface HitchConfig {
  /** Log expansion progress to the console */
  verbose?: boolean;
  expansion?: ExpansionConfig;
}

export interface ResolvedConfig {
  verbose: boolean;
  expansion: {
    feedbackLimit: number;
    unknownAttributes: UnknownAttributePolicy;
  };
}

/** Dotted keys accepted by `config.get` */
export interface ConfigValues {
  verbose: boolean;
  "expansion.feedbackLimit": number;
  "expansion.unknownAttributes": UnknownAttributePolicy;
}

export const DEFAULT_FEEDBACK_LIMIT = 100;

function defaults(): ResolvedConfig {
  return {
    verbose: false,
    expansion: {
      feedbackLimit: DEFAULT_FEEDBACK_LIMIT,
      unknownAttributes: "error",
    },
  };
}

// ============================================================================
// Global State
// ============================================================================

let configStore: ResolvedConfig = defaults();
let configLoaded = false;
let configFilePath: string | undefined;
let configFileError: Error | undefined;

let loadOptions: ConfigLoadOptions = {};

export interface ConfigLoadOptions {
  /** Directory to look for config files in (default: process.cwd()) */
  searchFrom?: string;
  /** Environment to read HITCH_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// Layer Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isUnknownAttributePolicy(value: unknown): value is UnknownAttributePolicy {
  return value === "error" || value === "ignore";
}

/**
 * Keep the recognised, well-typed parts of a raw layer. Anything else is
 * reported and dropped.
 */
function readLayer(raw: unknown, source: string): HitchConfig {
  const layer: HitchConfig = {};
  if (!isRecord(raw)) return layer;

  const warn = (key: string, value: unknown): void => {
    console.warn(`[hitch:config] ignoring ${key}=${JSON.stringify(value)} from ${source}`);
  };

  if ("verbose" in raw) {
    if (typeof raw.verbose === "boolean") layer.verbose = raw.verbose;
    else warn("verbose", raw.verbose);
  }

  const expansion = raw.expansion;
  if (isRecord(expansion)) {
    const out: ExpansionConfig = {};
    if ("feedbackLimit" in expansion) {
      const limit = expansion.feedbackLimit;
      if (typeof limit === "number" && Number.isInteger(limit) && limit >= 0) {
        out.feedbackLimit = limit;
      } else {
        warn("expansion.feedbackLimit", limit);
      }
    }
    if ("unknownAttributes" in expansion) {
      const policy = expansion.unknownAttributes;
      if (isUnknownAttributePolicy(policy)) out.unknownAttributes = policy;
      else warn("expansion.unknownAttributes", policy);
    }
    layer.expansion = out;
  } else if (expansion !== undefined) {
    warn("expansion", expansion);
  }

  return layer;
}

function applyLayer(base: ResolvedConfig, layer: HitchConfig): ResolvedConfig {
  return {
    verbose: layer.verbose ?? base.verbose,
    expansion: {
      feedbackLimit: layer.expansion?.feedbackLimit ?? base.expansion.feedbackLimit,
      unknownAttributes: layer.expansion?.unknownAttributes ?? base.expansion.unknownAttributes,
    },
  };
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "HITCH_";

/**
 * Load configuration from environment variables. Each `_`-separated segment
 * after the prefix names a config key, compared case-insensitively.
 *
 * Examples:
 *   HITCH_VERBOSE=1                          → { verbose: true }
 *   HITCH_EXPANSION_FEEDBACKLIMIT=20         → { expansion: { feedbackLimit: 20 } }
 *   HITCH_EXPANSION_UNKNOWNATTRIBUTES=ignore → { expansion: { unknownAttributes: "ignore" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): HitchConfig {
  const raw: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // HITCH_NO_COLOR belongs to the renderer
    if (key === "HITCH_NO_COLOR") continue;

    const segments = key.slice(ENV_PREFIX.length).split("_").filter(Boolean);
    setMatchingPath(raw, defaults(), segments, parseEnvValue(value));
  }

  return readLayer(raw, "environment");
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

/**
 * Follow `segments` through the shape of `schema`, matching keys
 * case-insensitively, and store `value` at the end. Unknown paths are dropped.
 */
function setMatchingPath(
  target: Record<string, unknown>,
  schema: unknown,
  segments: readonly string[],
  value: unknown
): void {
  const [head, ...rest] = segments;
  if (head === undefined || !isRecord(schema)) return;

  const key = Object.keys(schema).find((k) => k.toLowerCase() === head.toLowerCase());
  if (key === undefined) return;

  if (rest.length === 0) {
    // "1"/"0" on a numeric key means the number, not a flag
    target[key] =
      typeof schema[key] === "number" && typeof value === "boolean" ? Number(value) : value;
    return;
  }

  const existing = target[key];
  const child: Record<string, unknown> = isRecord(existing) ? existing : {};
  target[key] = child;
  setMatchingPath(child, schema[key], rest, value);
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "hitch";

function loadConfigFromFiles(searchFrom: string | undefined): HitchConfig {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
        `${MODULE_NAME}.config.mjs`,
      ],
    });
    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      const loaded: unknown = result.config;
      return readLayer(loaded, result.filepath);
    }
  } catch (error) {
    configFileError = error instanceof Error ? error : new Error(String(error));
    console.warn(`[hitch:config] failed to load config file: ${configFileError.message}`);
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles(loadOptions.searchFrom);
  const envConfig = loadConfigFromEnv(loadOptions.env ?? process.env);

  // Merge: defaults < fileConfig < envConfig
  configStore = applyLayer(applyLayer(defaults(), fileConfig), envConfig);
  configLoaded = true;

  if (configStore.verbose) {
    console.log(
      `[hitch:config] loaded${configFilePath ? ` ${configFilePath}` : " defaults"}: ` +
        JSON.stringify(configStore)
    );
  }
}

// ============================================================================
// Public API
// ============================================================================

function get<K extends keyof ConfigValues>(path: K): ConfigValues[K];
function get(path: keyof ConfigValues): ConfigValues[keyof ConfigValues] {
  initializeConfig();
  switch (path) {
    case "verbose":
      return configStore.verbose;
    case "expansion.feedbackLimit":
      return configStore.expansion.feedbackLimit;
    case "expansion.unknownAttributes":
      return configStore.expansion.unknownAttributes;
  }
}

/**
 * Set configuration values programmatically. Values are validated like
 * any other layer and take precedence over files and the environment.
 */
function set(values: HitchConfig): void {
  initializeConfig();
  configStore = applyLayer(configStore, readLayer(values, "config.set()"));
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: keyof ConfigValues): boolean {
  return !!get(path);
}

function getAll(): Readonly<ResolvedConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/** The error raised while reading the config file, if any */
function getConfigFileError(): Error | undefined {
  initializeConfig();
  return configFileError;
}

/**
 * Reset configuration to defaults (mainly for testing). The next read
 * reloads from `options`.
 */
function reset(options: ConfigLoadOptions = {}): void {
  configStore = defaults();
  configLoaded = false;
  configFilePath = undefined;
  configFileError = undefined;
  loadOptions = options;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  getConfigFileError,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: HitchConfig): HitchConfig {
  return cfg;
}
