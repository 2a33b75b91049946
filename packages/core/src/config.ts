/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: TAGWEAVE_* (highest priority, for CI overrides)
 * 2. Config files: .tagweaverc, tagweave.config.js, package.json#tagweave, etc.
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@tagweave/core";
 *
 * config.get("trace")                  // → boolean
 * config.get("diagnostics.context")    // → number
 *
 * config.set({ diagnostics: { color: true } });
 *
 * config.load();                       // read config files up front
 * config.peek("trace")                 // → no file I/O, never throws
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Options for rendering parse failures.
 */
export interface DiagnosticsConfig {
  /** Source lines shown above the failing line */
  context?: number;
  /** Emit ANSI colour codes */
  color?: boolean;
}

/**
 * Full tagweave configuration schema.
 */
export interface TagweaveConfig {
  /** Log parser entry/exit for `traced()` parsers */
  trace?: boolean;
  /** Failure rendering */
  diagnostics?: DiagnosticsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

/**
 * Raised when a config file exists but cannot be loaded.
 */
export class ConfigError extends Error {
  readonly filepath: string | undefined;

  constructor(message: string, options: { cause?: unknown; filepath?: string } = {}) {
    super(message, { cause: options.cause });
    this.name = "ConfigError";
    this.filepath = options.filepath;
  }
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;
// Defaults and env only, for reads that must not touch the file system
let envStore: Record<string, unknown> | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "TAGWEAVE_";

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   TAGWEAVE_TRACE=1                    → { trace: true }
 *   TAGWEAVE_DIAGNOSTICS_CONTEXT=3      → { diagnostics: { context: 3 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");
    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "tagweave";

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search();
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Failed to load ${MODULE_NAME} configuration: ${msg}`, { cause: e });
  }

  if (!result || result.isEmpty) return {};
  if (!isPlainObject(result.config)) {
    throw new ConfigError(`Configuration in ${result.filepath} must be an object`, {
      filepath: result.filepath,
    });
  }

  configFilePath = result.filepath;
  return result.config;
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: TagweaveConfig = {
  trace: false,
  diagnostics: {
    context: 1,
    color: false,
  },
};

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<TagweaveConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Load every source now, so later reads (and `peek`) see config files.
 *
 * @throws ConfigError when a config file exists but cannot be loaded
 */
function load(): void {
  initializeConfig();
}

/**
 * Read a value without loading config files.
 *
 * Before the config is loaded this sees only defaults and environment
 * variables; afterwards it reads the full store. Never does I/O, never throws.
 */
function peek(path: string): unknown {
  if (configLoaded) return getNestedValue(configStore, path);
  if (!envStore) envStore = deepMerge(DEFAULTS, loadConfigFromEnv());
  return getNestedValue(envStore, path);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<Record<string, unknown>> {
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

/**
 * Reset configuration so the next read reloads every source (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  envStore = undefined;
}

/**
 * Read a numeric setting, falling back when it is missing or not a number.
 */
function getNumber(path: string, fallback: number): number {
  const value = get(path);
  return typeof value === "number" ? value : fallback;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  load,
  get,
  peek,
  getNumber,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: TagweaveConfig): TagweaveConfig {
  return cfg;
}

/** @internal exposed for tests */
export { loadConfigFromEnv };
