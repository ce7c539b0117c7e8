/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for tinystd packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: TINYSTD_* (highest priority, for CI overrides)
 * 2. Config files: package.json#tinystd, .tinystdrc, .tinystdrc.json, ...
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@tinystd/core";
 *
 * // Read config values
 * config.get("debug")                    // → boolean
 * config.get("checks.preconditions")     // → boolean
 *
 * // Set config programmatically
 * config.set({ hex: { delimiter: ":" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { createLogger, setDebugOutput } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Runtime checking of caller contracts.
 */
export interface ChecksConfig {
  /** Throw PreconditionError where a caller contract would otherwise be undefined behaviour */
  preconditions?: boolean;
}

/**
 * Hex dump formatting.
 */
export interface HexConfig {
  /** Text placed between two bytes */
  delimiter?: string;
  /** Upper-case digits A-F */
  uppercase?: boolean;
}

/**
 * Full tinystd configuration schema.
 */
export interface TinystdConfig {
  /** Enable debug logging */
  debug?: boolean;
  checks?: ChecksConfig;
  hex?: HexConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

const MODULE_NAME = "tinystd";
const ENV_PREFIX = "TINYSTD_";

const log = createLogger("config");

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with TINYSTD_ are parsed into the config object.
 *
 * Examples:
 *   TINYSTD_DEBUG=1                        → { debug: true }
 *   TINYSTD_CHECKS_PRECONDITIONS=true      → { checks: { preconditions: true } }
 *   TINYSTD_HEX_DELIMITER=:                → { hex: { delimiter: ":" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
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
  const parts = path.split(".");
  let current: unknown = obj;

  for (const part of parts) {
    if (!isRecord(current)) {
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
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
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

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
    ],
  });

  try {
    const result = explorer.search(process.cwd());
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      log.debug(`loaded ${result.filepath}`);
      return result.config;
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    log.warn(`ignoring unreadable config file: ${reason}`);
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function defaults(): TinystdConfig {
  return {
    debug: false,
    checks: {
      preconditions: false,
    },
    hex: {
      delimiter: " ",
      uppercase: true,
    },
  };
}

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  configLoaded = true;
  const envConfig = loadConfigFromEnv();
  // The file search logs, so debug output follows env and defaults until it is done.
  setDebugOutput(deepMerge(defaults(), envConfig).debug === true);

  const fileConfig = loadConfigFromFiles();

  // Merge: defaults < fileConfig < envConfig
  storeConfig(deepMerge(deepMerge(defaults(), fileConfig), envConfig));
}

function storeConfig(next: Record<string, unknown>): void {
  configStore = next;
  setDebugOutput(next.debug === true);
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
 * Get a string value, or the fallback when the path holds no string.
 */
function getString(path: string, fallback: string): string {
  const value = get(path);
  return typeof value === "string" ? value : fallback;
}

/**
 * Get a boolean value, or the fallback when the path holds no boolean.
 */
function getBoolean(path: string, fallback: boolean): boolean {
  const value = get(path);
  return typeof value === "boolean" ? value : fallback;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<TinystdConfig>): void {
  initializeConfig();
  storeConfig(deepMerge(configStore, values));
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
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
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  setDebugOutput(false);
}

/**
 * Conditional value based on a configuration path (`"debug"`, `"!checks.preconditions"`).
 */
function when<T, U = undefined>(
  condition: string,
  thenValue: () => T,
  elseValue?: () => U
): T | U | undefined {
  const negated = condition.startsWith("!");
  const active = has(negated ? condition.slice(1).trim() : condition.trim());

  if (active !== negated) {
    return thenValue();
  }
  return elseValue?.();
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  getString,
  getBoolean,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  when,
} as const;

/**
 * Parse TINYSTD_* variables from an environment object (exposed for tooling and tests).
 */
export { loadConfigFromEnv };

/**
 * Helper for creating type-safe configuration objects.
 */
export function defineConfig(cfg: TinystdConfig): TinystdConfig {
  return cfg;
}
