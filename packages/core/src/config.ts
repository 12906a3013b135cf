/**
 * Compile-Time Configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: SHAPEMACRO_* (highest priority, for CI overrides)
 * 2. Programmatic: `createConfigStore({ overrides })` or `store.set()`
 * 3. Config files found by cosmiconfig: package.json "shapemacro" key,
 *    .shapemacrorc, shapemacro.config.js, ...
 * 4. Defaults (lowest priority)
 *
 * Macros never see the store itself. The driver opens a window over a
 * snapshot of it for the duration of one expansion run and closes it when the
 * run ends; reads through a closed window fail with ConfigAccessError.
 *
 * @example
 * ```typescript
 * const store = createConfigStore({ overrides: { features: { warnings: true } } });
 * const window = openConfigWindow(store.getAll());
 * window.config.get("features.warnings"); // → true
 * window.close();
 * window.config.get("features.warnings"); // throws ConfigAccessError
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigAccessError } from "./errors.js";
import type { CompileTimeConfig } from "./types.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Full shapemacro configuration schema.
 */
export interface ShapemacroConfig {
  /** Enable debug mode */
  debug?: boolean;
  /** Maximum nesting of macro expansions */
  maxExpansionDepth?: number;
  /** Feature flags */
  features?: Record<string, boolean>;
  /** Custom user configuration */
  [key: string]: unknown;
}

export type ConfigRecord = Record<string, unknown>;

const MODULE_NAME = "shapemacro";
const ENV_PREFIX = "SHAPEMACRO_";

export const DEFAULT_MAX_EXPANSION_DEPTH = 64;

export const DEFAULT_CONFIG: Readonly<ShapemacroConfig> = Object.freeze({
  debug: false,
  maxExpansionDepth: DEFAULT_MAX_EXPANSION_DEPTH,
  features: {},
});

/** Top-level schema keys by their lower-cased, underscore-free spelling */
const SCHEMA_KEYS: ReadonlyMap<string, string> = new Map(
  Object.keys(DEFAULT_CONFIG).map((key): [string, string] => [key.toLowerCase(), key]),
);

// ============================================================================
// Utility Functions
// ============================================================================

export function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: ConfigRecord = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
export function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
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
export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

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

function deepFreeze<T>(value: T): T {
  if (isRecord(value) || Array.isArray(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   SHAPEMACRO_DEBUG=1                   → { debug: true }
 *   SHAPEMACRO_FEATURES__WARNINGS=false  → { features: { warnings: false } }
 *   SHAPEMACRO_MAX_EXPANSION_DEPTH=16    → { maxExpansionDepth: 16 }
 *
 * Names are case-insensitive, so a top-level segment is matched against the
 * schema's camelCase keys; other segments are lower-cased.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // Double underscore __ becomes the nested object separator
    const [head, ...rest] = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    const configPath = [SCHEMA_KEYS.get(head.replace(/_/g, "")) ?? head, ...rest].join(".");

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
// Config File Loading
// ============================================================================

export interface FileConfig {
  config: ConfigRecord;
  filepath?: string;
}

/**
 * Search for a config file from `searchFrom` upwards.
 */
export function loadConfigFromFiles(searchFrom?: string): FileConfig {
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
  if (result && !result.isEmpty && isRecord(result.config)) {
    return { config: result.config, filepath: result.filepath };
  }
  return { config: {} };
}

// ============================================================================
// Config Store
// ============================================================================

export interface ConfigStoreOptions {
  /** Look for config files (default: true) */
  searchFiles?: boolean;
  /** Directory the config file search starts from */
  searchFrom?: string;
  /** Programmatic values, above files and below the environment */
  overrides?: ShapemacroConfig;
  /** Environment to read SHAPEMACRO_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigStore {
  get<T = unknown>(path: string): T | undefined;
  set(values: ShapemacroConfig): void;
  has(path: string): boolean;
  getAll(): Readonly<ConfigRecord>;
  getConfigFilePath(): string | undefined;
}

/**
 * Build a configuration store: defaults < files < overrides < environment.
 */
export function createConfigStore(options: ConfigStoreOptions = {}): ConfigStore {
  const file: FileConfig =
    options.searchFiles === false ? { config: {} } : loadConfigFromFiles(options.searchFrom);
  const envConfig = loadConfigFromEnv(options.env);

  let store: ConfigRecord = deepMerge(
    deepMerge(deepMerge({ ...DEFAULT_CONFIG }, file.config), options.overrides ?? {}),
    envConfig,
  );

  return {
    get<T = unknown>(path: string): T | undefined {
      return getNestedValue(store, path) as T | undefined;
    },
    set(values: ShapemacroConfig): void {
      store = deepMerge(store, values);
    },
    has(path: string): boolean {
      return !!getNestedValue(store, path);
    },
    getAll(): Readonly<ConfigRecord> {
      return store;
    },
    getConfigFilePath(): string | undefined {
      return file.filepath;
    },
  };
}

// ============================================================================
// Condition Evaluation
// ============================================================================

/**
 * Evaluate a condition string against a lookup function.
 *
 * Supports:
 * - Simple key: "debug" → truthy check
 * - Negation: "!test"
 * - Dotted path: "features.warnings"
 * - AND / OR: "debug && !production", "debug || test"
 * - Equality: "platform == 'browser'", inequality: "platform != 'node'"
 * - Parentheses: "(debug || test) && !production"
 */
export function evaluateCondition(condition: string, lookup: (path: string) => unknown): boolean {
  const expr = condition.trim();

  const orParts = splitTopLevel(expr, "||");
  if (orParts.length > 1) {
    return orParts.some((part) => evaluateCondition(part, lookup));
  }

  const andParts = splitTopLevel(expr, "&&");
  if (andParts.length > 1) {
    return andParts.every((part) => evaluateCondition(part, lookup));
  }

  if (expr.startsWith("(") && findMatchingParen(expr, 0) === expr.length - 1) {
    return evaluateCondition(expr.slice(1, -1), lookup);
  }

  if (expr.startsWith("!") && !expr.startsWith("!=")) {
    return !evaluateCondition(expr.slice(1), lookup);
  }

  const eqMatch = expr.match(/^([\w.]+)\s*==\s*['"](.+)['"]\s*$/);
  if (eqMatch) {
    return String(lookup(eqMatch[1])) === eqMatch[2];
  }

  const neqMatch = expr.match(/^([\w.]+)\s*!=\s*['"](.+)['"]\s*$/);
  if (neqMatch) {
    return String(lookup(neqMatch[1])) !== neqMatch[2];
  }

  return !!lookup(expr);
}

function splitTopLevel(expr: string, op: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";

  for (let i = 0; i < expr.length; i++) {
    if (expr[i] === "(") depth++;
    else if (expr[i] === ")") depth--;

    if (depth === 0 && expr.slice(i, i + op.length) === op) {
      parts.push(current);
      current = "";
      i += op.length - 1;
    } else {
      current += expr[i];
    }
  }

  parts.push(current);
  return parts;
}

function findMatchingParen(expr: string, start: number): number {
  let depth = 0;
  for (let i = start; i < expr.length; i++) {
    if (expr[i] === "(") depth++;
    else if (expr[i] === ")") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

// ============================================================================
// Compile-Time Window
// ============================================================================

export interface ConfigWindow {
  /** The capability handed to macros */
  readonly config: CompileTimeConfig;
  readonly isOpen: boolean;
  /** Revoke the capability; later reads throw ConfigAccessError */
  close(): void;
}

/**
 * Open a read-only window over a frozen snapshot of `values`.
 */
export function openConfigWindow(values: Readonly<ConfigRecord>): ConfigWindow {
  const snapshot = deepFreeze(deepMerge({}, values));
  let open = true;

  const read = (path: string): unknown => {
    if (!open) throw new ConfigAccessError(path);
    return getNestedValue(snapshot, path);
  };

  const config: CompileTimeConfig = {
    get<T = unknown>(path: string): T | undefined {
      return read(path) as T | undefined;
    },
    has(path: string): boolean {
      return !!read(path);
    },
    evaluate(condition: string): boolean {
      if (!open) throw new ConfigAccessError(condition);
      return evaluateCondition(condition, read);
    },
  };

  return {
    config: Object.freeze(config),
    get isOpen() {
      return open;
    },
    close() {
      open = false;
    },
  };
}

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: ShapemacroConfig): ShapemacroConfig {
  return cfg;
}
