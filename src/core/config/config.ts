// src/core/config/config.ts
// Configuration for registries and built-in display

import * as fs from "fs";
import * as path from "path";
import type { RegistryOptions } from "../generic/types";

// =========================================================================
// Configuration Types
// =========================================================================

export type RegistryConfig = RegistryOptions;

export type DisplayConfig = {
  /** Spaces used to indent nested list elements when formatting */
  indent: number;
};

export type TagDispatchConfig = {
  registry: RegistryConfig;
  display: DisplayConfig;
};

export type PartialConfig = {
  registry?: Partial<RegistryConfig>;
  display?: Partial<DisplayConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_REGISTRY_CONFIG: RegistryConfig = {
  recordEvents: true,
  eventLogLimit: 1000,
};

export const DEFAULT_DISPLAY_CONFIG: DisplayConfig = {
  indent: 0,
};

export const DEFAULT_CONFIG: TagDispatchConfig = {
  registry: DEFAULT_REGISTRY_CONFIG,
  display: DEFAULT_DISPLAY_CONFIG,
};

export const DEFAULT_CONFIG_FILES = [
  "tagdispatch.config.json",
  "tagdispatch.config.yaml",
  "tagdispatch.config.yml",
];

// =========================================================================
// Value Readers
// =========================================================================

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "true" || v === "1" || v === "yes") return true;
  if (v === "false" || v === "0" || v === "no") return false;
  return undefined;
}

function parseIntOr(raw: string | undefined, fallback: number): number {
  const n = parseInt(raw || "", 10);
  return Number.isNaN(n) ? fallback : n;
}

function asRecord(v: unknown): Record<string, unknown> {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return {};
  return Object.fromEntries(Object.entries(v));
}

/** First of the given keys holding a value of the wanted type. */
function pick<T>(data: Record<string, unknown>, keys: string[], guard: (v: unknown) => v is T): T | undefined {
  for (const key of keys) {
    const v = data[key];
    if (guard(v)) return v;
  }
  return undefined;
}

const isNumber = (v: unknown): v is number => typeof v === "number" && !Number.isNaN(v);
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "TAGDISPATCH"): TagDispatchConfig {
  const env = process.env;
  return {
    registry: {
      recordEvents: parseBool(env[`${prefix}_RECORD_EVENTS`]) ?? DEFAULT_REGISTRY_CONFIG.recordEvents,
      eventLogLimit: parseIntOr(env[`${prefix}_EVENT_LOG_LIMIT`], DEFAULT_REGISTRY_CONFIG.eventLogLimit),
    },
    display: {
      indent: parseIntOr(env[`${prefix}_DISPLAY_INDENT`], DEFAULT_DISPLAY_CONFIG.indent),
    },
  };
}

function readConfigFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  if (ext === ".json") {
    return partialConfigFromObject(asRecord(JSON.parse(content)));
  }
  if (ext === ".yaml" || ext === ".yml") {
    return partialConfigFromObject(parseSimpleYaml(content));
  }
  throw new Error(`Unsupported config file format: ${ext}`);
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): TagDispatchConfig {
  return mergeConfigs(readConfigFile(filePath));
}

/**
 * Keep only the settings actually present in `data`.
 * Accepts camelCase and snake_case keys.
 */
export function partialConfigFromObject(data: Record<string, unknown>): PartialConfig {
  const registryData = asRecord(data.registry);
  const displayData = asRecord(data.display);

  const registry: Partial<RegistryConfig> = {};
  const recordEvents = pick(registryData, ["recordEvents", "record_events"], isBoolean);
  if (recordEvents !== undefined) registry.recordEvents = recordEvents;
  const eventLogLimit = pick(registryData, ["eventLogLimit", "event_log_limit"], isNumber);
  if (eventLogLimit !== undefined) registry.eventLogLimit = eventLogLimit;

  const display: Partial<DisplayConfig> = {};
  const indent = pick(displayData, ["indent"], isNumber);
  if (indent !== undefined) display.indent = indent;

  return { registry, display };
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML),
 * with defaults for anything missing.
 */
export function configFromObject(data: Record<string, unknown>): TagDispatchConfig {
  return mergeConfigs(partialConfigFromObject(data));
}

/**
 * Merge configs with later ones overriding earlier ones.
 * Keys present but undefined leave the earlier value in place.
 */
export function mergeConfigs(...configs: PartialConfig[]): TagDispatchConfig {
  const result: TagDispatchConfig = {
    registry: { ...DEFAULT_REGISTRY_CONFIG },
    display: { ...DEFAULT_DISPLAY_CONFIG },
  };

  for (const cfg of configs) {
    if (cfg.registry) {
      result.registry = {
        recordEvents: cfg.registry.recordEvents ?? result.registry.recordEvents,
        eventLogLimit: cfg.registry.eventLogLimit ?? result.registry.eventLogLimit,
      };
    }
    if (cfg.display) {
      result.display = {
        indent: cfg.display.indent ?? result.display.indent,
      };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
}): TagDispatchConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, readConfigFile(options.configFile));
  } else {
    for (const p of DEFAULT_CONFIG_FILES) {
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, readConfigFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

function parseYamlScalar(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }
    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else {
      parent[key] = parseYamlScalar(value);
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: TagDispatchConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.registry.eventLogLimit) || config.registry.eventLogLimit < 0) {
    errors.push("eventLogLimit must be a non-negative integer");
  }
  if (config.registry.recordEvents && config.registry.eventLogLimit === 0) {
    warnings.push("recordEvents is on but eventLogLimit is 0, so no events are kept");
  }
  if (!Number.isInteger(config.display.indent) || config.display.indent < 0) {
    errors.push("display.indent must be a non-negative integer");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
