// src/core/config/config.ts
// Configuration for the calculator and its command-line front end.
// Layers, later ones winning: defaults < environment < config file < overrides.

import * as fs from "fs";
import * as path from "path";
import { isNotation, NOTATIONS } from "../values/value";

// =========================================================================
// Configuration Types
// =========================================================================

export type DisplayConfig = {
  /** Initial notation: si, eng, sci, fixed, hex, oct, bin, v-hex, v-oct, v-bin or v-dec */
  notation: string;
  /** Initial precision (real notations) or width (integer notations) */
  digits: number;
  /** Text placed between a number and its units */
  spacer: string;
};

export type RuntimeConfig = {
  /** Maximum nesting of macro expansions */
  maxMacroDepth: number;
  /** degrees or radians */
  angleUnit: string;
  /** mks or cgs */
  constantSystem: string;
};

export type StartupConfig = {
  /** Resource files run before anything else; "~" is the home directory */
  rcFiles: string[];
  /** Extra start-up script run after the rc files */
  file?: string;
};

export type VariableSeed = {
  value: number;
  units?: string;
};

export type CalcConfig = {
  display: DisplayConfig;
  runtime: RuntimeConfig;
  startup: StartupConfig;
  /** Seeded in addition to Rref */
  variables: Record<string, VariableSeed>;
};

/** A partial configuration, as read from one source. */
export type ConfigLayer = {
  display?: Partial<DisplayConfig>;
  runtime?: Partial<RuntimeConfig>;
  startup?: Partial<StartupConfig>;
  variables?: Record<string, VariableSeed>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_DISPLAY_CONFIG: DisplayConfig = {
  notation: "si",
  digits: 4,
  spacer: " ",
};

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  maxMacroDepth: 100,
  angleUnit: "degrees",
  constantSystem: "mks",
};

export const DEFAULT_STARTUP_CONFIG: StartupConfig = {
  rcFiles: ["~/.ecrc", "./.ecrc"],
};

export const DEFAULT_CONFIG: CalcConfig = {
  display: DEFAULT_DISPLAY_CONFIG,
  runtime: DEFAULT_RUNTIME_CONFIG,
  startup: DEFAULT_STARTUP_CONFIG,
  variables: {},
};

export const DEFAULT_CONFIG_FILES = ["ec.config.json", "ec.config.yaml", "ec.config.yml"];

// =========================================================================
// Configuration Loading
// =========================================================================

function intOrUndefined(text: string | undefined): number | undefined {
  if (text === undefined || text.trim() === "") return undefined;
  const n = Number(text);
  return Number.isInteger(n) ? n : undefined;
}

function compact<T extends object>(obj: T): Partial<T> | undefined {
  const entries = Object.entries(obj).filter(([, v]) => v !== undefined);
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "EC", env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  return {
    display: compact({
      notation: env[`${prefix}_FORMAT`] || undefined,
      digits: intOrUndefined(env[`${prefix}_DIGITS`]),
    }),
    runtime: compact({
      maxMacroDepth: intOrUndefined(env[`${prefix}_MAX_MACRO_DEPTH`]),
      angleUnit: env[`${prefix}_ANGLE_UNIT`] || undefined,
      constantSystem: env[`${prefix}_CONSTANT_SYSTEM`] || undefined,
    }),
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): ConfigLayer {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must hold an object: ${filePath}`);
  }
  return configFromObject(data);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = data[key];
  return isRecord(v) ? v : {};
}

/** First of the given keys (camelCase, then snake_case) holding a string. */
function str(obj: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "string") return v;
  }
  return undefined;
}

function num(obj: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "number") return v;
  }
  return undefined;
}

function strings(obj: Record<string, unknown>, ...keys: string[]): string[] | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (Array.isArray(v) && v.every((s): s is string => typeof s === "string")) return v;
  }
  return undefined;
}

function variablesFrom(data: Record<string, unknown>): Record<string, VariableSeed> | undefined {
  const raw = section(data, "variables");
  const result: Record<string, VariableSeed> = {};
  for (const [name, v] of Object.entries(raw)) {
    if (typeof v === "number") {
      result[name] = { value: v };
    } else if (isRecord(v) && typeof v.value === "number") {
      result[name] = typeof v.units === "string" ? { value: v.value, units: v.units } : { value: v.value };
    } else {
      throw new Error(`Config variable ${name} needs a numeric value`);
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 */
export function configFromObject(data: Record<string, unknown>): ConfigLayer {
  const displayData = section(data, "display");
  const runtimeData = section(data, "runtime");
  const startupData = section(data, "startup");

  return {
    display: compact({
      notation: str(displayData, "notation", "format"),
      digits: num(displayData, "digits", "precision"),
      spacer: str(displayData, "spacer"),
    }),
    runtime: compact({
      maxMacroDepth: num(runtimeData, "maxMacroDepth", "max_macro_depth"),
      angleUnit: str(runtimeData, "angleUnit", "angle_unit"),
      constantSystem: str(runtimeData, "constantSystem", "constant_system"),
    }),
    startup: compact({
      rcFiles: strings(startupData, "rcFiles", "rc_files"),
      file: str(startupData, "file"),
    }),
    variables: variablesFrom(data),
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: ConfigLayer[]): CalcConfig {
  const result: CalcConfig = {
    display: { ...DEFAULT_CONFIG.display },
    runtime: { ...DEFAULT_CONFIG.runtime },
    startup: { ...DEFAULT_CONFIG.startup },
    variables: { ...DEFAULT_CONFIG.variables },
  };

  for (const cfg of configs) {
    if (cfg.display) {
      result.display = { ...result.display, ...cfg.display };
    }
    if (cfg.runtime) {
      result.runtime = { ...result.runtime, ...cfg.runtime };
    }
    if (cfg.startup) {
      result.startup = { ...result.startup, ...cfg.startup };
    }
    if (cfg.variables) {
      result.variables = { ...result.variables, ...cfg.variables };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: CLI args > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigLayer;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): CalcConfig {
  const layers: ConfigLayer[] = [configFromEnv("EC", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    // Try to find default config files
    const cwd = options?.cwd ?? process.cwd();
    for (const p of DEFAULT_CONFIG_FILES) {
      const candidate = path.join(cwd, p);
      if (fs.existsSync(candidate)) {
        layers.push(configFromFile(candidate));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

type YamlScalar = string | number | boolean | null;

function parseScalar(value: string): YamlScalar {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d*\.?\d+(?:[eE][-+]?\d+)?$/.test(value)) return parseFloat(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  const lines = content.split("\n");

  for (const rawLine of lines) {
    // Skip empty lines and comments
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    // Calculate indentation
    const indent = rawLine.search(/\S/);
    if (indent < 0) continue;

    // Pop stack to find parent at correct indent level
    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }

    const parent = stack[stack.length - 1].obj;

    // Parse key: value
    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      // Nested object
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value.startsWith("[") && value.endsWith("]")) {
      // Inline list
      const inner = value.slice(1, -1).trim();
      parent[key] = inner === "" ? [] : inner.split(",").map(item => parseScalar(item.trim()));
    } else {
      parent[key] = parseScalar(value);
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

export const ANGLE_UNITS = ["degrees", "radians"] as const;
export const CONSTANT_SYSTEMS = ["mks", "cgs"] as const;

export function validateConfig(config: CalcConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isNotation(config.display.notation)) {
    errors.push(`Unknown notation: ${config.display.notation}. Expected one of ${NOTATIONS.join(", ")}`);
  }
  if (!Number.isInteger(config.display.digits) || config.display.digits < 0 || config.display.digits > 99) {
    errors.push("digits must be an integer from 0 to 99");
  }

  if (!Number.isInteger(config.runtime.maxMacroDepth) || config.runtime.maxMacroDepth < 1) {
    errors.push("maxMacroDepth must be at least 1");
  } else if (config.runtime.maxMacroDepth > 10_000) {
    warnings.push("maxMacroDepth is very high, runaway macros will take long to stop");
  }
  if (!ANGLE_UNITS.some(u => u === config.runtime.angleUnit)) {
    errors.push(`Unknown angle unit: ${config.runtime.angleUnit}. Expected degrees or radians`);
  }
  if (!CONSTANT_SYSTEMS.some(s => s === config.runtime.constantSystem)) {
    errors.push(`Unknown constant system: ${config.runtime.constantSystem}. Expected mks or cgs`);
  }

  for (const name of Object.keys(config.variables)) {
    if (!/^[A-Za-z_]\w*$/.test(name)) {
      errors.push(`Invalid variable name: ${name}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
