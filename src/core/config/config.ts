// src/core/config/config.ts
// Configuration for the emitter and the host compiler
// Priority: overrides > config file > environment > defaults

import * as fs from "fs";
import * as path from "path";
import { DEFAULT_EMIT_OPTIONS, type DoReturnStyle, type EmitOptions } from "../emit";

// =========================================================================
// Configuration Types
// =========================================================================

export type HostConfig = {
  /** Host compiler executable */
  command: string;
  /** Arguments placed before the sidecar path */
  args: string[];
  /** Extension of the generated sidecar file, dot included */
  extension: string;
};

export type LispnimConfig = {
  emit: EmitOptions;
  host: HostConfig;
};

/** A partial configuration layer; only the keys it sets take effect when merged. */
export type ConfigLayer = {
  emit?: Partial<EmitOptions>;
  host?: Partial<HostConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_HOST_CONFIG: HostConfig = {
  command: "nim",
  args: ["c", "--path:.", "-r"],
  extension: ".nim",
};

export const DEFAULT_CONFIG: LispnimConfig = {
  emit: DEFAULT_EMIT_OPTIONS,
  host: DEFAULT_HOST_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["lispnim.config.json", "lispnim.config.yaml", "lispnim.config.yml"];

// =========================================================================
// Value Helpers
// =========================================================================

function definedOnly<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  let key: Extract<keyof T, string>;
  for (key in obj) {
    if (obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function asPositiveInt(value: unknown): number | undefined {
  const n = typeof value === "string" ? parseInt(value, 10) : value;
  return typeof n === "number" && Number.isInteger(n) && n > 0 ? n : undefined;
}

function asDoReturn(value: unknown): DoReturnStyle | undefined {
  return value === "explicit" || value === "implicit" ? value : undefined;
}

/** Host args come as a list, or as one whitespace-separated string. */
function asArgs(value: unknown): string[] | undefined {
  if (typeof value === "string") return value.split(/\s+/).filter((a) => a !== "");
  if (Array.isArray(value) && value.every((a): a is string => typeof a === "string")) return value;
  return undefined;
}

function indentOf(width: number | undefined): string | undefined {
  return width === undefined ? undefined : " ".repeat(width);
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load a configuration layer from environment variables.
 */
export function configFromEnv(prefix = "LISPNIM", env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  return {
    emit: definedOnly({
      indent: indentOf(asPositiveInt(env[`${prefix}_INDENT_WIDTH`])),
      doReturn: asDoReturn(env[`${prefix}_DO_RETURN`]),
    }),
    host: definedOnly({
      command: asString(env[`${prefix}_HOST_COMMAND`]),
      args: asArgs(env[`${prefix}_HOST_ARGS`]),
      extension: asString(env[`${prefix}_EXTENSION`]),
    }),
  };
}

/**
 * Create a configuration layer from a plain object (e.g., parsed JSON/YAML).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): ConfigLayer {
  const emitData = asRecord(data.emit);
  const hostData = asRecord(data.host);

  return {
    emit: definedOnly({
      indent: indentOf(asPositiveInt(emitData.indentWidth ?? emitData.indent_width)),
      doReturn: asDoReturn(emitData.doReturn ?? emitData.do_return),
    }),
    host: definedOnly({
      command: asString(hostData.command),
      args: asArgs(hostData.args),
      extension: asString(hostData.extension),
    }),
  };
}

/**
 * Load a configuration layer from a JSON or YAML file.
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
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  return configFromObject(asRecord(data));
}

/**
 * Apply layers over the defaults, later layers overriding earlier ones.
 */
export function mergeConfigs(...layers: ConfigLayer[]): LispnimConfig {
  const result: LispnimConfig = {
    emit: { ...DEFAULT_CONFIG.emit },
    host: { ...DEFAULT_CONFIG.host, args: [...DEFAULT_CONFIG.host.args] },
  };

  for (const layer of layers) {
    if (layer.emit) {
      result.emit = { ...result.emit, ...definedOnly(layer.emit) };
    }
    if (layer.host) {
      result.host = { ...result.host, ...definedOnly(layer.host) };
    }
  }

  return result;
}

/**
 * Load the effective configuration.
 * Without an explicit file, the first of DEFAULT_CONFIG_FILES found in `cwd` is used.
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigLayer;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): LispnimConfig {
  const layers: ConfigLayer[] = [configFromEnv("LISPNIM", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    const found = DEFAULT_CONFIG_FILES.map((f) => path.join(cwd, f)).find((p) => fs.existsSync(p));
    if (found) layers.push(configFromFile(found));
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    // Skip empty lines and comments
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    // Pop stack to find parent at correct indent level
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
    } else if (value === "true" || value === "false") {
      parent[key] = value === "true";
    } else if (/^-?\d+$/.test(value)) {
      parent[key] = parseInt(value, 10);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
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

export function validateConfig(config: LispnimConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!/^ +$/.test(config.emit.indent)) {
    errors.push("emit indent must be one or more spaces");
  }
  if (!config.host.command.trim()) {
    errors.push("host command must not be empty");
  }
  if (!/^\.[A-Za-z0-9_]+$/.test(config.host.extension)) {
    errors.push(`host extension must look like ".nim", got: ${JSON.stringify(config.host.extension)}`);
  }
  if (config.emit.doReturn === "implicit") {
    warnings.push("implicit do blocks rely on the host's last-expression value");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
