// src/core/config/config.ts
// Search budgets and macro-lifting thresholds, from env, file, or object.

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";

// =========================================================================
// Configuration Types
// =========================================================================

export type SearchConfig = {
  /** BFS depth for reachability and bounded reach */
  depth: number;
  /** Applications expanded per word during BFS */
  width: number;
  /** Steps followed when looking for a limit cycle */
  limitMaxSteps: number;
  /** Trailing states kept when no cycle is found */
  limitWindow: number;
};

export type GraphConfig = {
  /** Length bound for the exhaustive configuration graph */
  maxLength: number;
  /** BFS depth for the incremental graph */
  incrementalDepth: number;
};

export type MacroConfig = {
  minPatternLength: number;
  maxPatternLength: number;
  minFrequency: number;
  /** Attractors smaller than this are not mined */
  minSccSize: number;
  /** Candidates tried per lifting run */
  maxCandidates: number;
  confluenceDepth: number;
  confluenceWidth: number;
  maxCriticalStrings: number;
  bisimulationLength: number;
  bisimulationDepth: number;
  bisimulationWidth: number;
  bisimulationSamples: number;
  /** Substitution passes before expansion gives up */
  expansionCap: number;
};

export type TallyConfig = {
  search: SearchConfig;
  graph: GraphConfig;
  macros: MacroConfig;
};

export type PartialTallyConfig = {
  search?: Partial<SearchConfig>;
  graph?: Partial<GraphConfig>;
  macros?: Partial<MacroConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  depth: 10,
  width: 50,
  limitMaxSteps: 1000,
  limitWindow: 100,
};

export const DEFAULT_GRAPH_CONFIG: GraphConfig = {
  maxLength: 6,
  incrementalDepth: 5,
};

export const DEFAULT_MACRO_CONFIG: MacroConfig = {
  minPatternLength: 2,
  maxPatternLength: 4,
  minFrequency: 2,
  minSccSize: 3,
  maxCandidates: 20,
  confluenceDepth: 5,
  confluenceWidth: 50,
  maxCriticalStrings: 20,
  bisimulationLength: 6,
  bisimulationDepth: 3,
  bisimulationWidth: 30,
  bisimulationSamples: 10,
  expansionCap: 100,
};

export const DEFAULT_CONFIG: TallyConfig = {
  search: DEFAULT_SEARCH_CONFIG,
  graph: DEFAULT_GRAPH_CONFIG,
  macros: DEFAULT_MACRO_CONFIG,
};

// =========================================================================
// Schema
// =========================================================================

const count = z.number().int().positive();

const configSchema = z.object({
  search: z
    .object({ depth: count, width: count, limitMaxSteps: count, limitWindow: count })
    .partial()
    .optional(),
  graph: z.object({ maxLength: z.number().int().nonnegative(), incrementalDepth: count }).partial().optional(),
  macros: z
    .object({
      minPatternLength: count,
      maxPatternLength: count,
      minFrequency: count,
      minSccSize: count,
      maxCandidates: count,
      confluenceDepth: count,
      confluenceWidth: count,
      maxCriticalStrings: count,
      bisimulationLength: count,
      bisimulationDepth: count,
      bisimulationWidth: count,
      bisimulationSamples: count,
      expansionCap: count,
    })
    .partial()
    .optional(),
});

type Section = keyof TallyConfig;

const SECTIONS: readonly Section[] = ["search", "graph", "macros"];

// =========================================================================
// Configuration Loading
// =========================================================================

function envKey(prefix: string, section: Section, key: string): string {
  return `${prefix}_${section}_${toSnake(key)}`.toUpperCase();
}

function readSection<T extends Record<string, number>>(
  env: NodeJS.ProcessEnv,
  prefix: string,
  section: Section,
  defaults: T
): T {
  const out: T = { ...defaults };
  for (const key of Object.keys(defaults)) {
    const raw = env[envKey(prefix, section, key)];
    const n = parseInt(raw || "", 10);
    if (Number.isFinite(n) && n > 0) {
      Object.assign(out, { [key]: n });
    }
  }
  return out;
}

/**
 * Load configuration from environment variables named
 * `<PREFIX>_<SECTION>_<KEY>`, e.g. `TALLY_SEARCH_DEPTH`, `TALLY_MACROS_MIN_SCC_SIZE`.
 * Unset or non-positive values fall back to the defaults.
 */
export function configFromEnv(prefix = "TALLY", env: NodeJS.ProcessEnv = process.env): TallyConfig {
  return {
    search: readSection(env, prefix, "search", DEFAULT_SEARCH_CONFIG),
    graph: readSection(env, prefix, "graph", DEFAULT_GRAPH_CONFIG),
    macros: readSection(env, prefix, "macros", DEFAULT_MACRO_CONFIG),
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): TallyConfig {
  return mergeConfigs(readConfigFile(filePath));
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Keys may be camelCase or snake_case. Missing keys take the defaults;
 * anything that is not a positive integer is rejected.
 */
export function configFromObject(data: unknown): TallyConfig {
  return mergeConfigs(parsePartialConfig(data));
}

/** Only the keys the file sets; defaults are not filled in. */
function readConfigFile(filePath: string): PartialTallyConfig {
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

  return parsePartialConfig(data);
}

function parsePartialConfig(data: unknown): PartialTallyConfig {
  const parsed = configSchema.safeParse(normalizeKeys(data));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid config: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialTallyConfig[]): TallyConfig {
  const result: TallyConfig = {
    search: { ...DEFAULT_SEARCH_CONFIG },
    graph: { ...DEFAULT_GRAPH_CONFIG },
    macros: { ...DEFAULT_MACRO_CONFIG },
  };

  for (const cfg of configs) {
    if (cfg.search) {
      result.search = { ...result.search, ...cfg.search };
    }
    if (cfg.graph) {
      result.graph = { ...result.graph, ...cfg.graph };
    }
    if (cfg.macros) {
      result.macros = { ...result.macros, ...cfg.macros };
    }
  }

  return result;
}

export const DEFAULT_CONFIG_FILES = ["tally.config.json", "tally.config.yaml", "tally.config.yml"];

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialTallyConfig;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): TallyConfig {
  // Start with env config (includes defaults)
  let config = configFromEnv("TALLY", options?.env);

  if (options?.configFile) {
    config = mergeConfigs(config, readConfigFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
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
// Key normalization
// =========================================================================

function toSnake(key: string): string {
  return key.replace(/[A-Z]/g, ch => `_${ch.toLowerCase()}`);
}

function toCamel(key: string): string {
  return key.replace(/_([a-z])/g, (_, ch: string) => ch.toUpperCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeKeys(data: unknown): unknown {
  if (!isRecord(data)) return data;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[toCamel(key)] = normalizeKeys(value);
  }
  return out;
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

type YamlFrame = { obj: Record<string, unknown>; indent: number };

function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: YamlFrame[] = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);
    if (indent < 0) continue;

    let top = stack[stack.length - 1];
    while (top && stack.length > 1 && top.indent >= indent) {
      stack.pop();
      top = stack[stack.length - 1];
    }
    const parent = top ? top.obj : result;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else {
      parent[key] = parseScalar(value);
    }
  }

  return result;
}

function parseScalar(value: string): unknown {
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

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: TallyConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const m = config.macros;

  for (const section of SECTIONS) {
    for (const [key, value] of Object.entries(config[section])) {
      if (!Number.isInteger(value) || value < 0) {
        errors.push(`${section}.${key} must be a non-negative integer`);
      }
    }
  }

  if (m.minPatternLength > m.maxPatternLength) {
    errors.push("macros.minPatternLength must not exceed macros.maxPatternLength");
  }
  if (m.minFrequency < 2) {
    warnings.push("macros.minFrequency below 2 admits patterns that occur once");
  }
  if (config.graph.maxLength > 12) {
    warnings.push(`graph.maxLength ${config.graph.maxLength} enumerates ${2 ** (config.graph.maxLength + 1) - 1} words`);
  }
  if (config.search.limitWindow > config.search.limitMaxSteps) {
    warnings.push("search.limitWindow exceeds search.limitMaxSteps");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
