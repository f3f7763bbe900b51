// test/config/config.spec.ts
// Tests for configuration loading and validation

import { describe, it, expect, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
  DEFAULT_CONFIG,
} from "../../src/core/config/config";

const tempDirs: string[] = [];

async function makeTempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "tally-config-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
});

describe("configFromEnv", () => {
  it("returns defaults when no env vars set", () => {
    expect(configFromEnv("TALLY", {})).toEqual(DEFAULT_CONFIG);
  });

  it("reads section keys in upper snake case", () => {
    const config = configFromEnv("TALLY", {
      TALLY_SEARCH_DEPTH: "4",
      TALLY_MACROS_MIN_SCC_SIZE: "2",
      TALLY_GRAPH_INCREMENTAL_DEPTH: "7",
    });
    expect(config.search.depth).toBe(4);
    expect(config.macros.minSccSize).toBe(2);
    expect(config.graph.incrementalDepth).toBe(7);
    expect(config.search.width).toBe(DEFAULT_CONFIG.search.width);
  });

  it("ignores values that are not positive integers", () => {
    const config = configFromEnv("TALLY", { TALLY_SEARCH_DEPTH: "deep", TALLY_SEARCH_WIDTH: "-3" });
    expect(config.search).toEqual(DEFAULT_CONFIG.search);
  });

  it("honours a custom prefix", () => {
    expect(configFromEnv("RW", { RW_SEARCH_DEPTH: "3" }).search.depth).toBe(3);
  });
});

describe("configFromObject", () => {
  it("accepts snake_case and camelCase keys", () => {
    const config = configFromObject({
      search: { limit_max_steps: 50 },
      macros: { maxCandidates: 5, expansion_cap: 10 },
    });
    expect(config.search.limitMaxSteps).toBe(50);
    expect(config.macros.maxCandidates).toBe(5);
    expect(config.macros.expansionCap).toBe(10);
    expect(config.graph).toEqual(DEFAULT_CONFIG.graph);
  });

  it("allows a zero graph length", () => {
    expect(configFromObject({ graph: { max_length: 0 } }).graph.maxLength).toBe(0);
  });

  it("rejects invalid values with their path", () => {
    expect(() => configFromObject({ search: { depth: -1 } })).toThrow(/^Invalid config: search\.depth: /);
    expect(() => configFromObject({ macros: { min_frequency: 1.5 } })).toThrow(/^Invalid config: macros\.minFrequency: /);
  });
});

describe("mergeConfigs", () => {
  it("lets later configs win per key", () => {
    const merged = mergeConfigs({ search: { depth: 3, width: 7 } }, { search: { depth: 9 } });
    expect(merged.search).toEqual({ ...DEFAULT_CONFIG.search, depth: 9, width: 7 });
  });

  it("does not mutate the defaults", () => {
    mergeConfigs({ macros: { minSccSize: 1 } });
    expect(DEFAULT_CONFIG.macros.minSccSize).toBe(3);
  });
});

describe("configFromFile", () => {
  it("reads JSON", async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, "tally.config.json");
    await fs.writeFile(file, JSON.stringify({ graph: { maxLength: 4 } }), "utf8");
    expect(configFromFile(file).graph.maxLength).toBe(4);
  });

  it("reads nested YAML", async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, "tally.config.yaml");
    await fs.writeFile(
      file,
      ["# budgets", "search:", "  depth: 6", "macros:", "  min_scc_size: 2", "  max_candidates: 4", ""].join("\n"),
      "utf8"
    );
    const config = configFromFile(file);
    expect(config.search.depth).toBe(6);
    expect(config.macros.minSccSize).toBe(2);
    expect(config.macros.maxCandidates).toBe(4);
  });

  it("rejects missing files and unknown formats", async () => {
    const dir = await makeTempDir();
    const missing = path.join(dir, "nope.json");
    expect(() => configFromFile(missing)).toThrow(`Config file not found: ${missing}`);

    const toml = path.join(dir, "tally.toml");
    await fs.writeFile(toml, "", "utf8");
    expect(() => configFromFile(toml)).toThrow("Unsupported config file format: .toml");
  });
});

describe("loadConfig", () => {
  it("applies overrides over file over env", async () => {
    const dir = await makeTempDir();
    await fs.writeFile(
      path.join(dir, "tally.config.json"),
      JSON.stringify({ search: { depth: 5, width: 8 } }),
      "utf8"
    );

    const config = loadConfig({
      cwd: dir,
      env: { TALLY_SEARCH_DEPTH: "2", TALLY_SEARCH_WIDTH: "3", TALLY_SEARCH_LIMIT_WINDOW: "4" },
      overrides: { search: { depth: 11 } },
    });
    expect(config.search.depth).toBe(11);
    expect(config.search.width).toBe(8);
    expect(config.search.limitWindow).toBe(4);
  });

  it("uses an explicit config file over the ones in cwd", async () => {
    const dir = await makeTempDir();
    await fs.writeFile(path.join(dir, "tally.config.json"), JSON.stringify({ search: { depth: 5 } }), "utf8");
    const other = path.join(dir, "other.yml");
    await fs.writeFile(other, "search:\n  depth: 7\n", "utf8");

    expect(loadConfig({ cwd: dir, env: {}, configFile: other }).search.depth).toBe(7);
  });

  it("falls back to defaults in an empty directory", async () => {
    const dir = await makeTempDir();
    expect(loadConfig({ cwd: dir, env: {} })).toEqual(DEFAULT_CONFIG);
  });
});

describe("validateConfig", () => {
  it("accepts the defaults without warnings", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("reports inverted pattern bounds", () => {
    const result = validateConfig(mergeConfigs({ macros: { minPatternLength: 5, maxPatternLength: 3 } }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["macros.minPatternLength must not exceed macros.maxPatternLength"]);
  });

  it("reports non-integer values", () => {
    const result = validateConfig(mergeConfigs({ search: { width: 2.5 } }));
    expect(result.errors).toEqual(["search.width must be a non-negative integer"]);
  });

  it("warns about expensive or lax settings", () => {
    const result = validateConfig(
      mergeConfigs({ graph: { maxLength: 14 }, macros: { minFrequency: 1 }, search: { limitWindow: 2000 } })
    );
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      "macros.minFrequency below 2 admits patterns that occur once",
      "graph.maxLength 14 enumerates 32767 words",
      "search.limitWindow exceeds search.limitMaxSteps",
    ]);
  });
});
