import path from "path";
import { describe, it, expect, vi, afterEach } from "vitest";
import {
  createEngineConfig,
  EngineConfigError,
  getDefaultEngineConfig,
  loadEngineConfig,
  type ReadConfigFile,
} from "./engineConfig";

afterEach(() => {
  vi.restoreAllMocks();
});

function fakeFiles(files: Record<string, string>): ReadConfigFile {
  return (filePath) => files[path.basename(filePath)] ?? null;
}

describe("getDefaultEngineConfig", () => {
  it("ships the vendor universe, categories and both severity tiers", () => {
    const config = getDefaultEngineConfig();
    expect(config.entities.find((e) => e.name === "ASML")?.aliases).toEqual(["ASML Holding", "ASML Holdings"]);
    expect(config.categories[0]).toMatchObject({ name: "geopolitical", weight: 3, precedence_rank: 0 });
    expect(config.severity_boosts.map((b) => b.tier)).toEqual(["major", "minor"]);
    expect(Object.keys(config.readiness.dimensions)).toEqual([
      "otif",
      "lead_time",
      "tightness",
      "concentration",
      "serviceability",
    ]);
  });

  it("is deeply frozen", () => {
    const config = getDefaultEngineConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.entities[0])).toBe(true);
    expect(Object.isFrozen(config.categories[0].keywords)).toBe(true);
  });
});

describe("createEngineConfig", () => {
  it("cleans aliases and keywords and ranks precedence", () => {
    const config = createEngineConfig({
      vendors: [
        { name: " ASML ", aliases: ["ASML Holding", " asml holding ", ""] },
        { name: "ASML", aliases: ["dupe"] },
      ],
      categories: [
        { name: "vendor", weight: 2, keywords: ["Supplier", "supplier", " "] },
        { name: "geopolitical", weight: 3, keywords: ["tariff"] },
      ],
      precedence: ["geopolitical"],
      severity_boosts: { major: { weight: 1, keywords: ["Embargo"] }, minor: { weight: 0.5, keywords: [] } },
    });
    expect(config.entities).toEqual([{ name: "ASML", aliases: ["ASML Holding"] }]);
    expect(config.categories).toEqual([
      { name: "vendor", weight: 2, keywords: ["Supplier"], precedence_rank: null },
      { name: "geopolitical", weight: 3, keywords: ["tariff"], precedence_rank: 0 },
    ]);
    expect(config.severity_boosts).toEqual([{ tier: "major", keywords: ["embargo"], boost_weight: 1 }]);
  });

  it("uses the built-in readiness model when none is given", () => {
    const config = createEngineConfig({
      vendors: [{ name: "ASML" }],
      categories: [{ name: "vendor", weight: 1, keywords: [] }],
    });
    expect(config.readiness).toEqual(getDefaultEngineConfig().readiness);
    expect(config.severity_boosts).toEqual([]);
    expect(config.precedence).toEqual([]);
  });

  it("throws EngineConfigError for structurally invalid input", () => {
    let caught: unknown;
    try {
      createEngineConfig({ vendors: [], categories: [{ name: "vendor", weight: Number.NaN, keywords: [] }] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(EngineConfigError);
    if (caught instanceof EngineConfigError) {
      expect(caught.message.startsWith("Invalid engine configuration: ")).toBe(true);
      expect(caught.issues).toHaveLength(2);
    }
  });
});

describe("loadEngineConfig", () => {
  it("uses every default when the directory is empty", () => {
    const loaded = loadEngineConfig({ dir: "cfg", readFile: fakeFiles({}) });
    expect(loaded.sources).toEqual({
      vendors: "default",
      risk_model: "default",
      severity_boosts: "default",
      readiness_model: "default",
    });
    expect(loaded.config).toEqual(getDefaultEngineConfig());
  });

  it("replaces only the sections that load", () => {
    const loaded = loadEngineConfig({
      dir: "cfg",
      readFile: fakeFiles({ "vendors.json": JSON.stringify({ vendors: [{ name: "Acme Fab" }] }) }),
    });
    expect(loaded.sources.vendors).toBe("file");
    expect(loaded.sources.risk_model).toBe("default");
    expect(loaded.config.entities).toEqual([{ name: "Acme Fab", aliases: [] }]);
    expect(loaded.config.categories).toEqual(getDefaultEngineConfig().categories);
  });

  it("falls back per section on bad JSON or failed validation", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const loaded = loadEngineConfig({
      dir: "cfg",
      readFile: fakeFiles({
        "risk_model.json": "{ not json",
        "severity_boosts.json": JSON.stringify({ major: { weight: "high", keywords: [] } }),
        "readiness_model.json": JSON.stringify({
          dimensions: { otif: { weight: 1, components: { otif_pct: { lower: 0, upper: 100, direction: "higher_is_better" } } } },
        }),
      }),
    });
    expect(loaded.sources).toEqual({
      vendors: "default",
      risk_model: "default",
      severity_boosts: "default",
      readiness_model: "file",
    });
    expect(Object.keys(loaded.config.readiness.dimensions)).toEqual(["otif"]);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("falls back when a file cannot be read", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const loaded = loadEngineConfig({
      dir: "cfg",
      readFile: (filePath) => {
        if (filePath.endsWith("vendors.json")) throw new Error("EACCES: permission denied");
        return null;
      },
    });
    expect(loaded.sources.vendors).toBe("default");
    expect(loaded.config.entities).toEqual(getDefaultEngineConfig().entities);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("reads from the configured directory", () => {
    const seen: string[] = [];
    loadEngineConfig({
      dir: "custom",
      readFile: (filePath) => {
        seen.push(filePath);
        return null;
      },
    });
    expect(seen).toEqual([
      path.join("custom", "vendors.json"),
      path.join("custom", "risk_model.json"),
      path.join("custom", "severity_boosts.json"),
      path.join("custom", "readiness_model.json"),
    ]);
  });
});
