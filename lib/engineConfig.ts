/**
 * Engine configuration: vendor universe, risk categories, severity boosts and the
 * readiness model. Every section is validated with Zod and the assembled config is
 * deep-frozen; callers pass it by reference, nothing reads it from global state.
 *
 * loadEngineConfig() reads one JSON file per section from SUPPLY_RISK_CONFIG_DIR
 * (default ./config). A missing or invalid file falls back to the built-in default
 * for that section only.
 */

import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { createLogger } from "./logger";
import defaultVendors from "./config/defaults/vendors.json";
import defaultRiskModel from "./config/defaults/risk_model.json";
import defaultSeverityBoosts from "./config/defaults/severity_boosts.json";
import defaultReadinessModel from "./config/defaults/readiness_model.json";

const log = createLogger("engine-config");

export type CanonicalEntity = {
  name: string;
  aliases: readonly string[];
};

export type RiskCategory = {
  name: string;
  keywords: readonly string[];
  weight: number;
  /** Index in the precedence list; null when the category is not listed. */
  precedence_rank: number | null;
};

export type SeverityTier = "major" | "minor";

export type SeverityBoost = {
  tier: SeverityTier;
  keywords: readonly string[];
  boost_weight: number;
};

export type MetricDirection = "higher_is_better" | "lower_is_better";

export type MetricBounds = {
  lower: number;
  upper: number;
  direction: MetricDirection;
};

export type ReadinessDimension = {
  weight: number;
  /** metric key -> bounds; the dimension subscore is the mean of present components. */
  components: Readonly<Record<string, MetricBounds>>;
};

export type ReadinessModel = {
  dimensions: Readonly<Record<string, ReadinessDimension>>;
};

export type EngineConfig = {
  entities: readonly CanonicalEntity[];
  categories: readonly RiskCategory[];
  precedence: readonly string[];
  /** Checked in order; major before minor. */
  severity_boosts: readonly SeverityBoost[];
  readiness: ReadinessModel;
};

export class EngineConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "EngineConfigError";
    this.issues = issues;
  }
}

const nameSchema = z.string().trim().min(1);

const vendorsFileSchema = z.object({
  vendors: z
    .array(
      z.object({
        name: nameSchema,
        aliases: z.array(z.string()).optional().default([]),
      })
    )
    .min(1),
});

const riskModelFileSchema = z.object({
  categories: z
    .array(
      z.object({
        name: nameSchema,
        weight: z.number().finite(),
        keywords: z.array(z.string()),
      })
    )
    .min(1),
  precedence: z.array(z.string()).optional().default([]),
});

const severityTierSchema = z.object({
  weight: z.number().finite(),
  keywords: z.array(z.string()),
});

const severityBoostsFileSchema = z.object({
  major: severityTierSchema.optional(),
  minor: severityTierSchema.optional(),
});

const metricBoundsSchema = z.object({
  lower: z.number().finite(),
  upper: z.number().finite(),
  direction: z.enum(["higher_is_better", "lower_is_better"]),
});

const readinessModelFileSchema = z.object({
  dimensions: z
    .record(
      z.string(),
      z.object({
        weight: z.number().finite().nonnegative(),
        components: z
          .record(z.string(), metricBoundsSchema)
          .refine((c) => Object.keys(c).length > 0, "dimension needs at least one component"),
      })
    )
    .refine((d) => Object.keys(d).length > 0, "at least one dimension is required"),
});

type VendorsFile = z.infer<typeof vendorsFileSchema>;
type RiskModelFile = z.infer<typeof riskModelFileSchema>;
type SeverityBoostsFile = z.infer<typeof severityBoostsFileSchema>;
type ReadinessModelFile = z.infer<typeof readinessModelFileSchema>;

const engineConfigInputSchema = z.object({
  vendors: vendorsFileSchema.shape.vendors,
  categories: riskModelFileSchema.shape.categories,
  precedence: riskModelFileSchema.shape.precedence,
  severity_boosts: severityBoostsFileSchema.optional().default({}),
  readiness: readinessModelFileSchema.optional(),
});

export type EngineConfigInput = z.input<typeof engineConfigInputSchema>;

export type ConfigSection = "vendors" | "risk_model" | "severity_boosts" | "readiness_model";

export const CONFIG_FILES: Record<ConfigSection, string> = {
  vendors: "vendors.json",
  risk_model: "risk_model.json",
  severity_boosts: "severity_boosts.json",
  readiness_model: "readiness_model.json",
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

// Built-in defaults ship with the code; a failure here is a packaging bug, so it throws.
function parseDefault<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, section: ConfigSection): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new EngineConfigError(`Built-in ${section} defaults are invalid`, formatIssues(result.error));
  }
  return result.data;
}

const DEFAULT_SECTIONS = {
  vendors: parseDefault(vendorsFileSchema, defaultVendors, "vendors"),
  risk_model: parseDefault(riskModelFileSchema, defaultRiskModel, "risk_model"),
  severity_boosts: parseDefault(severityBoostsFileSchema, defaultSeverityBoosts, "severity_boosts"),
  readiness_model: parseDefault(readinessModelFileSchema, defaultReadinessModel, "readiness_model"),
};

function cleanList(values: readonly string[]): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const v of values) {
    const t = v.trim();
    if (!t || seen.has(t.toLowerCase())) continue;
    seen.add(t.toLowerCase());
    out.push(t);
  }
  return out;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

function assemble(
  vendors: VendorsFile["vendors"],
  riskModel: RiskModelFile,
  severity: SeverityBoostsFile,
  readiness: ReadinessModelFile
): EngineConfig {
  const seenEntities = new Set<string>();
  const entities: CanonicalEntity[] = [];
  for (const v of vendors) {
    if (seenEntities.has(v.name)) continue;
    seenEntities.add(v.name);
    entities.push({ name: v.name, aliases: cleanList(v.aliases) });
  }

  const precedence = cleanList(riskModel.precedence);
  const seenCategories = new Set<string>();
  const categories: RiskCategory[] = [];
  for (const c of riskModel.categories) {
    if (seenCategories.has(c.name)) continue;
    seenCategories.add(c.name);
    const rank = precedence.indexOf(c.name);
    categories.push({
      name: c.name,
      weight: c.weight,
      keywords: cleanList(c.keywords),
      precedence_rank: rank >= 0 ? rank : null,
    });
  }

  const severity_boosts: SeverityBoost[] = [];
  for (const tier of ["major", "minor"] as const) {
    const t = severity[tier];
    if (!t) continue;
    const keywords = cleanList(t.keywords).map((k) => k.toLowerCase());
    if (keywords.length === 0) continue;
    severity_boosts.push({ tier, keywords, boost_weight: t.weight });
  }

  return deepFreeze({
    entities,
    categories,
    precedence,
    severity_boosts,
    readiness: { dimensions: readiness.dimensions },
  });
}

/**
 * Build a config from in-memory structures. Throws EngineConfigError when the input
 * is structurally invalid; omitted severity/readiness sections use the defaults.
 */
export function createEngineConfig(input: EngineConfigInput): EngineConfig {
  const result = engineConfigInputSchema.safeParse(input);
  if (!result.success) {
    throw new EngineConfigError("Invalid engine configuration", formatIssues(result.error));
  }
  const d = result.data;
  return assemble(
    d.vendors,
    { categories: d.categories, precedence: d.precedence },
    d.severity_boosts,
    d.readiness ?? DEFAULT_SECTIONS.readiness_model
  );
}

export function getDefaultEngineConfig(): EngineConfig {
  return assemble(
    DEFAULT_SECTIONS.vendors.vendors,
    DEFAULT_SECTIONS.risk_model,
    DEFAULT_SECTIONS.severity_boosts,
    DEFAULT_SECTIONS.readiness_model
  );
}

export type ReadConfigFile = (filePath: string) => string | null;

/** Returns file contents, or null when the file does not exist. Other I/O errors throw. */
export const readConfigFileFromDisk: ReadConfigFile = (filePath) => {
  try {
    return readFileSync(filePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
};

export type LoadEngineConfigOptions = {
  dir?: string;
  readFile?: ReadConfigFile;
};

export type LoadedEngineConfig = {
  config: EngineConfig;
  sources: Record<ConfigSection, "file" | "default">;
};

function loadSection<T>(
  section: ConfigSection,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  dir: string,
  readFile: ReadConfigFile
): T | null {
  const filePath = path.join(dir, CONFIG_FILES[section]);
  let text: string | null;
  try {
    text = readFile(filePath);
  } catch (err) {
    log.warn(`could not read ${filePath}; using built-in ${section}`, { error: String(err) });
    return null;
  }
  if (text == null) {
    log.debug(`${filePath} not found; using built-in ${section}`);
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    log.warn(`${filePath} is not valid JSON; using built-in ${section}`, { error: String(err) });
    return null;
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    log.warn(`${filePath} failed validation; using built-in ${section}`, {
      issues: formatIssues(result.error),
    });
    return null;
  }
  return result.data;
}

/**
 * Load the engine config from disk with per-section fallback. Never throws for a
 * bad file; the offending section is replaced by its default and a warning is logged.
 */
export function loadEngineConfig(options: LoadEngineConfigOptions = {}): LoadedEngineConfig {
  const dir = options.dir ?? process.env.SUPPLY_RISK_CONFIG_DIR ?? "config";
  const readFile = options.readFile ?? readConfigFileFromDisk;

  const vendors = loadSection("vendors", vendorsFileSchema, dir, readFile);
  const riskModel = loadSection("risk_model", riskModelFileSchema, dir, readFile);
  const severity = loadSection("severity_boosts", severityBoostsFileSchema, dir, readFile);
  const readiness = loadSection("readiness_model", readinessModelFileSchema, dir, readFile);

  const config = assemble(
    (vendors ?? DEFAULT_SECTIONS.vendors).vendors,
    riskModel ?? DEFAULT_SECTIONS.risk_model,
    severity ?? DEFAULT_SECTIONS.severity_boosts,
    readiness ?? DEFAULT_SECTIONS.readiness_model
  );

  return {
    config,
    sources: {
      vendors: vendors ? "file" : "default",
      risk_model: riskModel ? "file" : "default",
      severity_boosts: severity ? "file" : "default",
      readiness_model: readiness ? "file" : "default",
    },
  };
}
