/**
 * News classification pipeline: entity match -> category scores -> primary pick.
 * Pure per call; every result is computed fresh and fully replaces earlier derived
 * fields for that record.
 */

import { z } from "zod";
import type { CanonicalEntity, EngineConfig } from "./engineConfig";
import { compileEntityMatcher, matchEntities, type EntityMatcher } from "./entityMatcher";
import { compileRiskClassifier, scoreRiskCategories, type CategoryScores, type RiskClassifier } from "./riskClassifier";
import {
  applyFallbackRules,
  DEFAULT_FALLBACK_RULES,
  selectPrimaryCategory,
  selectPrimaryEntity,
  UNCLASSIFIED,
  type FallbackRule,
} from "./primarySelector";
import { createLogger } from "./logger";

const log = createLogger("classify");

/** Config plus everything compiled from it. Built once per load, never mutated. */
export type CompiledEngine = {
  readonly config: EngineConfig;
  readonly matcher: EntityMatcher;
  readonly classifier: RiskClassifier;
  readonly categoryNames: ReadonlySet<string>;
  /** Category names in configuration order. */
  readonly categoryOrder: readonly string[];
  readonly fallbackRules: readonly FallbackRule[];
};

export type NewsRecord = {
  id: string;
  title: string | null;
  summary: string | null;
};

export type ClassificationResult = {
  matched_entities: CanonicalEntity[];
  category_scores: CategoryScores;
  primary_entity: CanonicalEntity | null;
  primary_category: string;
  primary_score: number;
};

export type RecordClassification = ClassificationResult & { id: string };

export function compileEngine(
  config: EngineConfig,
  fallbackRules: readonly FallbackRule[] = DEFAULT_FALLBACK_RULES
): CompiledEngine {
  return Object.freeze({
    config,
    matcher: compileEntityMatcher(config.entities),
    classifier: compileRiskClassifier(config.categories, config.severity_boosts),
    categoryNames: new Set(config.categories.map((c) => c.name)),
    categoryOrder: Object.freeze(config.categories.map((c) => c.name)),
    fallbackRules: Object.freeze([...fallbackRules]),
  });
}

export function recordText(title: string | null | undefined, summary: string | null | undefined): string {
  return `${title ?? ""} ${summary ?? ""}`.trim();
}

export function unclassifiedResult(engine: CompiledEngine): ClassificationResult {
  const category_scores: CategoryScores = Object.fromEntries(
    engine.categoryOrder.map((name): [string, number] => [name, 0])
  );
  return {
    matched_entities: [],
    category_scores,
    primary_entity: null,
    primary_category: UNCLASSIFIED,
    primary_score: 0,
  };
}

export function classifyText(text: string, engine: CompiledEngine): ClassificationResult {
  const matched_entities = matchEntities(text, engine.matcher);
  const category_scores = scoreRiskCategories(text, engine.classifier);
  const primary_entity = selectPrimaryEntity(matched_entities);

  const picked = selectPrimaryCategory(category_scores, engine.config.precedence, engine.categoryOrder);
  const primary =
    picked ??
    applyFallbackRules(
      {
        text: text.toLowerCase(),
        matchedEntities: matched_entities,
        categories: engine.categoryNames,
        score: 0,
      },
      engine.fallbackRules
    );

  return {
    matched_entities,
    category_scores,
    primary_entity,
    primary_category: primary.category,
    primary_score: primary.score,
  };
}

const newsRecordSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  title: z.string().nullable().optional(),
  summary: z.string().nullable().optional(),
});

/**
 * Classify one untrusted record. Never throws: a malformed record degrades to the
 * unclassified result (id "" when no id can be read).
 */
export function classifyRecord(raw: unknown, engine: CompiledEngine): RecordClassification {
  const parsed = newsRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const id = readId(raw);
    log.warn("malformed news record; marking unclassified", {
      id,
      issues: parsed.error.issues.map((i) => i.message),
    });
    return { id, ...unclassifiedResult(engine) };
  }
  const { id, title, summary } = parsed.data;
  try {
    return { id, ...classifyText(recordText(title, summary), engine) };
  } catch (err) {
    log.warn("classification failed; marking unclassified", { id, error: String(err) });
    return { id, ...unclassifiedResult(engine) };
  }
}

function readId(raw: unknown): string {
  if (raw !== null && typeof raw === "object" && "id" in raw) {
    const id = raw.id;
    if (typeof id === "string" || typeof id === "number") return String(id);
  }
  return "";
}

export function classifyBatch(records: readonly unknown[], engine: CompiledEngine): RecordClassification[] {
  return records.map((r) => classifyRecord(r, engine));
}
