/**
 * Reduce a category score map to one primary category, and a matched-entity list to
 * one primary entity.
 *
 * Category: max score wins; ties go to the first precedence entry in the tie set,
 * else the first tied category in configuration order. When nothing scored above 0
 * the fallback rules run top to bottom and the first matching rule decides.
 */

import type { CanonicalEntity } from "./engineConfig";
import type { CategoryScores } from "./riskClassifier";

export const UNCLASSIFIED = "unclassified";

export type PrimaryCategory = {
  category: string;
  score: number;
};

export type FallbackContext = {
  /** title + summary, lowercased */
  text: string;
  matchedEntities: readonly CanonicalEntity[];
  /** Names of the configured categories. */
  categories: ReadonlySet<string>;
  /** Score carried into the fallback; 0 when no category scored. */
  score: number;
};

export type FallbackRule = {
  name: string;
  when: (ctx: FallbackContext) => boolean;
  category: string;
  /** Result score is max(ctx.score, minScore). */
  minScore: number;
};

export const GEOPOLITICAL_TRIGGERS = ["tariff", "export control", "sanction", "embargo"] as const;

export const DEFAULT_FALLBACK_RULES: readonly FallbackRule[] = Object.freeze([
  {
    name: "geopolitical-trigger",
    when: (ctx: FallbackContext) =>
      ctx.categories.has("geopolitical") && GEOPOLITICAL_TRIGGERS.some((t) => ctx.text.includes(t)),
    category: "geopolitical",
    minScore: 0.6,
  },
  {
    name: "vendor-mentioned",
    when: (ctx: FallbackContext) => ctx.categories.has("vendor") && ctx.matchedEntities.length > 0,
    category: "vendor",
    minScore: 0.4,
  },
  {
    name: "unclassified",
    when: () => true,
    category: UNCLASSIFIED,
    minScore: 0,
  },
]);

/**
 * Max-score category with precedence tie-break, or null when no category scored
 * above 0. `order` is the configuration order used when precedence does not settle
 * a tie; it defaults to the key order of `scores`.
 */
export function selectPrimaryCategory(
  scores: CategoryScores,
  precedence: readonly string[],
  order: readonly string[] = Object.keys(scores)
): PrimaryCategory | null {
  const entries = order
    .filter((name) => Object.prototype.hasOwnProperty.call(scores, name))
    .map((name): [string, number] => [name, scores[name]]);
  if (entries.length === 0) return null;

  const maxScore = Math.max(...entries.map(([, v]) => v));
  if (!(maxScore > 0)) return null;

  const tied = entries.filter(([, v]) => v === maxScore).map(([k]) => k);
  const byPrecedence = precedence.find((c) => tied.includes(c));
  return { category: byPrecedence ?? tied[0], score: maxScore };
}

export function selectPrimaryEntity(matched: readonly CanonicalEntity[]): CanonicalEntity | null {
  return matched.length > 0 ? matched[0] : null;
}

/** First matching rule wins; an empty or exhausted rule list yields unclassified. */
export function applyFallbackRules(
  ctx: FallbackContext,
  rules: readonly FallbackRule[] = DEFAULT_FALLBACK_RULES
): PrimaryCategory {
  for (const rule of rules) {
    if (rule.when(ctx)) {
      return { category: rule.category, score: Math.max(ctx.score, rule.minScore) };
    }
  }
  return { category: UNCLASSIFIED, score: 0 };
}

/** Insert a rule before the named rule (or at the end when it is not present). */
export function insertFallbackRule(
  rules: readonly FallbackRule[],
  rule: FallbackRule,
  beforeName: string
): FallbackRule[] {
  const idx = rules.findIndex((r) => r.name === beforeName);
  if (idx < 0) return [...rules, rule];
  return [...rules.slice(0, idx), rule, ...rules.slice(idx)];
}
