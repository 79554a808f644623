/**
 * Additive risk scoring. A category earns its configured weight once when any of its
 * keywords appears (presence, not hit count). A severity boost is then added to every
 * category: major if any major keyword appears, else minor if any minor keyword does.
 * Matched or not, every category gets the same boost.
 */

import type { RiskCategory, SeverityBoost } from "./engineConfig";
import { escapeRegExp } from "./entityMatcher";

export type CompiledCategory = {
  category: RiskCategory;
  /** null when the category has no keywords; it can then only score via the boost. */
  pattern: RegExp | null;
};

export type RiskClassifier = {
  readonly categories: readonly CompiledCategory[];
  readonly severityBoosts: readonly SeverityBoost[];
};

/**
 * One own property per configured category. Key order is not configuration order
 * (integer-like names sort first); use the classifier's category list for ordering.
 */
export type CategoryScores = Record<string, number>;

export function compileRiskClassifier(
  categories: readonly RiskCategory[],
  severityBoosts: readonly SeverityBoost[]
): RiskClassifier {
  const compiled: CompiledCategory[] = categories.map((category) => ({
    category,
    pattern: category.keywords.length
      ? new RegExp(category.keywords.map(escapeRegExp).join("|"), "i")
      : null,
  }));
  return Object.freeze({
    categories: Object.freeze(compiled),
    severityBoosts: Object.freeze(
      severityBoosts.map((b) => ({ ...b, keywords: b.keywords.map((k) => k.toLowerCase()) }))
    ),
  });
}

/**
 * The first boost tier whose keywords occur in the text, or null. Major is checked first.
 * Keywords are expected lowercased, as compileRiskClassifier stores them.
 */
export function findSeverityBoost(text: string, boosts: readonly SeverityBoost[]): SeverityBoost | null {
  const low = text.toLowerCase();
  for (const tier of ["major", "minor"] as const) {
    const boost = boosts.find((b) => b.tier === tier);
    if (boost && boost.keywords.some((k) => low.includes(k))) return boost;
  }
  return null;
}

/** Dense score map over every configured category (zero scores included). */
export function scoreRiskCategories(text: string, classifier: RiskClassifier): CategoryScores {
  const boost = findSeverityBoost(text, classifier.severityBoosts)?.boost_weight ?? 0;
  // fromEntries defines own properties, so names like "__proto__" are kept.
  return Object.fromEntries(
    classifier.categories.map(({ category, pattern }): [string, number] => [
      category.name,
      (pattern && pattern.test(text) ? category.weight : 0) + boost,
    ])
  );
}
