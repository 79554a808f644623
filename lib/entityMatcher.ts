/**
 * Canonical vendor resolution: one case-insensitive pattern per canonical entity,
 * built from its name plus every alias. Patterns are compiled once per config load
 * and reused for every text.
 */

import type { CanonicalEntity } from "./engineConfig";

export type CompiledEntityPattern = {
  entity: CanonicalEntity;
  pattern: RegExp;
};

export type EntityMatcher = {
  readonly patterns: readonly CompiledEntityPattern[];
};

/** Separators allowed between alias tokens: whitespace, hyphen, dot. */
const TOKEN_SPLIT = /[\s\-.]+/;
const TOKEN_JOIN = String.raw`\s*[\-.\s]\s*`;

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Pattern source for one name/alias, or null if it has no tokens.
 * "ASML Holding" -> (?<!\w)ASML\s*[\-.\s]\s*Holding(?!\w), so "TEL" never matches inside "INTEL".
 */
export function aliasPatternSource(alias: string): string | null {
  const tokens = alias.trim().split(TOKEN_SPLIT).filter((t) => t.length > 0);
  if (tokens.length === 0) return null;
  return `(?<!\\w)${tokens.map(escapeRegExp).join(TOKEN_JOIN)}(?!\\w)`;
}

export function compileEntityMatcher(entities: readonly CanonicalEntity[]): EntityMatcher {
  const patterns: CompiledEntityPattern[] = [];
  for (const entity of entities) {
    const sources = [entity.name, ...entity.aliases]
      .map(aliasPatternSource)
      .filter((s): s is string => s != null);
    if (sources.length === 0) continue;
    patterns.push({ entity, pattern: new RegExp(sources.join("|"), "i") });
  }
  return Object.freeze({ patterns: Object.freeze(patterns) });
}

/**
 * Every entity whose pattern matches, in configuration order (the order is the
 * priority signal used by selectPrimaryEntity). Overlapping aliases all match.
 */
export function matchEntities(text: string, matcher: EntityMatcher): CanonicalEntity[] {
  if (!text) return [];
  const out: CanonicalEntity[] = [];
  for (const { entity, pattern } of matcher.patterns) {
    if (pattern.test(text)) out.push(entity);
  }
  return out;
}
