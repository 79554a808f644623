/**
 * Readiness Index (0–100): weighted composite of direction-aware, min-max normalized
 * dimension subscores.
 *
 * Missing inputs are first-class: a missing subscore is null (never 0), and weights are
 * renormalized over the dimensions actually present for each entity, so sparse data
 * lowers coverage rather than the score. No present dimensions -> composite null.
 */

import type { MetricBounds, ReadinessModel } from "./engineConfig";

export type MetricRecord = {
  entity: string;
  dimension: string;
  value: number | null;
  /** ISO timestamp; the latest observation per (entity, dimension) is used. */
  timestamp: string | null;
};

export type DimensionSubscore = {
  entity: string;
  dimension: string;
  normalized: number | null;
};

export type ReadinessScore = {
  entity: string;
  composite: number | null;
  subscores: Record<string, number | null>;
  /** Renormalized weights of the present dimensions; sums to 1 when composite is set. */
  weights_used: Record<string, number>;
};

/**
 * Min-max scale into [0,1]; inverted for lower_is_better. Null when the value is
 * absent or non-finite, or when the bounds are degenerate (upper === lower).
 */
export function normalizeMetric(value: number | null | undefined, bounds: MetricBounds): number | null {
  if (value == null || !Number.isFinite(value)) return null;
  const span = bounds.upper - bounds.lower;
  if (span === 0 || !Number.isFinite(span)) return null;
  const raw =
    bounds.direction === "higher_is_better"
      ? (value - bounds.lower) / span
      : (bounds.upper - value) / span;
  return Math.min(1, Math.max(0, raw));
}

function timeOf(ts: string | null): number {
  if (ts == null) return Number.NEGATIVE_INFINITY;
  const t = Date.parse(ts);
  return Number.isNaN(t) ? Number.NEGATIVE_INFINITY : t;
}

/**
 * Latest finite value per entity and metric. Equal timestamps resolve to the later
 * record in input order (the table is append-only).
 */
export function latestMetricValues(records: readonly MetricRecord[]): Map<string, Map<string, number>> {
  const best = new Map<string, Map<string, { value: number; t: number }>>();
  for (const r of records) {
    if (r.value == null || !Number.isFinite(r.value)) continue;
    const t = timeOf(r.timestamp);
    const byMetric = best.get(r.entity) ?? new Map<string, { value: number; t: number }>();
    const prev = byMetric.get(r.dimension);
    if (!prev || t >= prev.t) byMetric.set(r.dimension, { value: r.value, t });
    best.set(r.entity, byMetric);
  }
  const out = new Map<string, Map<string, number>>();
  for (const [entity, byMetric] of best) {
    out.set(entity, new Map(Array.from(byMetric, ([k, v]) => [k, v.value])));
  }
  return out;
}

/** Weighted composite over the present subscores with weights renormalized to sum to 1. */
export function computeCompositeScore(
  subscores: Readonly<Record<string, number | null>>,
  weights: Readonly<Record<string, number>>
): { composite: number | null; weights_used: Record<string, number> } {
  const present = Object.keys(subscores).filter(
    (d) => subscores[d] != null && weights[d] != null && Number.isFinite(weights[d])
  );
  const total = present.reduce((s, d) => s + weights[d], 0);
  if (present.length === 0 || !(total > 0)) return { composite: null, weights_used: {} };

  const weights_used: Record<string, number> = {};
  let sum = 0;
  for (const d of present) {
    const w = weights[d] / total;
    weights_used[d] = w;
    sum += w * (subscores[d] ?? 0);
  }
  return { composite: sum * 100, weights_used };
}

/** Dimension-level entry point: one ReadinessScore per entity, in first-seen order. */
export function computeCompositeScores(
  table: readonly DimensionSubscore[],
  weights: Readonly<Record<string, number>>
): ReadinessScore[] {
  const byEntity = new Map<string, Record<string, number | null>>();
  for (const row of table) {
    const subs = byEntity.get(row.entity) ?? {};
    subs[row.dimension] = row.normalized;
    byEntity.set(row.entity, subs);
  }
  return Array.from(byEntity, ([entity, subscores]) => ({
    entity,
    subscores,
    ...computeCompositeScore(subscores, weights),
  }));
}

/** Each dimension subscore is the mean of its present components; null if none are present. */
export function scoreDimensions(
  metrics: ReadonlyMap<string, number>,
  model: ReadinessModel
): Record<string, number | null> {
  const out: Record<string, number | null> = {};
  for (const [dimension, dim] of Object.entries(model.dimensions)) {
    const parts = Object.entries(dim.components)
      .map(([metric, bounds]) => normalizeMetric(metrics.get(metric), bounds))
      .filter((v): v is number => v != null);
    out[dimension] = parts.length ? parts.reduce((s, v) => s + v, 0) / parts.length : null;
  }
  return out;
}

export function dimensionWeights(model: ReadinessModel): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [dimension, dim] of Object.entries(model.dimensions)) out[dimension] = dim.weight;
  return out;
}

export function computeReadinessIndex(records: readonly MetricRecord[], model: ReadinessModel): ReadinessScore[] {
  const latest = latestMetricValues(records);
  const weights = dimensionWeights(model);
  const table: DimensionSubscore[] = [];
  for (const [entity, metrics] of latest) {
    for (const [dimension, normalized] of Object.entries(scoreDimensions(metrics, model))) {
      table.push({ entity, dimension, normalized });
    }
  }
  return computeCompositeScores(table, weights);
}

/** Highest composite first; missing composites last; ties by entity name. */
export function rankReadiness(scores: readonly ReadinessScore[]): ReadinessScore[] {
  return [...scores].sort((a, b) => {
    if (a.composite == null && b.composite == null) return a.entity.localeCompare(b.entity);
    if (a.composite == null) return 1;
    if (b.composite == null) return -1;
    if (b.composite !== a.composite) return b.composite - a.composite;
    return a.entity.localeCompare(b.entity);
  });
}
