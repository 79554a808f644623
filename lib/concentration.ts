/**
 * Dependency / concentration statistics from an entity x counterparty value table
 * (e.g. vendor x customer billings).
 *
 * max_share = largest counterparty share of the entity total.
 * hhi       = round(sum(share^2) * 10000), 0..10000.
 * Both are null when the entity total is 0 (0/0 is missing, never an error).
 */

export type GroupedValueRow = {
  entity: string;
  counterparty: string;
  value: number | null;
};

export type ConcentrationStats = {
  entity: string;
  max_share: number | null;
  hhi: number | null;
  counterparty_count: number;
};

/** num / den, or null when the result is not a finite number (0/0, x/0, NaN inputs). */
export function safeDivide(num: number | null | undefined, den: number | null | undefined): number | null {
  if (num == null || den == null) return null;
  if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0) return null;
  const out = num / den;
  return Number.isFinite(out) ? out : null;
}

function clip01(x: number): number {
  return Math.min(1, Math.max(0, x));
}

/** Sum values per (entity, counterparty), keeping first-seen order. Non-finite values are skipped. */
export function groupValues(rows: readonly GroupedValueRow[]): Map<string, Map<string, number>> {
  const byEntity = new Map<string, Map<string, number>>();
  for (const r of rows) {
    if (r.value == null || !Number.isFinite(r.value)) continue;
    const byCounterparty = byEntity.get(r.entity) ?? new Map<string, number>();
    byCounterparty.set(r.counterparty, (byCounterparty.get(r.counterparty) ?? 0) + r.value);
    byEntity.set(r.entity, byCounterparty);
  }
  return byEntity;
}

export function shareStats(values: readonly number[]): { max_share: number | null; hhi: number | null } {
  const total = values.reduce((s, v) => s + v, 0);
  const shares: number[] = [];
  for (const v of values) {
    const share = safeDivide(v, total);
    if (share == null) return { max_share: null, hhi: null };
    shares.push(clip01(share));
  }
  if (shares.length === 0) return { max_share: null, hhi: null };
  return {
    max_share: Math.max(...shares),
    hhi: Math.round(shares.reduce((s, x) => s + x * x, 0) * 10000),
  };
}

export function analyzeConcentration(rows: readonly GroupedValueRow[]): ConcentrationStats[] {
  const out: ConcentrationStats[] = [];
  for (const [entity, byCounterparty] of groupValues(rows)) {
    const values = Array.from(byCounterparty.values());
    out.push({ entity, ...shareStats(values), counterparty_count: values.length });
  }
  return out;
}
