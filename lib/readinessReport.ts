/**
 * Vendor readiness report: raw commercial rows -> KPIs -> metric records -> ranked
 * Readiness Index, with each vendor's KPIs alongside its score.
 */

import {
  deriveVendorKpis,
  mapCommercialRow,
  vendorKpisToMetricRecords,
  type CommercialRow,
  type VendorKpis,
} from "./commercialKpis";
import type { ReadinessModel } from "./engineConfig";
import { computeReadinessIndex, rankReadiness, type ReadinessScore } from "./readinessIndex";

export type ReadinessReportRow = ReadinessScore & { kpis: VendorKpis | null };

export type ReadinessReport = {
  rows: ReadinessReportRow[];
  /** Raw rows dropped because no vendor column could be read. */
  skipped_rows: number;
};

export function buildReadinessReport(
  rawRows: readonly Readonly<Record<string, unknown>>[],
  model: ReadinessModel,
  asOf: string
): ReadinessReport {
  const rows: CommercialRow[] = [];
  let skipped = 0;
  for (const raw of rawRows) {
    const row = mapCommercialRow(raw);
    if (row) rows.push(row);
    else skipped += 1;
  }

  const kpis = deriveVendorKpis(rows);
  const byVendor = new Map(kpis.map((k) => [k.vendor, k]));
  const scores = computeReadinessIndex(vendorKpisToMetricRecords(kpis, asOf), model);

  // Vendors with no usable KPI at all still appear, with a missing composite.
  const scored = new Set(scores.map((s) => s.entity));
  for (const k of kpis) {
    if (!scored.has(k.vendor)) scores.push({ entity: k.vendor, composite: null, subscores: {}, weights_used: {} });
  }

  return {
    rows: rankReadiness(scores).map((s) => ({ ...s, kpis: byVendor.get(s.entity) ?? null })),
    skipped_rows: skipped,
  };
}

export function formatScore(value: number | null, digits = 1): string {
  return value == null ? "—" : value.toFixed(digits);
}
