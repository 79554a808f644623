/**
 * Print the vendor Readiness Index (0–100) from the commercial metrics table.
 * Table name comes from COMMERCIAL_KPI_TABLE (default commercial_kpi).
 *
 * Usage: npx tsx scripts/readinessReport.ts [--config-dir=config]
 */

import { createServiceRoleClient } from "../lib/supabase/service";
import { loadEngineConfig } from "../lib/engineConfig";
import { DEFAULT_COMMERCIAL_TABLE, fetchCommercialRows } from "../lib/commercialSource";
import { buildReadinessReport, formatScore } from "../lib/readinessReport";

function argValue(name: string): string | undefined {
  const prefix = `--${name}=`;
  return process.argv.find((a) => a.startsWith(prefix))?.slice(prefix.length);
}

async function main() {
  const { config } = loadEngineConfig({ dir: argValue("config-dir") });
  const table = process.env.COMMERCIAL_KPI_TABLE || DEFAULT_COMMERCIAL_TABLE;

  const raw = await fetchCommercialRows(createServiceRoleClient(), table);
  const report = buildReadinessReport(raw, config.readiness, new Date().toISOString());

  console.log(`Rows read: ${raw.length} (skipped without vendor: ${report.skipped_rows})`);
  console.log(`Vendors: ${report.rows.length}\n`);
  for (const row of report.rows) {
    const dims = Object.entries(row.weights_used)
      .map(([d, w]) => `${d}=${formatScore(row.subscores[d] ?? null, 2)}@${w.toFixed(2)}`)
      .join(" ");
    console.log(`${row.entity.padEnd(28)} ${formatScore(row.composite).padStart(5)}  ${dims || "no data"}`);
  }
}

main().catch((err) => {
  console.error("Readiness report failed:", err);
  process.exit(1);
});
