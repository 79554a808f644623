/**
 * Re-classify every stored news_events row: vendor_primary, vendor_matches,
 * risk_primary, risk_score and category_scores are recomputed from title + summary
 * and fully replaced. Safe to re-run. Use --dry-run for counts only.
 *
 * Usage: npx tsx scripts/reclassifyNews.ts [--dry-run | --commit] [--config-dir=config]
 */

import { createServiceRoleClient } from "../lib/supabase/service";
import { loadEngineConfig } from "../lib/engineConfig";
import { compileEngine } from "../lib/classifyNews";
import { createSupabaseNewsEventsStore } from "../lib/newsEventsStore";
import { reclassifyNewsEvents } from "../lib/reclassifyNews";

function argValue(name: string): string | undefined {
  const prefix = `--${name}=`;
  return process.argv.find((a) => a.startsWith(prefix))?.slice(prefix.length);
}

async function main() {
  const hasDryRun = process.argv.includes("--dry-run");
  const hasCommit = process.argv.includes("--commit");
  if (!hasDryRun && !hasCommit) {
    console.error("Use --dry-run to see counts only, or --commit to write classifications.");
    process.exit(1);
  }
  const dryRun = hasDryRun || !hasCommit;

  const { config, sources } = loadEngineConfig({ dir: argValue("config-dir") });
  console.log(
    `Config: ${config.entities.length} vendors, ${config.categories.length} categories`,
    sources
  );
  const engine = compileEngine(config);

  const store = createSupabaseNewsEventsStore(createServiceRoleClient());
  const summary = await reclassifyNewsEvents(store, engine, { dryRun });

  console.log(`Scanned: ${summary.scanned}`);
  console.log(`Unclassified: ${summary.unclassified}`);
  for (const [category, count] of Object.entries(summary.by_category).sort((a, b) => b[1] - a[1])) {
    console.log(`  ${category}: ${count}`);
  }
  if (dryRun) {
    console.log("Dry run: no updates. Run with --commit to apply.");
    return;
  }
  console.log(`Updated: ${summary.updated}. Failed: ${summary.failed}.`);
  if (summary.failed > 0) process.exitCode = 1;
}

main().catch((err) => {
  console.error("Reclassification failed:", err);
  process.exit(1);
});
