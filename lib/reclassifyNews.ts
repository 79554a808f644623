/**
 * Idempotent batch re-classification over the stored news snapshot. Every record is
 * classified from scratch and its derived fields fully replaced. A record that fails
 * to save is counted and logged; the batch continues.
 */

import { classifyRecord, type CompiledEngine } from "./classifyNews";
import { createLogger } from "./logger";
import { toClassificationUpdate, type NewsEventsStore } from "./newsEventsStore";
import { UNCLASSIFIED } from "./primarySelector";

const log = createLogger("reclassify");

export const DEFAULT_PAGE_SIZE = 500;

export type ReclassifyOptions = {
  dryRun: boolean;
  pageSize?: number;
  now?: () => Date;
};

export type ReclassifySummary = {
  scanned: number;
  updated: number;
  failed: number;
  unclassified: number;
  by_category: Record<string, number>;
};

export async function reclassifyNewsEvents(
  store: NewsEventsStore,
  engine: CompiledEngine,
  options: ReclassifyOptions
): Promise<ReclassifySummary> {
  const pageSize = Math.max(1, options.pageSize ?? DEFAULT_PAGE_SIZE);
  const now = options.now ?? (() => new Date());
  const summary: ReclassifySummary = { scanned: 0, updated: 0, failed: 0, unclassified: 0, by_category: {} };

  for (let offset = 0; ; offset += pageSize) {
    const page = await store.listNewsEvents({ offset, limit: pageSize });
    for (const row of page) {
      summary.scanned += 1;
      const result = classifyRecord({ id: row.hash_id, title: row.title, summary: row.summary }, engine);
      summary.by_category[result.primary_category] = (summary.by_category[result.primary_category] ?? 0) + 1;
      if (result.primary_category === UNCLASSIFIED) summary.unclassified += 1;
      if (options.dryRun) continue;

      try {
        await store.saveClassification(row.hash_id, toClassificationUpdate(result, now().toISOString()));
        summary.updated += 1;
      } catch (err) {
        summary.failed += 1;
        log.error("save failed; record left as previously committed", { hash_id: row.hash_id, error: String(err) });
      }
    }
    if (page.length < pageSize) break;
  }

  return summary;
}
