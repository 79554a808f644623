/**
 * news_events persistence. Each record's derived fields (vendor_primary, vendor_matches,
 * risk_primary, risk_score, category_scores, classified_at) are written together in a
 * single UPDATE, so a crash mid-batch never leaves a record half-tagged.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { ClassificationResult } from "./classifyNews";

export const NEWS_EVENTS_TABLE = "news_events";

export type NewsEventRow = {
  hash_id: string;
  title: string | null;
  summary: string | null;
};

export type ClassificationUpdate = {
  vendor_primary: string | null;
  vendor_matches: string;
  risk_primary: string;
  risk_score: number;
  category_scores: Record<string, number>;
  classified_at: string;
};

export type NewsEventsStore = {
  listNewsEvents(page: { offset: number; limit: number }): Promise<NewsEventRow[]>;
  /** Replaces every derived field of one record at once. */
  saveClassification(hashId: string, update: ClassificationUpdate): Promise<void>;
};

const newsEventRowSchema = z.object({
  hash_id: z.string(),
  title: z.string().nullable(),
  summary: z.string().nullable(),
});

/** Full replacement of the derived columns; nothing from a previous pass survives. */
export function toClassificationUpdate(result: ClassificationResult, classifiedAt: string): ClassificationUpdate {
  return {
    vendor_primary: result.primary_entity?.name ?? null,
    vendor_matches: result.matched_entities.map((e) => e.name).join(", "),
    risk_primary: result.primary_category,
    risk_score: result.primary_score,
    category_scores: { ...result.category_scores },
    classified_at: classifiedAt,
  };
}

export function createSupabaseNewsEventsStore(
  client: SupabaseClient,
  table: string = NEWS_EVENTS_TABLE
): NewsEventsStore {
  return {
    async listNewsEvents({ offset, limit }) {
      const { data, error } = await client
        .from(table)
        .select("hash_id, title, summary")
        .order("hash_id", { ascending: true })
        .range(offset, offset + limit - 1);
      if (error) throw new Error(`Fetch ${table} failed: ${error.message}`);
      const parsed = z.array(newsEventRowSchema).safeParse(data ?? []);
      if (!parsed.success) {
        throw new Error(`Unexpected ${table} row shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
      }
      return parsed.data;
    },

    async saveClassification(hashId, update) {
      const { error } = await client.from(table).update(update).eq("hash_id", hashId);
      if (error) throw new Error(`Update ${table} ${hashId} failed: ${error.message}`);
    },
  };
}
