import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";

export const DEFAULT_COMMERCIAL_TABLE = "commercial_kpi";

const rawRowsSchema = z.array(z.record(z.string(), z.unknown()));

/** All rows of the commercial metrics table, paged. Column names are mapped later by mapCommercialRow. */
export async function fetchCommercialRows(
  client: SupabaseClient,
  table: string = DEFAULT_COMMERCIAL_TABLE,
  pageSize = 1000
): Promise<Record<string, unknown>[]> {
  const out: Record<string, unknown>[] = [];
  for (let offset = 0; ; offset += pageSize) {
    const { data, error } = await client
      .from(table)
      .select("*")
      .range(offset, offset + pageSize - 1);
    if (error) throw new Error(`Fetch ${table} failed: ${error.message}`);
    const parsed = rawRowsSchema.safeParse(data ?? []);
    if (!parsed.success) throw new Error(`Unexpected ${table} row shape`);
    out.push(...parsed.data);
    if (parsed.data.length < pageSize) break;
  }
  return out;
}
