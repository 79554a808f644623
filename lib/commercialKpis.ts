/**
 * Per-vendor commercial KPIs for the readiness index, derived from raw commercial rows
 * (orders/billings/backlog by vendor, customer and month plus delivery records).
 *
 * Every KPI is computed only from the columns that exist; an underivable KPI is null.
 */

import columnSynonyms from "./config/columnSynonyms.json";
import { analyzeConcentration, safeDivide } from "./concentration";
import type { MetricRecord } from "./readinessIndex";

export type CommercialRow = {
  /** YYYY-MM-DD */
  date: string | null;
  vendor: string;
  customer: string | null;
  region: string | null;
  product: string | null;
  orders: number | null;
  billings: number | null;
  backlog: number | null;
  units: number | null;
  lead_time_weeks: number | null;
  promise_date: string | null;
  delivery_date: string | null;
  committed_qty: number | null;
  delivered_qty: number | null;
  on_time_flag: boolean | null;
  in_full_flag: boolean | null;
  spares_fill_rate: number | null;
  fte_on_site: number | null;
};

export type VendorKpis = {
  vendor: string;
  b2b_3mma: number | null;
  backlog_months: number | null;
  lead_time_median_w: number | null;
  otif_pct: number | null;
  spares_fill_rate: number | null;
  fte_on_site: number | null;
  max_customer_share: number | null;
  hhi: number | null;
  portfolio_share_pct: number | null;
  mom_3m_pct: number | null;
};

export const KPI_METRIC_KEYS = [
  "b2b_3mma",
  "backlog_months",
  "lead_time_median_w",
  "otif_pct",
  "spares_fill_rate",
  "fte_on_site",
  "max_customer_share",
  "hhi",
  "portfolio_share_pct",
  "mom_3m_pct",
] as const;

export type KpiMetricKey = (typeof KPI_METRIC_KEYS)[number];

type StandardColumn = keyof typeof columnSynonyms;

const SYNONYMS: Record<StandardColumn, readonly string[]> = columnSynonyms;

function toNumber(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v.trim().replace(/,/g, ""));
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function toText(v: unknown): string | null {
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  if (typeof v !== "string") return null;
  const t = v.trim();
  return t ? t : null;
}

function toBool(v: unknown): boolean | null {
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v === 1 ? true : v === 0 ? false : null;
  const t = toText(v)?.toLowerCase();
  if (t == null) return null;
  if (["true", "yes", "y", "1", "t"].includes(t)) return true;
  if (["false", "no", "n", "0", "f"].includes(t)) return false;
  return null;
}

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Calendar date as written. ISO strings keep their own date part (no timezone shift);
 * other formats are parsed as local time and read back from local date parts.
 */
function toIsoDate(v: unknown): string | null {
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : v.toISOString().slice(0, 10);
  const t = toText(v);
  if (t == null) return null;
  const iso = ISO_DATE_PREFIX.exec(t);
  if (iso) {
    const day = `${iso[1]}-${iso[2]}-${iso[3]}`;
    return Number.isNaN(Date.parse(day)) ? null : day;
  }
  const ms = Date.parse(t);
  if (Number.isNaN(ms)) return null;
  const d = new Date(ms);
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

/**
 * Map one raw row (arbitrary headers) onto standard columns via the synonym table.
 * Header matching is case-insensitive; the first synonym present wins. Returns null
 * when the row has no vendor.
 */
export function mapCommercialRow(raw: Readonly<Record<string, unknown>>): CommercialRow | null {
  const lut = new Map<string, string>();
  for (const key of Object.keys(raw)) {
    const lower = key.trim().toLowerCase();
    if (!lut.has(lower)) lut.set(lower, key);
  }
  const pick = (column: StandardColumn): unknown => {
    for (const syn of SYNONYMS[column]) {
      const key = lut.get(syn);
      if (key !== undefined) return raw[key];
    }
    return undefined;
  };

  const vendor = toText(pick("vendor"));
  if (!vendor) return null;

  const leadWeeks = toNumber(pick("lead_time_weeks"));
  const leadDays = toNumber(pick("lead_time_days"));

  return {
    date: toIsoDate(pick("date")),
    vendor,
    customer: toText(pick("customer")),
    region: toText(pick("region")),
    product: toText(pick("product")),
    orders: toNumber(pick("orders")),
    billings: toNumber(pick("billings")),
    backlog: toNumber(pick("backlog")),
    units: toNumber(pick("units")),
    lead_time_weeks: leadWeeks ?? (leadDays != null ? leadDays / 7 : null),
    promise_date: toIsoDate(pick("promise_date")),
    delivery_date: toIsoDate(pick("delivery_date")),
    committed_qty: toNumber(pick("committed_qty")),
    delivered_qty: toNumber(pick("delivered_qty")),
    on_time_flag: toBool(pick("on_time_flag")),
    in_full_flag: toBool(pick("in_full_flag")),
    spares_fill_rate: toNumber(pick("spares_fill_rate")),
    fte_on_site: toNumber(pick("fte_on_site")),
  };
}

function sumOrNull(values: readonly (number | null)[]): number | null {
  let seen = false;
  let total = 0;
  for (const v of values) {
    if (v == null) continue;
    seen = true;
    total += v;
  }
  return seen ? total : null;
}

function mean(values: readonly number[]): number | null {
  return values.length ? values.reduce((s, v) => s + v, 0) / values.length : null;
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

function present(values: readonly (number | null)[]): number[] {
  return values.filter((v): v is number => v != null);
}

type MonthBucket = {
  month: string;
  orders: number | null;
  billings: number | null;
  backlog: number | null;
};

/** Dated rows bucketed by calendar month (YYYY-MM), ascending. */
function monthlyBuckets(rows: readonly CommercialRow[]): MonthBucket[] {
  const byMonth = new Map<string, CommercialRow[]>();
  for (const r of rows) {
    if (!r.date) continue;
    const month = r.date.slice(0, 7);
    const list = byMonth.get(month) ?? [];
    list.push(r);
    byMonth.set(month, list);
  }
  return Array.from(byMonth.keys())
    .sort()
    .map((month) => {
      const list = byMonth.get(month) ?? [];
      return {
        month,
        orders: sumOrNull(list.map((r) => r.orders)),
        billings: sumOrNull(list.map((r) => r.billings)),
        backlog: sumOrNull(list.map((r) => r.backlog)),
      };
    });
}

/** Rolling 3-month orders / billings at the latest month. */
export function bookToBill3mma(buckets: readonly MonthBucket[]): number | null {
  const window = buckets.slice(-3);
  return safeDivide(sumOrNull(window.map((b) => b.orders)), sumOrNull(window.map((b) => b.billings)));
}

/** Latest-month backlog / average monthly billings over the trailing 12 months. */
export function backlogCoverageMonths(buckets: readonly MonthBucket[]): number | null {
  if (buckets.length === 0) return null;
  const ttm = sumOrNull(buckets.slice(-12).map((b) => b.billings));
  if (ttm == null || ttm === 0) return null;
  return safeDivide(buckets[buckets.length - 1].backlog, ttm / 12);
}

/** Rolling 3-month base value vs the 3-month window three months earlier, in percent. */
export function momentum3m(monthlyBase: readonly (number | null)[]): number | null {
  const n = monthlyBase.length;
  if (n < 4) return null;
  const rolling = (end: number) => sumOrNull(monthlyBase.slice(Math.max(0, end - 2), end + 1));
  const current = rolling(n - 1);
  const prior = rolling(n - 4);
  if (current == null || prior == null) return null;
  const ratio = safeDivide(current - prior, prior);
  return ratio == null ? null : ratio * 100;
}

/**
 * On-time-in-full rate in percent over rows where both halves are determinable.
 * On time: explicit flag, else delivery_date <= promise_date.
 * In full: explicit flag, else delivered_qty >= committed_qty.
 */
export function otifPct(rows: readonly CommercialRow[]): number | null {
  let counted = 0;
  let hits = 0;
  for (const r of rows) {
    const onTime =
      r.on_time_flag ?? (r.promise_date && r.delivery_date ? r.delivery_date <= r.promise_date : null);
    const inFull =
      r.in_full_flag ??
      (r.committed_qty != null && r.delivered_qty != null ? r.delivered_qty >= r.committed_qty : null);
    if (onTime == null || inFull == null) continue;
    counted += 1;
    if (onTime && inFull) hits += 1;
  }
  return counted ? (hits / counted) * 100 : null;
}

/** Billings when any row carries billings, else orders. */
export function baseMetric(rows: readonly CommercialRow[]): "billings" | "orders" | null {
  if (rows.some((r) => r.billings != null)) return "billings";
  if (rows.some((r) => r.orders != null)) return "orders";
  return null;
}

export function deriveVendorKpis(rows: readonly CommercialRow[]): VendorKpis[] {
  const base = baseMetric(rows);
  const byVendor = new Map<string, CommercialRow[]>();
  for (const r of rows) {
    const list = byVendor.get(r.vendor) ?? [];
    list.push(r);
    byVendor.set(r.vendor, list);
  }

  const concentration = new Map(
    analyzeConcentration(
      base == null
        ? []
        : rows
            .filter((r) => r.customer != null)
            .map((r) => ({ entity: r.vendor, counterparty: r.customer ?? "", value: r[base] }))
    ).map((s) => [s.entity, s])
  );

  const baseByVendor = new Map<string, number | null>();
  for (const [vendor, list] of byVendor) {
    baseByVendor.set(vendor, base == null ? null : sumOrNull(list.map((r) => r[base])));
  }
  const portfolioTotal = sumOrNull(Array.from(baseByVendor.values()));

  const out: VendorKpis[] = [];
  for (const vendor of Array.from(byVendor.keys()).sort()) {
    const list = byVendor.get(vendor) ?? [];
    const buckets = monthlyBuckets(list);
    const conc = concentration.get(vendor);
    const share = safeDivide(baseByVendor.get(vendor), portfolioTotal);
    out.push({
      vendor,
      b2b_3mma: bookToBill3mma(buckets),
      backlog_months: backlogCoverageMonths(buckets),
      lead_time_median_w: median(present(list.map((r) => r.lead_time_weeks))),
      otif_pct: otifPct(list),
      spares_fill_rate: mean(present(list.map((r) => r.spares_fill_rate))),
      fte_on_site: median(present(list.map((r) => r.fte_on_site))),
      max_customer_share: conc?.max_share ?? null,
      hhi: conc?.hhi ?? null,
      portfolio_share_pct: share == null ? null : share * 100,
      mom_3m_pct: base == null ? null : momentum3m(buckets.map((b) => b[base])),
    });
  }
  return out;
}

/** One MetricRecord per non-null KPI, stamped with the snapshot time. */
export function vendorKpisToMetricRecords(kpis: readonly VendorKpis[], timestamp: string): MetricRecord[] {
  const out: MetricRecord[] = [];
  for (const k of kpis) {
    for (const key of KPI_METRIC_KEYS) {
      const value = k[key];
      if (value == null) continue;
      out.push({ entity: k.vendor, dimension: key, value, timestamp });
    }
  }
  return out;
}
