import { stringify } from "csv-stringify/sync";
import type { AggregateRecommendation, RecommendationRow } from "../../domain/pricing";

export const RECOMMENDATION_COLUMNS = [
  "title",
  "platform",
  "market",
  "local_price_raw",
  "local_price_recommended",
  "usd_price",
  "pct_diff_vs_baseline",
  "flags",
] as const;

export const AGGREGATE_COLUMNS = [
  "tier",
  "platform",
  "market",
  "currency",
  "title_count",
  "recommended_usd",
  "recommended_local",
  "recommended_local_vanity",
  "tier_baseline_usd",
  "pct_diff_vs_tier_baseline",
] as const;

/** Two decimals for display; null stays an empty cell */
export function formatAmount(value: number | null): string {
  return value === null || !Number.isFinite(value) ? "" : value.toFixed(2);
}

export function toCsv(rows: readonly RecommendationRow[]): string {
  return stringify(
    rows.map((row) => ({
      title: row.title,
      platform: row.platform,
      market: row.market,
      local_price_raw: formatAmount(row.localPriceRaw),
      local_price_recommended: formatAmount(row.localPriceRecommended),
      usd_price: formatAmount(row.usdPrice),
      pct_diff_vs_baseline: formatAmount(row.pctDiffVsBaseline),
      flags: row.flags.join("|"),
    })),
    { header: true, columns: [...RECOMMENDATION_COLUMNS] },
  );
}

export function toAggregateCsv(rows: readonly AggregateRecommendation[]): string {
  return stringify(
    rows.map((row) => ({
      tier: row.tier,
      platform: row.platform,
      market: row.market,
      currency: row.currencyCode,
      title_count: String(row.titleCount),
      recommended_usd: formatAmount(row.recommendedUsd),
      recommended_local: formatAmount(row.recommendedLocal),
      recommended_local_vanity: formatAmount(row.recommendedLocalVanity),
      tier_baseline_usd: formatAmount(row.tierBaselineUsd),
      pct_diff_vs_tier_baseline: formatAmount(row.pctDiffVsTierBaseline),
    })),
    { header: true, columns: [...AGGREGATE_COLUMNS] },
  );
}
