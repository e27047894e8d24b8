import {
  DATA_QUALITY_FLAGS,
  PLATFORMS,
  tripleKey,
  type DataQualityFlag,
  type Market,
  type NormalizedPrice,
  type Platform,
  type RecommendationRow,
} from "../../domain/pricing";
import { PricingError } from "../../domain/errors";

export interface PricedEntry {
  status: "priced";
  price: NormalizedPrice;
  /** Vanity-rounded local price */
  localPriceRecommended: number;
}

export interface FailedEntry {
  status: "failed";
  title: string;
  platform: Platform;
  countryCode: string;
  /** null when the registry had no such market */
  market: Market | null;
  failureReason: string;
}

export type AssemblyEntry = PricedEntry | FailedEntry;

function orderedFlags(flags: Iterable<DataQualityFlag>): DataQualityFlag[] {
  const present = new Set(flags);
  return DATA_QUALITY_FLAGS.filter((flag) => present.has(flag));
}

function codePointCompare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareRows(a: RecommendationRow, b: RecommendationRow): number {
  return (
    a.title.localeCompare(b.title, "en", { sensitivity: "base" }) ||
    codePointCompare(a.title, b.title) ||
    codePointCompare(a.market, b.market) ||
    PLATFORMS.indexOf(a.platform) - PLATFORMS.indexOf(b.platform)
  );
}

function pricedRow(entry: PricedEntry): RecommendationRow {
  const { price } = entry;
  return {
    title: price.title,
    platform: price.platform,
    market: price.market.countryCode,
    marketName: price.market.displayName,
    currencyCode: price.observation.currencyCode,
    localPriceRaw: price.observation.localPrice,
    localPriceRecommended: entry.localPriceRecommended,
    usdPrice: price.usdPrice,
    pctDiffVsBaseline: price.pctDiffVsBaseline,
    editionConfidence: price.observation.editionConfidence,
    flags: orderedFlags(price.flags),
    failureReason: null,
  };
}

function failedRow(entry: FailedEntry): RecommendationRow {
  const flags: DataQualityFlag[] = entry.market ? ["fetch_failed"] : ["fetch_failed", "market_not_found"];
  return {
    title: entry.title,
    platform: entry.platform,
    market: entry.market?.countryCode ?? entry.countryCode.trim().toUpperCase(),
    marketName: entry.market?.displayName ?? null,
    currencyCode: entry.market?.currencyCode ?? null,
    localPriceRaw: null,
    localPriceRecommended: null,
    usdPrice: null,
    pctDiffVsBaseline: null,
    editionConfidence: null,
    flags,
    failureReason: entry.failureReason,
  };
}

/**
 * Builds the final table: one row per (title, market, platform), failures
 * included, ordered by title then market then platform so identical inputs
 * always produce identical output.
 *
 * Two entries for the same triple mean an upstream stage emitted twice; that
 * is a defect and fails the assembly.
 */
export function assemble(entries: readonly AssemblyEntry[]): RecommendationRow[] {
  const seen = new Set<string>();
  const rows = entries.map((entry) => {
    const row = entry.status === "priced" ? pricedRow(entry) : failedRow(entry);
    const key = tripleKey(row.title, row.platform, row.market);
    if (seen.has(key)) {
      throw new PricingError(
        `Duplicate recommendation row for "${row.title}" / ${row.platform} / ${row.market}`,
        "ASSEMBLY_DEFECT",
        { title: row.title, platform: row.platform, market: row.market },
      );
    }
    seen.add(key);
    return row;
  });

  return rows.sort(compareRows);
}
