/**
 * Pricing domain types
 *
 * One evaluation run turns raw storefront observations into a recommendation
 * table, one row per requested (title, market, platform) triple:
 *
 *   raw observation → scaled/weighted → USD-normalized → variance vs baseline
 *   → vanity-rounded recommendation
 *
 * Every entity here is per-run and immutable once created.
 */

export const PLATFORMS = ["steam", "xbox", "playstation"] as const;
export type Platform = (typeof PLATFORMS)[number];

export const TITLE_TIERS = ["AAA", "AA", "Indie"] as const;
export type TitleTier = (typeof TITLE_TIERS)[number];

export type EditionConfidence = "exact" | "ambiguous";

export const DATA_QUALITY_FLAGS = [
  "missing_fx",
  "ambiguous_edition",
  "stale_rate",
  "out_of_band_variance",
  "baseline_missing",
  "fetch_failed",
  "market_not_found",
] as const;
export type DataQualityFlag = (typeof DATA_QUALITY_FLAGS)[number];

export interface Market {
  /** ISO 3166-1 alpha-2, upper case */
  countryCode: string;

  /** Storefront locale, e.g. "fr-fr" */
  locale: string;

  /** ISO 4217 code the storefront prices in for this market */
  currencyCode: string;

  displayName: string;
}

export interface Title {
  /** Stable across every market and platform */
  canonicalName: string;

  tier: TitleTier;

  /** Tier list price in USD (e.g. 69.99 for AAA) */
  baselineUsdPrice: number;

  /** Multiplier applied to observed prices before conversion (> 0) */
  scaleFactor: number;

  /** Comp-set weight; only used by the aggregate view */
  weight: number;

  /** Per-platform product reference (Steam appid, Xbox store id, PS product id/url) */
  products: Partial<Record<Platform, string>>;

  /** Restricts the title to these markets; all requested markets when absent */
  markets?: string[];
}

/** What a collector hands back for one market */
export interface CollectedPrice {
  /** MSRP / base price in the market's local currency */
  localPrice: number;
  currencyCode: string;
  editionConfidence: EditionConfidence;
  sourceUrl?: string;
}

export interface RawObservation {
  readonly title: string;
  readonly market: Market;
  readonly platform: Platform;
  readonly productReference: string;
  readonly localPrice: number;
  readonly currencyCode: string;
  readonly editionConfidence: EditionConfidence;
  readonly sourceTimestamp: Date;
  readonly sourceUrl?: string;
}

export interface WeightedObservation extends RawObservation {
  readonly scaleFactor: number;
  readonly weight: number;

  /** localPrice × scaleFactor, still in local currency */
  readonly localPriceWeighted: number;
}

export interface FxRate {
  currencyCode: string;
  usdPerUnit: number;
  asOf: Date;
}

/** Exactly one rate per currency code */
export type FxTable = ReadonlyMap<string, FxRate>;

export interface NormalizedPrice {
  readonly observation: WeightedObservation;
  readonly title: string;
  readonly market: Market;
  readonly platform: Platform;
  readonly localPriceWeighted: number;

  /** null when the currency has no rate */
  readonly usdPrice: number | null;

  /** Baseline market's usdPrice for the same title and platform */
  readonly baselineUsdPrice: number | null;

  /** null whenever no numeric comparison is possible, never defaulted to 0 */
  readonly pctDiffVsBaseline: number | null;

  readonly flags: ReadonlySet<DataQualityFlag>;
}

export interface RecommendationRow {
  title: string;
  platform: Platform;
  market: string;
  marketName: string | null;
  currencyCode: string | null;
  localPriceRaw: number | null;
  localPriceRecommended: number | null;
  usdPrice: number | null;
  pctDiffVsBaseline: number | null;
  editionConfidence: EditionConfidence | null;
  flags: DataQualityFlag[];

  /** Why the triple produced no price, when it didn't */
  failureReason: string | null;
}

export interface AggregateRecommendation {
  tier: TitleTier;
  platform: Platform;
  market: string;
  currencyCode: string;
  titleCount: number;
  recommendedUsd: number;
  recommendedLocal: number | null;
  recommendedLocalVanity: number | null;
  tierBaselineUsd: number;
  pctDiffVsTierBaseline: number;
}

export function tripleKey(title: string, platform: Platform, countryCode: string): string {
  return `${title}\u0000${platform}\u0000${countryCode.toUpperCase()}`;
}

export function isPlatform(value: string): value is Platform {
  return (PLATFORMS as readonly string[]).includes(value);
}

/** Case-insensitive tier lookup ("indie" → "Indie") */
export function toTitleTier(value: string): TitleTier | undefined {
  const wanted = value.trim().toLowerCase();
  return TITLE_TIERS.find((tier) => tier.toLowerCase() === wanted);
}
