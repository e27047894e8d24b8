import {
  PLATFORMS,
  TITLE_TIERS,
  type AggregateRecommendation,
  type FxTable,
  type Market,
  type NormalizedPrice,
  type Platform,
  type Title,
  type TitleTier,
} from "../../domain/pricing";
import { MissingFxError } from "../../domain/errors";
import { fromUsd } from "./currencyEngine";
import { variance } from "./varianceEngine";
import { roundVanity, type VanityRuleTable } from "./vanityRounding";

interface Bucket {
  tier: TitleTier;
  platform: Platform;
  market: Market;
  currencyCode: string;
  weightSum: number;
  weightedUsd: number;
  weightedTierBaseline: number;
  titles: Set<string>;
}

/**
 * Comp-set view: per (tier, platform, market), the weight-averaged USD price
 * of the scaled titles, converted back to local currency and vanity-rounded.
 * Tiers never share a bucket.
 *
 * Rows without a USD price and titles weighted 0 contribute nothing; a market
 * with no contribution gets no aggregate row. The per-market rows of the main
 * table are never affected by these weights.
 */
export function buildAggregateRecommendations(
  prices: readonly NormalizedPrice[],
  titles: readonly Title[],
  fxTable: FxTable,
  rules: VanityRuleTable,
): AggregateRecommendation[] {
  const titlesByName = new Map(titles.map((title) => [title.canonicalName, title] as const));
  const buckets = new Map<string, Bucket>();

  for (const price of prices) {
    const title = titlesByName.get(price.title);
    const weight = price.observation.weight;
    if (!title || price.usdPrice === null || weight <= 0) {
      continue;
    }

    const key = `${title.tier}\u0000${price.platform}\u0000${price.market.countryCode}`;
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = {
        tier: title.tier,
        platform: price.platform,
        market: price.market,
        // A priced row's currency is known to have a rate
        currencyCode: price.observation.currencyCode,
        weightSum: 0,
        weightedUsd: 0,
        weightedTierBaseline: 0,
        titles: new Set(),
      };
      buckets.set(key, bucket);
    }

    bucket.weightSum += weight;
    bucket.weightedUsd += price.usdPrice * weight;
    bucket.weightedTierBaseline += title.baselineUsdPrice * weight;
    bucket.titles.add(title.canonicalName);
  }

  const rows = [...buckets.values()].map((bucket): AggregateRecommendation => {
    const recommendedUsd = bucket.weightedUsd / bucket.weightSum;
    const tierBaselineUsd = bucket.weightedTierBaseline / bucket.weightSum;

    let recommendedLocal: number | null;
    try {
      recommendedLocal = fromUsd(recommendedUsd, bucket.currencyCode, fxTable);
    } catch (error) {
      if (!(error instanceof MissingFxError)) throw error;
      recommendedLocal = null;
    }

    return {
      tier: bucket.tier,
      platform: bucket.platform,
      market: bucket.market.countryCode,
      currencyCode: bucket.currencyCode,
      titleCount: bucket.titles.size,
      recommendedUsd,
      recommendedLocal,
      recommendedLocalVanity: recommendedLocal === null ? null : roundVanity(recommendedLocal, bucket.market, rules),
      tierBaselineUsd,
      pctDiffVsTierBaseline: variance(recommendedUsd, tierBaselineUsd),
    };
  });

  return rows.sort(
    (a, b) =>
      TITLE_TIERS.indexOf(a.tier) - TITLE_TIERS.indexOf(b.tier) ||
      PLATFORMS.indexOf(a.platform) - PLATFORMS.indexOf(b.platform) ||
      (a.market < b.market ? -1 : a.market > b.market ? 1 : 0),
  );
}
