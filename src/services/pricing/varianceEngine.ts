import type { DataQualityFlag, NormalizedPrice, Platform } from "../../domain/pricing";
import { BaselineMissingError } from "../../domain/errors";
import { createLogger } from "../../utils/logger";

const logger = createLogger("variance-engine");

export interface VarianceOptions {
  /** Country code of the baseline market */
  baselineMarket: string;

  /** |pct| above this is flagged for review */
  bandPct: number;
}

/** Percentage difference of a USD price from the baseline USD price */
export function variance(usdPrice: number, baselineUsdPrice: number): number {
  return ((usdPrice - baselineUsdPrice) / baselineUsdPrice) * 100;
}

/**
 * Finds the baseline market's USD price in one (title, platform) group.
 * Throws BaselineMissingError when it is absent or has no USD price.
 */
export function resolveBaseline(
  title: string,
  platform: Platform,
  group: readonly NormalizedPrice[],
  options: VarianceOptions,
): number {
  const baselineCode = options.baselineMarket.toUpperCase();
  const baseline = group.find((price) => price.market.countryCode === baselineCode);

  if (!baseline || baseline.usdPrice === null || baseline.usdPrice <= 0) {
    throw new BaselineMissingError(title, platform, baselineCode);
  }
  return baseline.usdPrice;
}

function withVariance(
  price: NormalizedPrice,
  baselineUsdPrice: number | null,
  pctDiffVsBaseline: number | null,
  extraFlags: readonly DataQualityFlag[],
): NormalizedPrice {
  return Object.freeze({
    ...price,
    baselineUsdPrice,
    pctDiffVsBaseline,
    flags: new Set<DataQualityFlag>([...price.flags, ...extraFlags]),
  });
}

/**
 * Computes pct_diff for every price against its (title, platform) baseline.
 * Groups without a usable baseline get `baseline_missing` on every row and no
 * numeric variance. Input order is preserved.
 */
export function applyVariance(prices: readonly NormalizedPrice[], options: VarianceOptions): NormalizedPrice[] {
  const groups = new Map<string, { title: string; platform: Platform; members: NormalizedPrice[] }>();
  for (const price of prices) {
    const key = `${price.title}\u0000${price.platform}`;
    const group = groups.get(key) ?? { title: price.title, platform: price.platform, members: [] };
    group.members.push(price);
    groups.set(key, group);
  }

  const baselines = new Map<string, number | null>();
  for (const [key, group] of groups) {
    try {
      baselines.set(key, resolveBaseline(group.title, group.platform, group.members, options));
    } catch (error) {
      if (!(error instanceof BaselineMissingError)) {
        throw error;
      }
      logger.warn({ title: error.title, platform: error.platform, baselineMarket: error.baselineMarket }, error.message);
      baselines.set(key, null);
    }
  }

  const baselineCode = options.baselineMarket.toUpperCase();

  return prices.map((price) => {
    const baseline = baselines.get(`${price.title}\u0000${price.platform}`) ?? null;

    if (baseline === null) {
      return withVariance(price, null, null, ["baseline_missing"]);
    }
    if (price.usdPrice === null) {
      return withVariance(price, baseline, null, []);
    }

    const pct = price.market.countryCode === baselineCode ? 0 : variance(price.usdPrice, baseline);
    const flags: DataQualityFlag[] = Math.abs(pct) > options.bandPct ? ["out_of_band_variance"] : [];
    return withVariance(price, baseline, pct, flags);
  });
}

