import type {
  FxRate,
  FxTable,
  Market,
  NormalizedPrice,
  RawObservation,
  Title,
} from "../../domain/pricing";
import { applyScaleAndWeight } from "../pricing/scaleWeightNormalizer";
import { toUsd } from "../pricing/currencyEngine";

export const RATES_AS_OF = new Date("2026-03-01T00:00:00Z");
export const NOW = new Date("2026-03-01T06:00:00Z");
export const DAY_MS = 24 * 60 * 60 * 1000;

export const testMarket = (countryCode: string, currencyCode: string, overrides: Partial<Market> = {}): Market => ({
  countryCode,
  locale: `en-${countryCode.toLowerCase()}`,
  currencyCode,
  displayName: countryCode,
  ...overrides,
});

export const testTitle = (overrides: Partial<Title> = {}): Title => ({
  canonicalName: "Foo",
  tier: "AAA",
  baselineUsdPrice: 69.99,
  scaleFactor: 1,
  weight: 1,
  products: { steam: "100" },
  ...overrides,
});

export const testObservation = (
  market: Market,
  localPrice: number,
  overrides: Partial<RawObservation> = {},
): RawObservation => ({
  title: "Foo",
  market,
  platform: "steam",
  productReference: "100",
  localPrice,
  currencyCode: market.currencyCode,
  editionConfidence: "exact",
  sourceTimestamp: NOW,
  ...overrides,
});

export function testFxTable(rates: Record<string, number>, asOf: Date = RATES_AS_OF): FxTable {
  const table = new Map<string, FxRate>();
  for (const [currencyCode, usdPerUnit] of Object.entries(rates)) {
    table.set(currencyCode, { currencyCode, usdPerUnit, asOf });
  }
  return table;
}

/** Scale, then convert, with no variance applied yet */
export function normalize(
  observation: RawObservation,
  fxTable: FxTable,
  scaleFactor = 1,
  weight = 1,
): NormalizedPrice {
  return toUsd(applyScaleAndWeight(observation, scaleFactor, weight), fxTable, { now: NOW, staleAfterMs: DAY_MS });
}
