/**
 * Currency normalization: local price → USD using a point-in-time FX table.
 *
 * - Missing rate: the price still flows downstream, flagged `missing_fx`,
 *   with usdPrice and pctDiff left null.
 * - Stale rate: computed anyway, flagged `stale_rate`.
 */

import type {
  DataQualityFlag,
  FxRate,
  FxTable,
  NormalizedPrice,
  WeightedObservation,
} from "../../domain/pricing";
import { InvalidConfigError, MissingFxError } from "../../domain/errors";
import { FxTableInputSchema, parseInput } from "../../schemas/input";

export interface CurrencyOptions {
  /** Evaluation time the rate age is measured against */
  now: Date;
  staleAfterMs: number;
}

/**
 * Builds the run's FX table from `currency → {usdPerUnit, asOf}`.
 * USD is pinned at 1.0 unless the input supplies it.
 */
export function loadFxTable(input: unknown, asOfForUsd: Date = new Date()): FxTable {
  const parsed = parseInput(FxTableInputSchema, input, "FX table");
  const table = new Map<string, FxRate>();

  for (const [code, entry] of Object.entries(parsed)) {
    const currencyCode = code.toUpperCase();
    if (table.has(currencyCode)) {
      throw new InvalidConfigError(`FX table lists ${currencyCode} more than once`, { currencyCode });
    }
    table.set(currencyCode, Object.freeze({ currencyCode, usdPerUnit: entry.usdPerUnit, asOf: new Date(entry.asOf) }));
  }

  if (!table.has("USD")) {
    table.set("USD", Object.freeze({ currencyCode: "USD", usdPerUnit: 1, asOf: asOfForUsd }));
  }

  return table;
}

export function lookupRate(currencyCode: string, fxTable: FxTable): FxRate {
  const rate = fxTable.get(currencyCode.toUpperCase());
  if (!rate) {
    throw new MissingFxError(currencyCode);
  }
  return rate;
}

export function isStale(rate: FxRate, options: CurrencyOptions): boolean {
  return options.now.getTime() - rate.asOf.getTime() > options.staleAfterMs;
}

export function toUsd(
  observation: WeightedObservation,
  fxTable: FxTable,
  options: CurrencyOptions,
): NormalizedPrice {
  const flags = new Set<DataQualityFlag>();
  if (observation.editionConfidence === "ambiguous") {
    flags.add("ambiguous_edition");
  }

  const rate = fxTable.get(observation.currencyCode.toUpperCase());
  let usdPrice: number | null = null;

  if (!rate) {
    flags.add("missing_fx");
  } else {
    usdPrice = observation.localPriceWeighted * rate.usdPerUnit;
    if (isStale(rate, options)) {
      flags.add("stale_rate");
    }
  }

  return Object.freeze({
    observation,
    title: observation.title,
    market: observation.market,
    platform: observation.platform,
    localPriceWeighted: observation.localPriceWeighted,
    usdPrice,
    baselineUsdPrice: null,
    pctDiffVsBaseline: null,
    flags,
  });
}

/** Inverse of the conversion in toUsd; throws MissingFxError without a rate */
export function fromUsd(usdAmount: number, currencyCode: string, fxTable: FxTable): number {
  return usdAmount / lookupRate(currencyCode, fxTable).usdPerUnit;
}
