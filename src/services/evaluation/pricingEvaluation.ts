import type {
  AggregateRecommendation,
  FxTable,
  NormalizedPrice,
  Platform,
  RecommendationRow,
  Title,
} from "../../domain/pricing";
import { EvaluationCancelledError, FetchError, InvalidConfigError } from "../../domain/errors";
import type { MarketRegistrySet } from "../markets/marketRegistry";
import { collectObservations, type CollectionOptions } from "../collection/collectionRunner";
import type { CollectionOutcome, CollectionTask, PriceCollector } from "../collection/types";
import { applyScaleAndWeight } from "../pricing/scaleWeightNormalizer";
import { toUsd } from "../pricing/currencyEngine";
import { applyVariance } from "../pricing/varianceEngine";
import { roundVanity, type VanityRuleTable } from "../pricing/vanityRounding";
import { assemble, type AssemblyEntry } from "../pricing/recommendationAssembler";
import { buildAggregateRecommendations } from "../pricing/aggregateView";
import { createLogger } from "../../utils/logger";

const logger = createLogger("evaluation");

export interface EvaluationRequest {
  /** Validated comp set (see validateTitles) */
  titles: readonly Title[];
  fxTable: FxTable;
  platforms: readonly Platform[];

  /** Country codes to price; each platform's whole registry when omitted */
  markets?: readonly string[];

  baselineMarket: string;
  bandPct: number;
  signal?: AbortSignal;

  /** Reference time for FX staleness; defaults to the start of the run */
  now?: Date;
}

export interface EvaluationDeps {
  registries: MarketRegistrySet;
  collectors: ReadonlyMap<Platform, PriceCollector>;
  vanityRules: VanityRuleTable;
  collection: Omit<CollectionOptions, "signal" | "now">;
  fxStaleAfterMs: number;
}

export interface EvaluationSummary {
  triples: number;
  priced: number;
  failed: number;
  durationMs: number;
}

export interface EvaluationResult {
  rows: RecommendationRow[];
  aggregates: AggregateRecommendation[];

  /** Normalized prices after variance, in collection order */
  prices: NormalizedPrice[];
  summary: EvaluationSummary;
}

function validateRequest(request: EvaluationRequest, deps: EvaluationDeps): void {
  if (!/^[A-Za-z]{2}$/.test(request.baselineMarket.trim())) {
    throw new InvalidConfigError(`Baseline market must be a two-letter country code, got "${request.baselineMarket}"`);
  }
  if (!Number.isFinite(request.bandPct) || request.bandPct <= 0) {
    throw new InvalidConfigError(`Variance band must be > 0, got ${request.bandPct}`);
  }
  if (request.platforms.length === 0) {
    throw new InvalidConfigError("No platforms requested");
  }
  for (const platform of request.platforms) {
    // Throws when the silo was never loaded
    deps.registries.registry(platform);
  }
}

/**
 * Expands the request into (title, platform, market) triples. A title is only
 * priced on platforms it has a product reference for, and only in its own
 * market list when it carries one.
 */
const normalizeCodes = (codes: readonly string[]): string[] => [
  ...new Set(codes.map((code) => code.trim().toUpperCase())),
];

/** A title's own market list narrows the requested markets; it never adds to them */
function plannedMarkets(title: Title, requested: readonly string[] | undefined): string[] | undefined {
  if (!title.markets) {
    return requested && normalizeCodes(requested);
  }
  const own = normalizeCodes(title.markets);
  if (!requested) {
    return own;
  }
  const allowed = new Set(normalizeCodes(requested));
  return own.filter((code) => allowed.has(code));
}

export function planTasks(request: EvaluationRequest, registries: MarketRegistrySet): CollectionTask[] {
  const tasks: CollectionTask[] = [];

  for (const title of request.titles) {
    for (const platform of request.platforms) {
      if (!title.products[platform]) {
        continue;
      }
      const unique = plannedMarkets(title, request.markets) ?? registries.registry(platform).countryCodes();
      for (const countryCode of unique) {
        tasks.push({ title, platform, countryCode });
      }
    }
  }

  return tasks;
}

function failureReason(outcome: Extract<CollectionOutcome, { status: "failed" }>): string {
  return outcome.error instanceof FetchError ? outcome.error.reason : "market_not_found";
}

/**
 * One evaluation run: plan → collect (concurrent, the only async stage) →
 * scale → convert → variance → vanity → assemble.
 *
 * Rejects with EvaluationCancelledError when `request.signal` aborts; by then
 * every collection task has settled.
 */
export async function runEvaluation(request: EvaluationRequest, deps: EvaluationDeps): Promise<EvaluationResult> {
  validateRequest(request, deps);

  const started = Date.now();
  const now = request.now ?? new Date();
  const baselineMarket = request.baselineMarket.trim().toUpperCase();
  const tasks = planTasks(request, deps.registries);

  if (request.markets && !request.markets.some((code) => code.trim().toUpperCase() === baselineMarket)) {
    logger.warn({ baselineMarket }, "Baseline market is not among the requested markets; variance will be unavailable");
  }
  logger.info(
    { titles: request.titles.length, platforms: request.platforms, triples: tasks.length, baselineMarket },
    "Evaluation started",
  );

  const outcomes = await collectObservations(tasks, deps.registries, deps.collectors, {
    ...deps.collection,
    signal: request.signal,
    now: () => now,
  });

  if (request.signal?.aborted) {
    logger.warn({ settledTasks: outcomes.length }, "Evaluation cancelled");
    throw new EvaluationCancelledError(outcomes.length);
  }

  const normalized: NormalizedPrice[] = [];
  const entries: AssemblyEntry[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === "failed") {
      entries.push({
        status: "failed",
        title: outcome.task.title.canonicalName,
        platform: outcome.task.platform,
        countryCode: outcome.task.countryCode,
        market: outcome.market,
        failureReason: failureReason(outcome),
      });
      continue;
    }

    const { title } = outcome.task;
    const weighted = applyScaleAndWeight(outcome.observation, title.scaleFactor, title.weight);
    normalized.push(toUsd(weighted, request.fxTable, { now, staleAfterMs: deps.fxStaleAfterMs }));
  }

  const prices = applyVariance(normalized, { baselineMarket, bandPct: request.bandPct });
  for (const price of prices) {
    entries.push({
      status: "priced",
      price,
      localPriceRecommended: roundVanity(price.localPriceWeighted, price.market, deps.vanityRules),
    });
  }

  const rows = assemble(entries);
  const aggregates = buildAggregateRecommendations(prices, request.titles, request.fxTable, deps.vanityRules);

  const summary: EvaluationSummary = {
    triples: tasks.length,
    priced: prices.length,
    failed: tasks.length - prices.length,
    durationMs: Date.now() - started,
  };
  logger.info(summary, "Evaluation finished");

  return { rows, aggregates, prices, summary };
}
