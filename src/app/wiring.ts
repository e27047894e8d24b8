import type { Platform } from "../domain/pricing";
import { runtimeConfig, type RuntimeConfig } from "../config";
import { loadMarketRegistries, type MarketRegistrySet } from "../services/markets/marketRegistry";
import { SteamPriceCollector } from "../services/collection/steamCollector";
import { XboxPriceCollector } from "../services/collection/xboxCollector";
import type { PriceCollector } from "../services/collection/types";
import { loadVanityRulesFile, type VanityRuleTable } from "../services/pricing/vanityRounding";
import type { EvaluationDeps } from "../services/evaluation/pricingEvaluation";
import { createLogger } from "../utils/logger";

const logger = createLogger("wiring");

/**
 * Composition root. The only place that picks concrete collectors and loads
 * lookup data; everything downstream receives them through EvaluationDeps.
 */

export interface WiringOptions {
  platforms: readonly Platform[];
  overridesDir?: string | null;
  vanityRulesPath?: string | null;

  /** Replaces the built-in HTTP collectors (tests, or a PlayStation collector) */
  collectors?: readonly PriceCollector[];
}

export function createCollectors(config: RuntimeConfig): PriceCollector[] {
  return [
    new SteamPriceCollector({
      baseUrl: config.steamApiBaseUrl,
      userAgent: config.httpUserAgent,
      timeoutMs: config.collectTimeoutMs,
    }),
    new XboxPriceCollector({
      baseUrl: config.xboxApiBaseUrl,
      userAgent: config.httpUserAgent,
      timeoutMs: config.collectTimeoutMs,
    }),
  ];
}

export function createEvaluationDeps(options: WiringOptions, config: RuntimeConfig = runtimeConfig): EvaluationDeps {
  const registries: MarketRegistrySet = loadMarketRegistries({
    platforms: options.platforms,
    overridesDir: options.overridesDir ?? config.marketOverridesDir,
  });

  const vanityPath = options.vanityRulesPath ?? config.vanityRulesPath;
  const vanityRules: VanityRuleTable = vanityPath ? loadVanityRulesFile(vanityPath) : loadVanityRulesFile();

  const collectors = new Map<Platform, PriceCollector>();
  for (const collector of options.collectors ?? createCollectors(config)) {
    collectors.set(collector.platform, collector);
  }

  const missing = options.platforms.filter((platform) => !collectors.has(platform));
  if (missing.length > 0) {
    logger.warn({ platforms: missing }, "No collector for requested platforms; their rows will be fetch_failed");
  }

  logger.info(
    {
      platforms: options.platforms,
      collectors: [...collectors.keys()],
      vanityRules: vanityPath ?? "built-in",
      concurrency: config.collectConcurrency,
      timeoutMs: config.collectTimeoutMs,
    },
    "Evaluation dependencies ready",
  );

  return {
    registries,
    collectors,
    vanityRules,
    fxStaleAfterMs: config.fxStaleAfterMs,
    collection: {
      timeoutMs: config.collectTimeoutMs,
      concurrency: config.collectConcurrency,
      retries: config.collectRetries,
      retryDelayMs: config.collectRetryDelayMs,
      retryJitter: config.collectRetryJitter,
    },
  };
}
