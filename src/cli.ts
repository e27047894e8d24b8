#!/usr/bin/env node

import fs from "node:fs";
import { program } from "commander";
import { PLATFORMS } from "./domain/pricing";
import { PricingError, describeError } from "./domain/errors";
import { runtimeConfig } from "./config";
import { createEvaluationDeps } from "./app/wiring";
import { runEvaluation } from "./services/evaluation/pricingEvaluation";
import {
  parseCountryList,
  parsePlatformList,
  parseTierList,
  readFxTableFile,
  readTitlesFile,
  selectTiers,
} from "./services/evaluation/evaluationInputs";
import { loadMarketRegistries } from "./services/markets/marketRegistry";
import { toAggregateCsv, toCsv } from "./services/export/csvExport";
import { createLogger } from "./utils/logger";

const logger = createLogger("cli");

interface RunOptions {
  titles: string;
  fx: string;
  markets?: string;
  platforms: string;
  tier?: string;
  baseline: string;
  band: string;
  out: string;
  aggregateOut?: string;
  overridesDir?: string;
  vanityRules?: string;
}

async function runCommand(options: RunOptions): Promise<void> {
  const now = new Date();
  const platforms = parsePlatformList(options.platforms);
  const allTitles = readTitlesFile(options.titles);
  const titles = options.tier ? selectTiers(allTitles, parseTierList(options.tier)) : allTitles;
  const fxTable = readFxTableFile(options.fx, now);
  const bandPct = Number(options.band);

  const deps = createEvaluationDeps({
    platforms,
    overridesDir: options.overridesDir,
    vanityRulesPath: options.vanityRules,
  });

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn("Interrupted, cancelling in-flight collection");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const result = await runEvaluation(
      {
        titles,
        fxTable,
        platforms,
        markets: options.markets ? parseCountryList(options.markets) : undefined,
        baselineMarket: options.baseline,
        bandPct,
        signal: controller.signal,
        now,
      },
      deps,
    );

    fs.writeFileSync(options.out, toCsv(result.rows));
    logger.info({ file: options.out, rows: result.rows.length, ...result.summary }, "Recommendations written");

    if (options.aggregateOut) {
      fs.writeFileSync(options.aggregateOut, toAggregateCsv(result.aggregates));
      logger.info({ file: options.aggregateOut, rows: result.aggregates.length }, "Aggregate recommendations written");
    }
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

function marketsCommand(platformList: string, options: { overridesDir?: string }): void {
  const platforms = parsePlatformList(platformList);
  const registries = loadMarketRegistries({
    platforms,
    overridesDir: options.overridesDir ?? runtimeConfig.marketOverridesDir,
  });

  for (const platform of platforms) {
    const registry = registries.registry(platform);
    for (const code of registry.countryCodes()) {
      const market = registry.lookup(code);
      process.stdout.write(`${platform}\t${market.countryCode}\t${market.currencyCode}\t${market.locale}\t${market.displayName}\n`);
    }
  }
}

function fail(error: unknown): never {
  if (error instanceof PricingError) {
    logger.error({ code: error.code, context: error.context }, error.message);
  } else {
    logger.error({ err: error }, describeError(error));
  }
  process.exit(1);
}

program.name("game-price-reco").description("Per-country price recommendations for game titles").version("0.1.0");

program
  .command("run")
  .description("Collect storefront prices and write the recommendation table as CSV")
  .requiredOption("-t, --titles <file>", "Comp set JSON (array of titles)")
  .requiredOption("-f, --fx <file>", "FX table JSON (currency -> {usdPerUnit, asOf})")
  .option("-m, --markets <codes>", "Comma-separated country codes (default: every registry market)")
  .option("-p, --platforms <names>", `Comma-separated platforms (${PLATFORMS.join(", ")})`, "steam,xbox")
  .option("--tier <tiers>", "Only price titles of these comma-separated tiers (AAA, AA, Indie)")
  .option("-b, --baseline <code>", "Baseline market", runtimeConfig.baselineMarket)
  .option("--band <pct>", "Variance band in percent", String(runtimeConfig.varianceBandPct))
  .option("-o, --out <file>", "Output CSV", "recommendations.csv")
  .option("--aggregate-out <file>", "Write the weighted comp-set view to this CSV")
  .option("--overrides-dir <dir>", "Directory with <platform>.csv market overrides")
  .option("--vanity-rules <file>", "Vanity rule table JSON")
  .action((options: RunOptions) => runCommand(options).catch(fail));

program
  .command("markets <platforms>")
  .description("List the market registry of one or more comma-separated platforms")
  .option("--overrides-dir <dir>", "Directory with <platform>.csv market overrides")
  .action((platform: string, options: { overridesDir?: string }) => {
    try {
      marketsCommand(platform, options);
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
