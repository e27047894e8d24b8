import { describe, expect, it } from "vitest";
import { buildRuntimeConfig } from "../config";

describe("buildRuntimeConfig", () => {
  it("applies defaults", () => {
    const config = buildRuntimeConfig({});

    expect(config).toMatchObject({
      env: "development",
      logLevel: "info",
      baselineMarket: "US",
      varianceBandPct: 40,
      fxStaleAfterMs: 24 * 60 * 60 * 1000,
      collectTimeoutMs: 12000,
      collectConcurrency: 20,
      collectRetries: 1,
      collectRetryDelayMs: 350,
      collectRetryJitter: true,
      marketOverridesDir: null,
      vanityRulesPath: null,
      steamApiBaseUrl: "https://store.steampowered.com",
      xboxApiBaseUrl: "https://displaycatalog.mp.microsoft.com",
    });
  });

  it("coerces numeric and boolean settings from strings", () => {
    const config = buildRuntimeConfig({
      BASELINE_MARKET: "gb",
      VARIANCE_BAND_PCT: "25",
      FX_STALE_AFTER_HOURS: "2",
      COLLECT_CONCURRENCY: "8",
      COLLECT_RETRY_JITTER: "off",
      MARKET_OVERRIDES_DIR: " ./overrides ",
    });

    expect(config.baselineMarket).toBe("GB");
    expect(config.varianceBandPct).toBe(25);
    expect(config.fxStaleAfterMs).toBe(7_200_000);
    expect(config.collectConcurrency).toBe(8);
    expect(config.collectRetryJitter).toBe(false);
    expect(config.marketOverridesDir).toBe("./overrides");
  });

  it("rejects invalid values", () => {
    expect(() => buildRuntimeConfig({ BASELINE_MARKET: "USA" })).toThrow();
    expect(() => buildRuntimeConfig({ COLLECT_CONCURRENCY: "0" })).toThrow();
    expect(() => buildRuntimeConfig({ COLLECT_RETRY_JITTER: "maybe" })).toThrow();
  });
});
