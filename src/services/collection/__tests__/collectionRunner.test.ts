import { describe, expect, it } from "vitest";
import { collectObservations, isRetryable, type CollectionOptions } from "../collectionRunner";
import type { CollectionTask, PriceCollector } from "../types";
import { MarketRegistry, MarketRegistrySet } from "../../markets/marketRegistry";
import { FetchError, MarketNotFoundError } from "../../../domain/errors";
import type { CollectedPrice, Market, Platform } from "../../../domain/pricing";
import { NOW, testTitle } from "../../__tests__/fixtures";

type Responder = (market: Market, call: number, signal: AbortSignal) => Promise<CollectedPrice>;

class FakeCollector implements PriceCollector {
  readonly calls: string[] = [];

  constructor(
    readonly platform: Platform,
    private readonly respond: Responder,
  ) {}

  fetch(market: Market, _productReference: string, signal: AbortSignal): Promise<CollectedPrice> {
    this.calls.push(market.countryCode);
    return this.respond(market, this.calls.length, signal);
  }
}

const price = (localPrice: number, currencyCode = "USD"): CollectedPrice => ({
  localPrice,
  currencyCode,
  editionConfidence: "exact",
});

const hang = (): Promise<CollectedPrice> => new Promise<CollectedPrice>(() => undefined);

const registries = new MarketRegistrySet([
  MarketRegistry.fromRows(
    "steam",
    [
      { country: "US", locale: "en-us", currency: "USD" },
      { country: "FR", locale: "fr-fr", currency: "EUR" },
      { country: "JP", locale: "ja-jp", currency: "JPY" },
      { country: "DE", locale: "de-de", currency: "EUR" },
    ],
    { label: "test", firstRow: 1 },
  ),
  MarketRegistry.fromRows("xbox", [{ country: "US", locale: "en-us", currency: "USD" }], {
    label: "test",
    firstRow: 1,
  }),
]);

const title = testTitle();
const tasksFor = (...codes: string[]): CollectionTask[] =>
  codes.map((countryCode) => ({ title, platform: "steam", countryCode }));

const baseOptions: CollectionOptions = {
  timeoutMs: 2000,
  concurrency: 4,
  retries: 0,
  retryDelayMs: 0,
  retryJitter: false,
  now: () => NOW,
};

const collectorMap = (...collectors: PriceCollector[]) =>
  new Map<Platform, PriceCollector>(collectors.map((collector) => [collector.platform, collector] as const));

describe("collectObservations", () => {
  it("returns one outcome per task in task order", async () => {
    const steam = new FakeCollector("steam", async (market) =>
      market.countryCode === "FR" ? price(59.99, "eur") : price(69.99),
    );

    const outcomes = await collectObservations(tasksFor("FR", "US"), registries, collectorMap(steam), baseOptions);

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["collected", "collected"]);
    const [fr] = outcomes;
    if (fr?.status !== "collected") throw new Error("expected a collected outcome");
    expect(fr.observation).toMatchObject({
      title: "Foo",
      platform: "steam",
      productReference: "100",
      localPrice: 59.99,
      currencyCode: "EUR",
      sourceTimestamp: NOW,
    });
    expect(fr.observation.market.countryCode).toBe("FR");
    expect(Object.isFrozen(fr.observation)).toBe(true);
  });

  it("times out a slow task without holding up the others", async () => {
    const steam = new FakeCollector("steam", (market) => (market.countryCode === "JP" ? hang() : Promise.resolve(price(10))));

    const started = Date.now();
    const outcomes = await collectObservations(tasksFor("US", "JP", "FR"), registries, collectorMap(steam), {
      ...baseOptions,
      timeoutMs: 50,
    });

    expect(Date.now() - started).toBeLessThan(1000);
    expect(outcomes.map((outcome) => outcome.status)).toEqual(["collected", "failed", "collected"]);
    const jp = outcomes[1];
    expect(jp?.status === "failed" && jp.error instanceof FetchError && jp.error.reason).toBe("timeout");
  });

  it("reports unknown markets without calling the collector", async () => {
    const steam = new FakeCollector("steam", async () => price(10));

    const [outcome] = await collectObservations(tasksFor("ZZ"), registries, collectorMap(steam), baseOptions);

    expect(outcome?.status).toBe("failed");
    if (outcome?.status !== "failed") return;
    expect(outcome.market).toBeNull();
    expect(outcome.error).toBeInstanceOf(MarketNotFoundError);
    expect(steam.calls).toEqual([]);
  });

  it("fails tasks with no collector or no product reference", async () => {
    const tasks: CollectionTask[] = [
      { title, platform: "xbox", countryCode: "US" },
      { title: testTitle({ products: { xbox: "9ABC" } }), platform: "steam", countryCode: "US" },
    ];

    const outcomes = await collectObservations(
      tasks,
      registries,
      collectorMap(new FakeCollector("steam", async () => price(10))),
      baseOptions,
    );

    expect(outcomes.map((outcome) => (outcome.status === "failed" && "reason" in outcome.error ? outcome.error.reason : null))).toEqual([
      "no_collector",
      "no_product_reference",
    ]);
  });

  it("retries transient errors inside the timeout budget", async () => {
    const steam = new FakeCollector("steam", async (_market, call) => {
      if (call === 1) throw new FetchError("HTTP 503", "http_error");
      return price(69.99);
    });

    const [outcome] = await collectObservations(tasksFor("US"), registries, collectorMap(steam), {
      ...baseOptions,
      retries: 1,
    });

    expect(outcome?.status).toBe("collected");
    expect(steam.calls).toEqual(["US", "US"]);
  });

  it("does not retry a missing price", async () => {
    const steam = new FakeCollector("steam", async () => {
      throw new FetchError("not sold here", "no_price");
    });

    const [outcome] = await collectObservations(tasksFor("US"), registries, collectorMap(steam), {
      ...baseOptions,
      retries: 3,
    });

    expect(outcome?.status).toBe("failed");
    expect(steam.calls).toHaveLength(1);
  });

  it("wraps unexpected collector errors", async () => {
    const steam = new FakeCollector("steam", async () => {
      throw new TypeError("boom");
    });

    const [outcome] = await collectObservations(tasksFor("US"), registries, collectorMap(steam), baseOptions);

    if (outcome?.status !== "failed") throw new Error("expected a failed outcome");
    expect(outcome.error).toBeInstanceOf(FetchError);
    expect(outcome.error.message).toBe("boom");
    expect("reason" in outcome.error && outcome.error.reason).toBe("collector_error");
  });

  it("rejects unusable prices", async () => {
    const steam = new FakeCollector("steam", async () => price(0));

    const [outcome] = await collectObservations(tasksFor("US"), registries, collectorMap(steam), baseOptions);

    expect(outcome?.status === "failed" && "reason" in outcome.error && outcome.error.reason).toBe("bad_payload");
  });

  it("bounds the number of tasks in flight", async () => {
    let inFlight = 0;
    let peak = 0;
    const steam = new FakeCollector("steam", async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return price(10);
    });

    const outcomes = await collectObservations(tasksFor("US", "FR", "JP", "DE", "US", "FR"), registries, collectorMap(steam), {
      ...baseOptions,
      concurrency: 2,
    });

    expect(outcomes).toHaveLength(6);
    expect(peak).toBe(2);
  });

  it("settles every task as cancelled when the run is aborted", async () => {
    const controller = new AbortController();
    const steam = new FakeCollector("steam", () => hang());
    setTimeout(() => controller.abort(), 20);

    const outcomes = await collectObservations(tasksFor("US", "FR", "JP", "DE"), registries, collectorMap(steam), {
      ...baseOptions,
      concurrency: 2,
      timeoutMs: 10000,
      signal: controller.signal,
    });

    expect(outcomes).toHaveLength(4);
    expect(outcomes.map((outcome) => (outcome.status === "failed" && "reason" in outcome.error ? outcome.error.reason : null))).toEqual([
      "cancelled",
      "cancelled",
      "cancelled",
      "cancelled",
    ]);
    // The last two never reached the collector
    expect(steam.calls).toEqual(["US", "FR"]);
  });

  it("passes an abort signal to the collector that fires on timeout", async () => {
    let seen: AbortSignal | undefined;
    const steam = new FakeCollector("steam", (_market, _call, signal) => {
      seen = signal;
      return hang();
    });

    await collectObservations(tasksFor("US"), registries, collectorMap(steam), { ...baseOptions, timeoutMs: 20 });

    expect(seen?.aborted).toBe(true);
  });
});

describe("isRetryable", () => {
  it("retries transport errors only", () => {
    expect(isRetryable(new FetchError("HTTP 502", "http_error"))).toBe(true);
    expect(isRetryable(new Error("socket hang up"))).toBe(true);
    expect(isRetryable(new FetchError("late", "timeout"))).toBe(false);
    expect(isRetryable(new FetchError("gone", "no_price"))).toBe(false);
  });
});
