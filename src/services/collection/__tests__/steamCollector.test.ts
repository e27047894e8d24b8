import { describe, expect, it } from "vitest";
import { SteamPriceCollector } from "../steamCollector";
import { FetchError } from "../../../domain/errors";
import { testMarket } from "../../__tests__/fixtures";
import { stubAdapter, type StubReply } from "./stubAdapter";

const fr = testMarket("FR", "EUR", { locale: "en-fr" });
const signal = new AbortController().signal;

function collectorReplying(reply: StubReply) {
  const stub = stubAdapter(() => reply);
  const collector = new SteamPriceCollector({
    baseUrl: "https://store.example.test",
    userAgent: "test-agent",
    adapter: stub.adapter,
  });
  return { collector, requests: stub.requests };
}

const appDetails = (data: unknown, success = true) => ({ status: 200, data: { "100": { success, data } } });

describe("SteamPriceCollector", () => {
  it("reads the undiscounted price in minor units", async () => {
    const { collector, requests } = collectorReplying(
      appDetails({ name: "Foo", price_overview: { currency: "EUR", initial: 5999, final: 2999 } }),
    );

    const price = await collector.fetch(fr, "100", signal);

    expect(price).toEqual({
      localPrice: 59.99,
      currencyCode: "EUR",
      editionConfidence: "exact",
      sourceUrl: "https://store.steampowered.com/app/100",
    });
    expect(requests[0]?.baseURL).toBe("https://store.example.test");
    expect(requests[0]?.url).toBe("/api/appdetails");
    expect(requests[0]?.params).toEqual({ appids: "100", cc: "fr", l: "en" });
  });

  it("falls back to the final price", async () => {
    const { collector } = collectorReplying(appDetails({ price_overview: { currency: "usd", final: 1999 } }));

    await expect(collector.fetch(fr, "100", signal)).resolves.toMatchObject({ localPrice: 19.99, currencyCode: "USD" });
  });

  it("marks premium editions as ambiguous", async () => {
    const { collector } = collectorReplying(
      appDetails({ name: "Foo Deluxe Edition", price_overview: { currency: "EUR", initial: 8999 } }),
    );

    await expect(collector.fetch(fr, "100", signal)).resolves.toMatchObject({ editionConfidence: "ambiguous" });
  });

  it("reports apps unavailable in the market as no_price", async () => {
    const { collector } = collectorReplying(appDetails([], false));

    await expect(collector.fetch(fr, "100", signal)).rejects.toMatchObject({ reason: "no_price" });
  });

  it("reports free or unpriced apps as no_price", async () => {
    const { collector } = collectorReplying(appDetails({ name: "Foo", is_free: true }));

    await expect(collector.fetch(fr, "100", signal)).rejects.toMatchObject({
      reason: "no_price",
      context: { isFree: true },
    });
  });

  it("maps HTTP failures to http_error", async () => {
    const { collector } = collectorReplying({ status: 503, data: "" });

    const failure = collector.fetch(fr, "100", signal);
    await expect(failure).rejects.toBeInstanceOf(FetchError);
    await expect(failure).rejects.toMatchObject({ reason: "http_error", context: { status: 503 } });
  });

  it("rejects payloads that are not appdetails JSON", async () => {
    const { collector } = collectorReplying({ status: 200, data: "<html></html>" });

    await expect(collector.fetch(fr, "100", signal)).rejects.toMatchObject({ reason: "bad_payload" });
  });

  it("does not send a request once the signal has aborted", async () => {
    const { collector, requests } = collectorReplying(appDetails({}));

    await expect(collector.fetch(fr, "100", AbortSignal.abort())).rejects.toMatchObject({ reason: "cancelled" });
    expect(requests).toHaveLength(0);
  });
});
