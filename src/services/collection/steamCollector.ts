import type { AxiosInstance } from "axios";
import { z } from "zod";
import type { CollectedPrice, Market } from "../../domain/pricing";
import { FetchError } from "../../domain/errors";
import { createLogger } from "../../utils/logger";
import { classifyEdition } from "./editionScoring";
import { createStorefrontClient, toFetchError, type StorefrontClientOptions } from "./storefrontClient";
import type { PriceCollector } from "./types";

const logger = createLogger("steam-collector");

const AppDetailsEnvelopeSchema = z.record(
  z.string(),
  z.object({
    success: z.boolean(),
    data: z.unknown().optional(),
  }),
);

const AppDataSchema = z.object({
  name: z.string().optional(),
  is_free: z.boolean().optional(),
  price_overview: z
    .object({
      currency: z.string(),
      // Minor units (cents). `initial` is the undiscounted list price.
      initial: z.number().optional(),
      final: z.number().optional(),
    })
    .optional(),
});

/**
 * Steam storefront `appdetails` API. The product reference is the numeric
 * appid; the country code selects the regional price.
 */
export class SteamPriceCollector implements PriceCollector {
  readonly platform = "steam" as const;
  private readonly http: AxiosInstance;

  constructor(options: StorefrontClientOptions) {
    this.http = createStorefrontClient(options);
  }

  async fetch(market: Market, productReference: string, signal: AbortSignal): Promise<CollectedPrice> {
    const appId = productReference.trim();
    const context = { platform: this.platform, appId, countryCode: market.countryCode };

    let body: unknown;
    try {
      const response = await this.http.get<unknown>("/api/appdetails", {
        params: { appids: appId, cc: market.countryCode.toLowerCase(), l: "en" },
        signal,
      });
      body = response.data;
    } catch (error) {
      throw toFetchError(error, context);
    }

    const envelope = AppDetailsEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new FetchError("Unexpected appdetails payload", "bad_payload", context);
    }

    const node = envelope.data[appId];
    if (!node || !node.success) {
      throw new FetchError(`App ${appId} is not available in ${market.countryCode}`, "no_price", context);
    }

    const data = AppDataSchema.safeParse(node.data);
    if (!data.success) {
      throw new FetchError(`Unexpected appdetails data for app ${appId}`, "bad_payload", context);
    }

    const overview = data.data.price_overview;
    const cents = overview?.initial || overview?.final;
    if (!overview || !cents) {
      throw new FetchError(`App ${appId} has no price in ${market.countryCode}`, "no_price", {
        ...context,
        isFree: data.data.is_free ?? false,
      });
    }

    const collected: CollectedPrice = {
      localPrice: Math.round(cents) / 100,
      currencyCode: overview.currency.trim().toUpperCase(),
      editionConfidence: classifyEdition(data.data.name),
      sourceUrl: `https://store.steampowered.com/app/${appId}`,
    };

    logger.debug({ ...context, localPrice: collected.localPrice, currencyCode: collected.currencyCode }, "Steam price");
    return collected;
  }
}
