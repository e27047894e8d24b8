import { randomBytes } from "node:crypto";
import type { AxiosInstance } from "axios";
import { z } from "zod";
import type { CollectedPrice, Market } from "../../domain/pricing";
import { FetchError } from "../../domain/errors";
import { createLogger } from "../../utils/logger";
import { classifyEdition } from "./editionScoring";
import { createStorefrontClient, toFetchError, type StorefrontClientOptions } from "./storefrontClient";
import type { PriceCollector } from "./types";

const logger = createLogger("xbox-collector");

const PriceSchema = z.object({
  MSRP: z.number().optional(),
  ListPrice: z.number().optional(),
  CurrencyCode: z.string().optional(),
});

const SkuAvailabilitySchema = z.object({
  Sku: z
    .object({
      LocalizedProperties: z.array(z.object({ SkuTitle: z.string().optional() })).optional(),
    })
    .optional(),
  Availabilities: z
    .array(
      z.object({
        OrderManagementData: z.object({ Price: PriceSchema.optional() }).optional(),
      }),
    )
    .optional(),
});

const ProductsResponseSchema = z.object({
  Products: z
    .array(
      z.object({
        LocalizedProperties: z.array(z.object({ ProductTitle: z.string().optional() })).optional(),
        DisplaySkuAvailabilities: z.array(SkuAvailabilitySchema).optional(),
      }),
    )
    .default([]),
});

type ProductsResponse = z.infer<typeof ProductsResponseSchema>;

interface SkuPrice {
  amount: number;
  currencyCode: string | undefined;
  skuTitle: string | undefined;
}

/** First SKU availability carrying a price; MSRP wins over ListPrice */
export function pickSkuPrice(payload: ProductsResponse): SkuPrice | null {
  const product = payload.Products[0];
  for (const sku of product?.DisplaySkuAvailabilities ?? []) {
    for (const availability of sku.Availabilities ?? []) {
      const price = availability.OrderManagementData?.Price;
      const amount = price?.MSRP || price?.ListPrice;
      if (amount) {
        return {
          amount,
          currencyCode: price?.CurrencyCode,
          skuTitle: sku.Sku?.LocalizedProperties?.[0]?.SkuTitle,
        };
      }
    }
  }
  return null;
}

/** Correlation vector header the display catalog expects */
function msCorrelationVector(): string {
  return `${randomBytes(12).toString("base64url")}.0`;
}

/**
 * Xbox display catalog. The product reference is the 12-character Store ID
 * ("bigId"); market and language come from the registry entry.
 */
export class XboxPriceCollector implements PriceCollector {
  readonly platform = "xbox" as const;
  private readonly http: AxiosInstance;

  constructor(options: StorefrontClientOptions) {
    this.http = createStorefrontClient(options);
  }

  async fetch(market: Market, productReference: string, signal: AbortSignal): Promise<CollectedPrice> {
    const storeId = productReference.trim().toUpperCase();
    const context = { platform: this.platform, storeId, countryCode: market.countryCode };

    let body: unknown;
    try {
      const response = await this.http.get<unknown>("/v7.0/products", {
        params: {
          bigIds: storeId,
          market: market.countryCode,
          languages: market.locale,
          fieldsTemplate: "Details",
        },
        headers: { "MS-CV": msCorrelationVector() },
        signal,
      });
      body = response.data;
    } catch (error) {
      throw toFetchError(error, context);
    }

    const parsed = ProductsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError("Unexpected display catalog payload", "bad_payload", context);
    }

    const skuPrice = pickSkuPrice(parsed.data);
    if (!skuPrice) {
      throw new FetchError(`Product ${storeId} has no price in ${market.countryCode}`, "no_price", context);
    }

    const productTitle = parsed.data.Products[0]?.LocalizedProperties?.[0]?.ProductTitle;
    const collected: CollectedPrice = {
      localPrice: skuPrice.amount,
      currencyCode: (skuPrice.currencyCode ?? market.currencyCode).trim().toUpperCase(),
      editionConfidence: classifyEdition(productTitle, skuPrice.skuTitle),
      sourceUrl: `https://www.xbox.com/${market.locale}/games/store/x/${storeId}`,
    };

    logger.debug({ ...context, localPrice: collected.localPrice, currencyCode: collected.currencyCode }, "Xbox price");
    return collected;
  }
}
