import type { CollectedPrice, Market, Platform, RawObservation, Title } from "../../domain/pricing";
import type { FetchError, MarketNotFoundError } from "../../domain/errors";

/**
 * A storefront price source for one platform.
 *
 * The collector owns everything storefront-specific, including building the
 * localized request from the market's locale. It must reject with a FetchError
 * (any other rejection is wrapped as one) and should stop when `signal` aborts.
 */
export interface PriceCollector {
  readonly platform: Platform;
  fetch(market: Market, productReference: string, signal: AbortSignal): Promise<CollectedPrice>;
}

export interface CollectionTask {
  title: Title;
  platform: Platform;
  countryCode: string;
}

export type CollectionOutcome =
  | {
      status: "collected";
      task: CollectionTask;
      market: Market;
      observation: RawObservation;
    }
  | {
      status: "failed";
      task: CollectionTask;
      /** null when the registry had no such market */
      market: Market | null;
      error: FetchError | MarketNotFoundError;
    };
