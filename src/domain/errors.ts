import type { Platform } from "./pricing";

export type PricingErrorCode =
  | "MARKET_NOT_FOUND"
  | "FETCH_ERROR"
  | "MISSING_FX"
  | "BASELINE_MISSING"
  | "INVALID_CONFIG"
  | "EVALUATION_CANCELLED"
  | "ASSEMBLY_DEFECT";

export class PricingError extends Error {
  constructor(
    message: string,
    public readonly code: PricingErrorCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "PricingError";
  }
}

export class MarketNotFoundError extends PricingError {
  constructor(
    public readonly platform: Platform,
    public readonly countryCode: string,
  ) {
    super(`No ${platform} market registered for country "${countryCode}"`, "MARKET_NOT_FOUND", {
      platform,
      countryCode,
    });
    this.name = "MarketNotFoundError";
  }
}

export type FetchFailureReason =
  | "timeout"
  | "cancelled"
  | "no_price"
  | "http_error"
  | "bad_payload"
  | "no_collector"
  | "no_product_reference"
  | "collector_error";

export class FetchError extends PricingError {
  constructor(
    message: string,
    public readonly reason: FetchFailureReason,
    context?: Record<string, unknown>,
  ) {
    super(message, "FETCH_ERROR", { reason, ...context });
    this.name = "FetchError";
  }
}

export class MissingFxError extends PricingError {
  constructor(public readonly currencyCode: string) {
    super(`No FX rate for currency "${currencyCode}"`, "MISSING_FX", { currencyCode });
    this.name = "MissingFxError";
  }
}

export class BaselineMissingError extends PricingError {
  constructor(
    public readonly title: string,
    public readonly platform: Platform,
    public readonly baselineMarket: string,
  ) {
    super(
      `Title "${title}" has no usable ${baselineMarket} baseline price on ${platform}`,
      "BASELINE_MISSING",
      { title, platform, baselineMarket },
    );
    this.name = "BaselineMissingError";
  }
}

/** Bad input data. Raised at load time, before any fetching starts. */
export class InvalidConfigError extends PricingError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INVALID_CONFIG", context);
    this.name = "InvalidConfigError";
  }
}

export class EvaluationCancelledError extends PricingError {
  constructor(public readonly settledTasks: number) {
    super(`Evaluation cancelled after ${settledTasks} collection tasks settled`, "EVALUATION_CANCELLED", {
      settledTasks,
    });
    this.name = "EvaluationCancelledError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
