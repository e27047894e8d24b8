/**
 * Fan-out/fan-in of raw price collection.
 *
 * Every task runs independently under its own timeout; the timeout covers all
 * retry attempts. A failed, timed-out or cancelled task settles as a "failed"
 * outcome instead of rejecting, so the barrier always resolves with exactly
 * one outcome per task, in task order.
 */

import type { Market, Platform, RawObservation } from "../../domain/pricing";
import { FetchError, MarketNotFoundError, describeError, type FetchFailureReason } from "../../domain/errors";
import type { MarketRegistrySet } from "../markets/marketRegistry";
import { RetryPolicy } from "../../utils/retryPolicy";
import { createLogger } from "../../utils/logger";
import type { CollectionOutcome, CollectionTask, PriceCollector } from "./types";

const logger = createLogger("collection");

export interface CollectionOptions {
  timeoutMs: number;
  concurrency: number;
  /** Extra attempts after the first one */
  retries: number;
  retryDelayMs: number;
  /** Randomize backoff delays by ±20%; defaults to true */
  retryJitter?: boolean;
  signal?: AbortSignal;
  now?: () => Date;
}

const NON_RETRYABLE: ReadonlySet<FetchFailureReason> = new Set<FetchFailureReason>([
  "timeout",
  "cancelled",
  "no_price",
  "bad_payload",
  "no_collector",
  "no_product_reference",
]);

export function isRetryable(error: unknown): boolean {
  return !(error instanceof FetchError && NON_RETRYABLE.has(error.reason));
}

function toFetchError(error: unknown, task: CollectionTask): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  return new FetchError(describeError(error), "collector_error", {
    title: task.title.canonicalName,
    platform: task.platform,
    countryCode: task.countryCode,
  });
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

function resolveMarket(registries: MarketRegistrySet, task: CollectionTask): Market | MarketNotFoundError {
  try {
    return registries.lookup(task.platform, task.countryCode);
  } catch (error) {
    if (error instanceof MarketNotFoundError) {
      return error;
    }
    throw error;
  }
}

async function runTask(
  task: CollectionTask,
  registries: MarketRegistrySet,
  collectors: ReadonlyMap<Platform, PriceCollector>,
  retryPolicy: RetryPolicy,
  options: CollectionOptions,
): Promise<CollectionOutcome> {
  const titleName = task.title.canonicalName;

  const resolved = resolveMarket(registries, task);
  if (resolved instanceof MarketNotFoundError) {
    return { status: "failed", task, market: null, error: resolved };
  }
  const market = resolved;

  const fail = (error: FetchError): CollectionOutcome => ({ status: "failed", task, market, error });

  if (options.signal?.aborted) {
    return fail(new FetchError("Evaluation cancelled before collection started", "cancelled"));
  }

  const collector = collectors.get(task.platform);
  if (!collector) {
    return fail(new FetchError(`No collector configured for ${task.platform}`, "no_collector"));
  }

  const productReference = task.title.products[task.platform];
  if (!productReference) {
    return fail(new FetchError(`${titleName} has no ${task.platform} product reference`, "no_product_reference"));
  }

  const controller = new AbortController();
  const onRunAbort = () => controller.abort(new FetchError("Evaluation cancelled", "cancelled"));
  options.signal?.addEventListener("abort", onRunAbort, { once: true });
  const timer = setTimeout(
    () => controller.abort(new FetchError(`Timed out after ${options.timeoutMs}ms`, "timeout")),
    options.timeoutMs,
  );

  try {
    const collected = await Promise.race([
      retryPolicy.execute(() => collector.fetch(market, productReference, controller.signal), {
        context: `${task.platform}:${titleName}:${market.countryCode}`,
        signal: controller.signal,
      }),
      rejectOnAbort(controller.signal),
    ]);

    if (!Number.isFinite(collected.localPrice) || collected.localPrice <= 0 || !collected.currencyCode.trim()) {
      return fail(
        new FetchError(`Collector returned an unusable price (${collected.localPrice} ${collected.currencyCode})`, "bad_payload"),
      );
    }

    const observation: RawObservation = Object.freeze({
      title: titleName,
      market,
      platform: task.platform,
      productReference,
      localPrice: collected.localPrice,
      currencyCode: collected.currencyCode.trim().toUpperCase(),
      editionConfidence: collected.editionConfidence,
      sourceTimestamp: options.now ? options.now() : new Date(),
      sourceUrl: collected.sourceUrl,
    });

    return { status: "collected", task, market, observation };
  } catch (error) {
    const fetchError = toFetchError(error, task);
    logger.warn(
      { title: titleName, platform: task.platform, countryCode: market.countryCode, reason: fetchError.reason },
      `Collection failed: ${fetchError.message}`,
    );
    return fail(fetchError);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onRunAbort);
  }
}

export async function collectObservations(
  tasks: readonly CollectionTask[],
  registries: MarketRegistrySet,
  collectors: ReadonlyMap<Platform, PriceCollector>,
  options: CollectionOptions,
): Promise<CollectionOutcome[]> {
  const retryPolicy = new RetryPolicy({
    maxAttempts: options.retries + 1,
    initialDelay: options.retryDelayMs,
    maxDelay: options.timeoutMs,
    jitter: options.retryJitter,
    retryCondition: isRetryable,
  });

  const outcomes = new Array<CollectionOutcome>(tasks.length);
  let next = 0;

  const worker = async () => {
    while (next < tasks.length) {
      const index = next++;
      const task = tasks[index];
      if (task) {
        outcomes[index] = await runTask(task, registries, collectors, retryPolicy, options);
      }
    }
  };

  const started = Date.now();
  const workerCount = Math.min(Math.max(1, options.concurrency), tasks.length);
  await Promise.all(Array.from({ length: workerCount }, worker));

  const failed = outcomes.filter((outcome) => outcome.status === "failed").length;
  logger.info(
    { tasks: tasks.length, collected: tasks.length - failed, failed, durationMs: Date.now() - started },
    "Collection finished",
  );

  return outcomes;
}
