import { createLogger } from "./logger";

const logger = createLogger("retry");

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  factor?: number;
  jitter?: boolean;
  retryCondition?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
}

export interface ExecuteOptions {
  context?: string;
  /** Stops waiting between attempts and skips the remaining ones */
  signal?: AbortSignal;
}

export class RetryPolicy {
  private readonly maxAttempts: number;
  private readonly initialDelay: number;
  private readonly maxDelay: number;
  private readonly factor: number;
  private readonly jitter: boolean;
  private readonly retryCondition: (error: unknown, attempt: number) => boolean;
  private readonly onRetry?: (error: unknown, attempt: number, delay: number) => void;

  constructor(options: RetryOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.initialDelay = options.initialDelay ?? 1000;
    this.maxDelay = options.maxDelay ?? 30000;
    this.factor = options.factor ?? 2;
    this.jitter = options.jitter !== false;
    this.retryCondition = options.retryCondition ?? (() => true);
    this.onRetry = options.onRetry;
  }

  calculateDelay(attempt: number): number {
    let delay = this.initialDelay * Math.pow(this.factor, attempt - 1);
    delay = Math.min(delay, this.maxDelay);

    if (this.jitter) {
      const jitterAmount = delay * 0.2;
      delay = delay + (Math.random() * jitterAmount * 2 - jitterAmount);
    }

    return Math.max(0, Math.round(delay));
  }

  async execute<T>(fn: (attempt: number) => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
    const { context, signal } = options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      signal?.throwIfAborted();

      try {
        const result = await fn(attempt);
        if (attempt > 1) {
          logger.debug({ context, attempt }, "Retry succeeded");
        }
        return result;
      } catch (error) {
        lastError = error;

        if (signal?.aborted || attempt >= this.maxAttempts || !this.retryCondition(error, attempt)) {
          throw error;
        }

        const delay = this.calculateDelay(attempt);
        logger.debug(
          {
            context,
            attempt,
            nextAttempt: attempt + 1,
            delay,
            error: error instanceof Error ? error.message : String(error),
          },
          "Operation failed, retrying",
        );
        this.onRetry?.(error, attempt, delay);

        await sleep(delay, signal);
      }
    }

    throw lastError;
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
