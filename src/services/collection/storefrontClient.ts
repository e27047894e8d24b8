import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { FetchError, describeError } from "../../domain/errors";

export interface StorefrontClientOptions {
  baseUrl: string;
  userAgent: string;
  /** Socket-level timeout; the collection runner enforces its own per-task budget on top */
  timeoutMs?: number;
  /** Replaces the HTTP transport (tests) */
  adapter?: AxiosAdapter;
}

export function createStorefrontClient(options: StorefrontClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseUrl,
    timeout: options.timeoutMs ?? 10000,
    headers: {
      "User-Agent": options.userAgent,
      Accept: "application/json",
    },
    adapter: options.adapter,
  });
}

/** Maps transport failures onto FetchError reasons */
export function toFetchError(error: unknown, context: Record<string, unknown>): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  if (axios.isCancel(error)) {
    return new FetchError("Request cancelled", "cancelled", context);
  }
  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return new FetchError(`Request timed out: ${error.message}`, "timeout", context);
    }
    const status = error.response?.status;
    return new FetchError(
      status ? `Storefront responded with HTTP ${status}` : `Request failed: ${error.message}`,
      "http_error",
      { ...context, status, code: error.code },
    );
  }
  return new FetchError(describeError(error), "collector_error", context);
}
