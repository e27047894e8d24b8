import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

const countryCode = z
  .string()
  .trim()
  .regex(/^[A-Za-z]{2}$/, "expected a two-letter country code")
  .transform((value) => value.toUpperCase());

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  // Variance
  BASELINE_MARKET: countryCode.default("US"),
  VARIANCE_BAND_PCT: z.coerce.number().positive().default(40),
  FX_STALE_AFTER_HOURS: z.coerce.number().positive().default(24),
  // Collection fan-out
  COLLECT_TIMEOUT_MS: z.coerce.number().int().min(100).default(12000),
  COLLECT_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(20),
  COLLECT_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
  COLLECT_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(350),
  COLLECT_RETRY_JITTER: boolFromEnv(true),
  // Lookup data
  MARKET_OVERRIDES_DIR: z.string().optional(),
  VANITY_RULES_PATH: z.string().optional(),
  // Storefront endpoints
  STEAM_API_BASE_URL: z.string().url().default("https://store.steampowered.com"),
  XBOX_API_BASE_URL: z.string().url().default("https://displaycatalog.mp.microsoft.com"),
  HTTP_USER_AGENT: z.string().min(1).default("game-price-reco/0.1"),
});

export type Env = z.infer<typeof envSchema>;

export interface RuntimeConfig {
  env: Env["NODE_ENV"];
  logLevel: Env["LOG_LEVEL"];
  baselineMarket: string;
  varianceBandPct: number;
  fxStaleAfterMs: number;
  collectTimeoutMs: number;
  collectConcurrency: number;
  collectRetries: number;
  collectRetryDelayMs: number;
  collectRetryJitter: boolean;
  marketOverridesDir: string | null;
  vanityRulesPath: string | null;
  steamApiBaseUrl: string;
  xboxApiBaseUrl: string;
  httpUserAgent: string;
}

export function buildRuntimeConfig(source: Record<string, string | undefined>): RuntimeConfig {
  const parsed = envSchema.parse(source);

  return {
    env: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    baselineMarket: parsed.BASELINE_MARKET,
    varianceBandPct: parsed.VARIANCE_BAND_PCT,
    fxStaleAfterMs: parsed.FX_STALE_AFTER_HOURS * 60 * 60 * 1000,
    collectTimeoutMs: parsed.COLLECT_TIMEOUT_MS,
    collectConcurrency: parsed.COLLECT_CONCURRENCY,
    collectRetries: parsed.COLLECT_RETRIES,
    collectRetryDelayMs: parsed.COLLECT_RETRY_DELAY_MS,
    collectRetryJitter: parsed.COLLECT_RETRY_JITTER,
    marketOverridesDir: parsed.MARKET_OVERRIDES_DIR?.trim() || null,
    vanityRulesPath: parsed.VANITY_RULES_PATH?.trim() || null,
    steamApiBaseUrl: parsed.STEAM_API_BASE_URL,
    xboxApiBaseUrl: parsed.XBOX_API_BASE_URL,
    httpUserAgent: parsed.HTTP_USER_AGENT,
  };
}

export const runtimeConfig = buildRuntimeConfig(process.env);
