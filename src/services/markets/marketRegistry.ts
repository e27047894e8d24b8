/**
 * Market registries, one per platform silo.
 *
 * Each platform owns an independent keyed table (country code → Market); no
 * lookup data is shared between silos. Tables are validated on load and frozen.
 * An override table for a platform replaces its built-in table wholesale.
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { PLATFORMS, type Market, type Platform } from "../../domain/pricing";
import { InvalidConfigError, MarketNotFoundError } from "../../domain/errors";
import { MarketTableSchema, parseInput, type MarketRow } from "../../schemas/input";
import { parseMarketOverrideCsv } from "./marketOverrides";
import { createLogger } from "../../utils/logger";

const logger = createLogger("market-registry");

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const BUILTIN_MARKETS_DIR = path.resolve(__dirname, "../../../data/markets");

/** Where a table came from, for error messages */
export interface TableSource {
  label: string;
  /** Row number of the first entry (2 for a CSV with a header line) */
  firstRow: number;
}

export class MarketRegistry {
  private constructor(
    public readonly platform: Platform,
    private readonly markets: ReadonlyMap<string, Market>,
    public readonly source: string,
  ) {}

  /**
   * Validates every row before building anything: blank country/locale/currency
   * or a repeated country code fails the whole table.
   */
  static fromRows(platform: Platform, rows: readonly MarketRow[], source: TableSource): MarketRegistry {
    const markets = new Map<string, Market>();
    const firstSeenAt = new Map<string, number>();

    rows.forEach((row, index) => {
      const rowNumber = source.firstRow + index;
      const missing = (["country", "locale", "currency"] as const).filter((field) => !row[field]?.trim());
      if (missing.length > 0) {
        throw new InvalidConfigError(
          `${platform} market table ${source.label} row ${rowNumber}: empty ${missing.join(", ")}`,
          { platform, source: source.label, row: rowNumber, missing },
        );
      }

      const countryCode = row.country.trim().toUpperCase();
      const previous = firstSeenAt.get(countryCode);
      if (previous !== undefined) {
        throw new InvalidConfigError(
          `Duplicate country code "${countryCode}" in ${platform} market table ${source.label} ` +
            `row ${rowNumber} (first defined at row ${previous})`,
          { platform, source: source.label, row: rowNumber, countryCode },
        );
      }
      firstSeenAt.set(countryCode, rowNumber);

      markets.set(
        countryCode,
        Object.freeze({
          countryCode,
          locale: row.locale.trim(),
          currencyCode: row.currency.trim().toUpperCase(),
          displayName: row.name?.trim() || countryCode,
        }),
      );
    });

    return new MarketRegistry(platform, markets, source.label);
  }

  lookup(countryCode: string): Market {
    const market = this.markets.get(countryCode.trim().toUpperCase());
    if (!market) {
      throw new MarketNotFoundError(this.platform, countryCode);
    }
    return market;
  }

  has(countryCode: string): boolean {
    return this.markets.has(countryCode.trim().toUpperCase());
  }

  countryCodes(): string[] {
    return [...this.markets.keys()];
  }

  get size(): number {
    return this.markets.size;
  }
}

/** The per-run set of silos. Read-only once built. */
export class MarketRegistrySet {
  private readonly registries: ReadonlyMap<Platform, MarketRegistry>;

  constructor(registries: Iterable<MarketRegistry>) {
    const byPlatform = new Map<Platform, MarketRegistry>();
    for (const registry of registries) {
      if (byPlatform.has(registry.platform)) {
        throw new InvalidConfigError(`Two market registries supplied for ${registry.platform}`);
      }
      byPlatform.set(registry.platform, registry);
    }
    this.registries = byPlatform;
  }

  lookup(platform: Platform, countryCode: string): Market {
    return this.registry(platform).lookup(countryCode);
  }

  registry(platform: Platform): MarketRegistry {
    const registry = this.registries.get(platform);
    if (!registry) {
      throw new InvalidConfigError(`No market registry loaded for ${platform}`, { platform });
    }
    return registry;
  }

  platforms(): Platform[] {
    return [...this.registries.keys()];
  }
}

export interface MarketRegistryOptions {
  /** Explicit override tables; each replaces that platform's built-in table */
  overrides?: Partial<Record<Platform, readonly MarketRow[]>>;

  /** Directory scanned for `<platform>.csv` override files */
  overridesDir?: string | null;

  /** Directory holding the built-in `<platform>.json` tables */
  builtinDir?: string;

  platforms?: readonly Platform[];
}

export function loadBuiltinMarketTable(platform: Platform, builtinDir: string = BUILTIN_MARKETS_DIR): MarketRow[] {
  const file = path.join(builtinDir, `${platform}.json`);
  const raw: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  return parseInput(MarketTableSchema, raw, `${platform} built-in market table`);
}

/**
 * Loads every requested silo. Any invalid table fails the whole load, so a run
 * never starts on a partial registry.
 */
export function loadMarketRegistries(options: MarketRegistryOptions = {}): MarketRegistrySet {
  const platforms = options.platforms ?? PLATFORMS;
  const registries: MarketRegistry[] = [];

  for (const platform of platforms) {
    const explicit = options.overrides?.[platform];
    if (explicit) {
      registries.push(MarketRegistry.fromRows(platform, explicit, { label: "override", firstRow: 1 }));
      logger.info({ platform, markets: explicit.length }, "Market registry replaced by explicit override");
      continue;
    }

    const overrideFile = options.overridesDir ? path.join(options.overridesDir, `${platform}.csv`) : null;
    if (overrideFile && fs.existsSync(overrideFile)) {
      const rows = parseMarketOverrideCsv(fs.readFileSync(overrideFile, "utf8"), overrideFile);
      registries.push(MarketRegistry.fromRows(platform, rows, { label: path.basename(overrideFile), firstRow: 2 }));
      logger.info({ platform, file: overrideFile, markets: rows.length }, "Market registry replaced by override file");
      continue;
    }

    const rows = loadBuiltinMarketTable(platform, options.builtinDir);
    registries.push(MarketRegistry.fromRows(platform, rows, { label: "built-in", firstRow: 1 }));
  }

  logger.debug({ platforms }, "Market registries loaded");
  return new MarketRegistrySet(registries);
}
