import { parse } from "csv-parse/sync";
import { InvalidConfigError, describeError } from "../../domain/errors";
import { MarketTableSchema, parseInput, type MarketRow } from "../../schemas/input";

const REQUIRED_COLUMNS = ["country", "locale", "currency"] as const;

/**
 * Parses a market override table (`country, locale, currency, name`).
 * Column names are matched case-insensitively; `name` is optional.
 */
export function parseMarketOverrideCsv(text: string, source = "market override"): MarketRow[] {
  let headers: string[] = [];
  let records: unknown;

  try {
    records = parse(text, {
      bom: true,
      columns: (header: string[]) => {
        headers = header.map((column) => column.trim().toLowerCase());
        return headers;
      },
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new InvalidConfigError(`Unreadable ${source}: ${describeError(error)}`, { source });
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new InvalidConfigError(`${source} is missing column(s): ${missing.join(", ")}`, { source, missing });
  }

  return parseInput(MarketTableSchema, records, source);
}
