import fs from "node:fs";
import {
  TITLE_TIERS,
  isPlatform,
  toTitleTier,
  type FxTable,
  type Platform,
  type Title,
  type TitleTier,
} from "../../domain/pricing";
import { InvalidConfigError, describeError } from "../../domain/errors";
import { validateTitles } from "../pricing/scaleWeightNormalizer";
import { loadFxTable } from "../pricing/currencyEngine";

/** Reads and parses a JSON input file, reporting both failures as InvalidConfigError */
export function readJsonFile(file: string, label: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (error) {
    throw new InvalidConfigError(`Cannot read ${label} file ${file}: ${describeError(error)}`, { file });
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new InvalidConfigError(`${label} file ${file} is not valid JSON: ${describeError(error)}`, { file });
  }
}

export function readTitlesFile(file: string): Title[] {
  return validateTitles(readJsonFile(file, "title list"));
}

export function readFxTableFile(file: string, now: Date = new Date()): FxTable {
  return loadFxTable(readJsonFile(file, "FX table"), now);
}

/** "us, fr ,JP" → ["US", "FR", "JP"] */
export function parseCountryList(value: string): string[] {
  const codes = value
    .split(",")
    .map((code) => code.trim().toUpperCase())
    .filter((code) => code.length > 0);

  const invalid = codes.filter((code) => !/^[A-Z]{2}$/.test(code));
  if (invalid.length > 0) {
    throw new InvalidConfigError(`Invalid country codes: ${invalid.join(", ")}`, { invalid });
  }
  return [...new Set(codes)];
}

export function parsePlatformList(value: string): Platform[] {
  const names = value
    .split(",")
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);

  const platforms: Platform[] = [];
  for (const name of names) {
    if (!isPlatform(name)) {
      throw new InvalidConfigError(`Unknown platform "${name}"`, { platform: name });
    }
    if (!platforms.includes(name)) {
      platforms.push(name);
    }
  }
  if (platforms.length === 0) {
    throw new InvalidConfigError("No platforms given");
  }
  return platforms;
}

/** "aaa, indie" → ["AAA", "Indie"] */
export function parseTierList(value: string): TitleTier[] {
  const tiers: TitleTier[] = [];
  for (const name of value.split(",").filter((part) => part.trim().length > 0)) {
    const tier = toTitleTier(name);
    if (!tier) {
      throw new InvalidConfigError(`Unknown tier "${name.trim()}" (expected ${TITLE_TIERS.join(", ")})`, {
        tier: name.trim(),
      });
    }
    if (!tiers.includes(tier)) {
      tiers.push(tier);
    }
  }
  if (tiers.length === 0) {
    throw new InvalidConfigError("No tiers given");
  }
  return tiers;
}

/** Keeps the titles of the given tiers; an empty selection is a configuration error */
export function selectTiers(titles: readonly Title[], tiers: readonly TitleTier[]): Title[] {
  const selected = titles.filter((title) => tiers.includes(title.tier));
  if (selected.length === 0) {
    throw new InvalidConfigError(`No titles in tier ${tiers.join(", ")}`, { tiers: [...tiers] });
  }
  return selected;
}
