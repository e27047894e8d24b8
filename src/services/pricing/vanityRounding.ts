/**
 * Vanity pricing: snaps a computed local price onto the market's conventional
 * ending (xx.99, xx.95, whole yen, round
 * hundreds of rupiah...). The result never moves more than half a currency
 * unit from the target.
 *
 * Rules are configuration data, looked up by country code first, then by
 * currency. A market with no rule keeps its unrounded value.
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Market } from "../../domain/pricing";
import { VanityRuleTableSchema, parseInput, type VanityRule } from "../../schemas/input";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_VANITY_RULES_PATH = path.resolve(__dirname, "../../../data/vanity-rules.json");

const EPSILON = 1e-9;

export interface VanityRuleTable {
  byCurrency: ReadonlyMap<string, VanityRule>;
  byMarket: ReadonlyMap<string, VanityRule>;
}

export const EMPTY_VANITY_RULES: VanityRuleTable = {
  byCurrency: new Map(),
  byMarket: new Map(),
};

export function loadVanityRules(input: unknown): VanityRuleTable {
  const parsed = parseInput(VanityRuleTableSchema, input, "vanity rule table");
  const upperKeys = (record: Record<string, VanityRule>) =>
    new Map(Object.entries(record).map(([key, rule]) => [key.trim().toUpperCase(), rule] as const));

  return {
    byCurrency: upperKeys(parsed.byCurrency),
    byMarket: upperKeys(parsed.byMarket),
  };
}

export function loadVanityRulesFile(file: string = DEFAULT_VANITY_RULES_PATH): VanityRuleTable {
  const raw: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  return loadVanityRules(raw);
}

export function ruleFor(market: Market, rules: VanityRuleTable): VanityRule | undefined {
  return rules.byMarket.get(market.countryCode) ?? rules.byCurrency.get(market.currencyCode);
}

function toCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Nearest `n + ending` (n ≥ 0); ties go to the higher price */
function nearestEnding(target: number, ending: number): number {
  const whole = Math.floor(target);
  let best: number | null = null;
  let bestDistance = Infinity;

  for (const n of [whole - 1, whole, whole + 1]) {
    if (n < 0) continue;
    const candidate = n + ending;
    const distance = Math.abs(candidate - target);
    if (distance <= bestDistance + EPSILON) {
      best = candidate;
      bestDistance = distance;
    }
  }

  return best !== null && bestDistance <= 0.5 + EPSILON ? best : target;
}

/**
 * Nearest multiple of `step`; ties go up. A multiple more than half a unit
 * away, or zero, leaves the target as it is.
 */
function nearestStep(target: number, step: number): number {
  const candidate = Math.round(target / step) * step;
  return candidate > 0 && Math.abs(candidate - target) <= 0.5 + EPSILON ? candidate : target;
}

export function roundVanity(targetLocalPrice: number, market: Market, rules: VanityRuleTable): number {
  const rule = ruleFor(market, rules);
  if (!rule || !Number.isFinite(targetLocalPrice) || targetLocalPrice <= 0) {
    return targetLocalPrice;
  }

  switch (rule.kind) {
    case "ending":
      return toCents(nearestEnding(targetLocalPrice, rule.ending));
    case "step":
      return toCents(nearestStep(targetLocalPrice, rule.step));
  }
}
