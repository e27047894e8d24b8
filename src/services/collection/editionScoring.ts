import type { EditionConfidence } from "../../domain/pricing";

// Storefronts list premium editions under the same product; any of these in
// a label means the price may not be the standard edition's. Keywords match
// whole words only ("Golden Axe" is not a gold edition).
const NEGATIVE_EDITIONS = wordPatterns(
  "deluxe",
  "ultimate",
  "premium",
  "super edition",
  "vault",
  "gold",
  "mvp",
  "champion",
  "bundle",
);
const PREFERRED_EDITIONS = wordPatterns("standard", "cross-gen", "cross gen", "crossgen", "base game");

function wordPatterns(...keywords: string[]): RegExp[] {
  return keywords.map((keyword) => new RegExp(`\\b${keyword.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}\\b`, "i"));
}

export function scoreEditionLabel(label: string): number {
  let score = 0;
  if (PREFERRED_EDITIONS.some((pattern) => pattern.test(label))) score += 100;
  if (NEGATIVE_EDITIONS.some((pattern) => pattern.test(label))) score -= 100;
  return score;
}

/**
 * Labels the edition a price was read from. A label naming a premium edition
 * makes the match ambiguous unless it also names the standard one
 * ("Standard Edition Cross-Gen Bundle" stays exact).
 */
export function classifyEdition(...labels: Array<string | null | undefined>): EditionConfidence {
  const present = labels.filter((label): label is string => Boolean(label?.trim()));
  return present.some((label) => scoreEditionLabel(label) < 0) ? "ambiguous" : "exact";
}
