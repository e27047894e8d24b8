import type { RawObservation, Title, WeightedObservation } from "../../domain/pricing";
import { InvalidConfigError } from "../../domain/errors";
import { TitleListSchema, parseInput } from "../../schemas/input";

/**
 * Applies a title's scale factor to one observation.
 *
 * The scale factor brings a title's price onto its tier's footing (a 39.99
 * title with scale 1.75 compares like a 69.99 one) and is applied in local
 * currency, before conversion. The weight is carried along for the aggregate
 * view only; it never alters this market's own price.
 *
 * Inputs are validated by validateTitles at load time.
 */
export function applyScaleAndWeight(
  observation: RawObservation,
  scaleFactor: number,
  weight: number,
): WeightedObservation {
  return Object.freeze({
    ...observation,
    scaleFactor,
    weight,
    localPriceWeighted: observation.localPrice * scaleFactor,
  });
}

/**
 * Load-time validation of a comp set. Throws InvalidConfigError on the first
 * bad entry so a run never starts on unreliable input.
 */
export function validateTitles(input: unknown): Title[] {
  const parsed = parseInput(TitleListSchema, input, "title list");
  const seen = new Set<string>();

  return parsed.map((title, index) => {
    const where = `title #${index + 1} ("${title.canonicalName}")`;

    if (seen.has(title.canonicalName)) {
      throw new InvalidConfigError(`Duplicate canonical name in ${where}`, { title: title.canonicalName });
    }
    seen.add(title.canonicalName);

    if (!Number.isFinite(title.scaleFactor) || title.scaleFactor <= 0) {
      throw new InvalidConfigError(`${where}: scale factor must be > 0, got ${title.scaleFactor}`, {
        title: title.canonicalName,
        scaleFactor: title.scaleFactor,
      });
    }
    if (!Number.isFinite(title.weight) || title.weight < 0) {
      throw new InvalidConfigError(`${where}: weight must be >= 0, got ${title.weight}`, {
        title: title.canonicalName,
        weight: title.weight,
      });
    }
    if (!Number.isFinite(title.baselineUsdPrice) || title.baselineUsdPrice <= 0) {
      throw new InvalidConfigError(`${where}: baseline USD price must be > 0, got ${title.baselineUsdPrice}`, {
        title: title.canonicalName,
        baselineUsdPrice: title.baselineUsdPrice,
      });
    }
    if (Object.keys(title.products).length === 0) {
      throw new InvalidConfigError(`${where}: no platform product references`, { title: title.canonicalName });
    }

    return {
      canonicalName: title.canonicalName,
      tier: title.tier,
      baselineUsdPrice: title.baselineUsdPrice,
      scaleFactor: title.scaleFactor,
      weight: title.weight,
      products: title.products,
      markets: title.markets?.map((code) => code.toUpperCase()),
    };
  });
}
