import { z } from "zod";
import { PLATFORMS, TITLE_TIERS } from "../domain/pricing";
import { InvalidConfigError } from "../domain/errors";

/**
 * Schemas for every file-shaped input of an evaluation run:
 * market tables, FX tables, comp sets and vanity rules.
 */

export const MarketRowSchema = z.object({
  country: z.string().trim(),
  locale: z.string().trim(),
  currency: z.string().trim(),
  name: z.string().trim().optional(),
});
export type MarketRow = z.infer<typeof MarketRowSchema>;

export const MarketTableSchema = z.array(MarketRowSchema);

export const FxEntrySchema = z.object({
  usdPerUnit: z.number().positive(),
  asOf: z.string().datetime({ offset: true }),
});
export const FxTableInputSchema = z.record(z.string().regex(/^[A-Za-z]{3}$/), FxEntrySchema);

export const TitleSchema = z.object({
  canonicalName: z.string().trim().min(1),
  tier: z.enum(TITLE_TIERS),
  baselineUsdPrice: z.number(),
  scaleFactor: z.number().default(1),
  weight: z.number().default(1),
  products: z.record(z.enum(PLATFORMS), z.string().trim().min(1)),
  markets: z.array(z.string().trim().length(2)).optional(),
});
export const TitleListSchema = z.array(TitleSchema);

export const VanityRuleSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("ending"), ending: z.number().min(0).lt(1) }),
  z.object({ kind: z.literal("step"), step: z.number().positive() }),
]);
export type VanityRule = z.infer<typeof VanityRuleSchema>;

export const VanityRuleTableSchema = z.object({
  byCurrency: z.record(z.string(), VanityRuleSchema).default({}),
  byMarket: z.record(z.string(), VanityRuleSchema).default({}),
});

/**
 * Parses with a schema and reports failures as InvalidConfigError,
 * naming the first offending path.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown, source: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new InvalidConfigError(`Invalid ${source} at ${where}: ${issue?.message ?? "unknown error"}`, {
      source,
      issues: result.error.issues,
    });
  }
  return result.data;
}
