import { z } from "zod";

const FractionSchema = z.number().finite().min(0).max(1);

/**
 * FetchWindowV1Schema
 *
 * Fraction window over an entity's chronologically sorted samples.
 * Selects the half-open index range [floor(min*n), floor(max*n)).
 */
export const FetchWindowV1Schema = z
  .object({
    min: FractionSchema.default(0),
    max: FractionSchema.default(1),
  })
  .refine((w) => w.min <= w.max, { message: "min cannot be greater than max", path: ["min"] });

export type FetchWindowV1 = z.infer<typeof FetchWindowV1Schema>;
