import { z } from "zod";
import { ResourceName, Quantity } from "./resources";

export const WeightEntry = z
  .object({
    resource: ResourceName,
    weight: Quantity,
    baseline: Quantity
  })
  .strict();

export type WeightEntry = z.infer<typeof WeightEntry>;

/** resource -> (weight, baseline); the keys define the vocabulary Q scores. */
export const WeightTable = z
  .record(ResourceName, z.object({ weight: Quantity, baseline: Quantity }).strict())
  .refine((table) => Object.keys(table).length > 0, { message: "weight table must not be empty" });

export type WeightTable = z.infer<typeof WeightTable>;
