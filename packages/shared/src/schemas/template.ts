import { z } from "zod";
import { NonEmpty, ResourceName } from "./resources";

const PerUnit = z.record(ResourceName, z.number().finite().nonnegative());

/** A single-country production recipe, scalable by a non-negative factor. */
export const TransformTemplate = z
  .object({
    name: NonEmpty,
    inputs: PerUnit.default({}),
    outputs: PerUnit.default({})
  })
  .strict();

export type TransformTemplate = z.infer<typeof TransformTemplate>;
