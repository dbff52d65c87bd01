import { z } from "zod";
import { NonEmpty, ResourceAmounts } from "./resources";

/**
 * Action catalog.
 *
 * Actions are the only legal way to change a world during planning. They are
 * plain data so schedules can be compared and written out after the worlds
 * they were planned against are gone.
 */

export const TransformParams = z
  .object({
    country: NonEmpty,
    template: NonEmpty,
    scale: z.number().finite().nonnegative(),
  })
  .strict();

export const TransferParams = z
  .object({
    source: NonEmpty,
    destination: NonEmpty,
    bundle: ResourceAmounts,
  })
  .strict();

export const Action = z.discriminatedUnion("type", [
  z.object({ type: z.literal("transform"), params: TransformParams }).strict(),
  z.object({ type: z.literal("transfer"), params: TransferParams }).strict(),
]);

export type Action = z.infer<typeof Action>;
export type TransformAction = Extract<Action, { type: "transform" }>;
export type TransferAction = Extract<Action, { type: "transfer" }>;
