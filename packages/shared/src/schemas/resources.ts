import { z } from "zod";

/** Reserved resource name that reads and writes a country's population. */
export const POPULATION = "Population";

export const NonEmpty = z.string().trim().min(1);
export const ResourceName = NonEmpty;
export const Quantity = z.number().finite();

export const ResourceAmounts = z.record(ResourceName, Quantity);

export type ResourceAmounts = z.infer<typeof ResourceAmounts>;
