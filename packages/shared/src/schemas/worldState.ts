import { z } from "zod";
import { NonEmpty, POPULATION, ResourceAmounts } from "./resources";

export const CountrySnapshot = z
  .object({
    name: NonEmpty,
    population: z.number().int().positive(),
    resources: ResourceAmounts.default({})
  })
  .strict()
  .refine((c) => !Object.prototype.hasOwnProperty.call(c.resources, POPULATION), {
    message: `${POPULATION} belongs in the population field, not in resources`,
    path: ["resources"]
  });

export type CountrySnapshot = z.infer<typeof CountrySnapshot>;

export const WorldSnapshot = z
  .object({
    countries: z.array(CountrySnapshot).min(1)
  })
  .strict()
  .superRefine((world, ctx) => {
    const seen = new Set<string>();
    const vocabulary = Object.keys(world.countries[0]?.resources ?? {}).sort();
    world.countries.forEach((country, index) => {
      if (seen.has(country.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate country "${country.name}"`,
          path: ["countries", index, "name"]
        });
      }
      seen.add(country.name);
      const keys = Object.keys(country.resources).sort();
      if (keys.join("\u0000") !== vocabulary.join("\u0000")) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `country "${country.name}" does not share the resource vocabulary of "${world.countries[0]?.name}"`,
          path: ["countries", index, "resources"]
        });
      }
    });
  });

export type WorldSnapshot = z.infer<typeof WorldSnapshot>;
