import { WeightTable } from "@nationplan/shared";
import { ConfigurationError } from "./errors";
import type { Country, StateQualityFn } from "./state";
import { holding } from "./world";

/**
 * Per-capita weighted surplus over baseline:
 *
 *   Q(c) = (1 / pop) * sum_r w[r] * (amount[r] - baseline[r] * pop)
 *
 * summed over the weight table; resources the country lacks count as zero.
 */
export function scoreCountry(country: Country, weights: Readonly<WeightTable>): number {
  const pop = country.population;
  if (!Number.isFinite(pop) || pop <= 0) {
    throw new ConfigurationError(`population must be positive, got ${pop}`, `country ${country.name}`);
  }
  let score = 0;
  for (const [resource, { weight, baseline }] of Object.entries(weights)) {
    score += weight * (holding(country, resource) - baseline * pop);
  }
  return score / pop;
}

export function createStateQuality(weights: Readonly<WeightTable>): StateQualityFn {
  const parsed = WeightTable.safeParse(weights);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => i.message).join("; "), "weights");
  }
  const table = Object.freeze(parsed.data);
  return (country) => scoreCountry(country, table);
}
