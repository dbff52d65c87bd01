import { TransformTemplate, type WeightTable } from "@nationplan/shared";
import { ConfigurationError } from "./errors";
import { createStateQuality } from "./quality";
import type { PlanningContext } from "./state";

/**
 * Freezes the template and weight tables of one run. Template order is kept:
 * it fixes the order legal transforms are enumerated in.
 */
export function createPlanningContext(
  templates: ReadonlyArray<TransformTemplate>,
  weights: Readonly<WeightTable>
): PlanningContext {
  const byName = new Map<string, TransformTemplate>();
  for (const raw of templates) {
    const parsed = TransformTemplate.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(parsed.error.issues.map((i) => i.message).join("; "), `template ${raw.name}`);
    }
    if (byName.has(parsed.data.name)) {
      throw new ConfigurationError(`duplicate template "${parsed.data.name}"`, "templates");
    }
    byName.set(parsed.data.name, Object.freeze(parsed.data));
  }
  const quality = createStateQuality(weights);
  return Object.freeze({
    templates: Object.freeze([...byName.values()]),
    templatesByName: byName,
    weights: Object.freeze({ ...weights }),
    quality
  });
}
