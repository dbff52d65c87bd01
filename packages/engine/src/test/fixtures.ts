import type { TransformTemplate, WeightTable } from "@nationplan/shared";
import { createPlanningContext } from "../context";
import type { PlanningContext, World } from "../state";
import { createWorld } from "../world";

export const housing: TransformTemplate = {
  name: "Housing",
  inputs: { Timber: 5, MetallicElements: 1 },
  outputs: { Housing: 1 }
};

export const weights: WeightTable = {
  Timber: { weight: 0.1, baseline: 1 },
  MetallicElements: { weight: 0.1, baseline: 0.5 },
  Housing: { weight: 2, baseline: 0.1 }
};

export function mkWorld(): World {
  return createWorld({
    countries: [
      { name: "Atlantis", population: 100, resources: { Timber: 200, MetallicElements: 50, Housing: 0 } },
      { name: "Erewhon", population: 50, resources: { Timber: 20, MetallicElements: 100, Housing: 10 } }
    ]
  });
}

export function mkContext(templates: TransformTemplate[] = [housing]): PlanningContext {
  return createPlanningContext(templates, weights);
}
