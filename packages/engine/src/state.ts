import type { TransformTemplate, WeightTable } from "@nationplan/shared";
import type { ResourceBundle } from "./bundle";

export type CountryName = string;

export type Country = {
  readonly name: CountryName;
  readonly population: number;
  readonly resources: ResourceBundle;
};

/**
 * A snapshot of every country. Worlds are never mutated: applying an action
 * builds a new World that shares the countries it did not touch.
 */
export type World = {
  readonly countries: Readonly<Record<CountryName, Country>>;
};

export type StateQualityFn = (country: Country) => number;

/** Read-only tables shared by every branch of one planning run. */
export type PlanningContext = {
  readonly templates: ReadonlyArray<TransformTemplate>;
  readonly templatesByName: ReadonlyMap<string, TransformTemplate>;
  readonly weights: Readonly<WeightTable>;
  readonly quality: StateQualityFn;
};

export type MetricParams = {
  gamma: number;
  cost: number;
  k: number;
  x0: number;
};
