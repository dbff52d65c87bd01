import type { Action } from "@nationplan/shared";
import { actionParticipants } from "./apply";
import type { CountryName, MetricParams, StateQualityFn, World } from "./state";
import { getCountry } from "./world";

/** Logistic acceptance curve 1 / (1 + e^(-k (x - x0))). */
export function logistic(x: number, k = 1, x0 = 0): number {
  return 1 / (1 + Math.exp(-k * (x - x0)));
}

export function reward(qStart: number, qEnd: number): number {
  return qEnd - qStart;
}

/** gamma^steps * (qEnd - qStart): later gains are worth less. */
export function discountedReward(qStart: number, qEnd: number, steps: number, gamma: number): number {
  return Math.pow(gamma, steps) * reward(qStart, qEnd);
}

/** Every participant must accept independently: the product of their logistic acceptances. */
export function acceptanceProbability(discountedRewards: ReadonlyArray<number>, k: number, x0: number): number {
  return discountedRewards.reduce((p, dr) => p * logistic(dr, k, x0), 1);
}

export function expectedUtility(pSuccess: number, drSelf: number, cost: number): number {
  return pSuccess * drSelf + (1 - pSuccess) * cost;
}

export type StepUtilityArgs = {
  /** World the schedule started from. */
  root: World;
  /** World after the schedule's latest action. */
  world: World;
  /** Every action of the schedule so far, the latest one last. */
  actions: ReadonlyArray<Action>;
  self: CountryName;
  quality: StateQualityFn;
  params: MetricParams;
};

/** Self first, then every other country the actions touch, in first-seen order. */
export function scheduleParticipants(self: CountryName, actions: ReadonlyArray<Action>): CountryName[] {
  const seen = new Set<CountryName>([self]);
  for (const action of actions) {
    for (const name of actionParticipants(action)) seen.add(name);
  }
  return [...seen];
}

/**
 * EU of a schedule after its latest step. Each participant's reward runs
 * from the root world to `world`, discounted by the schedule length; every
 * country any action so far has touched must accept.
 */
export function stepExpectedUtility(args: StepUtilityArgs): number {
  const { root, world, actions, self, quality, params } = args;
  const steps = actions.length;
  if (steps === 0) return 0;

  const dr = (name: CountryName) =>
    discountedReward(quality(getCountry(root, name)), quality(getCountry(world, name)), steps, params.gamma);

  const drs = scheduleParticipants(self, actions).map(dr);
  const pSuccess = acceptanceProbability(drs, params.k, params.x0);
  return expectedUtility(pSuccess, drs[0], params.cost);
}

/** A schedule's EU is its terminal step value; the empty schedule scores 0. */
export function scheduleExpectedUtility(trace: ReadonlyArray<number>): number {
  return trace.length === 0 ? 0 : trace[trace.length - 1];
}
