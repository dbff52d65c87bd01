import type { Action, ScheduleResult } from "@nationplan/shared";
import { applyAction } from "./apply";
import { scheduleExpectedUtility, stepExpectedUtility } from "./metrics";
import type { CountryName, MetricParams, PlanningContext, World } from "./state";

/** Ordered actions plus the EU after each one. Never holds a World. */
export type Schedule = {
  readonly actions: ReadonlyArray<Action>;
  readonly euTrace: ReadonlyArray<number>;
};

export const EMPTY_SCHEDULE: Schedule = Object.freeze({ actions: Object.freeze([]), euTrace: Object.freeze([]) });

export function extendSchedule(schedule: Schedule, action: Action, eu: number): Schedule {
  return { actions: [...schedule.actions, action], euTrace: [...schedule.euTrace, eu] };
}

export function scheduleLength(schedule: Schedule): number {
  return schedule.actions.length;
}

export function freezeSchedule(schedule: Schedule): ScheduleResult {
  const actions = schedule.actions.map((a) => structuredClone(a));
  const eu_trace = [...schedule.euTrace];
  Object.freeze(actions);
  Object.freeze(eu_trace);
  return Object.freeze({ actions, eu_trace, eu: scheduleExpectedUtility(eu_trace) });
}

/** The world `actions` lead to from `root`; throws on an illegal step. */
export function replaySchedule(root: World, actions: ReadonlyArray<Action>, ctx: PlanningContext): World {
  return actions.reduce((world, action) => applyAction(world, action, ctx), root);
}

/**
 * Replays `actions` from `root` and recomputes the EU trace. Throws
 * IllegalActionError if any step is not legal where it lands.
 */
export function evaluateSchedule(
  root: World,
  actions: ReadonlyArray<Action>,
  ctx: PlanningContext,
  self: CountryName,
  params: MetricParams
): ScheduleResult {
  let world = root;
  let schedule = EMPTY_SCHEDULE;
  for (const action of actions) {
    world = applyAction(world, action, ctx);
    const eu = stepExpectedUtility({
      root,
      world,
      actions: [...schedule.actions, action],
      self,
      quality: ctx.quality,
      params
    });
    schedule = extendSchedule(schedule, action, eu);
  }
  return freezeSchedule(schedule);
}
