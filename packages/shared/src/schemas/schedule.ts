import { z } from "zod";
import { Action } from "./action";
import { NonEmpty, ResourceAmounts } from "./resources";
import { PlannerParams } from "./planner";

export const ScheduleResult = z
  .object({
    actions: z.array(Action),
    eu_trace: z.array(z.number()),
    eu: z.number(),
  })
  .strict()
  .refine((s) => s.actions.length === s.eu_trace.length, {
    message: "eu_trace must hold one value per action",
    path: ["eu_trace"],
  });

export type ScheduleResult = z.infer<typeof ScheduleResult>;

/** A country's holdings once a schedule has run; population need not stay whole. */
export const CountryOutcome = z
  .object({
    name: NonEmpty,
    population: z.number().positive(),
    resources: ResourceAmounts,
  })
  .strict();

export type CountryOutcome = z.infer<typeof CountryOutcome>;

/** What the CLI writes for a `.json` output target. */
export const PlanReport = z
  .object({
    self: NonEmpty,
    params: PlannerParams,
    exhausted: z.boolean(),
    expansions: z.number().int().min(0),
    schedules: z.array(ScheduleResult).min(1),
    /** Every country after the best schedule. */
    final_world: z.array(CountryOutcome).min(1),
  })
  .strict();

export type PlanReport = z.infer<typeof PlanReport>;
