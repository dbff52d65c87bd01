import { z } from "zod";

export const PLANNER_DEFAULTS = {
  n: 5,
  depth: 6,
  beam: 50,
  gamma: 0.9,
  cost: -10,
  k: 1,
  x0: 0,
} as const;

/** Numeric knobs of one planning run. */
export const PlannerParams = z
  .object({
    n: z.number().int().min(1).default(PLANNER_DEFAULTS.n),
    depth: z.number().int().min(0).default(PLANNER_DEFAULTS.depth),
    beam: z.number().int().min(1).default(PLANNER_DEFAULTS.beam),
    gamma: z.number().min(0).lt(1).default(PLANNER_DEFAULTS.gamma),
    cost: z.number().finite().default(PLANNER_DEFAULTS.cost),
    k: z.number().finite().default(PLANNER_DEFAULTS.k),
    x0: z.number().finite().default(PLANNER_DEFAULTS.x0),
  })
  .strict();

export type PlannerParams = z.infer<typeof PlannerParams>;
export type PlannerParamsInput = z.input<typeof PlannerParams>;

/** Which successors the search enumerates and keeps. */
export const SearchPolicy = z
  .object({
    transfer_quantity: z.number().finite().positive().default(1),
    max_transform_scale: z.number().int().min(1).optional(),
    allow_transfers: z.boolean().default(true),
    allow_imports: z.boolean().default(true),
    skip_repeated_action: z.boolean().default(true),
    min_step_eu: z.number().finite().optional(),
    dedupe_states: z.boolean().default(false),
  })
  .strict();

export type SearchPolicy = z.infer<typeof SearchPolicy>;
export type SearchPolicyInput = z.input<typeof SearchPolicy>;
