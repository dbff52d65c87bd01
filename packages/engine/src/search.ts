import {
  PlannerParams,
  SearchPolicy,
  type PlannerParamsInput,
  type ScheduleResult,
  type SearchPolicyInput
} from "@nationplan/shared";
import type { z } from "zod";
import { actionKey, applyAction } from "./apply";
import { ConfigurationError } from "./errors";
import { Frontier } from "./frontier";
import { legalActions } from "./legal";
import { stepExpectedUtility } from "./metrics";
import { EMPTY_SCHEDULE, extendSchedule, freezeSchedule, scheduleLength, type Schedule } from "./schedule";
import type { CountryName, PlanningContext, World } from "./state";
import { hasCountry, worldSignature } from "./world";

/** Optional observability callbacks, called synchronously from {@link SearchEngine.step}. */
export type SearchHooks = {
  /** A partial schedule of `depth` actions was popped for expansion. */
  onExpand?: (depth: number, eu: number, frontierSize: number) => void;
  /** A full-depth schedule joined the results. */
  onSchedule?: (schedule: ScheduleResult, completed: number) => void;
  /** The frontier was cut back to the beam width. */
  onPrune?: (dropped: number, frontierSize: number) => void;
};

export type SearchConfig = {
  world: World;
  self: CountryName;
  context: PlanningContext;
  params?: PlannerParamsInput;
  policy?: SearchPolicyInput;
  hooks?: SearchHooks;
};

export type SearchStats = {
  expansions: number;
  generated: number;
  pruned: number;
  completed: number;
  frontier: number;
};

/** Caller-imposed stopping rules layered over the anytime loop. */
export type SearchLimits = {
  maxSteps?: number;
  shouldStop?: () => boolean;
};

export type SearchOutcome = {
  schedules: ScheduleResult[];
  /** True when the frontier ran dry rather than `n` schedules being found. */
  exhausted: boolean;
  stats: SearchStats;
};

export type SearchEngine = {
  readonly params: PlannerParams;
  readonly policy: SearchPolicy;
  readonly done: boolean;
  step(): boolean;
  run(limits?: SearchLimits): SearchOutcome;
  results(): ScheduleResult[];
  stats(): SearchStats;
};

type Node = {
  schedule: Schedule;
  world: World;
};

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/**
 * Creates an anytime beam search over schedules for `config.self`.
 *
 * Each {@link SearchEngine.step} pops the best partial schedule (highest EU,
 * earliest insertion on ties). A schedule that has reached `depth` actions is
 * moved to the results; any other is expanded by every legal action and the
 * frontier is cut back to `beam` entries. The engine is done once `n` results
 * are collected or the frontier is empty, but it can be stopped after any
 * step and {@link SearchEngine.results} is always usable.
 *
 * @throws {ConfigurationError} for invalid params or policy, an unknown self
 *   country, or a country whose quality cannot be scored.
 *
 * @example
 * ```ts
 * const engine = createSearchEngine({ world, self: "Atlantis", context, params: { depth: 3 } });
 * const { schedules } = engine.run({ maxSteps: 1000 });
 * ```
 */
export function createSearchEngine(config: SearchConfig): SearchEngine {
  const { world: root, self, context, hooks } = config;

  const parsedParams = PlannerParams.safeParse(config.params ?? {});
  if (!parsedParams.success) {
    throw new ConfigurationError(describeIssues(parsedParams.error), "params");
  }
  const parsedPolicy = SearchPolicy.safeParse(config.policy ?? {});
  if (!parsedPolicy.success) {
    throw new ConfigurationError(describeIssues(parsedPolicy.error), "policy");
  }
  const params = parsedParams.data;
  const policy = parsedPolicy.data;

  if (!hasCountry(root, self)) {
    throw new ConfigurationError(`self country "${self}" is not in the world`, "params");
  }
  for (const country of Object.values(root.countries)) {
    context.quality(country);
  }

  const frontier = new Frontier<Node>();
  const completed: ScheduleResult[] = [];
  const visited = new Map<string, number>();
  const counters = { expansions: 0, generated: 0, pruned: 0 };

  frontier.push({ schedule: EMPTY_SCHEDULE, world: root }, 0);

  const isDone = () => completed.length >= params.n || frontier.size === 0;

  function expand(node: Node, eu: number): void {
    const depth = scheduleLength(node.schedule);
    counters.expansions++;
    hooks?.onExpand?.(depth, eu, frontier.size);

    const last = node.schedule.actions[depth - 1];
    const lastKey = last === undefined ? null : actionKey(last);

    for (const action of legalActions(node.world, self, context, policy)) {
      if (policy.skip_repeated_action && lastKey !== null && actionKey(action) === lastKey) continue;

      const successor = applyAction(node.world, action, context);
      const stepEu = stepExpectedUtility({
        root,
        world: successor,
        actions: [...node.schedule.actions, action],
        self,
        quality: context.quality,
        params
      });
      if (policy.min_step_eu !== undefined && stepEu < policy.min_step_eu) continue;

      if (policy.dedupe_states) {
        const key = `${depth + 1}#${worldSignature(successor)}`;
        const seen = visited.get(key);
        if (seen !== undefined && seen >= stepEu) continue;
        visited.set(key, stepEu);
      }

      frontier.push({ schedule: extendSchedule(node.schedule, action, stepEu), world: successor }, stepEu);
      counters.generated++;
    }

    const dropped = frontier.prune(params.beam);
    if (dropped > 0) {
      counters.pruned += dropped;
      hooks?.onPrune?.(dropped, frontier.size);
    }
  }

  const engine: SearchEngine = {
    params,
    policy,

    get done() {
      return isDone();
    },

    step(): boolean {
      if (isDone()) return false;
      const next = frontier.pop();
      if (next === undefined) return false;

      if (scheduleLength(next.item.schedule) >= params.depth) {
        const result = freezeSchedule(next.item.schedule);
        completed.push(result);
        hooks?.onSchedule?.(result, completed.length);
      } else {
        expand(next.item, next.priority);
      }
      return !isDone();
    },

    run(limits: SearchLimits = {}): SearchOutcome {
      let steps = 0;
      while (!isDone()) {
        if (limits.maxSteps !== undefined && steps >= limits.maxSteps) break;
        if (limits.shouldStop?.()) break;
        engine.step();
        steps++;
      }
      return { schedules: engine.results(), exhausted: frontier.size === 0, stats: engine.stats() };
    },

    results(): ScheduleResult[] {
      if (completed.length === 0) return [freezeSchedule(EMPTY_SCHEDULE)];
      return [...completed].sort((a, b) => b.eu - a.eu);
    },

    stats(): SearchStats {
      return { ...counters, completed: completed.length, frontier: frontier.size };
    }
  };

  return engine;
}

/** Runs a search to completion; see {@link createSearchEngine}. */
export function findBestSchedules(config: SearchConfig, limits?: SearchLimits): SearchOutcome {
  return createSearchEngine(config).run(limits);
}
