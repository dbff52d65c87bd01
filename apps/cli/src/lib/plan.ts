import type { PlanReport } from "@nationplan/shared";
import {
  createPlanningContext,
  createSearchEngine,
  createWorld,
  replaySchedule,
  toSnapshot,
  type SearchLimits,
  type SearchOutcome
} from "@nationplan/engine";
import type { CliOptions } from "../args";
import type { Logger } from "../logger";
import { loadTemplatesFile } from "./templates";
import { loadWeightsFile, loadWorldFile } from "./worldLoader";
import { writeReport } from "./scheduleWriter";

export type PlanRun = {
  report: PlanReport;
  outcome: SearchOutcome;
  format: "json" | "csv";
};

/** Loads the input files, searches and writes the output file. */
export async function runPlanner(options: CliOptions, log: Logger): Promise<PlanRun> {
  const [snapshot, weights, templates] = await Promise.all([
    loadWorldFile(options.worldPath),
    loadWeightsFile(options.weightsPath),
    loadTemplatesFile(options.templatesPath)
  ]);
  log.info(
    {
      countries: snapshot.countries.length,
      resources: Object.keys(weights).length,
      templates: templates.length
    },
    "Inputs loaded"
  );

  const context = createPlanningContext(templates, weights);
  const world = createWorld(snapshot);
  const engine = createSearchEngine({
    world,
    self: options.self,
    context,
    params: options.params,
    policy: options.policy,
    hooks: {
      onExpand: (depth, eu, frontierSize) => log.debug({ depth, eu, frontierSize }, "Expanding schedule"),
      onSchedule: (schedule, completed) => log.debug({ eu: schedule.eu, completed }, "Schedule completed"),
      onPrune: (dropped, frontierSize) => log.debug({ dropped, frontierSize }, "Frontier pruned")
    }
  });

  const { maxSteps, timeLimitMs } = options.limits;
  const limits: SearchLimits = { maxSteps };
  if (timeLimitMs !== undefined) {
    const deadline = Date.now() + timeLimitMs;
    limits.shouldStop = () => Date.now() >= deadline;
  }

  const started = Date.now();
  const outcome = engine.run(limits);
  log.info({ ...outcome.stats, exhausted: outcome.exhausted, ms: Date.now() - started }, "Search finished");

  const [best] = outcome.schedules;
  const report: PlanReport = {
    self: options.self,
    params: engine.params,
    exhausted: outcome.exhausted,
    expansions: outcome.stats.expansions,
    schedules: outcome.schedules,
    final_world: toSnapshot(replaySchedule(world, best.actions, context)).countries
  };
  const format = await writeReport(options.outputPath, report);
  log.info({ output: options.outputPath, format }, "Report written");

  return { report, outcome, format };
}
