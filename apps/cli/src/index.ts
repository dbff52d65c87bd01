#!/usr/bin/env tsx
import { env } from "./config";
import { parseArgs, USAGE } from "./args";
import { createLogger, logger } from "./logger";
import { runPlanner } from "./lib/plan";
import { formatSummary } from "./lib/scheduleWriter";

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2), env);
  if (command.kind === "help") {
    process.stdout.write(USAGE);
    return;
  }
  const { options } = command;
  const log = options.logLevel === env.LOG_LEVEL ? logger : createLogger(options.logLevel);
  const { report } = await runPlanner(options, log);
  process.stdout.write(formatSummary(report));
}

main().catch((err) => {
  logger.error({ err }, "Planning failed");
  process.exit(1);
});
