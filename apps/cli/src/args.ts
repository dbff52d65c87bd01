import { z } from "zod";
import { PlannerParams, type SearchPolicyInput } from "@nationplan/shared";
import { ConfigurationError, type SearchLimits } from "@nationplan/engine";
import { LogLevel, type Env } from "./config";

export const USAGE = `Usage: nationplan <self> <weights.csv> <world.csv> <templates.tpl> <output> [options]

Options:
  --n <int>                 schedules to return
  --depth <int>             actions per schedule
  --beam <int>              frontier width
  --gamma <num>             discount factor in [0, 1)
  --cost <num>              utility of a rejected schedule
  --k <num>                 logistic steepness
  --x0 <num>                logistic midpoint
  --transfer-quantity <num> units moved per enumerated transfer
  --max-scale <int>         cap on transform scales
  --min-step-eu <num>       drop successors scoring below this
  --max-steps <int>         stop after this many search steps
  --time-limit-ms <int>     stop after this much wall time
  --log-level <level>       pino level (fatal..trace, silent)
  --no-transfers            enumerate transforms only
  --no-imports              only export from self
  --allow-repeats           allow the same action twice in a row
  --dedupe                  skip states already reached at the same depth
  -h, --help                show this text
`;

const BOOLEAN_FLAGS = new Set(["no-transfers", "no-imports", "allow-repeats", "dedupe", "help"]);

const Flags = z
  .object({
    n: z.coerce.number().int().min(1).optional(),
    depth: z.coerce.number().int().min(0).optional(),
    beam: z.coerce.number().int().min(1).optional(),
    gamma: z.coerce.number().min(0).lt(1).optional(),
    cost: z.coerce.number().finite().optional(),
    k: z.coerce.number().finite().optional(),
    x0: z.coerce.number().finite().optional(),
    "transfer-quantity": z.coerce.number().finite().positive().optional(),
    "max-scale": z.coerce.number().int().min(1).optional(),
    "min-step-eu": z.coerce.number().finite().optional(),
    "max-steps": z.coerce.number().int().min(1).optional(),
    "time-limit-ms": z.coerce.number().int().positive().optional(),
    "log-level": LogLevel.optional(),
    "no-transfers": z.boolean().default(false),
    "no-imports": z.boolean().default(false),
    "allow-repeats": z.boolean().default(false),
    dedupe: z.boolean().default(false),
    help: z.boolean().default(false)
  })
  .strict();

export type CliOptions = {
  self: string;
  weightsPath: string;
  worldPath: string;
  templatesPath: string;
  outputPath: string;
  params: PlannerParams;
  policy: SearchPolicyInput;
  limits: SearchLimits & { timeLimitMs?: number };
  logLevel: LogLevel;
};

export type CliCommand = { kind: "help" } | { kind: "plan"; options: CliOptions };

type EnvDefaults = Pick<
  Env,
  "LOG_LEVEL" | "PLANNER_N" | "PLANNER_DEPTH" | "PLANNER_BEAM" | "PLANNER_GAMMA" | "PLANNER_COST" | "PLANNER_K" | "PLANNER_X0"
>;

function splitArgv(argv: string[]): { positionals: string[]; flags: Record<string, string | boolean> } {
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h") {
      flags.help = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }
    const eq = arg.indexOf("=");
    const name = eq < 0 ? arg.slice(2) : arg.slice(2, eq);
    if (BOOLEAN_FLAGS.has(name)) {
      if (eq >= 0) {
        throw new ConfigurationError(`--${name} takes no value`, "arguments");
      }
      flags[name] = true;
    } else if (eq >= 0) {
      flags[name] = arg.slice(eq + 1);
    } else {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new ConfigurationError(`--${name} needs a value`, "arguments");
      }
      flags[name] = value;
      i++;
    }
  }
  return { positionals, flags };
}

/**
 * Parses command-line arguments over environment defaults. Flags accept
 * `--name value` and `--name=value`.
 */
export function parseArgs(argv: string[], defaults: EnvDefaults): CliCommand {
  const { positionals, flags } = splitArgv(argv);
  const parsed = Flags.safeParse(flags);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((i) => (i.code === "unrecognized_keys" ? `unknown option ${i.keys.map((k) => `--${k}`).join(", ")}` : `--${i.path.join(".")}: ${i.message}`))
      .join("; ");
    throw new ConfigurationError(message, "arguments");
  }
  const f = parsed.data;
  if (f.help) return { kind: "help" };

  if (positionals.length !== 5) {
    throw new ConfigurationError(`expected 5 positional arguments, got ${positionals.length}\n\n${USAGE}`, "arguments");
  }
  const [self, weightsPath, worldPath, templatesPath, outputPath] = positionals;

  const params = PlannerParams.parse({
    n: f.n ?? defaults.PLANNER_N,
    depth: f.depth ?? defaults.PLANNER_DEPTH,
    beam: f.beam ?? defaults.PLANNER_BEAM,
    gamma: f.gamma ?? defaults.PLANNER_GAMMA,
    cost: f.cost ?? defaults.PLANNER_COST,
    k: f.k ?? defaults.PLANNER_K,
    x0: f.x0 ?? defaults.PLANNER_X0
  });

  const policy: SearchPolicyInput = {
    allow_transfers: !f["no-transfers"],
    allow_imports: !f["no-imports"],
    skip_repeated_action: !f["allow-repeats"],
    dedupe_states: f.dedupe
  };
  if (f["transfer-quantity"] !== undefined) policy.transfer_quantity = f["transfer-quantity"];
  if (f["max-scale"] !== undefined) policy.max_transform_scale = f["max-scale"];
  if (f["min-step-eu"] !== undefined) policy.min_step_eu = f["min-step-eu"];

  return {
    kind: "plan",
    options: {
      self,
      weightsPath,
      worldPath,
      templatesPath,
      outputPath,
      params,
      policy,
      limits: { maxSteps: f["max-steps"], timeLimitMs: f["time-limit-ms"] },
      logLevel: f["log-level"] ?? defaults.LOG_LEVEL
    }
  };
}
