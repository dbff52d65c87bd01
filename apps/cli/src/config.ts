import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { z } from "zod";
import { PLANNER_DEFAULTS } from "@nationplan/shared";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const repoRoot = path.resolve(__dirname, "../../..");
dotenv.config({ path: path.join(repoRoot, ".env") });
dotenv.config();

export const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export type LogLevel = z.infer<typeof LogLevel>;

const Env = z
  .object({
    LOG_LEVEL: z.preprocess(
      (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
      LogLevel.default("info")
    ),

    PLANNER_N: z.coerce.number().int().min(1).default(PLANNER_DEFAULTS.n),
    PLANNER_DEPTH: z.coerce.number().int().min(0).default(PLANNER_DEFAULTS.depth),
    PLANNER_BEAM: z.coerce.number().int().min(1).default(PLANNER_DEFAULTS.beam),
    PLANNER_GAMMA: z.coerce.number().min(0).lt(1).default(PLANNER_DEFAULTS.gamma),
    PLANNER_COST: z.coerce.number().finite().default(PLANNER_DEFAULTS.cost),
    PLANNER_K: z.coerce.number().finite().default(PLANNER_DEFAULTS.k),
    PLANNER_X0: z.coerce.number().finite().default(PLANNER_DEFAULTS.x0)
  })
  .passthrough();

export type Env = z.infer<typeof Env>;

export function loadEnv(source: Record<string, string | undefined>): Env {
  return Env.parse(source);
}

export const env: Env = loadEnv(process.env);
