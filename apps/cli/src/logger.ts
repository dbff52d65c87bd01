import pino from "pino";
import { env, type LogLevel } from "./config";

export type Logger = pino.Logger;

/** Structured logs go to stderr; stdout carries the plan report. */
export function createLogger(level: LogLevel = env.LOG_LEVEL): Logger {
  return pino({ name: "nationplan", level }, pino.destination(2));
}

export const logger: Logger = createLogger();
