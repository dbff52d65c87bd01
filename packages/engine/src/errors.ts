import type { Action } from "@nationplan/shared";

/**
 * Thrown when the inputs of a planning run are unusable: a non-positive
 * population, an empty weight table, out-of-range parameters or a malformed
 * input file. Always raised before the search starts.
 *
 * @example
 * ```ts
 * try {
 *   findBestSchedules(config);
 * } catch (err) {
 *   if (err instanceof ConfigurationError) {
 *     console.error(`Bad input (${err.source ?? "config"}): ${err.message}`);
 *   }
 * }
 * ```
 */
export class ConfigurationError extends Error {
  /** File, line or field the problem was found in, when known. */
  readonly source: string | undefined;

  constructor(message: string, source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = "ConfigurationError";
    this.source = source;
  }
}

export type IllegalActionReason =
  | "unknown_country"
  | "unknown_template"
  | "invalid_scale"
  | "insufficient_resources"
  | "population_exhausted"
  | "same_country"
  | "invalid_quantity"
  | "population_not_transferable";

/**
 * Raised when an action is applied outside its legality precondition.
 * Actions produced by {@link legalActions} never trigger it, so inside the
 * search it signals a defect and is left to propagate.
 */
export class IllegalActionError extends Error {
  readonly reason: IllegalActionReason;
  readonly action: Action;

  constructor(reason: IllegalActionReason, action: Action, detail: string) {
    super(`Illegal ${action.type} (${reason}): ${detail}`);
    this.name = "IllegalActionError";
    this.reason = reason;
    this.action = action;
  }
}
