export type { Country, CountryName, World, PlanningContext, StateQualityFn, MetricParams } from "./state";
export type { ResourceBundle } from "./bundle";
export type { Result, Ok, Err } from "./result";
export type { Schedule } from "./schedule";
export type { IllegalActionReason } from "./errors";
export type {
  SearchConfig,
  SearchEngine,
  SearchHooks,
  SearchLimits,
  SearchOutcome,
  SearchStats
} from "./search";

export {
  makeBundle,
  quantity,
  addBundles,
  subtractBundles,
  scaleBundle,
  covers,
  bundlesEqual
} from "./bundle";
export { ConfigurationError, IllegalActionError } from "./errors";
export { ok, err, unwrap } from "./result";
export {
  createWorld,
  hasCountry,
  getCountry,
  countryNames,
  holding,
  worldVocabulary,
  cloneWorld,
  worldSignature,
  toSnapshot
} from "./world";
export { scoreCountry, createStateQuality } from "./quality";
export { createPlanningContext } from "./context";
export {
  validateAction,
  tryApplyAction,
  applyAction,
  actionParticipants,
  describeAction,
  actionKey
} from "./apply";
export { legalActions } from "./legal";
export {
  logistic,
  reward,
  discountedReward,
  acceptanceProbability,
  expectedUtility,
  stepExpectedUtility,
  scheduleParticipants,
  scheduleExpectedUtility
} from "./metrics";
export { EMPTY_SCHEDULE, extendSchedule, freezeSchedule, evaluateSchedule, replaySchedule } from "./schedule";
export { Frontier } from "./frontier";
export { createSearchEngine, findBestSchedules } from "./search";
