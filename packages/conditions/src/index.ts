export {
  mergeHeaderConditions,
  toHeaderMatch,
  validateHeaderConditions,
} from "./header-conditions";
export {
  conditionBlockKey,
  mergeConditions,
  validateConditionBlock,
} from "./merge";
export {
  collapseSlashes,
  escapeRegex,
  mergePathConditions,
  regexProblem,
  validatePathConditions,
} from "./path-conditions";
export {
  pathMatchValue,
  renderCondition,
  renderHeaderMatch,
  renderPathMatch,
} from "./render";
export {
  ALL_PATH_KINDS,
  type ConditionBlock,
  type ConditionBlockOptions,
  type ConditionError,
  type ConditionErrorReason,
} from "./types";
