import {
  createResultErr,
  createResultOk,
  type RenderedCondition,
  type Result,
} from "@routegraph/types";

import {
  mergeHeaderConditions,
  validateHeaderConditions,
} from "./header-conditions";
import { mergePathConditions, validatePathConditions } from "./path-conditions";
import { renderCondition } from "./render";
import type {
  ConditionBlock,
  ConditionBlockOptions,
  ConditionError,
} from "./types";

/** Validates a single declared block in isolation. */
export const validateConditionBlock = (
  block: ConditionBlock,
  options: ConditionBlockOptions = {}
): ConditionError | undefined =>
  validatePathConditions(block, options.allowedPathKinds) ??
  validateHeaderConditions([block]);

/**
 * Merges the blocks met along an inclusion path, root first. Every block but
 * the last may only carry prefix matches.
 */
export const mergeConditions = (
  blocks: readonly ConditionBlock[]
): Result<RenderedCondition, ConditionError> => {
  const lastIndex = blocks.length - 1;
  for (const [index, block] of blocks.entries()) {
    const problem = validatePathConditions(
      block,
      index === lastIndex ? undefined : ["prefix"]
    );
    if (problem) {
      return createResultErr(problem);
    }
  }

  const headerProblem = validateHeaderConditions(blocks);
  if (headerProblem) {
    return createResultErr(headerProblem);
  }

  return createResultOk({
    path: mergePathConditions(blocks),
    headers: mergeHeaderConditions(blocks),
  });
};

/** Canonical key of a single block, used to spot duplicate sibling includes. */
export const conditionBlockKey = (block: ConditionBlock): string => {
  const merged = mergeConditions([block]);
  return merged.ok
    ? renderCondition(merged.value)
    : `invalid:${JSON.stringify(block)}`;
};
