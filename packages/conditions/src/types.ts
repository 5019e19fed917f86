import type { MatchConditionInput, PathMatchKind } from "@routegraph/types";

/** One `conditions` array as declared on an include or a route. */
export type ConditionBlock = readonly MatchConditionInput[];

export type ConditionErrorReason =
  | "PathMatchConditionsNotValid"
  | "HeaderMatchConditionsNotValid";

export type ConditionError = {
  readonly reason: ConditionErrorReason;
  readonly message: string;
};

export type ConditionBlockOptions = {
  /** Path match kinds permitted in the block. Defaults to every kind. */
  readonly allowedPathKinds?: readonly PathMatchKind[];
};

export const ALL_PATH_KINDS: readonly PathMatchKind[] = [
  "prefix",
  "exact",
  "regex",
];

export const pathError = (message: string): ConditionError => ({
  reason: "PathMatchConditionsNotValid",
  message,
});

export const headerError = (message: string): ConditionError => ({
  reason: "HeaderMatchConditionsNotValid",
  message,
});
