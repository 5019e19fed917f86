import { pathMatchValue, renderCondition } from "@routegraph/conditions";
import type {
  PathMatchKind,
  RenderedCondition,
  RouteSortingMode,
} from "@routegraph/types";

const KIND_RANK: Readonly<Record<PathMatchKind, number>> = {
  exact: 0,
  regex: 1,
  prefix: 2,
};

const compareStrings = (left: string, right: string): number =>
  left < right ? -1 : left > right ? 1 : 0;

/**
 * Total order over conditions, most specific first: exact before regex
 * before prefix, then longer match strings, then more header matches, then
 * the rendered condition.
 */
export const compareConditions = (
  left: RenderedCondition,
  right: RenderedCondition
): number => {
  const byKind = KIND_RANK[left.path.kind] - KIND_RANK[right.path.kind];
  if (byKind !== 0) {
    return byKind;
  }

  const byLength =
    pathMatchValue(right.path).length - pathMatchValue(left.path).length;
  if (byLength !== 0) {
    return byLength;
  }

  const byHeaders = right.headers.length - left.headers.length;
  if (byHeaders !== 0) {
    return byHeaders;
  }

  return compareStrings(renderCondition(left), renderCondition(right));
};

export const sortConditions = (
  conditions: readonly RenderedCondition[]
): RenderedCondition[] => [...conditions].sort(compareConditions);

export type Sortable = {
  readonly condition: RenderedCondition;
};

/**
 * Orders the routes of one virtual host. `declaration` keeps the input
 * order, which callers build parent first and in array order.
 */
export const sortRoutes = <TRoute extends Sortable>(
  routes: readonly TRoute[],
  mode: RouteSortingMode = "specificity"
): TRoute[] =>
  mode === "declaration"
    ? [...routes]
    : [...routes].sort((left, right) =>
        compareConditions(left.condition, right.condition)
      );

export type DedupedRoutes<TRoute> = {
  readonly kept: TRoute[];
  readonly duplicates: TRoute[];
};

/** Keeps the first route seen for each rendered condition. */
export const dedupeRoutes = <TRoute extends Sortable>(
  routes: readonly TRoute[]
): DedupedRoutes<TRoute> => {
  const seen = new Set<string>();
  const kept: TRoute[] = [];
  const duplicates: TRoute[] = [];

  for (const route of routes) {
    const key = renderCondition(route.condition);
    if (seen.has(key)) {
      duplicates.push(route);
    } else {
      seen.add(key);
      kept.push(route);
    }
  }

  return { kept, duplicates };
};
