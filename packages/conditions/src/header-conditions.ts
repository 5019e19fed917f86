import type { HeaderMatch, HeaderMatchClause } from "@routegraph/types";

import { renderHeaderMatch } from "./render";
import { type ConditionBlock, type ConditionError, headerError } from "./types";

const operatorCount = (clause: HeaderMatchClause): number =>
  [
    clause.present,
    clause.notPresent,
    clause.exact,
    clause.notExact,
    clause.contains,
    clause.notContains,
  ].filter((operator) => operator !== undefined && operator !== false).length;

/** Translates a declared header clause into its match form. */
export const toHeaderMatch = (
  clause: HeaderMatchClause
): HeaderMatch | undefined => {
  const name = clause.name.toLowerCase();
  if (clause.present) {
    return { name, kind: "present", invert: false };
  }
  if (clause.notPresent) {
    return { name, kind: "present", invert: true };
  }
  if (clause.contains !== undefined) {
    return { name, kind: "contains", value: clause.contains, invert: false };
  }
  if (clause.notContains !== undefined) {
    return { name, kind: "contains", value: clause.notContains, invert: true };
  }
  if (clause.exact !== undefined) {
    return { name, kind: "exact", value: clause.exact, invert: false };
  }
  if (clause.notExact !== undefined) {
    return { name, kind: "exact", value: clause.notExact, invert: true };
  }
  return;
};

const headerClauses = (blocks: readonly ConditionBlock[]): HeaderMatchClause[] =>
  blocks.flatMap((block) =>
    block.flatMap((entry) => (entry.header ? [entry.header] : []))
  );

const contradiction = (operator: string, negated: string) =>
  headerError(
    `cannot specify contradictory '${operator}' and '${negated}' conditions for the same route and header`
  );

/**
 * Validates the header clauses accumulated over every block of a path.
 * Header names compare case-insensitively.
 */
export const validateHeaderConditions = (
  blocks: readonly ConditionBlock[]
): ConditionError | undefined => {
  const seen = new Set<string>();
  const exactValues = new Map<string, string>();

  for (const clause of headerClauses(blocks)) {
    if (operatorCount(clause) !== 1) {
      return headerError(
        `header condition for ${clause.name} must specify exactly one match operator`
      );
    }
    const match = toHeaderMatch(clause);
    if (!match) {
      continue;
    }
    const opposite = renderHeaderMatch({ ...match, invert: !match.invert });

    if (match.kind === "exact" && !match.invert) {
      const previous = exactValues.get(match.name);
      if (previous !== undefined && previous !== match.value) {
        return headerError(
          "cannot specify duplicate header 'exact match' conditions in the same route"
        );
      }
      exactValues.set(match.name, match.value ?? "");
    }

    if (seen.has(opposite)) {
      switch (match.kind) {
        case "present":
          return contradiction("present", "notpresent");
        case "exact":
          return contradiction("exact", "notexact");
        case "contains":
          return contradiction("contains", "notcontains");
        default:
          break;
      }
    }
    seen.add(renderHeaderMatch(match));
  }

  return;
};

/** Union of header matches in first-seen order; identical matches collapse. */
export const mergeHeaderConditions = (
  blocks: readonly ConditionBlock[]
): HeaderMatch[] => {
  const merged = new Map<string, HeaderMatch>();
  for (const clause of headerClauses(blocks)) {
    const match = toHeaderMatch(clause);
    if (match) {
      const key = renderHeaderMatch(match);
      if (!merged.has(key)) {
        merged.set(key, match);
      }
    }
  }
  return [...merged.values()];
};
