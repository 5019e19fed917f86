import {
  type ConditionBlock,
  conditionBlockKey,
  validateConditionBlock,
} from "@routegraph/conditions";
import {
  createError,
  createWarning,
  type StatusCondition,
} from "@routegraph/types";

import type { DocumentArena } from "./arena";

export type PathStep = {
  readonly document: number;
  /** Conditions of the include that led to this document; empty for the root. */
  readonly conditions: ConditionBlock;
};

export type DelegationPath = {
  readonly root: number;
  readonly steps: readonly PathStep[];
  readonly leaf: number;
};

export type PlaceholderReason = "IncludeNotFound" | "RootIncludesRoot";

/** Include edge that cannot be followed but still claims its conditions. */
export type IncludePlaceholder = {
  readonly root: number;
  readonly includer: number;
  readonly blocks: readonly ConditionBlock[];
  readonly target: string;
  readonly reason: PlaceholderReason;
  /** Number of paths emitted before this placeholder in traversal order. */
  readonly position: number;
};

export type DelegationFinding = {
  readonly document: number;
  readonly origin: number;
  readonly condition: StatusCondition;
};

export type DelegationResult = {
  readonly paths: readonly DelegationPath[];
  readonly placeholders: readonly IncludePlaceholder[];
  readonly findings: readonly DelegationFinding[];
  /** Document index to the indexes of the roots whose traversal reached it. */
  readonly reachedBy: ReadonlyMap<number, ReadonlySet<number>>;
};

type VisitOutcome =
  | { readonly kind: "complete" }
  | { readonly kind: "cycle"; readonly target: number }
  | { readonly kind: "excluded" };

const COMPLETE: VisitOutcome = { kind: "complete" };
const EXCLUDED: VisitOutcome = { kind: "excluded" };

/**
 * Walks every root depth first, parent before child and includes in array
 * order, emitting one path per reachable document occurrence.
 */
export const resolveDelegation = (
  arena: DocumentArena,
  roots: readonly number[]
): DelegationResult => {
  const paths: DelegationPath[] = [];
  const placeholders: IncludePlaceholder[] = [];
  const findings: DelegationFinding[] = [];
  const reachedBy = new Map<number, Set<number>>();

  const markReached = (document: number, root: number): boolean => {
    const roots = reachedBy.get(document) ?? new Set<number>();
    const added = !roots.has(root);
    roots.add(root);
    reachedBy.set(document, roots);
    return added;
  };

  for (const root of roots) {
    const stack: PathStep[] = [];
    // Documents this root reached for the first time, in visit order.
    const firstReached: number[] = [];
    const cycleMembers = new Set<number>();

    // An excluded subtree reaches nothing but its cycle members.
    const forgetReachedSince = (count: number) => {
      for (const document of firstReached.splice(count)) {
        if (!cycleMembers.has(document)) {
          reachedBy.get(document)?.delete(root);
        }
      }
    };

    const report = (document: number, condition: StatusCondition) => {
      findings.push({ document, origin: root, condition });
    };

    const visit = (step: PathStep): VisitOutcome => {
      const index = step.document;
      const document = arena.at(index);
      const pathCount = paths.length;
      const placeholderCount = placeholders.length;
      const reachedCount = firstReached.length;

      stack.push(step);
      if (markReached(index, root)) {
        firstReached.push(index);
      }
      paths.push({ root, steps: [...stack], leaf: index });

      const siblingConditions = new Set<string>();
      let outcome: VisitOutcome = COMPLETE;

      for (const include of document.includes) {
        const namespace = include.namespace ?? document.namespace;
        const target = `${namespace}/${include.name}`;
        const conditions: ConditionBlock = include.conditions ?? [];

        const problem = validateConditionBlock(conditions, {
          allowedPathKinds: ["prefix"],
        });
        if (problem) {
          report(index, createError("include", problem.reason, problem.message));
          continue;
        }

        const conditionsKey = conditionBlockKey(conditions);
        if (siblingConditions.has(conditionsKey)) {
          report(
            index,
            createError(
              "include",
              "DuplicateMatchConditions",
              "duplicate conditions defined on an include"
            )
          );
          continue;
        }
        siblingConditions.add(conditionsKey);

        const blocks = [...stack.map((entry) => entry.conditions), conditions];
        const targetIndex = arena.indexOf(namespace, include.name);
        if (targetIndex === undefined) {
          report(
            index,
            createError("include", "IncludeNotFound", `include ${target} not found`)
          );
          placeholders.push({
            root,
            includer: index,
            blocks,
            target,
            reason: "IncludeNotFound",
            position: paths.length,
          });
          continue;
        }
        if (arena.at(targetIndex).root) {
          report(
            index,
            createError(
              "include",
              "RootIncludesRoot",
              "root proxy cannot include another root proxy"
            )
          );
          placeholders.push({
            root,
            includer: index,
            blocks,
            target,
            reason: "RootIncludesRoot",
            position: paths.length,
          });
          continue;
        }

        const cycleStart = stack.findIndex(
          (entry) => entry.document === targetIndex
        );
        if (cycleStart >= 0) {
          const members = stack.slice(cycleStart).map((entry) => entry.document);
          const rendered = [...members, targetIndex]
            .map((member) => arena.label(member))
            .join(" -> ");
          for (const member of members) {
            cycleMembers.add(member);
            report(
              member,
              createError(
                "delegation",
                "IncludeCreatesCycle",
                `include creates an include cycle: ${rendered}`
              )
            );
          }
          outcome = { kind: "cycle", target: targetIndex };
          break;
        }

        const child = visit({ document: targetIndex, conditions });
        if (child.kind === "cycle") {
          outcome = child;
          break;
        }
        if (child.kind === "excluded") {
          report(
            index,
            createWarning(
              "include",
              "IncludeExcluded",
              `include ${target} was excluded because it is part of an include cycle`
            )
          );
        }
      }

      stack.pop();

      if (outcome.kind === "cycle" && outcome.target === index) {
        paths.length = pathCount;
        placeholders.length = placeholderCount;
        forgetReachedSince(reachedCount);
        return EXCLUDED;
      }
      return outcome;
    };

    visit({ document: root, conditions: [] });
  }

  return { paths, placeholders, findings, reachedBy };
};
