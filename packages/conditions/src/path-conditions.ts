import type {
  MatchConditionInput,
  PathMatch,
  PathMatchKind,
} from "@routegraph/types";

import {
  ALL_PATH_KINDS,
  type ConditionBlock,
  type ConditionError,
  pathError,
} from "./types";

const REPEATED_SLASHES = /\/\/+/g;
const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

type DeclaredPath = { kind: PathMatchKind; value: string };

const declaredPaths = (entry: MatchConditionInput): DeclaredPath[] => {
  const paths: DeclaredPath[] = [];
  if (entry.prefix) {
    paths.push({ kind: "prefix", value: entry.prefix });
  }
  if (entry.exact) {
    paths.push({ kind: "exact", value: entry.exact });
  }
  if (entry.regex) {
    paths.push({ kind: "regex", value: entry.regex });
  }
  return paths;
};

export const collapseSlashes = (path: string): string =>
  path.replace(REPEATED_SLASHES, "/");

export const escapeRegex = (value: string): string =>
  value.replace(REGEX_SPECIALS, "\\$&");

/** Returns the compile error of a pattern, if any. */
export const regexProblem = (pattern: string): string | undefined => {
  try {
    new RegExp(pattern);
    return;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
};

/**
 * Checks the path clauses of one block: at most one path match, prefix and
 * exact values start with `/`, regexes compile, and only permitted kinds
 * appear.
 */
export const validatePathConditions = (
  block: ConditionBlock,
  allowedPathKinds: readonly PathMatchKind[] = ALL_PATH_KINDS
): ConditionError | undefined => {
  let count = 0;

  for (const entry of block) {
    for (const declared of declaredPaths(entry)) {
      count += 1;
      if (count > 1) {
        return pathError(
          "more than one path match is not allowed in a condition block"
        );
      }
      if (!allowedPathKinds.includes(declared.kind)) {
        return pathError(
          `${declared.kind} conditions are not allowed here, only ${allowedPathKinds.join(", ")}`
        );
      }
      if (declared.kind === "regex") {
        const problem = regexProblem(declared.value);
        if (problem) {
          return pathError(`regex condition ${declared.value} is not valid: ${problem}`);
        }
      } else if (!declared.value.startsWith("/")) {
        return pathError(
          `${declared.kind} conditions must start with /, ${declared.value} was supplied`
        );
      }
    }
  }

  return;
};

const blockPath = (block: ConditionBlock): DeclaredPath | undefined => {
  for (const entry of block) {
    const [declared] = declaredPaths(entry);
    if (declared) {
      return declared;
    }
  }
  return;
};

/**
 * Folds the path clauses along an inclusion path into one match. Prefixes
 * concatenate; an exact or regex clause on the last block is anchored under
 * the prefix inherited so far. Blocks are assumed to be valid.
 */
export const mergePathConditions = (
  blocks: readonly ConditionBlock[]
): PathMatch => {
  let prefix = "";
  let leaf: DeclaredPath | undefined;

  for (const block of blocks) {
    const declared = blockPath(block);
    if (!declared) {
      continue;
    }
    if (declared.kind === "prefix") {
      prefix += declared.value;
    } else {
      leaf = declared;
    }
  }

  const inherited = collapseSlashes(prefix);

  if (leaf?.kind === "exact") {
    return { kind: "exact", path: collapseSlashes(inherited + leaf.value) };
  }
  if (leaf?.kind === "regex") {
    const anchor = inherited.endsWith("/") ? inherited.slice(0, -1) : inherited;
    return { kind: "regex", regex: escapeRegex(anchor) + leaf.value };
  }
  return { kind: "prefix", prefix: inherited === "" ? "/" : inherited };
};
