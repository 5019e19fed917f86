import type { HeaderMatch, PathMatch, RenderedCondition } from "@routegraph/types";

export const pathMatchValue = (path: PathMatch): string => {
  switch (path.kind) {
    case "prefix":
      return path.prefix;
    case "exact":
      return path.path;
    case "regex":
      return path.regex;
    default: {
      const exhaustive: never = path;
      throw new Error(`Unsupported path match: ${JSON.stringify(exhaustive)}`);
    }
  }
};

export const renderPathMatch = (path: PathMatch): string =>
  `${path.kind}:${pathMatchValue(path)}`;

export const renderHeaderMatch = (header: HeaderMatch): string =>
  `header:${header.name.toLowerCase()}:${header.invert ? "not-" : ""}${header.kind}${
    header.value === undefined ? "" : `=${header.value}`
  }`;

/**
 * Canonical form of a condition: the path match followed by the sorted
 * header matches, space separated. Two conditions that match the same
 * requests by construction render identically.
 */
export const renderCondition = (condition: RenderedCondition): string =>
  [
    renderPathMatch(condition.path),
    ...condition.headers.map(renderHeaderMatch).sort(),
  ].join(" ");
