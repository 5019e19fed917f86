import { describe, expect, it } from "vitest";

import {
  conditionBlockKey,
  mergeConditions,
  mergePathConditions,
  renderCondition,
  validateConditionBlock,
} from "../src/index";

describe("mergePathConditions", () => {
  it("concatenates prefixes along the path", () => {
    expect(
      mergePathConditions([[{ prefix: "/api" }], [{ prefix: "/widgets" }]])
    ).toEqual({ kind: "prefix", prefix: "/api/widgets" });
  });

  it.each([
    ["/", "/svc", "/svc"],
    ["/api/", "/v1", "/api/v1"],
    ["/a", "/b/", "/a/b/"],
    ["/a//", "//b", "/a/b"],
  ])("merges %s and %s into %s", (parent, child, expected) => {
    expect(
      mergePathConditions([[{ prefix: parent }], [{ prefix: child }]])
    ).toEqual({ kind: "prefix", prefix: expected });
  });

  it("inherits the parent prefix when a block declares none", () => {
    expect(
      mergePathConditions([[{ prefix: "/api" }], [], [{ header: { name: "x", present: true } }]])
    ).toEqual({ kind: "prefix", prefix: "/api" });
  });

  it("yields / when nothing declares a prefix", () => {
    expect(mergePathConditions([[], []])).toEqual({ kind: "prefix", prefix: "/" });
  });

  it("anchors an exact leaf under the inherited prefix", () => {
    expect(
      mergePathConditions([[{ prefix: "/api/" }], [{ exact: "/health" }]])
    ).toEqual({ kind: "exact", path: "/api/health" });
  });

  it("prefixes a regex leaf with the escaped inherited prefix", () => {
    expect(
      mergePathConditions([[{ prefix: "/v1.0/" }], [{ regex: "/items/[0-9]+" }]])
    ).toEqual({ kind: "regex", regex: "/v1\\.0/items/[0-9]+" });
  });
});

describe("validateConditionBlock", () => {
  it("rejects more than one path match in a block", () => {
    expect(validateConditionBlock([{ prefix: "/a" }, { prefix: "/b" }])).toEqual({
      reason: "PathMatchConditionsNotValid",
      message: "more than one path match is not allowed in a condition block",
    });
  });

  it("rejects prefixes that do not start with a slash", () => {
    expect(validateConditionBlock([{ prefix: "api" }])?.message).toBe(
      "prefix conditions must start with /, api was supplied"
    );
  });

  it("rejects path kinds outside the allowed set", () => {
    expect(
      validateConditionBlock([{ exact: "/a" }], { allowedPathKinds: ["prefix"] })
        ?.message
    ).toBe("exact conditions are not allowed here, only prefix");
  });

  it("rejects regexes that do not compile", () => {
    expect(validateConditionBlock([{ regex: "/(" }])?.reason).toBe(
      "PathMatchConditionsNotValid"
    );
  });

  it.each([
    [
      [
        { header: { name: "X-Tenant", exact: "blue" } },
        { header: { name: "x-tenant", exact: "green" } },
      ],
      "cannot specify duplicate header 'exact match' conditions in the same route",
    ],
    [
      [
        { header: { name: "x-tenant", exact: "blue" } },
        { header: { name: "X-TENANT", notExact: "blue" } },
      ],
      "cannot specify contradictory 'exact' and 'notexact' conditions for the same route and header",
    ],
    [
      [
        { header: { name: "x-debug", present: true } },
        { header: { name: "x-debug", notPresent: true } },
      ],
      "cannot specify contradictory 'present' and 'notpresent' conditions for the same route and header",
    ],
    [
      [
        { header: { name: "user-agent", notContains: "bot" } },
        { header: { name: "user-agent", contains: "bot" } },
      ],
      "cannot specify contradictory 'contains' and 'notcontains' conditions for the same route and header",
    ],
  ])("rejects contradictory header clauses (%#)", (block, message) => {
    expect(validateConditionBlock(block)).toEqual({
      reason: "HeaderMatchConditionsNotValid",
      message,
    });
  });

  it("accepts exact and notexact with different values", () => {
    expect(
      validateConditionBlock([
        { header: { name: "x-tenant", exact: "blue" } },
        { header: { name: "x-tenant", notExact: "green" } },
      ])
    ).toBeUndefined();
  });
});

describe("mergeConditions", () => {
  it("unions header clauses and collapses identical ones", () => {
    const merged = mergeConditions([
      [{ prefix: "/api" }, { header: { name: "X-Tenant", exact: "blue" } }],
      [{ header: { name: "x-tenant", exact: "blue" } }, { header: { name: "x-debug", present: true } }],
    ]);

    expect(merged).toEqual({
      ok: true,
      value: {
        path: { kind: "prefix", prefix: "/api" },
        headers: [
          { name: "x-tenant", kind: "exact", value: "blue", invert: false },
          { name: "x-debug", kind: "present", invert: false },
        ],
      },
    });
  });

  it("detects contradictions spread over several blocks", () => {
    const merged = mergeConditions([
      [{ header: { name: "x-debug", present: true } }],
      [{ header: { name: "x-debug", notPresent: true } }],
    ]);

    expect(merged.ok).toBe(false);
  });

  it("only allows exact and regex matches on the last block", () => {
    const merged = mergeConditions([[{ exact: "/a" }], [{ prefix: "/b" }]]);

    expect(merged.ok).toBe(false);
    if (!merged.ok) {
      expect(merged.error.message).toBe(
        "exact conditions are not allowed here, only prefix"
      );
    }
  });
});

describe("renderCondition", () => {
  it("renders headers in a canonical order", () => {
    const first = renderCondition({
      path: { kind: "prefix", prefix: "/api" },
      headers: [
        { name: "x-b", kind: "present", invert: true },
        { name: "x-a", kind: "exact", value: "1", invert: false },
      ],
    });

    expect(first).toBe(
      "prefix:/api header:x-a:exact=1 header:x-b:not-present"
    );
  });

  it("gives equivalent blocks the same key", () => {
    expect(
      conditionBlockKey([
        { prefix: "/a" },
        { header: { name: "X-One", present: true } },
      ])
    ).toBe(
      conditionBlockKey([
        { header: { name: "x-one", present: true } },
        { prefix: "/a" },
      ])
    );
  });
});
