import { describe, expect, it } from "vitest";

import {
  createGraphError,
  createResultErr,
  createResultOk,
  GRAPH_ERROR_CODES,
  isGraphError,
  isResultErr,
  isResultOk,
} from "../src/index";

describe("result primitives", () => {
  it("createResultOk wraps payload without freezing value", () => {
    const value = { key: "value" };
    const result = createResultOk(value);

    expect(result.ok).toBe(true);
    expect(result.value).toBe(value);
    expect(isResultOk(result)).toBe(true);
    expect(isResultErr(result)).toBe(false);
  });

  it("createResultErr preserves error payload", () => {
    const error = new Error("kaboom");
    const result = createResultErr(error);

    expect(result.ok).toBe(false);
    expect(result.error).toBe(error);
    expect(isResultErr(result)).toBe(true);
    expect(isResultOk(result)).toBe(false);
  });
});

describe("graph error helpers", () => {
  it("createGraphError freezes the error and its issues", () => {
    const issues = ["listeners must use different ports"];

    const error = createGraphError({
      code: "CONFIG_INVALID",
      message: "Invalid builder config",
      issues,
      details: { attempt: 3 },
    });

    expect(error.issues).toEqual(issues);
    expect(error.issues).not.toBe(issues);
    expect(Object.isFrozen(error.issues)).toBe(true);
    expect(Object.isFrozen(error)).toBe(true);
    expect(error.details).toEqual({ attempt: 3 });
  });

  it("createGraphError omits optional properties when not provided", () => {
    const error = createGraphError({
      code: "STORE_UNAVAILABLE",
      message: "Resource store is unreachable",
    });

    expect(error.details).toBeUndefined();
    expect(error.issues).toBeUndefined();
    expect("details" in error).toBe(false);
  });

  it("isGraphError recognises only known codes", () => {
    const fallbackCode = GRAPH_ERROR_CODES.at(-1) ?? "INTERNAL_ERROR";

    expect(
      isGraphError(createGraphError({ code: fallbackCode, message: "boom" }))
    ).toBe(true);
    expect(isGraphError({ code: "NOPE", message: "boom" })).toBe(false);
    expect(isGraphError(new Error("boom"))).toBe(false);
    expect(isGraphError(undefined)).toBe(false);
  });
});
