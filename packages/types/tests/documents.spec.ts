import { describe, expect, it } from "vitest";

import {
  builderConfigJsonSchema,
  builderConfigSchema,
  documentKeyOf,
  formatDocumentKey,
  parseDocumentKey,
  resolveBuilderConfig,
  sourceDocumentJsonSchema,
  sourceDocumentSchema,
} from "../src/index";

const metadata = {
  namespace: "team-a",
  name: "web",
  revision: 1,
  creationTimestamp: "2024-01-01T00:00:00Z",
};

describe("document keys", () => {
  it("formats and parses kind/namespace/name keys", () => {
    const key = formatDocumentKey({
      kind: "proxy",
      namespace: "team-a",
      name: "web",
    });

    expect(key).toBe("proxy/team-a/web");
    expect(parseDocumentKey(key)).toEqual({
      kind: "proxy",
      namespace: "team-a",
      name: "web",
    });
    expect(documentKeyOf({ kind: "service", metadata })).toBe(
      "service/team-a/web"
    );
  });

  it("rejects malformed keys", () => {
    expect(parseDocumentKey("proxy/web")).toBeUndefined();
    expect(parseDocumentKey("proxy//web")).toBeUndefined();
  });
});

describe("sourceDocumentSchema", () => {
  it("accepts a root proxy document", () => {
    const result = sourceDocumentSchema.safeParse({
      kind: "proxy",
      metadata,
      spec: {
        virtualHost: { fqdn: "example.com" },
        routes: [{ services: [{ name: "web", port: 80 }] }],
      },
    });

    expect(result.success).toBe(true);
  });

  it("reports the path of an invalid field", () => {
    const result = sourceDocumentSchema.safeParse({
      kind: "proxy",
      metadata,
      spec: { routes: [{ services: [{ name: "web", port: "eighty" }] }] },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual([
        "spec",
        "routes",
        0,
        "services",
        0,
        "port",
      ]);
    }
  });

  it("rejects unknown kinds", () => {
    const result = sourceDocumentSchema.safeParse({
      kind: "ingress",
      metadata,
      spec: {},
    });

    expect(result.success).toBe(false);
  });
});

describe("builderConfigSchema", () => {
  it("fills every default", () => {
    expect(resolveBuilderConfig()).toEqual({
      listeners: { http: { port: 80 }, https: { port: 443 } },
      routeSorting: "specificity",
      rootNamespaces: [],
      disablePermitInsecure: false,
      debounceMs: 100,
      retry: { initialDelayMs: 250, maxDelayMs: 30_000 },
      log: {},
    });
  });

  it("rejects identical listener ports", () => {
    const result = builderConfigSchema.safeParse({
      listeners: { http: { port: 8080 }, https: { port: 8080 } },
    });

    expect(result.success).toBe(false);
  });
});

describe("JSON schemas", () => {
  it("describes every document kind", () => {
    expect(sourceDocumentJsonSchema).toHaveProperty(
      "$ref",
      "#/definitions/SourceDocument"
    );
    expect(sourceDocumentJsonSchema).toHaveProperty(
      ["definitions", "SourceDocument", "anyOf", 4, "properties", "kind", "const"],
      "secret"
    );
  });

  it("carries the builder config defaults", () => {
    expect(builderConfigJsonSchema).toHaveProperty(
      ["definitions", "BuilderConfig", "properties", "debounceMs", "default"],
      100
    );
    expect(builderConfigJsonSchema).toHaveProperty(
      ["definitions", "BuilderConfig", "properties", "maxDebounceMs", "default"],
      500
    );
  });
});
