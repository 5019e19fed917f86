import { createError, createWarning } from "@routegraph/types";
import { describe, expect, it } from "vitest";

import { createStatusLedger, deriveVerdict } from "../src/index";

const cycleError = createError(
  "delegation",
  "IncludeCreatesCycle",
  "include creates an include cycle: team-a/b -> team-a/b"
);

describe("deriveVerdict", () => {
  it("ranks orphaned over invalid over warnings", () => {
    const warning = createWarning("route", "TimeoutPolicyNotValid", "bad");

    expect(deriveVerdict([], false)).toBe("valid");
    expect(deriveVerdict([warning], false)).toBe("valid-with-warnings");
    expect(deriveVerdict([warning, cycleError], false)).toBe("invalid");
    expect(deriveVerdict([cycleError], true)).toBe("orphaned");
  });
});

describe("createStatusLedger", () => {
  it("produces one record per document with de-duplicated conditions", () => {
    const ledger = createStatusLedger();
    ledger.addCondition("proxy/team-a/b", cycleError, "proxy/team-a/one");
    ledger.addCondition("proxy/team-a/b", cycleError, "proxy/team-a/two");
    ledger.setVirtualHost("proxy/team-a/root", "example.com");

    const records = ledger.toRecords([
      { key: "proxy/team-a/root", revision: 4 },
      { key: "proxy/team-a/b", revision: 2 },
    ]);

    expect(records).toEqual([
      {
        key: "proxy/team-a/root",
        observedRevision: 4,
        verdict: "valid",
        vhost: "example.com",
        conditions: [],
      },
      {
        key: "proxy/team-a/b",
        observedRevision: 2,
        verdict: "invalid",
        conditions: [cycleError],
      },
    ]);
  });

  it("withdraws the findings of a discarded root", () => {
    const ledger = createStatusLedger();
    const notFound = createError(
      "service",
      "ServiceUnresolvedReference",
      "service team-a/api not found"
    );
    ledger.addCondition("proxy/team-a/leaf", notFound, "proxy/team-a/loser");
    ledger.addCondition(
      "proxy/team-a/leaf",
      createWarning("route", "RouteDuplicated", "duplicate"),
      "proxy/team-a/winner"
    );

    ledger.discardOrigin("proxy/team-a/loser");

    expect(ledger.conditionsFor("proxy/team-a/leaf").map((c) => c.reason)).toEqual(
      ["RouteDuplicated"]
    );
    expect(ledger.hasErrors("proxy/team-a/leaf")).toBe(false);
  });

  it("reports orphans with an explanatory condition", () => {
    const ledger = createStatusLedger();
    ledger.markOrphaned("proxy/team-a/stray");

    const [record] = ledger.toRecords([
      { key: "proxy/team-a/stray", revision: 1, kind: "proxy" },
    ]);

    expect(record?.verdict).toBe("orphaned");
    expect(record?.conditions).toEqual([
      {
        level: "warning",
        subject: "orphan",
        reason: "Orphaned",
        message: "this proxy is not part of a delegation chain from a root proxy",
      },
    ]);
  });
});
