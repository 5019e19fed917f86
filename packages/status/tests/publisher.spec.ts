import type { StatusRecord } from "@routegraph/types";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createInMemoryStatusSink, createStatusPublisher } from "../src/index";

const createRecord = (overrides: Partial<StatusRecord> = {}): StatusRecord => ({
  key: "proxy/team-a/web",
  observedRevision: 1,
  verdict: "valid",
  conditions: [],
  ...overrides,
});

describe("createStatusPublisher", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("writes only records that changed since the last write", async () => {
    const sink = createInMemoryStatusSink();
    const publisher = createStatusPublisher({ sink });

    expect(
      await publisher.publish([
        createRecord(),
        createRecord({ key: "proxy/team-a/api" }),
      ])
    ).toEqual({ written: 2, unchanged: 0, failed: 0 });

    expect(
      await publisher.publish([
        createRecord(),
        createRecord({ key: "proxy/team-a/api", verdict: "orphaned" }),
      ])
    ).toEqual({ written: 1, unchanged: 1, failed: 0 });

    expect(sink.writeCount()).toBe(3);
    expect(sink.get("proxy/team-a/api")?.verdict).toBe("orphaned");
    publisher.stop();
  });

  it("never deletes records of removed documents and rewrites them on return", async () => {
    const sink = createInMemoryStatusSink();
    const publisher = createStatusPublisher({ sink });

    await publisher.publish([createRecord()]);
    await publisher.publish([]);
    expect(sink.keys()).toEqual(["proxy/team-a/web"]);

    await publisher.publish([createRecord()]);
    expect(sink.writeCount()).toBe(2);
    publisher.stop();
  });

  it("retries failed writes with backoff", async () => {
    const sink = createInMemoryStatusSink();
    sink.failNext(2);
    const publisher = createStatusPublisher({
      sink,
      retry: { initialDelayMs: 100, maxDelayMs: 1000 },
    });

    expect(await publisher.publish([createRecord()])).toEqual({
      written: 0,
      unchanged: 0,
      failed: 1,
    });
    expect(publisher.pendingRetries()).toBe(1);

    await vi.advanceTimersByTimeAsync(100);
    expect(sink.writeCount()).toBe(0);

    await vi.advanceTimersByTimeAsync(200);
    expect(sink.writeCount()).toBe(1);
    expect(publisher.pendingRetries()).toBe(0);
    publisher.stop();
  });
});
