import type { ResourceCache } from "@routegraph/cache";
import { createInMemoryStatusSink } from "@routegraph/status";
import {
  type GraphSnapshot,
  noopLogger,
  resolveBuilderConfig,
  type StatusSink,
} from "@routegraph/types";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  createBuilderCache,
  createGraphController,
  type GraphController,
} from "../src/controller";
import { createProxy, createService, routeTo } from "./fixtures";

const rootProxy = (revision: number, prefixes: string[]) =>
  createProxy(
    "root",
    {
      virtualHost: { fqdn: "example.com" },
      routes: prefixes.map((prefix) => routeTo("svc-a", prefix)),
    },
    { revision }
  );

const routedPrefixes = (snapshot: GraphSnapshot | undefined) =>
  snapshot?.graph.listeners[0]?.virtualHosts[0]?.routes.map((route) =>
    route.condition.path.kind === "prefix" ? route.condition.path.prefix : ""
  );

describe("createGraphController", () => {
  let cache: ResourceCache;
  let controller: GraphController | undefined;
  const sink = createInMemoryStatusSink();
  const accepted: GraphSnapshot[] = [];
  const warn = vi.fn();
  const config = resolveBuilderConfig({ debounceMs: 50 });

  const start = (statusSink: StatusSink = sink) => {
    controller = createGraphController({
      cache,
      config,
      statusSink,
      consumer: { accept: (snapshot) => void accepted.push(snapshot) },
      logger: { ...noopLogger, warn },
    });
    return controller;
  };

  beforeEach(() => {
    vi.useFakeTimers();
    accepted.length = 0;
    warn.mockReset();
    cache = createBuilderCache(config);
    cache.put(rootProxy(1, ["/api"]));
    cache.put(createService("svc-a"));
  });

  afterEach(() => {
    controller?.stop();
    controller = undefined;
    cache.dispose();
    vi.useRealTimers();
  });

  it("publishes the first graph and its status on start", async () => {
    const graphs = start();
    await graphs.idle();

    expect(graphs.current()?.generation).toBe(1);
    expect(routedPrefixes(graphs.current())).toEqual(["/api"]);
    expect(accepted.map((snapshot) => snapshot.generation)).toEqual([1]);
    expect(sink.get("proxy/team-a/root")?.verdict).toBe("valid");
  });

  it("rebuilds after the debounced change signal", async () => {
    const graphs = start();
    await graphs.idle();

    cache.put(rootProxy(2, ["/api", "/web"]));
    await vi.advanceTimersByTimeAsync(50);
    await graphs.idle();

    expect(graphs.current()?.generation).toBe(2);
    expect(routedPrefixes(graphs.current())).toEqual(["/api", "/web"]);
    expect(sink.get("proxy/team-a/root")?.observedRevision).toBe(2);
  });

  it("keeps the generation when a change leaves the graph as it was", async () => {
    const graphs = start();
    await graphs.idle();

    cache.put(createService("svc-unused"));
    await vi.advanceTimersByTimeAsync(50);
    await graphs.idle();

    expect(graphs.current()?.generation).toBe(1);
    expect(accepted).toHaveLength(1);
  });

  it("serves the last graph while the store is unavailable", async () => {
    const graphs = start();
    await graphs.idle();
    const before = graphs.current();

    cache.markUnavailable(new Error("connection refused"));
    cache.put(rootProxy(2, ["/api", "/web"]));
    await vi.advanceTimersByTimeAsync(50);
    await graphs.idle();

    expect(graphs.current()).toBe(before);
    expect(warn).toHaveBeenCalledWith(
      "Resource store is unavailable: connection refused",
      { code: "STORE_UNAVAILABLE" }
    );

    cache.markAvailable();
    await vi.advanceTimersByTimeAsync(50);
    await graphs.idle();

    expect(graphs.current()?.generation).toBe(2);
    expect(routedPrefixes(graphs.current())).toEqual(["/api", "/web"]);
  });

  it("keeps rebuilding while status writes never settle", async () => {
    const graphs = start({ upsert: () => new Promise<void>(() => undefined) });
    await graphs.idle();

    cache.put(rootProxy(2, ["/api", "/web"]));
    await vi.advanceTimersByTimeAsync(50);
    await graphs.idle();

    expect(graphs.current()?.generation).toBe(2);
    expect(routedPrefixes(graphs.current())).toEqual(["/api", "/web"]);
  });

  it("rebuilds within the debounce cap while writes keep arriving", async () => {
    const graphs = start();
    await graphs.idle();

    for (let revision = 2; revision <= 16; revision += 1) {
      cache.put(
        createProxy("busy", { routes: [routeTo("svc-a")] }, { revision })
      );
      await vi.advanceTimersByTimeAsync(40);
    }

    expect(graphs.current()?.generation).toBe(1);
    expect(sink.get("proxy/team-a/busy")?.verdict).toBe("orphaned");
  });

  it("stops reacting to the cache once stopped", async () => {
    const graphs = start();
    await graphs.idle();
    graphs.stop();

    cache.put(rootProxy(2, ["/api", "/web"]));
    await vi.advanceTimersByTimeAsync(50);

    expect(graphs.current()?.generation).toBe(1);
  });
});
