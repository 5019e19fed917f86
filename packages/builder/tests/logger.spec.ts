import { afterEach, describe, expect, it, vi } from "vitest";

import { createDefaultLogger, StructuredLogger } from "../src/logger";

describe("createDefaultLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("builds a JSON logger from the log section", () => {
    const logger = createDefaultLogger({ level: "error", format: "json" });

    expect(logger).toBeInstanceOf(StructuredLogger);
    expect(() => {
      logger.debug("dropped below the configured level");
      logger.error(new Error("rebuild failed"), { generation: 3 });
    }).not.toThrow();
  });

  it("writes one JSON entry per event with its metadata as fields", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({
      level: "info",
      prettyPrint: false,
      bindings: { instance: "builder-1" },
      destination: { write: (line: string) => void lines.push(line) },
    });

    logger.debug("Routing graph unchanged", { generation: 1 });
    logger.warn("Some status records could not be written", { failed: 2 });
    logger.error(new Error("rebuild failed"), { generation: 3 });

    const entries: unknown[] = lines.map((line) => JSON.parse(line));
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      level: 40,
      component: "routegraph",
      instance: "builder-1",
      failed: 2,
      msg: "Some status records could not be written",
    });
    expect(entries[1]).toMatchObject({
      level: 50,
      generation: 3,
      msg: "rebuild failed",
      err: { type: "Error", message: "rebuild failed" },
    });
  });

  it("accepts a level from the environment", () => {
    vi.stubEnv("ROUTEGRAPH_LOG_LEVEL", "debug");
    vi.stubEnv("NODE_ENV", "production");

    const logger = new StructuredLogger();

    expect(() => logger.debug("Routing graph unchanged", { generation: 1 })).not.toThrow();
  });
});
