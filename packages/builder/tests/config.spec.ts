import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { CONFIG_DIRECTORY, loadBuilderConfig } from "../src/config";

const createdDirs: string[] = [];

const createTempProject = async (
  files: Record<string, string> = {}
): Promise<string> => {
  const root = await mkdtemp(path.join(tmpdir(), "routegraph-config-"));
  createdDirs.push(root);
  const configDir = path.join(root, CONFIG_DIRECTORY);
  await mkdir(configDir, { recursive: true });
  for (const [name, contents] of Object.entries(files)) {
    await writeFile(path.join(configDir, name), contents, "utf8");
  }
  return root;
};

afterEach(async () => {
  while (createdDirs.length > 0) {
    const dir = createdDirs.pop();
    if (!dir) {
      continue;
    }
    await rm(dir, { recursive: true, force: true });
  }
});

describe("loadBuilderConfig", () => {
  it("falls back to defaults when the config directory is empty", async () => {
    const projectDir = await createTempProject();

    const result = await loadBuilderConfig({ startPath: projectDir });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.path).toBeUndefined();
    expect(result.value.config.listeners).toEqual({
      http: { port: 80 },
      https: { port: 443 },
    });
    expect(result.value.config.routeSorting).toBe("specificity");
    expect(result.value.config.debounceMs).toBe(100);
  });

  it("finds YAML configuration from a nested start path", async () => {
    const projectDir = await createTempProject({
      "config.yaml":
        "listeners:\n  http:\n    port: 8080\nrootNamespaces:\n  - ingress\n",
    });
    const nested = path.join(projectDir, "deploy", "prod");
    await mkdir(nested, { recursive: true });

    const result = await loadBuilderConfig({ startPath: nested });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.format).toBe("yaml");
    expect(result.value.path?.endsWith("config.yaml")).toBe(true);
    expect(result.value.config.listeners.http.port).toBe(8080);
    expect(result.value.config.listeners.https.port).toBe(443);
    expect(result.value.config.rootNamespaces).toEqual(["ingress"]);
  });

  it("reads JSONC with comments", async () => {
    const projectDir = await createTempProject({
      "config.jsonc":
        '{\n  // order routes as declared\n  "routeSorting": "declaration",\n}\n',
    });

    const result = await loadBuilderConfig({ startPath: projectDir });

    expect(result.ok && result.value.config.routeSorting).toBe("declaration");
  });

  it("reads TOML", async () => {
    const projectDir = await createTempProject({
      "config.toml": "disablePermitInsecure = true\n\n[retry]\ninitialDelayMs = 50\n",
    });

    const result = await loadBuilderConfig({ startPath: projectDir });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.format).toBe("toml");
    expect(result.value.config.disablePermitInsecure).toBe(true);
    expect(result.value.config.retry).toEqual({
      initialDelayMs: 50,
      maxDelayMs: 30_000,
    });
  });

  it("rejects listeners sharing a port", async () => {
    const projectDir = await createTempProject({
      "config.json": JSON.stringify({
        listeners: { http: { port: 8443 }, https: { port: 8443 } },
      }),
    });

    const result = await loadBuilderConfig({ startPath: projectDir });

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe("CONFIG_INVALID");
    expect(result.error.issues).toEqual([
      "listeners HTTP and HTTPS listeners must use different ports",
    ]);
  });

  it("reports unparsable files", async () => {
    const projectDir = await createTempProject({ "config.json": "{ not json" });

    const result = await loadBuilderConfig({ startPath: projectDir });

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe("CONFIG_INVALID");
    expect(result.error.message).toContain("Failed to parse builder config");
  });

  it("reports a missing explicit config path", async () => {
    const result = await loadBuilderConfig({
      configPath: path.join(tmpdir(), "routegraph-missing", "config.yaml"),
    });

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe("CONFIG_NOT_FOUND");
  });
});
