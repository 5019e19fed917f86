// Vitest configuration for the routegraph workspace. Resolves workspace packages from their sources.
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const WORKSPACE_PACKAGES = [
  "types",
  "cache",
  "conditions",
  "delegation",
  "sorter",
  "listeners",
  "status",
  "builder",
] as const;

export default defineConfig({
  resolve: {
    alias: Object.fromEntries(
      WORKSPACE_PACKAGES.map((name) => [
        `@routegraph/${name}`,
        fileURLToPath(
          new URL(`./packages/${name}/src/index.ts`, import.meta.url)
        ),
      ])
    ),
  },
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.spec.ts"],
  },
});
