import { promises as fs } from "node:fs";
import path from "node:path";
import TOML from "@iarna/toml";
import {
  type BuilderConfig,
  builderConfigSchema,
  createGraphError,
  createResultErr,
  createResultOk,
  type GraphError,
  type Result,
} from "@routegraph/types";
import { load as yamlLoad } from "js-yaml";
import JSON5 from "json5";

export type BuilderConfigFormat = "yaml" | "json" | "jsonc" | "toml";

export type BuilderConfigResult = {
  /** Absolute path to the resolved configuration file (if found). */
  path?: string;
  /** The format derived from the file extension. */
  format?: BuilderConfigFormat;
  config: BuilderConfig;
};

export type LoadBuilderConfigOptions = {
  /** Starting directory or file from which to locate `.routegraph/`. Defaults to `process.cwd()`. */
  startPath?: string;
  /** Explicit path to a configuration file. Bypasses discovery when provided. */
  configPath?: string;
};

export const CONFIG_DIRECTORY = ".routegraph";

type Candidate = {
  filename: string;
  format: BuilderConfigFormat;
};

const DEFAULT_CANDIDATES: readonly Candidate[] = [
  { filename: "config.yaml", format: "yaml" },
  { filename: "config.yml", format: "yaml" },
  { filename: "config.json", format: "json" },
  { filename: "config.jsonc", format: "jsonc" },
  { filename: "config.toml", format: "toml" },
];

const EXTENSION_FORMATS: Readonly<Record<string, BuilderConfigFormat>> = {
  ".yaml": "yaml",
  ".yml": "yaml",
  ".json": "json",
  ".jsonc": "jsonc",
  ".toml": "toml",
};

const pathExists = (candidate: string): Promise<boolean> =>
  fs.access(candidate).then(
    () => true,
    () => false
  );

const isDirectory = (candidate: string): Promise<boolean> =>
  fs
    .stat(candidate)
    .then((stat) => stat.isDirectory())
    .catch(() => false);

const findConfigRoot = async (
  startPath: string
): Promise<string | undefined> => {
  let current = path.resolve(startPath);
  const stats = await fs.stat(current).catch(() => undefined);
  if (stats?.isFile()) {
    current = path.dirname(current);
  }

  const root = path.parse(current).root;

  while (true) {
    if (await isDirectory(path.join(current, CONFIG_DIRECTORY))) {
      return current;
    }
    if (current === root) {
      return;
    }
    current = path.dirname(current);
  }
};

const parseConfigContents = (
  contents: string,
  format: BuilderConfigFormat
): unknown => {
  switch (format) {
    case "yaml":
      return yamlLoad(contents) ?? {};
    case "json":
      return JSON.parse(contents);
    case "jsonc":
      return JSON5.parse(contents);
    case "toml":
      return TOML.parse(contents);
    default: {
      const exhaustive: never = format;
      throw new Error(`Unsupported builder config format: ${exhaustive}`);
    }
  }
};

const resolveConfigPath = async (
  options: LoadBuilderConfigOptions
): Promise<
  Result<{ path: string; format: BuilderConfigFormat } | undefined>
> => {
  if (options.configPath) {
    const explicit = path.resolve(options.configPath);
    if (!(await pathExists(explicit))) {
      return createResultErr(
        createGraphError({
          code: "CONFIG_NOT_FOUND",
          message: `Specified builder config not found: ${options.configPath}`,
        })
      );
    }
    const format = EXTENSION_FORMATS[path.extname(explicit).toLowerCase()];
    if (!format) {
      return createResultErr(
        createGraphError({
          code: "CONFIG_INVALID",
          message: `Unsupported builder config extension: ${path.basename(explicit)}`,
          help: "Use one of .yaml, .yml, .json, .jsonc or .toml",
        })
      );
    }
    return createResultOk({ path: explicit, format });
  }

  const start = options.startPath
    ? path.resolve(options.startPath)
    : process.cwd();
  const configRoot = await findConfigRoot(start);
  if (!configRoot) {
    return createResultOk(undefined);
  }

  const configDir = path.join(configRoot, CONFIG_DIRECTORY);
  for (const candidate of DEFAULT_CANDIDATES) {
    const candidatePath = path.join(configDir, candidate.filename);
    if (await pathExists(candidatePath)) {
      return createResultOk({ path: candidatePath, format: candidate.format });
    }
  }

  return createResultOk(undefined);
};

export const formatIssuePath = (segments: readonly (string | number)[]): string =>
  segments
    .map((segment, index) =>
      typeof segment === "number"
        ? `[${segment}]`
        : index === 0
          ? segment
          : `.${segment}`
    )
    .join("");

/**
 * Loads the builder configuration from `.routegraph/config.*`, searching
 * upward from the start path. Every field has a default, so a missing file
 * yields the default configuration.
 */
export const loadBuilderConfig = async (
  options: LoadBuilderConfigOptions = {}
): Promise<Result<BuilderConfigResult>> => {
  const resolved = await resolveConfigPath(options);
  if (!resolved.ok) {
    return resolved;
  }
  if (!resolved.value) {
    return createResultOk({ config: builderConfigSchema.parse({}) });
  }

  const location = resolved.value;
  let raw: unknown;
  try {
    const contents = await fs.readFile(location.path, "utf8");
    raw = parseConfigContents(contents, location.format);
  } catch (cause) {
    return createResultErr(
      createGraphError({
        code: "CONFIG_INVALID",
        message: `Failed to parse builder config (${location.path}): ${
          cause instanceof Error ? cause.message : String(cause)
        }`,
        cause,
      })
    );
  }

  const schemaResult = builderConfigSchema.safeParse(raw);
  if (!schemaResult.success) {
    const issues = schemaResult.error.issues.map((issue) => {
      const label = formatIssuePath(issue.path) || "builderConfig";
      return `${label} ${issue.message}`;
    });
    const error: GraphError = createGraphError({
      code: "CONFIG_INVALID",
      message: `Invalid builder config (${location.path}):\n  • ${issues.join("\n  • ")}`,
      issues,
    });
    return createResultErr(error);
  }

  return createResultOk({
    path: location.path,
    format: location.format,
    config: schemaResult.data,
  });
};
