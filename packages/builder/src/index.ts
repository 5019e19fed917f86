export { type BuildInput, type BuildResult, buildGraph } from "./build";
export {
  type BuilderConfigFormat,
  type BuilderConfigResult,
  CONFIG_DIRECTORY,
  type LoadBuilderConfigOptions,
  loadBuilderConfig,
} from "./config";
export {
  createBuilderCache,
  createGraphController,
  type GraphController,
  type GraphControllerOptions,
} from "./controller";
export { compareVirtualHosts, emitGraph, serializeGraph } from "./emitter";
export { intersectHostnames } from "./gateway";
export { createDefaultLogger, type LoggerConfig, StructuredLogger } from "./logger";
export {
  canonicalHeaderName,
  parseDuration,
  parseTimeout,
} from "./policy";
export { createSecretLookup, type SecretLookup } from "./secrets";
export { createServiceResolver } from "./services";
