import { z } from "zod";
import { type JsonSchema7Type, zodToJsonSchema } from "zod-to-json-schema";

export const BUILDER_LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type BuilderLogLevel = (typeof BUILDER_LOG_LEVELS)[number];

export const ROUTE_SORTING_MODES = ["specificity", "declaration"] as const;

export type RouteSortingMode = (typeof ROUTE_SORTING_MODES)[number];

export const DEFAULT_HTTP_PORT = 80;
export const DEFAULT_HTTPS_PORT = 443;
export const DEFAULT_DEBOUNCE_MS = 100;
export const DEFAULT_MAX_DEBOUNCE_MS = 500;
export const DEFAULT_RETRY_INITIAL_DELAY_MS = 250;
export const DEFAULT_RETRY_MAX_DELAY_MS = 30_000;

const listenerPortSchema = z.number().int().min(1).max(65_535);

export const builderConfigSchema = z
  .object({
    listeners: z
      .object({
        http: z
          .object({ port: listenerPortSchema.default(DEFAULT_HTTP_PORT) })
          .default({}),
        https: z
          .object({ port: listenerPortSchema.default(DEFAULT_HTTPS_PORT) })
          .default({}),
      })
      .default({}),
    routeSorting: z.enum(ROUTE_SORTING_MODES).default("specificity"),
    rootNamespaces: z.array(z.string().min(1)).default([]),
    disablePermitInsecure: z.boolean().default(false),
    debounceMs: z.number().int().nonnegative().default(DEFAULT_DEBOUNCE_MS),
    maxDebounceMs: z
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_MAX_DEBOUNCE_MS),
    retry: z
      .object({
        initialDelayMs: z
          .number()
          .int()
          .positive()
          .default(DEFAULT_RETRY_INITIAL_DELAY_MS),
        maxDelayMs: z
          .number()
          .int()
          .positive()
          .default(DEFAULT_RETRY_MAX_DELAY_MS),
      })
      .default({}),
    log: z
      .object({
        level: z.enum(BUILDER_LOG_LEVELS).optional(),
        format: z.enum(["pretty", "json"]).optional(),
      })
      .default({}),
  })
  .refine(
    (config) => config.listeners.http.port !== config.listeners.https.port,
    {
      message: "HTTP and HTTPS listeners must use different ports",
      path: ["listeners"],
    }
  );

export type BuilderConfigInput = z.input<typeof builderConfigSchema>;
export type BuilderConfig = z.output<typeof builderConfigSchema>;

export const resolveBuilderConfig = (
  input: BuilderConfigInput = {}
): BuilderConfig => builderConfigSchema.parse(input);

export const builderConfigJsonSchema: JsonSchema7Type = zodToJsonSchema(
  builderConfigSchema,
  "BuilderConfig"
);
