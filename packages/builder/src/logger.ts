import {
  BUILDER_LOG_LEVELS,
  type BuilderLogLevel,
  type Logger,
  type LogMetadata,
} from "@routegraph/types";
import type { DestinationStream, Logger as PinoLogger } from "pino";
import pino from "pino";

export type LoggerConfig = {
  /** Falls back to `ROUTEGRAPH_LOG_LEVEL`, then `info`. */
  level?: BuilderLogLevel;
  /** Colorized pino-pretty lines; on by default outside production. */
  prettyPrint?: boolean;
  /** Fields stamped on every entry, e.g. the instance serving the graph. */
  bindings?: Record<string, unknown>;
  /** Receives JSON lines when `prettyPrint` is off. Defaults to stdout. */
  destination?: DestinationStream;
};

const levelFromEnvironment = (): BuilderLogLevel | undefined => {
  const value = process.env.ROUTEGRAPH_LOG_LEVEL;
  return BUILDER_LOG_LEVELS.find((level) => level === value);
};

/**
 * Rebuild, cache and status events as pino entries tagged
 * `component: "routegraph"`. Metadata such as `generation` or `document`
 * becomes top-level fields.
 */
export class StructuredLogger implements Logger {
  private readonly logger: PinoLogger;

  constructor(config: LoggerConfig = {}) {
    const {
      level = levelFromEnvironment() ?? "info",
      prettyPrint = process.env.NODE_ENV !== "production",
      bindings = {},
    } = config;

    this.logger = pino(
      {
        level,
        base: {
          component: "routegraph",
          ...bindings,
        },
        transport: prettyPrint
          ? {
              target: "pino-pretty",
              options: {
                colorize: true,
                translateTime: "SYS:standard",
                ignore: "pid,hostname,component",
              },
            }
          : undefined,
      },
      prettyPrint ? undefined : config.destination
    );
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.logger.debug(metadata ?? {}, message);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.logger.info(metadata ?? {}, message);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.logger.warn(metadata ?? {}, message);
  }

  error(message: string | Error, metadata?: LogMetadata): void {
    if (message instanceof Error) {
      this.logger.error({ err: message, ...metadata }, message.message);
    } else {
      this.logger.error(metadata ?? {}, message);
    }
  }
}

/**
 * Creates the builder's logger. The `log` section of the builder
 * configuration wins over the environment.
 */
export const createDefaultLogger = (
  log: { level?: BuilderLogLevel; format?: "pretty" | "json" } = {}
): Logger =>
  new StructuredLogger({
    ...(log.level ? { level: log.level } : {}),
    ...(log.format ? { prettyPrint: log.format === "pretty" } : {}),
  });
