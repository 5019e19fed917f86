import { createResourceCache, type ResourceCache } from "@routegraph/cache";
import { createStatusPublisher } from "@routegraph/status";
import {
  type BuilderConfig,
  computeBackoffDelay,
  createGraphError,
  deepFreeze,
  type GraphSnapshot,
  type Logger,
  noopLogger,
  type SnapshotConsumer,
  type StatusRecord,
  type StatusSink,
} from "@routegraph/types";

import { buildGraph } from "./build";
import { serializeGraph } from "./emitter";

export type GraphControllerOptions = {
  cache: ResourceCache;
  config: BuilderConfig;
  statusSink: StatusSink;
  consumer: SnapshotConsumer;
  logger?: Logger;
};

export type GraphController = {
  /** Last published snapshot; `undefined` until the first rebuild succeeds. */
  current(): GraphSnapshot | undefined;
  /** Requests a rebuild outside the cache's change signal. */
  requestRebuild(): void;
  /** Resolves once no rebuild is running or queued. */
  idle(): Promise<void>;
  stop(): void;
};

/** Resource cache whose change signal follows the builder's debounce settings. */
export const createBuilderCache = (
  config: BuilderConfig,
  logger?: Logger
): ResourceCache =>
  createResourceCache({
    debounceMs: config.debounceMs,
    maxDelayMs: config.maxDebounceMs,
    ...(logger ? { logger } : {}),
  });

const describeCause = (value: unknown): string =>
  value instanceof Error ? value.message : String(value);

/**
 * Single writer of routing graph snapshots. Rebuilds follow the cache's
 * debounced change signal; a signal that arrives while a rebuild runs queues
 * exactly one follow-up rebuild.
 */
export const createGraphController = (
  options: GraphControllerOptions
): GraphController => {
  const { cache, config, consumer } = options;
  const logger = options.logger ?? noopLogger;
  const publisher = createStatusPublisher({
    sink: options.statusSink,
    logger,
    retry: config.retry,
  });

  let snapshot: GraphSnapshot | undefined;
  let serialized: string | undefined;
  let generation = 0;
  let rebuildInProgress = false;
  let pendingRebuild = false;
  let stopped = false;
  let retryAttempt = 0;
  let retryTimer: NodeJS.Timeout | undefined;
  let idleWaiters: (() => void)[] = [];

  const deliver = (next: GraphSnapshot) => {
    Promise.resolve()
      .then(() => consumer.accept(next))
      .catch((error: unknown) => {
        logger.error(
          `Snapshot consumer rejected generation ${next.generation}: ${describeCause(error)}`,
          { generation: next.generation }
        );
      });
  };

  // Status writes never hold up the next rebuild; the publisher keeps only
  // the latest desired record per document.
  const publishStatus = (records: readonly StatusRecord[]) => {
    publisher
      .publish(records)
      .then((summary) => {
        if (summary.failed > 0) {
          logger.warn("Some status records could not be written", { ...summary });
        }
      })
      .catch((error: unknown) => {
        logger.error(`Status publish failed: ${describeCause(error)}`, {
          generation,
        });
      });
  };

  const scheduleRetry = () => {
    if (stopped || retryTimer) {
      return;
    }
    const delay = computeBackoffDelay(retryAttempt, config.retry);
    retryAttempt += 1;
    retryTimer = setTimeout(() => {
      retryTimer = undefined;
      requestRebuild();
    }, delay);
  };

  const runRebuild = async () => {
    const view = cache.snapshot();
    if (!view.ok) {
      logger.warn(view.error.message, { code: view.error.code });
      scheduleRetry();
      return;
    }
    retryAttempt = 0;

    try {
      const started = Date.now();
      const { graph, records } = buildGraph({
        documents: view.value.list(),
        config,
      });

      const text = serializeGraph(graph);
      if (text !== serialized) {
        generation += 1;
        serialized = text;
        snapshot = deepFreeze({ generation, graph });
        logger.info("Published routing graph", {
          generation,
          listeners: graph.listeners.length,
          clusters: graph.clusters.length,
          documents: view.value.size,
          durationMs: Date.now() - started,
        });
        deliver(snapshot);
      } else {
        logger.debug("Routing graph unchanged", { generation });
      }

      publishStatus(records);
    } catch (cause) {
      const error = createGraphError({
        code: "INTERNAL_ERROR",
        message: `Rebuild failed: ${describeCause(cause)}`,
        cause,
      });
      logger.error(error.message, { code: error.code, generation });
    }
  };

  const settle = () => {
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  };

  const requestRebuild = () => {
    if (stopped) {
      return;
    }
    if (rebuildInProgress) {
      pendingRebuild = true;
      return;
    }

    rebuildInProgress = true;
    runRebuild().finally(() => {
      rebuildInProgress = false;
      if (pendingRebuild && !stopped) {
        pendingRebuild = false;
        requestRebuild();
        return;
      }
      settle();
    });
  };

  const unsubscribe = cache.subscribe(requestRebuild);
  requestRebuild();

  return {
    current: () => snapshot,
    requestRebuild,
    idle: () =>
      rebuildInProgress
        ? new Promise<void>((resolve) => {
            idleWaiters.push(resolve);
          })
        : Promise.resolve(),
    stop: () => {
      stopped = true;
      pendingRebuild = false;
      unsubscribe();
      publisher.stop();
      if (retryTimer) {
        clearTimeout(retryTimer);
        retryTimer = undefined;
      }
      settle();
    },
  };
};
