import {
  computeBackoffDelay,
  DEFAULT_RETRY_INITIAL_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  type Logger,
  noopLogger,
  type ResourceStore,
  type ResourceStoreEvent,
  type RetryOptions,
} from "@routegraph/types";

import type { ResourceCache } from "./resource-cache";

export type StoreSyncOptions = {
  logger?: Logger;
  retry?: Partial<RetryOptions>;
};

export type StoreSync = {
  /** Resolves after the first successful relist. */
  readonly ready: Promise<void>;
  stop(): void;
};

/**
 * Mirrors a resource store into the cache: relist, then follow watch events.
 * A failed relist or a watch error marks the cache unavailable and relists
 * again after an exponential backoff.
 */
export const connectResourceStore = (
  store: ResourceStore,
  cache: ResourceCache,
  options: StoreSyncOptions = {}
): StoreSync => {
  const logger = options.logger ?? noopLogger;
  const retry: RetryOptions = {
    initialDelayMs:
      options.retry?.initialDelayMs ?? DEFAULT_RETRY_INITIAL_DELAY_MS,
    maxDelayMs: options.retry?.maxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS,
  };

  let stopped = false;
  let attempt = 0;
  let retryTimer: NodeJS.Timeout | undefined;
  let unwatch: (() => void) | undefined;
  let markReady: (() => void) | undefined;
  const ready = new Promise<void>((resolve) => {
    markReady = resolve;
  });

  const detach = () => {
    if (unwatch) {
      unwatch();
      unwatch = undefined;
    }
  };

  const scheduleRelist = (cause: unknown) => {
    cache.markUnavailable(cause);
    detach();
    if (stopped || retryTimer) {
      return;
    }
    const delay = computeBackoffDelay(attempt, retry);
    attempt += 1;
    logger.warn("Relisting resource store after failure", {
      attempt,
      delayMs: delay,
    });
    retryTimer = setTimeout(() => {
      retryTimer = undefined;
      relist().catch((error: unknown) => scheduleRelist(error));
    }, delay);
  };

  const handleEvent = (event: ResourceStoreEvent) => {
    if (stopped) {
      return;
    }
    switch (event.type) {
      case "put":
        cache.put(event.document);
        return;
      case "delete":
        cache.delete(event.key);
        return;
      case "error":
        scheduleRelist(event.cause);
        return;
      default: {
        const exhaustive: never = event;
        throw new Error(`Unsupported store event: ${JSON.stringify(exhaustive)}`);
      }
    }
  };

  const relist = async () => {
    const documents = await store.list();
    if (stopped) {
      return;
    }
    cache.replaceAll(documents);
    cache.markAvailable();
    attempt = 0;
    detach();
    unwatch = store.watch(handleEvent);
    logger.debug("Resource store synchronised", { documents: documents.length });
    markReady?.();
  };

  relist().catch((error: unknown) => scheduleRelist(error));

  return {
    ready,
    stop: () => {
      stopped = true;
      if (retryTimer) {
        clearTimeout(retryTimer);
        retryTimer = undefined;
      }
      detach();
    },
  };
};
