import {
  createGraphError,
  createResultErr,
  createResultOk,
  DEFAULT_DEBOUNCE_MS,
  DEFAULT_MAX_DEBOUNCE_MS,
  deepFreeze,
  documentKeyOf,
  type DocumentKind,
  type GraphError,
  type Logger,
  noopLogger,
  type RawDocument,
  type Result,
} from "@routegraph/types";

/** Point-in-time, read-only view of the cache. */
export type CacheSnapshot = {
  /** Monotonic counter bumped on every effective mutation. */
  readonly version: number;
  readonly size: number;
  get(key: string): RawDocument | undefined;
  list(kind?: DocumentKind): readonly RawDocument[];
};

export type ResourceCacheOptions = {
  debounceMs?: number;
  /** Longest a notification waits while writes keep arriving. */
  maxDelayMs?: number;
  logger?: Logger;
};

export type ResourceCache = {
  /** Returns `true` when the write changed the cache. */
  put(document: RawDocument): boolean;
  delete(key: string): boolean;
  /** Replaces the whole content, as after a full relist of the store. */
  replaceAll(documents: Iterable<RawDocument>): boolean;
  snapshot(): Result<CacheSnapshot, GraphError>;
  subscribe(listener: () => void): () => void;
  markUnavailable(cause: unknown): void;
  markAvailable(): void;
  isAvailable(): boolean;
  dispose(): void;
};

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

const sameDocument = (left: RawDocument, right: RawDocument): boolean =>
  left.metadata.revision === right.metadata.revision &&
  JSON.stringify(left) === JSON.stringify(right);

const compareKeys = (left: string, right: string): number =>
  left < right ? -1 : left > right ? 1 : 0;

const createSnapshot = (
  entries: ReadonlyMap<string, RawDocument>,
  version: number
): CacheSnapshot => {
  const contents = new Map(entries);
  const ordered = Object.freeze(
    [...contents.entries()]
      .sort(([left], [right]) => compareKeys(left, right))
      .map(([, document]) => document)
  );

  return Object.freeze({
    version,
    size: contents.size,
    get: (key: string) => contents.get(key),
    list: (kind?: DocumentKind) =>
      kind === undefined
        ? ordered
        : ordered.filter((document) => document.kind === kind),
  });
};

/**
 * In-memory document cache keyed by `kind/namespace/name`.
 *
 * Writers return immediately; subscribers are told about changes once per
 * quiet period of `debounceMs`, and at least every `maxDelayMs` during a
 * steady stream of writes.
 */
export const createResourceCache = (
  options: ResourceCacheOptions = {}
): ResourceCache => {
  const debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
  const maxDelayMs = Math.max(
    debounceMs,
    options.maxDelayMs ?? DEFAULT_MAX_DEBOUNCE_MS
  );
  const logger = options.logger ?? noopLogger;
  const entries = new Map<string, RawDocument>();
  const listeners = new Set<() => void>();
  let version = 0;
  let current: CacheSnapshot | undefined;
  let unavailableCause: unknown;
  let available = true;
  let debounceTimer: NodeJS.Timeout | undefined;
  let pendingSince: number | undefined;

  const flush = () => {
    for (const listener of [...listeners]) {
      try {
        listener();
      } catch (error) {
        logger.error(
          error instanceof Error ? error : String(error),
          { phase: "cache-notify" }
        );
      }
    }
  };

  const schedule = () => {
    if (debounceTimer) {
      clearTimeout(debounceTimer);
    }
    const now = Date.now();
    pendingSince ??= now;
    const deadline = pendingSince + maxDelayMs - now;
    debounceTimer = setTimeout(() => {
      debounceTimer = undefined;
      pendingSince = undefined;
      flush();
    }, Math.max(0, Math.min(debounceMs, deadline)));
  };

  const touch = () => {
    version += 1;
    current = undefined;
    schedule();
  };

  const put = (document: RawDocument): boolean => {
    const key = documentKeyOf(document);
    const existing = entries.get(key);
    if (existing) {
      if (existing.metadata.revision > document.metadata.revision) {
        logger.debug("Ignoring stale document revision", {
          document: key,
          revision: document.metadata.revision,
          cachedRevision: existing.metadata.revision,
        });
        return false;
      }
      if (sameDocument(existing, document)) {
        return false;
      }
    }
    entries.set(key, deepFreeze(structuredClone(document)));
    touch();
    return true;
  };

  const remove = (key: string): boolean => {
    if (!entries.delete(key)) {
      return false;
    }
    touch();
    return true;
  };

  const replaceAll = (documents: Iterable<RawDocument>): boolean => {
    const next = new Map<string, RawDocument>();
    for (const document of documents) {
      const key = documentKeyOf(document);
      const previous = next.get(key);
      if (previous && previous.metadata.revision > document.metadata.revision) {
        continue;
      }
      next.set(key, document);
    }

    let changed = next.size !== entries.size;
    for (const [key, document] of next) {
      const existing = entries.get(key);
      if (!(existing && sameDocument(existing, document))) {
        changed = true;
        break;
      }
    }
    if (!changed) {
      return false;
    }

    entries.clear();
    for (const [key, document] of next) {
      entries.set(key, deepFreeze(structuredClone(document)));
    }
    touch();
    return true;
  };

  const snapshot = (): Result<CacheSnapshot, GraphError> => {
    if (!available) {
      return createResultErr(
        createGraphError({
          code: "STORE_UNAVAILABLE",
          message: `Resource store is unavailable: ${describeCause(unavailableCause)}`,
          cause: unavailableCause,
          help: "The last published graph stays authoritative until the store recovers.",
        })
      );
    }
    current ??= createSnapshot(entries, version);
    return createResultOk(current);
  };

  const subscribe = (listener: () => void) => {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  const markUnavailable = (cause: unknown) => {
    unavailableCause = cause;
    if (available) {
      available = false;
      logger.warn("Resource store marked unavailable", {
        cause: describeCause(cause),
      });
    }
  };

  const markAvailable = () => {
    unavailableCause = undefined;
    if (!available) {
      available = true;
      logger.info("Resource store available again");
      schedule();
    }
  };

  const dispose = () => {
    if (debounceTimer) {
      clearTimeout(debounceTimer);
      debounceTimer = undefined;
    }
    pendingSince = undefined;
    listeners.clear();
  };

  return {
    put,
    delete: remove,
    replaceAll,
    snapshot,
    subscribe,
    markUnavailable,
    markAvailable,
    isAvailable: () => available,
    dispose,
  };
};
