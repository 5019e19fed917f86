import {
  computeBackoffDelay,
  createGraphError,
  DEFAULT_RETRY_INITIAL_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  type Logger,
  noopLogger,
  type RetryOptions,
  type StatusRecord,
  type StatusSink,
} from "@routegraph/types";

export type StatusPublisherOptions = {
  sink: StatusSink;
  logger?: Logger;
  retry?: Partial<RetryOptions>;
};

export type PublishSummary = {
  readonly written: number;
  readonly unchanged: number;
  readonly failed: number;
};

export type StatusPublisher = {
  /**
   * Writes the records that differ from what the sink last accepted. Records
   * whose document disappeared are forgotten; the sink's copy is left alone.
   */
  publish(records: readonly StatusRecord[]): Promise<PublishSummary>;
  pendingRetries(): number;
  stop(): void;
};

const fingerprint = (record: StatusRecord): string => JSON.stringify(record);

export const createStatusPublisher = (
  options: StatusPublisherOptions
): StatusPublisher => {
  const { sink } = options;
  const logger = options.logger ?? noopLogger;
  const retry: RetryOptions = {
    initialDelayMs:
      options.retry?.initialDelayMs ?? DEFAULT_RETRY_INITIAL_DELAY_MS,
    maxDelayMs: options.retry?.maxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS,
  };

  const written = new Map<string, string>();
  const desired = new Map<string, StatusRecord>();
  const failed = new Set<string>();
  let attempt = 0;
  let retryTimer: NodeJS.Timeout | undefined;
  let stopped = false;

  const write = async (record: StatusRecord): Promise<boolean> => {
    const print = fingerprint(record);
    try {
      await sink.upsert(record.key, record);
      const latest = desired.get(record.key);
      if (latest && fingerprint(latest) === print) {
        written.set(record.key, print);
        failed.delete(record.key);
      }
      return true;
    } catch (cause) {
      const error = createGraphError({
        code: "STATUS_SINK_UNAVAILABLE",
        message: `Failed to write status for ${record.key}`,
        cause,
      });
      logger.warn(error.message, {
        document: record.key,
        code: error.code,
        cause: cause instanceof Error ? cause.message : String(cause),
      });
      failed.add(record.key);
      return false;
    }
  };

  const scheduleRetry = () => {
    if (stopped || retryTimer || failed.size === 0) {
      return;
    }
    const delay = computeBackoffDelay(attempt, retry);
    attempt += 1;
    retryTimer = setTimeout(() => {
      retryTimer = undefined;
      const keys = [...failed];
      Promise.all(
        keys.flatMap((key) => {
          const record = desired.get(key);
          return record ? [write(record)] : [];
        })
      )
        .then(() => {
          if (failed.size === 0) {
            attempt = 0;
          } else {
            scheduleRetry();
          }
        })
        .catch((error: unknown) => {
          logger.error(error instanceof Error ? error : String(error), {
            phase: "status-retry",
          });
        });
    }, delay);
  };

  const publish = async (
    records: readonly StatusRecord[]
  ): Promise<PublishSummary> => {
    const present = new Set(records.map((record) => record.key));
    for (const key of [...desired.keys()]) {
      if (!present.has(key)) {
        desired.delete(key);
        written.delete(key);
        failed.delete(key);
      }
    }

    const changed: StatusRecord[] = [];
    for (const record of records) {
      desired.set(record.key, record);
      if (written.get(record.key) !== fingerprint(record)) {
        changed.push(record);
      }
    }

    const outcomes = await Promise.all(changed.map((record) => write(record)));
    const failures = outcomes.filter((outcome) => !outcome).length;
    if (failures > 0) {
      scheduleRetry();
    } else if (failed.size === 0) {
      attempt = 0;
    }

    return {
      written: outcomes.length - failures,
      unchanged: records.length - changed.length,
      failed: failures,
    };
  };

  return {
    publish,
    pendingRetries: () => failed.size,
    stop: () => {
      stopped = true;
      if (retryTimer) {
        clearTimeout(retryTimer);
        retryTimer = undefined;
      }
    },
  };
};
