import type { StatusRecord, StatusSink } from "@routegraph/types";

export type InMemoryStatusSink = StatusSink & {
  get(key: string): StatusRecord | undefined;
  keys(): string[];
  /** Number of upserts accepted so far. */
  writeCount(): number;
  /** Rejects the next `count` upserts with the given cause. */
  failNext(count: number, cause?: unknown): void;
};

export const createInMemoryStatusSink = (): InMemoryStatusSink => {
  const records = new Map<string, StatusRecord>();
  let writes = 0;
  let failures = 0;
  let failureCause: unknown = new Error("status sink unavailable");

  return {
    upsert: (key, record) => {
      if (failures > 0) {
        failures -= 1;
        return Promise.reject(failureCause);
      }
      records.set(key, record);
      writes += 1;
      return Promise.resolve();
    },
    get: (key) => records.get(key),
    keys: () => [...records.keys()].sort(),
    writeCount: () => writes,
    failNext: (count, cause) => {
      failures = count;
      if (cause !== undefined) {
        failureCause = cause;
      }
    },
  };
};
