import {
  documentKeyOf,
  type RawDocument,
  type ResourceStore,
  type ResourceStoreEvent,
} from "@routegraph/types";

/** Resource store held in process memory, for embedding and tests. */
export type InMemoryResourceStore = ResourceStore & {
  apply(document: RawDocument): void;
  remove(key: string): void;
  /** Makes the next `list()` calls reject until `recover()` is called. */
  fail(cause: unknown): void;
  recover(): void;
  watcherCount(): number;
};

export const createInMemoryResourceStore = (
  initial: readonly RawDocument[] = []
): InMemoryResourceStore => {
  const documents = new Map<string, RawDocument>();
  const handlers = new Set<(event: ResourceStoreEvent) => void>();
  let failure: { cause: unknown } | undefined;

  for (const document of initial) {
    documents.set(documentKeyOf(document), document);
  }

  const emit = (event: ResourceStoreEvent) => {
    for (const handler of [...handlers]) {
      handler(event);
    }
  };

  return {
    list: () =>
      failure
        ? Promise.reject(failure.cause)
        : Promise.resolve([...documents.values()]),
    watch: (handler) => {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },
    apply: (document) => {
      documents.set(documentKeyOf(document), document);
      emit({ type: "put", document });
    },
    remove: (key) => {
      if (documents.delete(key)) {
        emit({ type: "delete", key });
      }
    },
    fail: (cause) => {
      failure = { cause };
      emit({ type: "error", cause });
    },
    recover: () => {
      failure = undefined;
    },
    watcherCount: () => handlers.size,
  };
};
