import type { RawDocument } from "./documents";
import type { ClusterProtocol, GraphSnapshot } from "./graph";

export type ResourceStoreEvent =
  | { readonly type: "put"; readonly document: RawDocument }
  | { readonly type: "delete"; readonly key: string }
  | { readonly type: "error"; readonly cause: unknown };

/**
 * Document store the builder reads from. `watch` returns an unsubscribe
 * function; the handler may be called synchronously.
 */
export type ResourceStore = {
  list(): Promise<readonly RawDocument[]>;
  watch(handler: (event: ResourceStoreEvent) => void): () => void;
};

export type ServiceReference = {
  readonly namespace: string;
  readonly name: string;
  readonly port: number;
  /** Upstream protocol requested by the route, if any. */
  readonly protocol?: ClusterProtocol;
};

export type ResolvedService = {
  readonly namespace: string;
  readonly name: string;
  readonly port: number;
  readonly protocol: ClusterProtocol;
};

export type ServiceResolutionReason =
  | "ServiceUnresolvedReference"
  | "ServicePortInvalid"
  | "ServiceProtocolMismatch";

export type ServiceResolutionError = {
  readonly reason: ServiceResolutionReason;
  readonly message: string;
};

export type SnapshotConsumer = {
  accept(snapshot: GraphSnapshot): void | Promise<void>;
};
