import { CATCH_ALL_HOSTNAME, isWildcardHostname } from "@routegraph/listeners";
import {
  type Cluster,
  deepFreeze,
  type Listener,
  type RouteGraph,
  type VirtualHost,
} from "@routegraph/types";

const hostnameRank = (hostname: string): number => {
  if (hostname === CATCH_ALL_HOSTNAME) {
    return 2;
  }
  return isWildcardHostname(hostname) ? 1 : 0;
};

const compareStrings = (left: string, right: string): number =>
  left < right ? -1 : left > right ? 1 : 0;

export const compareVirtualHosts = (
  left: VirtualHost,
  right: VirtualHost
): number =>
  hostnameRank(left.hostname) - hostnameRank(right.hostname) ||
  compareStrings(left.hostname, right.hostname);

const collectClusters = (listeners: readonly Listener[]): Cluster[] => {
  const clusters = new Map<string, Cluster>();
  for (const listener of listeners) {
    for (const virtualHost of listener.virtualHosts) {
      for (const route of virtualHost.routes) {
        if (route.action.kind !== "forward") {
          continue;
        }
        const weighted = route.action.mirror
          ? [...route.action.clusters, route.action.mirror]
          : route.action.clusters;
        for (const { cluster } of weighted) {
          if (!clusters.has(cluster.name)) {
            clusters.set(cluster.name, cluster);
          }
        }
      }
    }
  }
  return [...clusters.values()].sort((left, right) =>
    compareStrings(left.name, right.name)
  );
};

/**
 * Assembles the immutable graph. Listeners arrive validated and sorted by
 * internal port; only virtual host order and the cluster list are settled
 * here.
 */
export const emitGraph = (listeners: readonly Listener[]): RouteGraph => {
  const ordered = listeners.map((listener) => ({
    ...listener,
    virtualHosts: [...listener.virtualHosts].sort(compareVirtualHosts),
  }));
  return deepFreeze({
    listeners: ordered,
    clusters: collectClusters(ordered),
  });
};

export const serializeGraph = (graph: RouteGraph): string =>
  JSON.stringify(graph, null, 2);
