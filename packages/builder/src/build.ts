import { renderCondition } from "@routegraph/conditions";
import { createDocumentArena, resolveDelegation } from "@routegraph/delegation";
import {
  compareTimestamps,
  type ListenerRequest,
  type MergedListener,
  mergeListeners,
} from "@routegraph/listeners";
import { dedupeRoutes, sortRoutes } from "@routegraph/sorter";
import { createStatusLedger, type StatusLedger } from "@routegraph/status";
import {
  type BuilderConfig,
  createError,
  createWarning,
  documentKeyOf,
  type Listener,
  type RawDocument,
  type Route,
  type RouteGraph,
  type StatusRecord,
  type TlsDescriptor,
  type VirtualHost,
} from "@routegraph/types";

import { emitGraph } from "./emitter";
import {
  attachHttpRoutes,
  type GatewayListener,
  gatewayListenerRequests,
  type RouteAttachment,
} from "./gateway";
import { ingestDocuments } from "./ingest";
import {
  collectRootRoutes,
  processRoute,
  type RouteDraft,
} from "./proxy-routes";
import { type QualifiedRoot, qualifyRoot, rootListenerRequests } from "./roots";
import { createSecretLookup } from "./secrets";
import { createServiceResolver } from "./services";

export type BuildInput = {
  readonly documents: readonly RawDocument[];
  readonly config: BuilderConfig;
};

export type BuildResult = {
  readonly graph: RouteGraph;
  readonly records: readonly StatusRecord[];
};

type RequestOwner =
  | { readonly kind: "root"; readonly root: QualifiedRoot; readonly index: number }
  | { readonly kind: "gateway"; readonly entry: GatewayListener };

type HostBuild = {
  readonly hostname: string;
  readonly tls?: TlsDescriptor;
  /** Key of the root proxy that owns the host, if any. */
  readonly owner?: string;
  readonly routes: Route[];
};

const compareKeys = (left: string, right: string): number =>
  left < right ? -1 : left > right ? 1 : 0;

const toRoute = (draft: RouteDraft, httpsUpgrade: boolean): Route => ({
  condition: draft.condition,
  action: draft.action,
  policy: { ...draft.policy, httpsUpgrade },
  source: draft.source,
});

const groupAttachments = (
  attachments: readonly RouteAttachment[]
): Map<string, RouteAttachment[]> => {
  const grouped = new Map<string, RouteAttachment[]>();
  for (const attachment of attachments) {
    const list = grouped.get(attachment.requestId) ?? [];
    list.push(attachment);
    grouped.set(attachment.requestId, list);
  }
  return grouped;
};

type AssemblyContext = {
  readonly config: BuilderConfig;
  readonly ledger: StatusLedger;
  readonly owners: ReadonlyMap<string, RequestOwner>;
  readonly drafts: ReadonlyMap<number, readonly RouteDraft[]>;
  readonly attachments: ReadonlyMap<string, readonly RouteAttachment[]>;
  readonly createdAt: ReadonlyMap<string, string>;
};

const finishHost = (
  host: HostBuild,
  port: number,
  context: AssemblyContext
): VirtualHost | undefined => {
  const { kept, duplicates } = dedupeRoutes(host.routes);
  for (const duplicate of duplicates) {
    context.ledger.addCondition(
      duplicate.source,
      createWarning(
        "route",
        "DuplicateMatchConditions",
        `route ${renderCondition(duplicate.condition)} on ${host.hostname} duplicates the conditions of an earlier route and is not served`
      ),
      host.owner === undefined || host.owner === duplicate.source
        ? undefined
        : host.owner
    );
  }
  if (kept.length === 0) {
    return;
  }
  const sources = [...new Set(kept.map((route) => route.source))].sort(
    compareKeys
  );
  return {
    hostname: host.hostname,
    port,
    ...(host.tls ? { tls: host.tls } : {}),
    routes: sortRoutes(kept, context.config.routeSorting),
    sources: host.owner
      ? [host.owner, ...sources.filter((source) => source !== host.owner)]
      : sources,
  };
};

const assembleListener = (
  merged: MergedListener,
  context: AssemblyContext
): Listener | undefined => {
  const hosts = new Map<string, HostBuild>();

  for (const virtualHost of merged.virtualHosts) {
    for (const request of virtualHost.requests) {
      const owner = context.owners.get(request.id);
      if (owner?.kind !== "root") {
        continue;
      }
      const { root } = owner;
      const upgradeInsecure = merged.protocol === "http" && root.tls !== undefined;
      hosts.set(virtualHost.hostname, {
        hostname: virtualHost.hostname,
        ...(virtualHost.tls ? { tls: virtualHost.tls } : {}),
        owner: root.key,
        routes: (context.drafts.get(owner.index) ?? []).map((draft) =>
          toRoute(
            draft,
            upgradeInsecure &&
              !(draft.permitInsecure && !context.config.disablePermitInsecure)
          )
        ),
      });
    }
  }

  const gatewayRoutes = new Map<
    string,
    { tls?: TlsDescriptor; attachments: RouteAttachment[] }
  >();
  for (const virtualHost of merged.virtualHosts) {
    for (const request of virtualHost.requests) {
      if (context.owners.get(request.id)?.kind !== "gateway") {
        continue;
      }
      for (const attachment of context.attachments.get(request.id) ?? []) {
        const claimed = hosts.get(attachment.hostname);
        if (claimed?.owner) {
          context.ledger.addCondition(
            attachment.routeKey,
            createError(
              "parent",
              "HostnameConflict",
              `hostname ${attachment.hostname} on port ${merged.port} is already claimed by ${claimed.owner}`
            )
          );
          continue;
        }
        const entry = gatewayRoutes.get(attachment.hostname) ?? {
          ...(request.tls ? { tls: request.tls } : {}),
          attachments: [],
        };
        entry.attachments.push(attachment);
        gatewayRoutes.set(attachment.hostname, entry);
      }
    }
  }

  for (const [hostname, entry] of gatewayRoutes) {
    const unique = new Map(
      entry.attachments.map((attachment) => [attachment.routeKey, attachment])
    );
    const ordered = [...unique.values()].sort(
      (left, right) =>
        compareTimestamps(
          context.createdAt.get(left.routeKey) ?? "",
          context.createdAt.get(right.routeKey) ?? ""
        ) || compareKeys(left.routeKey, right.routeKey)
    );
    hosts.set(hostname, {
      hostname,
      ...(entry.tls ? { tls: entry.tls } : {}),
      routes: ordered.flatMap((attachment) =>
        attachment.drafts.map((draft) => toRoute(draft, false))
      ),
    });
  }

  const virtualHosts = [...hosts.values()].flatMap((host) => {
    const finished = finishHost(host, merged.port, context);
    return finished ? [finished] : [];
  });
  if (virtualHosts.length === 0) {
    return;
  }
  return {
    name: merged.name,
    protocol: merged.protocol,
    port: merged.port,
    internalPort: merged.internalPort,
    virtualHosts,
  };
};

/**
 * Compiles one consistent set of documents into a routing graph and the
 * status records of every reported document. Pure: the same documents and
 * configuration always give the same graph.
 */
export const buildGraph = ({ documents, config }: BuildInput): BuildResult => {
  const ledger = createStatusLedger();
  const ordered = [...documents].sort((left, right) =>
    compareKeys(documentKeyOf(left), documentKeyOf(right))
  );
  const ingested = ingestDocuments(ordered, ledger);
  const secrets = createSecretLookup(ingested.secrets);
  const resolver = createServiceResolver(ingested.services);

  const { proxies } = ingested;
  const arena = createDocumentArena(
    proxies.map((proxy) => ({
      key: documentKeyOf(proxy),
      namespace: proxy.metadata.namespace,
      name: proxy.metadata.name,
      root: proxy.spec.virtualHost !== undefined,
      includes: proxy.spec.includes ?? [],
    }))
  );

  const qualified = new Map<number, QualifiedRoot>();
  for (const [index, proxy] of proxies.entries()) {
    const fqdn = proxy.spec.virtualHost?.fqdn.trim();
    if (fqdn) {
      ledger.setVirtualHost(documentKeyOf(proxy), fqdn);
    }
    const root = qualifyRoot(proxy, config, secrets, ledger);
    if (root) {
      qualified.set(index, root);
    }
  }

  const delegation = resolveDelegation(arena, [...qualified.keys()]);
  for (const finding of delegation.findings) {
    ledger.addCondition(
      arena.at(finding.document).key,
      finding.condition,
      finding.document === finding.origin
        ? undefined
        : arena.at(finding.origin).key
    );
  }
  const drafts = collectRootRoutes(proxies, delegation, resolver, ledger);

  const owners = new Map<string, RequestOwner>();
  const requests: ListenerRequest[] = [];
  for (const [index, root] of qualified) {
    for (const request of rootListenerRequests(root, config)) {
      owners.set(request.id, { kind: "root", root, index });
      requests.push(request);
    }
  }
  const gatewayListeners = gatewayListenerRequests(
    ingested.gateways,
    secrets,
    ledger
  );
  for (const entry of gatewayListeners) {
    owners.set(entry.request.id, { kind: "gateway", entry });
    requests.push(entry.request);
  }

  const merge = mergeListeners(requests);
  const rejectedRoots = new Set<string>();
  for (const rejection of merge.rejections) {
    const owner = owners.get(rejection.request.id);
    if (owner?.kind === "root") {
      rejectedRoots.add(owner.root.key);
      ledger.addCondition(
        owner.root.key,
        createError("virtualhost", rejection.reason, rejection.message)
      );
    } else if (owner?.kind === "gateway") {
      ledger.addCondition(
        owner.entry.gatewayKey,
        createError(
          "listener",
          rejection.reason,
          `listener "${owner.entry.listener.name}": ${rejection.message}`
        )
      );
    }
  }
  for (const rootKey of rejectedRoots) {
    ledger.discardOrigin(rootKey);
  }

  const admittedRoots = new Set(
    [...qualified.entries()]
      .filter(([, root]) => !rejectedRoots.has(root.key))
      .map(([index]) => index)
  );
  for (const [index, proxy] of proxies.entries()) {
    if (proxy.spec.virtualHost) {
      continue;
    }
    const reached = [...(delegation.reachedBy.get(index) ?? [])].some((root) =>
      admittedRoots.has(root)
    );
    if (reached) {
      continue;
    }
    ledger.markOrphaned(documentKeyOf(proxy));
    for (const route of proxy.spec.routes ?? []) {
      processRoute(route, { document: proxy, blocks: [], resolver, ledger });
    }
  }

  const admittedIds = new Set(merge.admitted.map((request) => request.id));
  const attachments = attachHttpRoutes(
    ingested.httpRoutes,
    gatewayListeners,
    admittedIds,
    resolver,
    ledger
  );
  const context: AssemblyContext = {
    config,
    ledger,
    owners,
    drafts,
    attachments: groupAttachments(attachments),
    createdAt: new Map(
      ingested.httpRoutes.map((route) => [
        documentKeyOf(route),
        route.metadata.creationTimestamp,
      ])
    ),
  };
  const listeners = merge.listeners.flatMap((merged) => {
    const listener = assembleListener(merged, context);
    return listener ? [listener] : [];
  });

  return {
    graph: emitGraph(listeners),
    records: ledger.toRecords(ingested.reported),
  };
};
