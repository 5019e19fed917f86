import { mergeConditions, regexProblem } from "@routegraph/conditions";
import {
  CATCH_ALL_HOSTNAME,
  isWildcardHostname,
  type ListenerRequest,
  validateHostname,
} from "@routegraph/listeners";
import type { StatusLedger } from "@routegraph/status";
import {
  createError,
  createResultErr,
  createResultOk,
  documentKeyOf,
  formatNamespacedName,
  type GatewayDocument,
  type GatewayListenerSpec,
  type HeaderMatch,
  type HttpRouteDocument,
  type HttpRouteMatch,
  type MatchConditionInput,
  type RenderedCondition,
  type Result,
  type RouteAction,
  type ServiceResolver,
  type StatusCondition,
  type WeightedCluster,
} from "@routegraph/types";

import {
  DEFAULT_ROUTE_POLICY,
  NO_BACKEND_STATUS,
  normalizeWeights,
  type RouteDraft,
  toCluster,
} from "./proxy-routes";
import type { SecretLookup } from "./secrets";

export type GatewayListener = {
  readonly gatewayKey: string;
  readonly gateway: GatewayDocument;
  readonly listener: GatewayListenerSpec;
  readonly request: ListenerRequest;
};

export const gatewayRequestId = (gatewayKey: string, listenerName: string) =>
  `${gatewayKey}#${listenerName}`;

const PROTOCOL_CLASSES = {
  HTTP: "http",
  HTTPS: "https",
} as const;

const isSupportedProtocol = (
  protocol: string
): protocol is keyof typeof PROTOCOL_CLASSES =>
  protocol === "HTTP" || protocol === "HTTPS";

/**
 * Listener requests for every gateway listener that can be served. Gateway
 * listeners are mergeable: equal hostnames from different gateways share a
 * virtual host.
 */
export const gatewayListenerRequests = (
  gateways: readonly GatewayDocument[],
  secrets: SecretLookup,
  ledger: StatusLedger
): GatewayListener[] => {
  const accepted: GatewayListener[] = [];

  for (const gateway of gateways) {
    const gatewayKey = documentKeyOf(gateway);
    const fail = (listener: GatewayListenerSpec, reason: string, message: string) => {
      ledger.addCondition(
        gatewayKey,
        createError("listener", reason, `listener "${listener.name}": ${message}`)
      );
    };

    for (const listener of gateway.spec.listeners) {
      if (!isSupportedProtocol(listener.protocol)) {
        fail(
          listener,
          "UnsupportedProtocol",
          `Listener protocol "${listener.protocol}" is unsupported, must be one of HTTP or HTTPS`
        );
        continue;
      }
      const protocol = PROTOCOL_CLASSES[listener.protocol];

      const request: ListenerRequest = {
        id: gatewayRequestId(gatewayKey, listener.name),
        source: gatewayKey,
        createdAt: gateway.metadata.creationTimestamp,
        protocol,
        port: listener.port,
        ...(listener.hostname ? { hostname: listener.hostname } : {}),
        atomic: false,
        mergeable: true,
      };

      if (protocol === "http") {
        accepted.push({ gatewayKey, gateway, listener, request });
        continue;
      }

      if (!listener.tls) {
        fail(
          listener,
          "InvalidTLSConfiguration",
          "TLS configuration is required when protocol is HTTPS"
        );
        continue;
      }
      const secret = secrets.lookup(
        listener.tls.secretName,
        gateway.metadata.namespace
      );
      if (!secret.ok) {
        fail(listener, "InvalidCertificateRef", secret.error);
        continue;
      }
      accepted.push({
        gatewayKey,
        gateway,
        listener,
        request: {
          ...request,
          tls: {
            secret: secret.value,
            minimumProtocolVersion: "1.2",
            maximumProtocolVersion: "1.3",
          },
        },
      });
    }
  }

  return accepted;
};

/** `*.example.com` matches `a.example.com` and `a.b.example.com`. */
const wildcardMatches = (wildcard: string, hostname: string): boolean => {
  const suffix = wildcard.slice(1);
  return hostname.length > suffix.length && hostname.endsWith(suffix);
};

/** Most specific hostname matched by both sides, if any. */
export const intersectHostnames = (
  listenerHostname: string | undefined,
  routeHostname: string
): string | undefined => {
  if (listenerHostname === undefined || listenerHostname === routeHostname) {
    return routeHostname;
  }
  if (
    isWildcardHostname(listenerHostname) &&
    !isWildcardHostname(routeHostname)
  ) {
    return wildcardMatches(listenerHostname, routeHostname)
      ? routeHostname
      : undefined;
  }
  if (
    isWildcardHostname(routeHostname) &&
    !isWildcardHostname(listenerHostname)
  ) {
    return wildcardMatches(routeHostname, listenerHostname)
      ? listenerHostname
      : undefined;
  }
  return;
};

type MatchProblem = {
  readonly reason: string;
  readonly message: string;
};

type PathMatchSpec = NonNullable<HttpRouteMatch["path"]>;

const DEFAULT_PATH_MATCH: PathMatchSpec = { type: "PathPrefix", value: "/" };

const pathClause = (path: PathMatchSpec): MatchConditionInput => {
  switch (path.type) {
    case "Exact":
      return { exact: path.value };
    case "PathPrefix":
      return { prefix: path.value };
    case "RegularExpression":
      return { regex: path.value };
    default: {
      const exhaustive: never = path.type;
      throw new Error(`Unsupported path match type: ${exhaustive}`);
    }
  }
};

export const buildMatchCondition = (
  match: HttpRouteMatch
): Result<RenderedCondition, MatchProblem> => {
  const block: MatchConditionInput[] = [
    pathClause(match.path ?? DEFAULT_PATH_MATCH),
  ];
  const regexHeaders: HeaderMatch[] = [];

  for (const header of match.headers ?? []) {
    if (header.type === "RegularExpression") {
      const problem = regexProblem(header.value);
      if (problem) {
        return createResultErr({
          reason: "HeaderMatchConditionsNotValid",
          message: `header regex ${header.value} is not valid: ${problem}`,
        });
      }
      regexHeaders.push({
        name: header.name.toLowerCase(),
        kind: "regex",
        value: header.value,
        invert: false,
      });
    } else {
      block.push({ header: { name: header.name, exact: header.value } });
    }
  }

  const merged = mergeConditions([block]);
  if (!merged.ok) {
    return merged;
  }
  return createResultOk({
    path: merged.value.path,
    headers: [...merged.value.headers, ...regexHeaders],
  });
};

export type RouteAttachment = {
  readonly requestId: string;
  readonly hostname: string;
  readonly routeKey: string;
  readonly drafts: readonly RouteDraft[];
};

const buildRouteDrafts = (
  route: HttpRouteDocument,
  resolver: ServiceResolver,
  report: (condition: StatusCondition) => void
): RouteDraft[] => {
  const key = documentKeyOf(route);
  const { namespace } = route.metadata;
  const drafts: RouteDraft[] = [];

  for (const rule of route.spec.rules) {
    const clusters: WeightedCluster[] = [];
    for (const backend of rule.backendRefs ?? []) {
      const backendNamespace = backend.namespace ?? namespace;
      if (backendNamespace !== namespace) {
        report(
          createError(
            "route",
            "RefNotPermitted",
            `backendRef ${formatNamespacedName(backendNamespace, backend.name)} is in a different namespace than the route and cross-namespace references are not permitted`
          )
        );
        continue;
      }
      const resolved = resolver.resolve({
        namespace: backendNamespace,
        name: backend.name,
        port: backend.port,
      });
      if (!resolved.ok) {
        report(createError("service", resolved.error.reason, resolved.error.message));
        continue;
      }
      clusters.push({
        cluster: toCluster(resolved.value),
        weight: backend.weight ?? 1,
      });
    }

    const action: RouteAction =
      clusters.length === 0
        ? { kind: "direct-response", statusCode: NO_BACKEND_STATUS }
        : { kind: "forward", clusters: normalizeWeights(clusters) };

    for (const match of rule.matches ?? [{}]) {
      const condition = buildMatchCondition(match);
      if (!condition.ok) {
        report(
          createError("route", condition.error.reason, `route: ${condition.error.message}`)
        );
        continue;
      }
      drafts.push({
        condition: condition.value,
        action,
        policy: DEFAULT_ROUTE_POLICY,
        permitInsecure: false,
        source: key,
        createdAt: route.metadata.creationTimestamp,
      });
    }
  }

  return drafts;
};

/**
 * Binds flat routes to the admitted listeners named by their parent refs.
 * Every intersecting hostname yields one attachment.
 */
export const attachHttpRoutes = (
  httpRoutes: readonly HttpRouteDocument[],
  listeners: readonly GatewayListener[],
  admitted: ReadonlySet<string>,
  resolver: ServiceResolver,
  ledger: StatusLedger
): RouteAttachment[] => {
  const byGateway = new Map<string, GatewayListener[]>();
  for (const entry of listeners) {
    const name = formatNamespacedName(
      entry.gateway.metadata.namespace,
      entry.gateway.metadata.name
    );
    const list = byGateway.get(name) ?? [];
    list.push(entry);
    byGateway.set(name, list);
  }
  const knownGateways = new Set(byGateway.keys());

  const attachments: RouteAttachment[] = [];

  for (const route of httpRoutes) {
    const routeKey = documentKeyOf(route);
    const report = (condition: StatusCondition) => {
      ledger.addCondition(routeKey, condition);
    };

    const hostnames = route.spec.hostnames ?? [];
    const invalid = hostnames
      .map((hostname) => validateHostname(hostname))
      .find((problem) => problem !== undefined);
    if (invalid) {
      report(createError("route", "InvalidHostname", invalid));
      continue;
    }

    const drafts = buildRouteDrafts(route, resolver, report);

    for (const parent of route.spec.parentRefs) {
      const gatewayName = formatNamespacedName(
        parent.namespace ?? route.metadata.namespace,
        parent.name
      );
      const candidates = (byGateway.get(gatewayName) ?? []).filter(
        (entry) =>
          parent.sectionName === undefined ||
          entry.listener.name === parent.sectionName
      );
      if (candidates.length === 0) {
        report(
          knownGateways.has(gatewayName) && parent.sectionName !== undefined
            ? createError(
                "parent",
                "NoMatchingParent",
                `listener "${parent.sectionName}" not found on gateway "${gatewayName}"`
              )
            : createError(
                "parent",
                "GatewayNotFound",
                `gateway "${gatewayName}" not found`
              )
        );
        continue;
      }

      const usable = candidates.filter((entry) => admitted.has(entry.request.id));
      if (usable.length === 0) {
        report(
          createError(
            "parent",
            "NoMatchingListener",
            `no admitted listener of gateway "${gatewayName}" matches the route`
          )
        );
        continue;
      }

      let attached = 0;
      for (const entry of usable) {
        const listenerHostname = entry.listener.hostname;
        const matched =
          hostnames.length === 0
            ? [listenerHostname ?? CATCH_ALL_HOSTNAME]
            : hostnames.flatMap((hostname) => {
                const intersection = intersectHostnames(listenerHostname, hostname);
                return intersection === undefined ? [] : [intersection];
              });
        for (const hostname of new Set(matched)) {
          attachments.push({ requestId: entry.request.id, hostname, routeKey, drafts });
          attached += 1;
        }
      }
      if (attached === 0) {
        report(
          createError(
            "parent",
            "NoMatchingListenerHostname",
            "no intersecting hostnames were found between the listener and the route"
          )
        );
      }
    }
  }

  return attachments;
};
