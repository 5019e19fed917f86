import { type ConditionBlock, mergeConditions } from "@routegraph/conditions";
import type { DelegationResult, IncludePlaceholder } from "@routegraph/delegation";
import type { StatusLedger } from "@routegraph/status";
import {
  type Cluster,
  createError,
  createWarning,
  documentKeyOf,
  type ProxyDocument,
  type RenderedCondition,
  type ResolvedService,
  type RouteAction,
  type RoutePolicy,
  type RouteSpec,
  type ServiceResolver,
  type StatusCondition,
  type WeightedCluster,
} from "@routegraph/types";

import {
  buildHeadersPolicy,
  buildRetryPolicy,
  buildTimeoutPolicy,
  selectPrefixReplacement,
  validatePrefixReplacements,
} from "./policy";

const MIRROR_DEFAULT_WEIGHT = 100;
export const PLACEHOLDER_STATUS = 502;
export const NO_BACKEND_STATUS = 503;

/** A route before it is placed on a virtual host. */
export type RouteDraft = {
  readonly condition: RenderedCondition;
  readonly action: RouteAction;
  readonly policy: Omit<RoutePolicy, "httpsUpgrade">;
  readonly permitInsecure: boolean;
  readonly source: string;
  readonly createdAt: string;
};

export const DEFAULT_ROUTE_POLICY: Omit<RoutePolicy, "httpsUpgrade"> = {
  responseTimeout: { kind: "default" },
  idleTimeout: { kind: "default" },
  websocket: false,
};

export const clusterName = (service: ResolvedService): string => {
  const base = `${service.namespace}/${service.name}/${service.port}`;
  return service.protocol === "http" ? base : `${base}/${service.protocol}`;
};

export const toCluster = (service: ResolvedService): Cluster => ({
  name: clusterName(service),
  service: {
    namespace: service.namespace,
    name: service.name,
    port: service.port,
  },
  protocol: service.protocol,
});

/** Weights that are all zero mean an even split. */
export const normalizeWeights = (
  clusters: readonly WeightedCluster[]
): WeightedCluster[] =>
  clusters.every((entry) => entry.weight === 0)
    ? clusters.map((entry) => ({ ...entry, weight: 1 }))
    : [...clusters];

export type RouteContext = {
  readonly document: ProxyDocument;
  /** Include conditions met on the way from the root, root first. */
  readonly blocks: readonly ConditionBlock[];
  /** Root key the findings belong to; omitted for the root itself. */
  readonly origin?: string;
  readonly resolver: ServiceResolver;
  readonly ledger: StatusLedger;
};

const resolveForwardAction = (
  route: RouteSpec,
  context: RouteContext,
  report: (condition: StatusCondition) => void
): RouteAction | undefined => {
  const services = route.services ?? [];
  if (services.filter((service) => service.mirror).length > 1) {
    report(
      createError(
        "route",
        "OnlyOneMirror",
        "only one service per route may be nominated as mirror"
      )
    );
    return;
  }

  const clusters: WeightedCluster[] = [];
  let mirror: WeightedCluster | undefined;
  for (const service of services) {
    const resolved = context.resolver.resolve({
      namespace: context.document.metadata.namespace,
      name: service.name,
      port: service.port,
      ...(service.protocol ? { protocol: service.protocol } : {}),
    });
    if (!resolved.ok) {
      report(createError("service", resolved.error.reason, resolved.error.message));
      continue;
    }
    const cluster = toCluster(resolved.value);
    if (service.mirror) {
      mirror = { cluster, weight: service.weight || MIRROR_DEFAULT_WEIGHT };
    } else {
      clusters.push({ cluster, weight: service.weight ?? 0 });
    }
  }

  if (clusters.length === 0) {
    return { kind: "direct-response", statusCode: NO_BACKEND_STATUS };
  }
  return {
    kind: "forward",
    clusters: normalizeWeights(clusters),
    ...(mirror ? { mirror } : {}),
  };
};

/**
 * Turns one declared route into a draft, recording findings on the declaring
 * document. Returns `undefined` when the route cannot be served at all.
 */
export const processRoute = (
  route: RouteSpec,
  context: RouteContext
): RouteDraft | undefined => {
  const { document, ledger, origin } = context;
  const key = documentKeyOf(document);
  const report = (condition: StatusCondition) => {
    ledger.addCondition(key, condition, origin);
  };

  const merged = mergeConditions([...context.blocks, route.conditions ?? []]);
  if (!merged.ok) {
    report(
      createError("route", merged.error.reason, `route: ${merged.error.message}`)
    );
    return;
  }
  const condition = merged.value;

  const actions = [
    (route.services?.length ?? 0) > 0,
    route.requestRedirectPolicy !== undefined,
    route.directResponsePolicy !== undefined,
  ].filter(Boolean).length;
  if (actions !== 1) {
    report(
      createError(
        "route",
        "RouteActionCountNotValid",
        "must set exactly one of route.services or route.requestRedirectPolicy or route.directResponsePolicy"
      )
    );
    return;
  }

  let prefixRewrite: string | undefined;
  const replacements = route.pathRewritePolicy?.replacePrefix ?? [];
  if (replacements.length > 0) {
    const { path } = condition;
    if (path.kind !== "prefix") {
      report(
        createError(
          "route",
          "MustHavePrefix",
          "cannot specify prefix replacements without a prefix condition"
        )
      );
      return;
    }
    const problem = validatePrefixReplacements(replacements);
    if (problem) {
      report(createError("route", problem.reason, problem.message));
      return;
    }
    prefixRewrite = selectPrefixReplacement(path.prefix, replacements);
  }

  const timeouts = buildTimeoutPolicy(route.timeoutPolicy);
  const retry = buildRetryPolicy(route.retryPolicy);
  const requestHeaders = buildHeadersPolicy(route.requestHeadersPolicy, "request");
  const responseHeaders = buildHeadersPolicy(
    route.responseHeadersPolicy,
    "response"
  );
  for (const outcome of [timeouts, retry, requestHeaders, responseHeaders]) {
    if (!outcome.ok) {
      report(createWarning("route", outcome.error.reason, outcome.error.message));
    }
  }

  let action: RouteAction | undefined;
  if (route.requestRedirectPolicy) {
    const redirect = route.requestRedirectPolicy;
    action = {
      kind: "redirect",
      statusCode: redirect.statusCode ?? 302,
      ...(redirect.scheme ? { scheme: redirect.scheme } : {}),
      ...(redirect.hostname ? { hostname: redirect.hostname } : {}),
      ...(redirect.port === undefined ? {} : { port: redirect.port }),
    };
  } else if (route.directResponsePolicy) {
    const direct = route.directResponsePolicy;
    action = {
      kind: "direct-response",
      statusCode: direct.statusCode,
      ...(direct.body === undefined ? {} : { body: direct.body }),
    };
  } else {
    action = resolveForwardAction(route, context, report);
  }
  if (!action) {
    return;
  }

  return {
    condition,
    action,
    policy: {
      ...(timeouts.ok ? timeouts.value : DEFAULT_ROUTE_POLICY),
      ...(retry.ok && retry.value ? { retry: retry.value } : {}),
      ...(requestHeaders.ok && requestHeaders.value
        ? { requestHeaders: requestHeaders.value }
        : {}),
      ...(responseHeaders.ok && responseHeaders.value
        ? { responseHeaders: responseHeaders.value }
        : {}),
      ...(prefixRewrite === undefined ? {} : { prefixRewrite }),
      websocket: route.enableWebsockets ?? false,
    },
    permitInsecure: route.permitInsecure ?? false,
    source: key,
    createdAt: document.metadata.creationTimestamp,
  };
};

/**
 * Drafts every route reachable from each root in traversal order. Placeholders
 * for unusable include edges sit where their include was met.
 */
export const collectRootRoutes = (
  proxies: readonly ProxyDocument[],
  delegation: DelegationResult,
  resolver: ServiceResolver,
  ledger: StatusLedger
): Map<number, RouteDraft[]> => {
  const drafts = new Map<number, RouteDraft[]>();
  const documentAt = (index: number): ProxyDocument => {
    const document = proxies[index];
    if (!document) {
      throw new RangeError(`No proxy at index ${index}`);
    }
    return document;
  };
  const draftsFor = (root: number): RouteDraft[] => {
    const list = drafts.get(root) ?? [];
    drafts.set(root, list);
    return list;
  };

  const pushPlaceholder = (placeholder: IncludePlaceholder) => {
    const merged = mergeConditions(placeholder.blocks);
    if (!merged.ok) {
      return;
    }
    const includer = documentAt(placeholder.includer);
    draftsFor(placeholder.root).push({
      condition: merged.value,
      action: { kind: "direct-response", statusCode: PLACEHOLDER_STATUS },
      policy: DEFAULT_ROUTE_POLICY,
      permitInsecure: false,
      source: documentKeyOf(includer),
      createdAt: includer.metadata.creationTimestamp,
    });
  };

  const { placeholders } = delegation;
  let next = 0;
  const pushPlaceholdersBefore = (position: number) => {
    while (next < placeholders.length) {
      const placeholder = placeholders[next];
      if (!placeholder || placeholder.position > position) {
        return;
      }
      pushPlaceholder(placeholder);
      next += 1;
    }
  };

  for (const [position, path] of delegation.paths.entries()) {
    pushPlaceholdersBefore(position);
    const root = documentAt(path.root);
    const leaf = documentAt(path.leaf);
    const context: RouteContext = {
      document: leaf,
      blocks: path.steps.map((step) => step.conditions),
      ...(path.leaf === path.root ? {} : { origin: documentKeyOf(root) }),
      resolver,
      ledger,
    };
    const list = draftsFor(path.root);
    for (const route of leaf.spec.routes ?? []) {
      const draft = processRoute(route, context);
      if (draft) {
        list.push(draft);
      }
    }
  }

  pushPlaceholdersBefore(delegation.paths.length);

  return drafts;
};
