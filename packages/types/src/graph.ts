export type PathMatch =
  | { readonly kind: "prefix"; readonly prefix: string }
  | { readonly kind: "exact"; readonly path: string }
  | { readonly kind: "regex"; readonly regex: string };

export type PathMatchKind = PathMatch["kind"];

export type HeaderMatchKind = "present" | "exact" | "contains" | "regex";

export type HeaderMatch = {
  readonly name: string;
  readonly kind: HeaderMatchKind;
  readonly value?: string;
  readonly invert: boolean;
};

/** Effective match condition of a route once every inclusion has been applied. */
export type RenderedCondition = {
  readonly path: PathMatch;
  readonly headers: readonly HeaderMatch[];
};

export type ClusterProtocol = "http" | "h2" | "h2c" | "tls";

export type ServiceRef = {
  readonly namespace: string;
  readonly name: string;
  readonly port: number;
};

export type Cluster = {
  readonly name: string;
  readonly service: ServiceRef;
  readonly protocol: ClusterProtocol;
};

export type WeightedCluster = {
  readonly cluster: Cluster;
  readonly weight: number;
};

export type TimeoutSetting =
  | { readonly kind: "default" }
  | { readonly kind: "disabled" }
  | { readonly kind: "value"; readonly milliseconds: number };

export type HeadersRewrite = {
  readonly set: readonly { readonly name: string; readonly value: string }[];
  readonly remove: readonly string[];
  /** Replacement for the Host header; request policies only. */
  readonly hostRewrite?: string;
};

export type RoutePolicy = {
  readonly responseTimeout: TimeoutSetting;
  readonly idleTimeout: TimeoutSetting;
  readonly retry?: {
    readonly count: number;
    readonly perTryTimeout: TimeoutSetting;
  };
  readonly requestHeaders?: HeadersRewrite;
  readonly responseHeaders?: HeadersRewrite;
  readonly prefixRewrite?: string;
  readonly websocket: boolean;
  readonly httpsUpgrade: boolean;
};

export type RouteAction =
  | {
      readonly kind: "forward";
      readonly clusters: readonly WeightedCluster[];
      readonly mirror?: WeightedCluster;
    }
  | {
      readonly kind: "redirect";
      readonly scheme?: "http" | "https";
      readonly hostname?: string;
      readonly port?: number;
      readonly statusCode: 301 | 302;
    }
  | {
      readonly kind: "direct-response";
      readonly statusCode: number;
      readonly body?: string;
    };

export type Route = {
  readonly condition: RenderedCondition;
  readonly action: RouteAction;
  readonly policy: RoutePolicy;
  /** Document key of the resource that declared this route. */
  readonly source: string;
};

export type TlsVersion = "1.2" | "1.3";

export type TlsDescriptor = {
  /** Secret reference rendered as `namespace/name`. */
  readonly secret: string;
  readonly minimumProtocolVersion: TlsVersion;
  readonly maximumProtocolVersion: TlsVersion;
};

export type VirtualHost = {
  /** Hostname, or `*` for the catch-all host of a listener. */
  readonly hostname: string;
  readonly port: number;
  readonly tls?: TlsDescriptor;
  readonly routes: readonly Route[];
  readonly sources: readonly string[];
};

export type ProtocolClass = "http" | "https";

export type Listener = {
  readonly name: string;
  readonly protocol: ProtocolClass;
  readonly port: number;
  readonly internalPort: number;
  readonly virtualHosts: readonly VirtualHost[];
};

export type RouteGraph = {
  readonly listeners: readonly Listener[];
  readonly clusters: readonly Cluster[];
};

export type GraphSnapshot = {
  readonly generation: number;
  readonly graph: RouteGraph;
};
