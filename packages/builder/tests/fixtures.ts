import {
  type GatewayDocument,
  type HttpRouteDocument,
  type ProxyDocument,
  type RawDocument,
  type ServiceDocument,
  type StatusRecord,
} from "@routegraph/types";

export const CREATED_AT = "2024-01-01T00:00:00Z";

type MetadataOverrides = {
  namespace?: string;
  revision?: number;
  createdAt?: string;
};

const metadata = (name: string, overrides: MetadataOverrides) => ({
  namespace: overrides.namespace ?? "team-a",
  name,
  revision: overrides.revision ?? 1,
  creationTimestamp: overrides.createdAt ?? CREATED_AT,
});

export const createProxy = (
  name: string,
  spec: ProxyDocument["spec"],
  overrides: MetadataOverrides = {}
): RawDocument => ({ kind: "proxy", metadata: metadata(name, overrides), spec });

export const createService = (
  name: string,
  ports: ServiceDocument["spec"]["ports"] = [{ port: 80 }],
  overrides: MetadataOverrides = {}
): RawDocument => ({
  kind: "service",
  metadata: metadata(name, overrides),
  spec: { ports },
});

export const createTlsSecret = (
  name: string,
  overrides: MetadataOverrides = {}
): RawDocument => ({
  kind: "secret",
  metadata: metadata(name, overrides),
  spec: {
    type: "tls",
    data: { "tls.crt": "test-certificate", "tls.key": "test-secret" },
  },
});

export const createGateway = (
  name: string,
  listeners: GatewayDocument["spec"]["listeners"],
  overrides: MetadataOverrides = {}
): RawDocument => ({
  kind: "gateway",
  metadata: metadata(name, overrides),
  spec: { listeners },
});

export const createHttpRoute = (
  name: string,
  spec: HttpRouteDocument["spec"],
  overrides: MetadataOverrides = {}
): RawDocument => ({
  kind: "httproute",
  metadata: metadata(name, overrides),
  spec,
});

export const routeTo = (service: string, prefix?: string) => ({
  ...(prefix ? { conditions: [{ prefix }] } : {}),
  services: [{ name: service, port: 80 }],
});

export const recordFor = (
  records: readonly StatusRecord[],
  key: string
): StatusRecord | undefined => records.find((record) => record.key === key);
